import { PassThrough, Writable } from 'stream';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Prompt, describeCandidate } from './chooser';
import { createFileRecord } from './file';
import type { Folder } from './project';
import type { Candidate } from './resolver';

function folder(number: string, name: string): Folder {
    return { path: `/project/${number} ${name}`, level: 'subcategory', number, name, terms: [name] };
}

const candidates: Candidate[] = [
    { folder: folder('11.01', 'Invoices'), matchedTerms: ['acme'] },
    { folder: folder('11.02', 'Receipts'), matchedTerms: ['acme', 'receipts'] },
];
const record = createFileRecord('/inbox/acme receipts.pdf');

describe('Prompt', () => {
    let input: PassThrough;
    let output: Writable;
    let written: string;
    let prompt: Prompt;

    beforeEach(() => {
        input = new PassThrough();
        written = '';
        output = new Writable({
            write(chunk: Buffer, _encoding, callback) {
                written += chunk.toString();
                callback();
            },
        });
        prompt = new Prompt({ input, output });
    });

    afterEach(() => {
        prompt.close();
    });

    it('lists the candidates and returns the chosen folder', async () => {
        input.write('7\n2\n');
        const answer = await prompt.choose(candidates, record);
        expect(answer).toEqual({ kind: 'folder', folder: candidates[1].folder });
        expect(written).toContain('Several folders match acme receipts.pdf:\n');
        expect(written).toContain('  2) 11.02 Receipts (matched: acme, receipts)\n');
        expect(written).toContain('Not an option: 7\n');
    });

    it('can leave the file in place or abort', async () => {
        input.write('s\nQ\n');
        expect(await prompt.choose(candidates, record)).toEqual({ kind: 'skip' });
        expect(await prompt.choose(candidates, record)).toEqual({ kind: 'abort' });
    });

    it('aborts when the input ends', async () => {
        input.end();
        expect(await prompt.choose(candidates, record)).toEqual({ kind: 'abort' });
    });

    it('confirms only on yes', async () => {
        input.write('yes\nn\n');
        expect(await prompt.confirm('Apply 2 change(s)?')).toBe(true);
        expect(await prompt.confirm('Apply 2 change(s)?')).toBe(false);
        expect(written).toContain('Apply 2 change(s)? [y/N] ');
    });
});

describe('describeCandidate', () => {
    it('shows flat folders by name', () => {
        const flat: Folder = { path: '/p/Clients', level: 'other', name: 'Clients', terms: ['Clients'] };
        expect(describeCandidate({ folder: flat, matchedTerms: ['clients'] })).toBe('Clients (matched: clients)');
    });
});
