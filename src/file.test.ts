import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { resolveSettings } from './config';
import { RenameError } from './errors';
import { commit, createFileRecord, processFile, targetPath } from './file';
import { buildIndex } from './project';
import { tokenize } from './resolver';

const today = { year: 2024, month: 6, day: 15 };

describe('processFile', () => {
    it('extracts, cleans and reinserts the date', async () => {
        const settings = resolveSettings({ case: 'title', separator: 'underscore' });
        const record = await processFile(
            createFileRecord('/files/month-DD-YYYY file january 01 2016.txt'),
            settings,
            { today },
        );
        expect(record.dateMatch?.matchedText).toBe('january 01 2016');
        expect(record.newStem).toBe('2016-01-01_Month_Dd_Yyyy_File');
        expect(record.newSuffixes).toEqual(['.txt']);
        expect(record.state).toBe('date-reinserted');
        expect(targetPath(record)).toBe(path.join('/files', '2016-01-01_Month_Dd_Yyyy_File.txt'));
    });

    it('keeps the words on either side of a date apart', async () => {
        const record = await processFile(createFileRecord('/f/invoice2023-05-01acme.pdf'), resolveSettings(), { today });
        expect(record.newStem).toBe('2023-05-01_invoice acme');
        expect(tokenize(record.newStem)).toEqual(new Set(['invoice', 'acme']));
    });

    it('only moves the date when cleaning is off', async () => {
        const record = await processFile(createFileRecord('/files/Scan 03.04.2022 Final.PDF'), resolveSettings({ clean: false }), {
            today,
        });
        expect(record.newStem).toBe('2022-03-04_Scan Final');
        expect(record.newSuffixes).toEqual(['.PDF']);
    });

    it('inserts the reference date when the name has none', async () => {
        const record = createFileRecord('/files/notes.md', { year: 2021, month: 5, day: 6 });
        await processFile(record, resolveSettings({ insertLocation: 'after', separator: 'dash' }), { today });
        expect(record.newStem).toBe('notes-2021-05-06');
    });

    it('leaves an already clean name alone', async () => {
        const record = await processFile(createFileRecord('/files/2023-01-05_notes.txt'), resolveSettings(), { today });
        expect(record.changes).toEqual({ stem: false, suffixes: false, parent: false });
    });

    it('normalizes the extension chain', async () => {
        const record = await processFile(createFileRecord('/files/holiday.JPEG'), resolveSettings({ formatDates: false }), { today });
        expect(record.newSuffixes).toEqual(['.jpg']);
        expect(record.changes.suffixes).toBe(true);
    });
});

describe('organizing', () => {
    let root: string;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'jdsort-file-'));
        await fs.ensureDir(path.join(root, 'project', '10-19 Admin', '11 Finance', '11.01 Invoices'));
        await fs.ensureDir(path.join(root, 'project', '10-19 Admin', '11 Finance', '11.02 Receipts'));
        await fs.ensureDir(path.join(root, 'inbox'));
    });

    afterEach(async () => {
        await fs.remove(root);
    });

    it('files a matching document into its folder', async () => {
        const index = await buildIndex(path.join(root, 'project'));
        const source = path.join(root, 'inbox', 'acme invoices 2023-05-01.pdf');
        await fs.writeFile(source, 'pdf');

        const record = await processFile(createFileRecord(source), resolveSettings(), { index, today });
        expect(record.state).toBe('organized');
        expect(record.matchedTerms).toEqual(['Invoices']);

        const result = await commit(record, { dryRun: false, overwriteExisting: false, separator: '_' });
        const expected = path.join(root, 'project', '10-19 Admin', '11 Finance', '11.01 Invoices', '2023-05-01_acme invoices.pdf');
        expect(result).toEqual({ status: 'renamed', from: source, to: expected, dryRun: false });
        expect(await fs.pathExists(expected)).toBe(true);
        expect(await fs.pathExists(source)).toBe(false);
    });

    it('leaves the file in place when nothing matches', async () => {
        const index = await buildIndex(path.join(root, 'project'));
        const record = await processFile(createFileRecord(path.join(root, 'inbox', 'holiday.txt')), resolveSettings({ formatDates: false }), {
            index,
            today,
        });
        expect(record.unresolved).toBe(true);
        expect(record.state).toBe('skipped');
        expect(record.newParent).toBe(path.join(root, 'inbox'));
    });
});

describe('commit', () => {
    let dir: string;
    const options = { dryRun: false, overwriteExisting: false, separator: '_' };

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'jdsort-commit-'));
    });

    afterEach(async () => {
        await fs.remove(dir);
    });

    function renamed(name: string, newStem: string) {
        const record = createFileRecord(path.join(dir, name));
        record.newStem = newStem;
        record.changes.stem = true;
        return record;
    }

    it('renames the file', async () => {
        await fs.writeFile(path.join(dir, 'a.txt'), 'a');
        const result = await commit(renamed('a.txt', 'b'), options);
        expect(result).toEqual({ status: 'renamed', from: path.join(dir, 'a.txt'), to: path.join(dir, 'b.txt'), dryRun: false });
        expect(await fs.readFile(path.join(dir, 'b.txt'), 'utf-8')).toBe('a');
    });

    it('numbers the new name instead of overwriting', async () => {
        await fs.writeFile(path.join(dir, 'a.txt'), 'a');
        await fs.writeFile(path.join(dir, 'b.txt'), 'b');
        const record = renamed('a.txt', 'b');
        const result = await commit(record, options);
        expect(result).toMatchObject({ status: 'renamed', to: path.join(dir, 'b_1.txt') });
        expect(record.newStem).toBe('b_1');
        expect(await fs.readFile(path.join(dir, 'b.txt'), 'utf-8')).toBe('b');
    });

    it('overwrites when allowed', async () => {
        await fs.writeFile(path.join(dir, 'a.txt'), 'a');
        await fs.writeFile(path.join(dir, 'b.txt'), 'b');
        const result = await commit(renamed('a.txt', 'b'), { ...options, overwriteExisting: true });
        expect(result).toMatchObject({ status: 'renamed', to: path.join(dir, 'b.txt') });
        expect(await fs.readFile(path.join(dir, 'b.txt'), 'utf-8')).toBe('a');
    });

    it('keeps names claimed earlier in a dry run apart', async () => {
        await fs.writeFile(path.join(dir, 'x.txt'), 'x');
        await fs.writeFile(path.join(dir, 'y.txt'), 'y');
        const claimed = new Set<string>();
        const first = await commit(renamed('x.txt', 'z'), { ...options, dryRun: true, claimed });
        const second = await commit(renamed('y.txt', 'z'), { ...options, dryRun: true, claimed });
        expect(first).toMatchObject({ to: path.join(dir, 'z.txt'), dryRun: true });
        expect(second).toMatchObject({ to: path.join(dir, 'z_1.txt'), dryRun: true });
        expect(await fs.pathExists(path.join(dir, 'z.txt'))).toBe(false);
    });

    it('reports files without changes', async () => {
        const record = createFileRecord(path.join(dir, 'a.txt'));
        expect(await commit(record, options)).toEqual({ status: 'no-change', path: path.join(dir, 'a.txt') });
    });

    it('returns the failure instead of throwing', async () => {
        const result = await commit(renamed('gone.txt', 'moved'), options);
        expect(result.status).toBe('failed');
        if (result.status === 'failed') {
            expect(result.error).toBeInstanceOf(RenameError);
            expect(result.error.code).toBe('ENOENT');
        }
    });
});
