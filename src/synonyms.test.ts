import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { ConfigurationError } from './errors';
import { createThesaurusExpander, identityExpander, loadThesaurus } from './synonyms';

describe('expanders', () => {
    it('returns just the word without a thesaurus', () => {
        expect(identityExpander('invoice')).toEqual(new Set(['invoice']));
    });

    it('adds synonyms looked up without regard to case', () => {
        const expand = createThesaurusExpander({ Invoice: ['receipt'], invoice: ['statement'] });
        expect(expand('INVOICE')).toEqual(new Set(['INVOICE', 'receipt', 'statement']));
        expect(expand('lunch')).toEqual(new Set(['lunch']));
    });
});

describe('loadThesaurus', () => {
    let dir: string;

    beforeAll(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'jdsort-synonyms-'));
    });

    afterAll(async () => {
        await fs.remove(dir);
    });

    it('reads a JSON word list', async () => {
        const file = path.join(dir, 'thesaurus.json');
        await fs.writeJSON(file, { trip: ['travel', 'holiday'] });
        const expand = await loadThesaurus(file);
        expect(expand('trip')).toEqual(new Set(['trip', 'travel', 'holiday']));
    });

    it('rejects files of the wrong shape', async () => {
        const file = path.join(dir, 'bad.json');
        await fs.writeJSON(file, { trip: 'travel' });
        await expect(loadThesaurus(file)).rejects.toThrow(ConfigurationError);
    });

    it('rejects a missing file', async () => {
        await expect(loadThesaurus(path.join(dir, 'missing.json'))).rejects.toThrow(ConfigurationError);
    });
});
