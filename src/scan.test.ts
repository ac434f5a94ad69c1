import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from './errors';
import { type ScanOptions, collectFiles } from './scan';

describe('collectFiles', () => {
    let dir: string;
    const base: ScanOptions = { depth: 1, ignoreDotfiles: true, ignoredFiles: ['.DS_Store'] };

    beforeAll(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'jdsort-scan-'));
        await fs.ensureDir(path.join(dir, 'sub', 'deeper'));
        for (const name of ['b.txt', 'a.txt', '.hidden', '.DS_Store', 'skip.log', 'sub/c.txt', 'sub/deeper/d.txt']) {
            await fs.writeFile(path.join(dir, name), name);
        }
    });

    afterAll(async () => {
        await fs.remove(dir);
    });

    const relative = (files: string[]) => files.map((f) => path.relative(dir, f));

    it('lists direct children in sorted order and reports progress', async () => {
        const onProgress = vi.fn();
        const files = await collectFiles([dir], { ...base, onProgress });
        expect(relative(files)).toEqual(['a.txt', 'b.txt', 'skip.log']);
        expect(onProgress).toHaveBeenCalledTimes(1);
        expect(onProgress).toHaveBeenCalledWith({ discovered: 3 });
    });

    it('walks down to the given depth', async () => {
        const files = await collectFiles([dir], { ...base, depth: 2 });
        expect(relative(files)).toEqual(['a.txt', 'b.txt', 'skip.log', path.join('sub', 'c.txt')]);
    });

    it('applies the ignore rules', async () => {
        expect(relative(await collectFiles([dir], { ...base, ignoreFileRegex: /\.log$/ }))).toEqual(['a.txt', 'b.txt']);
        expect(relative(await collectFiles([dir], { ...base, ignoreDotfiles: false }))).toEqual([
            '.hidden',
            'a.txt',
            'b.txt',
            'skip.log',
        ]);
    });

    it('takes named files as they are and drops duplicates', async () => {
        const files = await collectFiles([path.join(dir, 'a.txt'), dir, path.join(dir, '.hidden')], base);
        expect(relative(files)).toEqual(['.hidden', 'a.txt', 'b.txt', 'skip.log']);
    });

    it('rejects an input that does not exist', async () => {
        await expect(collectFiles([path.join(dir, 'missing')], base)).rejects.toThrow(ConfigurationError);
    });
});
