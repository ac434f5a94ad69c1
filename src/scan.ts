import fs from 'fs-extra';
import path from 'path';
import { ConfigurationError } from './errors';
import { logger } from './logger';

export interface ScanProgress {
    discovered: number;
}

export interface ScanOptions {
    /** 1 = only the direct children of each input directory. */
    depth: number;
    ignoreDotfiles: boolean;
    ignoredFiles: readonly string[];
    ignoreFileRegex?: RegExp;
    onProgress?: (progress: ScanProgress) => void;
}

export function isIgnored(name: string, options: Pick<ScanOptions, 'ignoreDotfiles' | 'ignoredFiles' | 'ignoreFileRegex'>): boolean {
    if (options.ignoreDotfiles && name.startsWith('.')) return true;
    if (options.ignoredFiles.includes(name)) return true;
    return options.ignoreFileRegex?.test(name) ?? false;
}

/**
 * Gather the files to work on. Files named directly are always taken;
 * directories are walked down to `depth`, skipping ignored names. The result
 * is absolute, de-duplicated and sorted, which is the order the batch runs in.
 */
export async function collectFiles(inputs: readonly string[], options: ScanOptions): Promise<string[]> {
    const found = new Set<string>();

    const report = () => {
        if (options.onProgress && found.size % 100 === 0) {
            options.onProgress({ discovered: found.size });
        }
    };

    const walk = async (dir: string, level: number) => {
        const entries = await fs.readdir(dir, { withFileTypes: true });
        for (const entry of entries) {
            if (isIgnored(entry.name, options)) continue;
            const entryPath = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                if (level < options.depth) {
                    await walk(entryPath, level + 1);
                }
            } else if (entry.isFile() && !found.has(entryPath)) {
                found.add(entryPath);
                report();
            }
        }
    };

    for (const input of inputs) {
        const absolute = path.resolve(input);
        if (!await fs.pathExists(absolute)) {
            throw new ConfigurationError(`Input path does not exist: ${input}`);
        }
        const stat = await fs.stat(absolute);
        if (stat.isDirectory()) {
            await walk(absolute, 1);
        } else if (!found.has(absolute)) {
            found.add(absolute);
            report();
        }
    }

    options.onProgress?.({ discovered: found.size });
    logger.debug(`Collected ${found.size} files`);
    return [...found].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
