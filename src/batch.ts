import path from 'path';
import type { Settings } from './config';
import { UserAbort } from './errors';
import {
    type Collaborators,
    type CommitResult,
    type FileRecord,
    commit,
    hasChanges,
    loadFileRecord,
    processFile,
    targetPath,
} from './file';
import { logger } from './logger';
import { separatorChar } from './strings';

export interface BatchHooks {
    /** Called with the pending changes before anything is renamed; false aborts the batch. */
    confirm?: (pending: FileRecord[]) => Promise<boolean>;
}

export interface BatchSummary {
    renamed: number;
    unchanged: number;
    unresolved: number;
    failed: number;
}

export interface BatchResult {
    records: FileRecord[];
    results: CommitResult[];
    summary: BatchSummary;
}

function displayPath(file: string): string {
    return path.relative(process.cwd(), file) || file;
}

export function summarize(records: readonly FileRecord[], results: readonly CommitResult[]): BatchSummary {
    return {
        renamed: results.filter((r) => r.status === 'renamed').length,
        unchanged: results.filter((r) => r.status === 'no-change').length,
        unresolved: records.filter((r) => r.unresolved).length,
        failed: results.filter((r) => r.status === 'failed').length,
    };
}

/**
 * Work out every file's new name first, then rename them one by one in the
 * given order. Later files see the names taken by earlier ones. A failed
 * rename is reported and the batch moves on; an abort stops it before
 * anything else is renamed.
 */
export async function runBatch(
    paths: readonly string[],
    settings: Settings,
    collaborators: Collaborators = {},
    hooks: BatchHooks = {},
): Promise<BatchResult> {
    const records: FileRecord[] = [];
    for (const file of paths) {
        const record = await processFile(await loadFileRecord(file), settings, collaborators);
        if (record.unresolved) {
            logger.warn(`No folder chosen for ${path.basename(record.path)}, leaving it in place`);
        }
        records.push(record);
    }

    const pending = records.filter(hasChanges);
    if (hooks.confirm && pending.length > 0 && !await hooks.confirm(pending)) {
        throw new UserAbort('Batch not confirmed, nothing was renamed');
    }

    const claimed = settings.dryRun ? new Set<string>() : undefined;
    const results: CommitResult[] = [];
    for (const record of records) {
        const result = await commit(record, {
            dryRun: settings.dryRun,
            overwriteExisting: settings.overwriteExisting,
            separator: separatorChar(settings.clean.separatorMode),
            claimed,
        });
        switch (result.status) {
            case 'renamed':
                logger.info(`${settings.dryRun ? '[DRY-RUN] ' : ''}${path.basename(result.from)} -> ${displayPath(result.to)}`);
                break;
            case 'no-change':
                logger.debug(`No change: ${path.basename(result.path)}`);
                break;
            case 'failed':
                logger.error(result.error.message);
                break;
        }
        results.push(result);
    }

    const summary = summarize(records, results);
    logger.info(
        `${summary.renamed} renamed, ${summary.unchanged} unchanged, ${summary.unresolved} unresolved, ${summary.failed} failed`,
    );
    return { records, results, summary };
}

export function describePending(record: FileRecord): string {
    return `${path.basename(record.path)} -> ${displayPath(targetPath(record))}`;
}
