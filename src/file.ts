import fs from 'fs-extra';
import path from 'path';
import type { Settings } from './config';
import { type CalendarDate, type DateMatch, findDate, formatDate, fromJsDate } from './dates';
import { RenameError, UserAbort } from './errors';
import { logger } from './logger';
import type { Folder, ProjectIndex } from './project';
import { type Candidate, resolve, tokenize } from './resolver';
import { cleanStem, cleanSuffixes, insertText, separatorChar } from './strings';
import type { SynonymExpander } from './synonyms';
import { makeUnique, splitName } from './unique';

export type FileState =
    | 'new'
    | 'date-extracted'
    | 'normalized'
    | 'date-reinserted'
    | 'organized'
    | 'skipped'
    | 'committed';

export interface FileRecord {
    path: string;
    stem: string;
    suffixes: string[];
    isDotfile: boolean;
    /** Creation date on disk; stands in when the name carries no date. */
    createdOn?: CalendarDate;
    newStem: string;
    newSuffixes: string[];
    newParent: string;
    changes: {
        stem: boolean;
        suffixes: boolean;
        parent: boolean;
    };
    state: FileState;
    dateMatch?: DateMatch;
    /** Set when organizing found no folder or the chooser said to leave the file. */
    unresolved?: boolean;
    matchedTerms?: string[];
}

export type ChooserAnswer =
    | { kind: 'folder'; folder: Folder }
    | { kind: 'skip' }
    | { kind: 'abort' };

/** Picks between several matching folders; awaited before the next file is touched. */
export type Chooser = (candidates: Candidate[], file: FileRecord) => Promise<ChooserAnswer>;

export interface Collaborators {
    index?: ProjectIndex;
    expand?: SynonymExpander;
    choose?: Chooser;
    today?: CalendarDate;
}

export type CommitResult =
    | { status: 'renamed'; from: string; to: string; dryRun: boolean }
    | { status: 'no-change'; path: string }
    | { status: 'failed'; path: string; error: RenameError };

export function createFileRecord(filePath: string, createdOn?: CalendarDate): FileRecord {
    const absolute = path.resolve(filePath);
    const { stem, suffixes } = splitName(path.basename(absolute));
    return {
        path: absolute,
        stem,
        suffixes,
        isDotfile: stem.startsWith('.'),
        createdOn,
        newStem: stem,
        newSuffixes: [...suffixes],
        newParent: path.dirname(absolute),
        changes: { stem: false, suffixes: false, parent: false },
        state: 'new',
    };
}

/**
 * Create a record for a file on disk, using its birth time (or change time
 * where the filesystem has none) as the reference date.
 */
export async function loadFileRecord(filePath: string): Promise<FileRecord> {
    const stat = await fs.stat(filePath);
    const created = stat.birthtimeMs > 0 ? stat.birthtime : stat.ctime;
    return createFileRecord(filePath, fromJsDate(created));
}

export function targetPath(record: FileRecord): string {
    return path.join(record.newParent, `${record.newStem}${record.newSuffixes.join('')}`);
}

export function hasChanges(record: FileRecord): boolean {
    return record.changes.stem || record.changes.suffixes || record.changes.parent;
}

/**
 * Cut the matched date out of the stem and close the gap with one of the
 * separators that stood around it.
 */
function removeMatchedText(stem: string, match: DateMatch): string {
    if (!match.matchedText) return stem;
    const at = match.index ?? stem.indexOf(match.matchedText);
    if (at < 0) return stem;

    const head = stem.slice(0, at);
    const tail = stem.slice(at + match.matchedText.length);
    const before = head.replace(/[-_ .,]+$/, '');
    const after = tail.replace(/^[-_ .,]+/, '');
    const around = head.slice(before.length) || tail.slice(0, tail.length - after.length);
    const joiner = before && after ? (around.charAt(0) || ' ').replace(',', ' ') : '';
    const dot = stem.startsWith('.') && !before.startsWith('.') ? '.' : '';
    return `${dot}${before}${joiner}${after}`;
}

function extractDate(record: FileRecord, settings: Settings, today?: CalendarDate): string {
    if (!settings.formatDates) return record.stem;

    record.dateMatch = findDate(record.stem, record.createdOn, today);
    record.state = 'date-extracted';
    return record.dateMatch ? removeMatchedText(record.stem, record.dateMatch) : record.stem;
}

function reinsertDate(record: FileRecord, stem: string, settings: Settings): string {
    if (!settings.formatDates || !record.dateMatch) return stem;

    const formatted = formatDate(record.dateMatch.date, settings.dateFormat);
    record.state = 'date-reinserted';
    return insertText(stem, formatted, settings.insertLocation, separatorChar(settings.clean.separatorMode));
}

async function organize(record: FileRecord, settings: Settings, collaborators: Collaborators): Promise<void> {
    const { index } = collaborators;
    if (!settings.organize || !index) return;

    const tokens = tokenize(record.newStem, settings.terms, collaborators.expand);
    const resolution = resolve(tokens, index, { jdNumber: settings.jdNumber, force: settings.force });

    let folder: Folder | undefined;
    switch (resolution.kind) {
        case 'selected':
            folder = resolution.folder;
            record.matchedTerms = resolution.matchedTerms;
            logger.debug(`${path.basename(record.path)} matched ${folder.path} by ${resolution.reason}`);
            break;
        case 'candidates': {
            if (!collaborators.choose) break;
            const answer = await collaborators.choose(resolution.candidates, record);
            if (answer.kind === 'abort') {
                throw new UserAbort();
            }
            if (answer.kind === 'folder') {
                folder = answer.folder;
                record.matchedTerms = resolution.candidates.find((c) => c.folder.path === folder?.path)?.matchedTerms;
            }
            break;
        }
        case 'no-match':
            break;
    }

    if (!folder) {
        record.unresolved = true;
        record.state = 'skipped';
        return;
    }

    record.newParent = folder.path;
    record.changes.parent = folder.path !== path.dirname(record.path);
    record.state = 'organized';
}

/**
 * Compute the new name and parent for one file. Nothing touches the disk
 * here; see commit().
 */
export async function processFile(record: FileRecord, settings: Settings, collaborators: Collaborators = {}): Promise<FileRecord> {
    let stem = extractDate(record, settings, collaborators.today);

    if (settings.cleanFilenames) {
        stem = cleanStem(stem, settings.clean);
        record.state = 'normalized';
        record.newSuffixes = cleanSuffixes(record.suffixes);
    }

    record.newStem = reinsertDate(record, stem, settings);
    record.changes.stem = record.newStem !== record.stem;
    record.changes.suffixes = record.newSuffixes.join('') !== record.suffixes.join('');

    await organize(record, settings, collaborators);
    return record;
}

export interface CommitOptions {
    dryRun: boolean;
    overwriteExisting: boolean;
    separator: string;
    /** Targets already claimed by earlier files in the same dry run. */
    claimed?: Set<string>;
}

/**
 * Rename the file to its computed target, numbering it when the target is
 * taken and overwriting is off. A failed rename is returned, not thrown, so
 * the caller decides whether the batch goes on.
 */
export async function commit(record: FileRecord, options: CommitOptions): Promise<CommitResult> {
    if (!hasChanges(record)) {
        return { status: 'no-change', path: record.path };
    }

    let target = targetPath(record);
    if (target !== record.path) {
        const blocked = (await fs.pathExists(target)) && (!options.overwriteExisting || (await fs.stat(target)).isDirectory());
        if (blocked || options.claimed?.has(target)) {
            target = await makeUnique(target, {
                separator: options.separator,
                suffixes: record.newSuffixes,
                taken: options.claimed,
            });
            const name = path.basename(target);
            record.newStem = name.slice(0, name.length - record.newSuffixes.join('').length);
        }
    }

    if (options.dryRun) {
        options.claimed?.add(target);
        record.state = 'committed';
        return { status: 'renamed', from: record.path, to: target, dryRun: true };
    }

    try {
        await fs.rename(record.path, target);
    } catch (err) {
        return { status: 'failed', path: record.path, error: new RenameError(record.path, target, err) };
    }
    record.state = 'committed';
    return { status: 'renamed', from: record.path, to: target, dryRun: false };
}
