import { validateDateFormat } from './dates';
import { ConfigurationError } from './errors';
import type { ProjectType } from './project';
import type { CaseMode, CleanOptions, InsertLocation, SeparatorMode } from './strings';

export const CONFIG = {
    DATE_FORMAT: '%Y-%m-%d',
    FORMAT_DATES: true,
    CLEAN_FILENAMES: true,
    SEPARATOR: 'ignore',
    CASE: 'ignore',
    SPLIT_WORDS: false,
    STRIP_STOPWORDS: true,
    STOPWORDS: [],
    // Words whose casing is never changed
    MATCH_CASE: ['iMac', 'iPhone'],
    OVERWRITE_EXISTING: false,
    INSERT_LOCATION: 'before',
    ORGANIZE: true,
    // Depth when walking input directories (1 = direct children only)
    DEPTH: 1,
    // Depth indexed for flat (non Johnny Decimal) projects
    PROJECT_DEPTH: 2,
    IGNORE_DOTFILES: true,
    IGNORED_FILES: [],
    ALWAYS_IGNORED_FILES: ['.DS_Store', '.localized', 'desktop.ini', 'Thumbs.db', '.jdsort'],
    SIDECAR_FILE: '.jdsort',
} as const;

const SEPARATOR_ALIASES: Record<string, SeparatorMode> = {
    dash: 'dash',
    '-': 'dash',
    space: 'space',
    ' ': 'space',
    underscore: 'underscore',
    _: 'underscore',
    none: 'none',
    '': 'none',
    ignore: 'ignore',
};

const CASE_ALIASES: Record<string, CaseMode> = {
    lower: 'lower',
    upper: 'upper',
    title: 'title',
    sentence: 'sentence',
    camel: 'camel',
    camelcase: 'camel',
    ignore: 'ignore',
};

const INSERT_ALIASES: Record<string, InsertLocation> = {
    before: 'before',
    after: 'after',
};

const PROJECT_TYPE_ALIASES: Record<string, ProjectType> = {
    jd: 'jd',
    johnnydecimal: 'jd',
    folder: 'folder',
    flat: 'folder',
};

function lookup<T>(option: string, value: string, table: Record<string, T>): T {
    // Exact spelling first so a literal " " separator is not trimmed into ""
    if (Object.prototype.hasOwnProperty.call(table, value)) {
        return table[value];
    }
    const key = value.trim().toLowerCase();
    if (Object.prototype.hasOwnProperty.call(table, key)) {
        return table[key];
    }
    const accepted = [...new Set(Object.keys(table).filter((k) => k.trim()))].join(', ');
    throw new ConfigurationError(`Invalid ${option} "${value}". Expected one of: ${accepted}`);
}

export const parseSeparator = (value: string) => lookup('separator', value, SEPARATOR_ALIASES);
export const parseCaseMode = (value: string) => lookup('case', value, CASE_ALIASES);
export const parseInsertLocation = (value: string) => lookup('insert location', value, INSERT_ALIASES);
export const parseProjectType = (value: string) => lookup('project type', value, PROJECT_TYPE_ALIASES);

export interface Settings {
    cleanFilenames: boolean;
    formatDates: boolean;
    dateFormat: string;
    insertLocation: InsertLocation;
    clean: CleanOptions;
    overwriteExisting: boolean;
    organize: boolean;
    force: boolean;
    terms: readonly string[];
    jdNumber?: string;
    depth: number;
    ignoreDotfiles: boolean;
    ignoredFiles: readonly string[];
    ignoreFileRegex?: RegExp;
    project?: {
        path: string;
        type: ProjectType;
        depth: number;
    };
    dryRun: boolean;
    confirm: boolean;
}

/** Raw values as they arrive from the command line; anything unset falls back to CONFIG. */
export interface SettingsInput {
    clean?: boolean;
    formatDates?: boolean;
    dateFormat?: string;
    insertLocation?: string;
    separator?: string;
    case?: string;
    splitWords?: boolean;
    stripStopwords?: boolean;
    stopwords?: string[];
    matchCase?: string[];
    overwrite?: boolean;
    organize?: boolean;
    force?: boolean;
    terms?: string[];
    number?: string;
    depth?: number;
    ignoreDotfiles?: boolean;
    ignore?: string[];
    ignoreRegex?: string;
    project?: string;
    projectType?: string;
    projectDepth?: number;
    dryRun?: boolean;
    confirm?: boolean;
}

function positiveInt(option: string, value: number): number {
    if (!Number.isInteger(value) || value < 1) {
        throw new ConfigurationError(`Invalid ${option} "${value}". Expected a whole number of 1 or more`);
    }
    return value;
}

function compileRegex(source: string | undefined): RegExp | undefined {
    if (!source) return undefined;
    try {
        return new RegExp(source);
    } catch (err) {
        throw new ConfigurationError(`Invalid ignore regex "${source}"`, { cause: err });
    }
}

/**
 * Merge CLI input over the defaults and validate everything up front, so
 * that nothing on the per-file path has to parse or check options again.
 */
export function resolveSettings(input: SettingsInput = {}): Settings {
    const dateFormat = input.dateFormat ?? CONFIG.DATE_FORMAT;
    validateDateFormat(dateFormat);

    const settings: Settings = {
        cleanFilenames: input.clean ?? CONFIG.CLEAN_FILENAMES,
        formatDates: input.formatDates ?? CONFIG.FORMAT_DATES,
        dateFormat,
        insertLocation: input.insertLocation === undefined ? CONFIG.INSERT_LOCATION : parseInsertLocation(input.insertLocation),
        clean: {
            splitCamelCase: input.splitWords ?? CONFIG.SPLIT_WORDS,
            exceptionPhrases: input.matchCase ?? CONFIG.MATCH_CASE,
            stripStopwords: input.stripStopwords ?? CONFIG.STRIP_STOPWORDS,
            stopwords: [...CONFIG.STOPWORDS, ...(input.stopwords ?? [])],
            caseMode: input.case === undefined ? CONFIG.CASE : parseCaseMode(input.case),
            separatorMode: input.separator === undefined ? CONFIG.SEPARATOR : parseSeparator(input.separator),
        },
        overwriteExisting: input.overwrite ?? CONFIG.OVERWRITE_EXISTING,
        organize: input.organize ?? CONFIG.ORGANIZE,
        force: input.force ?? false,
        terms: input.terms ?? [],
        jdNumber: input.number,
        depth: positiveInt('depth', input.depth ?? CONFIG.DEPTH),
        ignoreDotfiles: input.ignoreDotfiles ?? CONFIG.IGNORE_DOTFILES,
        ignoredFiles: [...CONFIG.ALWAYS_IGNORED_FILES, ...CONFIG.IGNORED_FILES, ...(input.ignore ?? [])],
        ignoreFileRegex: compileRegex(input.ignoreRegex),
        project: input.project
            ? {
                path: input.project,
                type: input.projectType === undefined ? 'jd' : parseProjectType(input.projectType),
                depth: positiveInt('project depth', input.projectDepth ?? CONFIG.PROJECT_DEPTH),
            }
            : undefined,
        dryRun: input.dryRun ?? false,
        confirm: input.confirm ?? false,
    };

    if (settings.jdNumber !== undefined && !settings.project) {
        throw new ConfigurationError('A folder number was given without a project');
    }
    if (settings.jdNumber !== undefined && !settings.organize) {
        throw new ConfigurationError('A folder number was given with organizing turned off');
    }

    return Object.freeze(settings);
}
