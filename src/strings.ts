import STOPWORDS from './stopwords.json';

export type CaseMode = 'lower' | 'upper' | 'title' | 'sentence' | 'camel' | 'ignore';
export type SeparatorMode = 'dash' | 'space' | 'underscore' | 'none' | 'ignore';
export type InsertLocation = 'before' | 'after';

export interface CleanOptions {
    splitCamelCase: boolean;
    /** Phrases whose spelling is never altered (e.g. "iPhone"). */
    exceptionPhrases: readonly string[];
    stripStopwords: boolean;
    /** Project-specific stopwords, stripped in addition to the built-in list. */
    stopwords: readonly string[];
    caseMode: CaseMode;
    separatorMode: SeparatorMode;
}

export const BUILTIN_STOPWORDS: readonly string[] = STOPWORDS;

const SEPARATOR_CHARS: Record<Exclude<SeparatorMode, 'ignore'>, string> = {
    dash: '-',
    space: ' ',
    underscore: '_',
    none: '',
};

const escapeRegex = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * The character placed between words for a separator mode. Ignore mode has
 * no character of its own, so callers joining new text fall back to "_".
 */
export function separatorChar(mode: SeparatorMode): string {
    return mode === 'ignore' ? '_' : SEPARATOR_CHARS[mode];
}

// A capital followed by a lowercase letter starts a word, unless a separator is already there.
const CAMEL_BOUNDARY = /(?<=[^-_ .])(?=\p{Lu}\p{Ll})/gu;

export function splitCamelCase(text: string, exceptionPhrases: readonly string[] = []): string {
    const protectedPhrases: string[] = [];
    let working = text;
    for (const phrase of exceptionPhrases) {
        if (!phrase) continue;
        working = working.replace(new RegExp(escapeRegex(phrase), 'gi'), () => {
            protectedPhrases.push(phrase);
            return `\u0000${protectedPhrases.length - 1}\u0000`;
        });
    }

    working = working.replace(CAMEL_BOUNDARY, ' ');

    return working.replace(/\u0000(\d+)\u0000/g, (_m, i: string) => protectedPhrases[Number(i)]);
}

function stopwordPattern(word: string): RegExp {
    return new RegExp(`(?<![A-Za-z0-9])${escapeRegex(word)}(?![A-Za-z0-9])`, 'gi');
}

const BUILTIN_PATTERNS = BUILTIN_STOPWORDS.map(stopwordPattern);

/**
 * Remove whole-word stopwords. Leaves the text alone when stripping would
 * reduce it to nothing or a single character.
 */
export function stripStopwords(text: string, extra: readonly string[] = []): string {
    let stripped = text;
    for (const pattern of [...BUILTIN_PATTERNS, ...extra.filter(Boolean).map(stopwordPattern)]) {
        stripped = stripped.replace(pattern, '');
    }

    const trimmed = stripped.replace(/^[-_ ]+|[-_ ]+$/g, '');
    return /^.?$/u.test(trimmed) ? text : trimmed;
}

export function stripSpecialChars(text: string): string {
    return text.replace(/[^\p{L}\p{N}_ -]/gu, '');
}

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

// Inside a run of letters, a capital followed by a lowercase letter starts a new word.
const WORD_START = /(?<=\p{L})(?=\p{Lu}\p{Ll})/u;

function titleRun(run: string): string {
    return run.split(WORD_START).map(capitalize).join('');
}

export function transformCase(text: string, mode: CaseMode): string {
    switch (mode) {
        case 'lower':
            return text.toLowerCase();
        case 'upper':
            return text.toUpperCase();
        case 'title':
            return text.replace(/\p{L}+/gu, titleRun);
        case 'sentence':
            return capitalize(text);
        case 'camel':
            return text.replace(/\p{L}+/gu, titleRun).replace(/[-_ ]/g, '');
        case 'ignore':
            return text;
    }
}

/**
 * Restore the listed spelling of each phrase wherever it stands as its own word.
 */
export function matchCase(text: string, phrases: readonly string[]): string {
    let result = text;
    for (const phrase of phrases) {
        if (!phrase) continue;
        result = result.replace(new RegExp(`(?<=^|[-_ ])${escapeRegex(phrase)}(?=[-_ ]|$)`, 'gi'), phrase);
    }
    return result;
}

export function normalizeSeparators(text: string, mode: SeparatorMode): string {
    const collapsed = mode === 'ignore'
        ? text.replace(/([-_ .])\1+/g, '$1')
        : text.replace(/[-_ .]+/g, SEPARATOR_CHARS[mode]);
    return trimSeparators(collapsed);
}

export function trimSeparators(text: string): string {
    return text.replace(/^[-_ .]+|[-_ .]+$/g, '');
}

/**
 * Normalize a filename stem. Stages run in a fixed order; see CleanOptions.
 * A stem that cleans down to nothing is returned unchanged.
 */
export function cleanStem(stem: string, options: CleanOptions): string {
    const isDotfile = stem.startsWith('.');
    let working = stem;

    if (options.splitCamelCase) {
        working = splitCamelCase(working, options.exceptionPhrases);
    }
    if (options.stripStopwords) {
        working = stripStopwords(working, options.stopwords);
    }
    working = stripSpecialChars(working);
    working = transformCase(working, options.caseMode);
    working = matchCase(working, options.exceptionPhrases);
    working = normalizeSeparators(working, options.separatorMode);

    if (!working) {
        return stem;
    }
    if (isDotfile && !working.startsWith('.')) {
        working = `.${working}`;
    }
    return working;
}

export function cleanSuffixes(suffixes: readonly string[]): string[] {
    return suffixes.map((suffix) => {
        const lower = suffix.toLowerCase();
        return lower === '.jpeg' ? '.jpg' : lower;
    });
}

/**
 * Join `value` onto `text` at the given end, keeping a leading dot in front.
 */
export function insertText(text: string, value: string, location: InsertLocation, separator: string): string {
    if (!text) return value;
    if (location === 'after') {
        return `${text}${separator}${value}`;
    }
    if (text.startsWith('.')) {
        return `.${value}${separator}${text.slice(1)}`;
    }
    return `${value}${separator}${text}`;
}

/**
 * Split text into match tokens: camelCase and separator boundaries, dropping
 * pure numbers and single characters.
 */
export function splitWords(text: string): string[] {
    return splitCamelCase(text)
        .split(/[^\p{L}\p{N}]+/u)
        .filter((word) => word.length > 1 && !/^\d+$/.test(word));
}
