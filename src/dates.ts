import { InvalidFormatTemplate } from './errors';
import { logger } from './logger';

export interface CalendarDate {
    year: number;
    month: number; // 1-12
    day: number;
}

export interface DateMatch {
    date: CalendarDate;
    /** Text that produced the date. Absent when the date came from a reference timestamp. */
    matchedText?: string;
    /** Offset of matchedText within the searched string. */
    index?: number;
}

interface DatePattern {
    name: string;
    regex: RegExp;
    extract: (groups: Record<string, string | undefined>, today: CalendarDate) => CalendarDate | undefined;
}

const MONTHS = 'january|jan?|february|feb?|march|mar?|april|apr?|may|june?|july?|august|aug?|september|sep?t?|october|oct?|november|nov?|december|dec?';
const DAY_FLEXIBLE = '0?[1-9]|[12][0-9]|3[01]';
const DAY = '0[1-9]|[12][0-9]|3[01]';
const MONTH = '0[1-9]|1[012]';
const SEP = '[-./_, :]*?';
const YEAR = '20[0-2][0-9]';
const ORDINAL = '(?:nd|rd|th|st)?';
const NOT_DIGIT_AFTER = '(?=[^0-9]|$)';

// Shortest unambiguous prefix of each month name, in calendar order.
const MONTH_PREFIXES: ReadonlyArray<[string, number]> = [
    ['ja', 1],
    ['fe', 2],
    ['mar', 3],
    ['ap', 4],
    ['may', 5],
    ['jun', 6],
    ['jul', 7],
    ['au', 8],
    ['se', 9],
    ['oc', 10],
    ['no', 11],
    ['de', 12],
];

export const MONTH_NAMES = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December',
];

const WEEKDAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

/**
 * Resolve a (possibly abbreviated) month name to 1-12. "jan", "ja" and
 * "January" all give 1; anything without a known prefix gives undefined.
 */
export function monthFromName(name: string): number | undefined {
    const lower = name.toLowerCase();
    for (const [prefix, month] of MONTH_PREFIXES) {
        if (lower.startsWith(prefix)) {
            return month;
        }
    }
    return undefined;
}

/**
 * Build a calendar date, rejecting combinations the Gregorian calendar does
 * not have (Feb 30, Feb 29 outside leap years, month 13...).
 */
export function makeDate(year: number, month: number, day: number): CalendarDate | undefined {
    if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
        return undefined;
    }
    const probe = new Date(Date.UTC(year, month - 1, day));
    probe.setUTCFullYear(year);
    if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
        return undefined;
    }
    return { year, month, day };
}

export function todayDate(now: Date = new Date()): CalendarDate {
    return { year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() };
}

export function fromJsDate(value: Date): CalendarDate {
    return todayDate(value);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
    const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
    return { year: shifted.getUTCFullYear(), month: shifted.getUTCMonth() + 1, day: shifted.getUTCDate() };
}

function firstOfPreviousMonth(date: CalendarDate): CalendarDate {
    if (date.month === 1) {
        return { year: date.year - 1, month: 12, day: 1 };
    }
    return { year: date.year, month: date.month - 1, day: 1 };
}

function num(value: string | undefined): number {
    return value === undefined ? NaN : parseInt(value, 10);
}

function numeric(groups: Record<string, string | undefined>, year?: number): CalendarDate | undefined {
    return makeDate(year ?? num(groups.year), num(groups.month), num(groups.day));
}

function named(groups: Record<string, string | undefined>, year: number, day: number): CalendarDate | undefined {
    const month = monthFromName(groups.month ?? '');
    if (month === undefined) return undefined;
    return makeDate(year, month, day);
}

function keyword(word: string): RegExp {
    return new RegExp(`(?<![0-9])(?<found>${word}'?s?)${NOT_DIGIT_AFTER}`, 'di');
}

/**
 * Every spelling the recognizer understands, in priority order. The first
 * pattern that yields a valid calendar date wins, so ambiguous spellings
 * (mm-dd vs dd-mm, yyyy-mm-dd vs yyyy-dd-mm) resolve to whichever comes first.
 */
export const DATE_PATTERNS: readonly DatePattern[] = [
    {
        name: 'yyyy-mm-dd',
        regex: new RegExp(`(?<found>(?<year>${YEAR})${SEP}(?<month>${MONTH})${SEP}(?<day>${DAY}))`, 'd'),
        extract: (g) => numeric(g),
    },
    {
        name: 'yyyy-dd-mm',
        regex: new RegExp(`(?<found>(?<year>${YEAR})${SEP}(?<day>${DAY})${SEP}(?<month>${MONTH}))`, 'd'),
        extract: (g) => numeric(g),
    },
    {
        name: 'month dd, yyyy',
        regex: new RegExp(
            `(?<found>(?<month>${MONTHS})${SEP}(?<day>${DAY_FLEXIBLE})${ORDINAL}${SEP}(?<year>${YEAR}))${NOT_DIGIT_AFTER}`,
            'di',
        ),
        extract: (g) => named(g, num(g.year), num(g.day)),
    },
    {
        // Leading greedy run makes this pick the last candidate in the string.
        name: 'dd month, yyyy',
        regex: new RegExp(
            `(?:^|.*[^0-9])(?<found>(?<day>${DAY_FLEXIBLE})${ORDINAL}${SEP}(?<month>${MONTHS})${SEP}(?<year>${YEAR}))${NOT_DIGIT_AFTER}`,
            'di',
        ),
        extract: (g) => named(g, num(g.year), num(g.day)),
    },
    {
        name: 'month dd',
        regex: new RegExp(`(?<found>(?<month>${MONTHS})${SEP}(?<day>${DAY_FLEXIBLE})${ORDINAL})${NOT_DIGIT_AFTER}`, 'di'),
        extract: (g, today) => named(g, today.year, num(g.day)),
    },
    {
        name: 'month yyyy',
        regex: new RegExp(`(?<found>(?<month>${MONTHS})${SEP}(?<year>${YEAR}))${NOT_DIGIT_AFTER}`, 'di'),
        extract: (g) => named(g, num(g.year), 1),
    },
    {
        name: 'yyyy month',
        regex: new RegExp(`(?<found>(?<year>${YEAR})${SEP}(?<month>${MONTHS}))${NOT_DIGIT_AFTER}`, 'di'),
        extract: (g) => named(g, num(g.year), 1),
    },
    {
        name: 'mmddyyyy',
        regex: new RegExp(`(?<found>(?<month>${MONTH})${SEP}(?<day>${DAY})${SEP}(?<year>${YEAR}))${NOT_DIGIT_AFTER}`, 'd'),
        extract: (g) => numeric(g),
    },
    {
        name: 'ddmmyyyy',
        regex: new RegExp(`(?<found>(?<day>${DAY})${SEP}(?<month>${MONTH})${SEP}(?<year>${YEAR}))${NOT_DIGIT_AFTER}`, 'd'),
        extract: (g) => numeric(g),
    },
    {
        name: 'mm-dd',
        regex: new RegExp(`(?<![0-9])(?<found>(?<month>${MONTH})${SEP}(?<day>${DAY}))${NOT_DIGIT_AFTER}`, 'd'),
        extract: (g, today) => numeric(g, today.year),
    },
    {
        name: 'dd-mm',
        regex: new RegExp(`(?<![0-9])(?<found>(?<day>${DAY})${SEP}(?<month>${MONTH}))${NOT_DIGIT_AFTER}`, 'd'),
        extract: (g, today) => numeric(g, today.year),
    },
    { name: 'today', regex: keyword('today'), extract: (_g, today) => today },
    { name: 'yesterday', regex: keyword('yesterday'), extract: (_g, today) => addDays(today, -1) },
    { name: 'tomorrow', regex: keyword('tomorrow'), extract: (_g, today) => addDays(today, 1) },
    { name: 'last week', regex: keyword('last[- _.]?week'), extract: (_g, today) => addDays(today, -7) },
    { name: 'last month', regex: keyword('last[- _.]?month'), extract: (_g, today) => firstOfPreviousMonth(today) },
];

/**
 * Find the first date spelled out in `text`.
 *
 * When nothing in the text matches and a `referenceDate` is supplied, that
 * date is returned without `matchedText`: callers may insert it but have
 * nothing to remove.
 */
export function findDate(text: string, referenceDate?: CalendarDate, today: CalendarDate = todayDate()): DateMatch | undefined {
    for (const pattern of DATE_PATTERNS) {
        const match = pattern.regex.exec(text);
        const groups = match?.groups;
        if (!match || !groups || groups.found === undefined) continue;

        const date = pattern.extract(groups, today);
        if (!date) {
            logger.trace(`Pattern "${pattern.name}" matched "${groups.found}" but it is not a valid date`);
            continue;
        }
        return { date, matchedText: groups.found, index: match.indices?.groups?.found?.[0] };
    }

    if (referenceDate) {
        return { date: referenceDate };
    }
    return undefined;
}

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

function dayOfYear(date: CalendarDate): number {
    const start = Date.UTC(date.year, 0, 1);
    const current = Date.UTC(date.year, date.month - 1, date.day);
    return Math.round((current - start) / 86_400_000) + 1;
}

function weekday(date: CalendarDate): number {
    return new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay();
}

// strftime-style codes. Time codes render as midnight since only dates are carried.
const FORMAT_CODES: Record<string, (date: CalendarDate) => string> = {
    Y: (d) => pad(d.year, 4),
    y: (d) => pad(d.year % 100),
    m: (d) => pad(d.month),
    d: (d) => pad(d.day),
    e: (d) => String(d.day).padStart(2, ' '),
    B: (d) => MONTH_NAMES[d.month - 1],
    b: (d) => MONTH_NAMES[d.month - 1].slice(0, 3),
    A: (d) => WEEKDAY_NAMES[weekday(d)],
    a: (d) => WEEKDAY_NAMES[weekday(d)].slice(0, 3),
    j: (d) => pad(dayOfYear(d), 3),
    F: (d) => `${pad(d.year, 4)}-${pad(d.month)}-${pad(d.day)}`,
    H: () => '00',
    M: () => '00',
    S: () => '00',
    '%': () => '%',
};

const CODE_RE = /%(.?)/g;

/**
 * Check a strftime-style template once, before any file is processed.
 */
export function validateDateFormat(template: string): void {
    const unknown = [...template.matchAll(CODE_RE)]
        .map((m) => m[1])
        .filter((code) => !(code in FORMAT_CODES))
        .map((code) => `%${code}`);
    if (unknown.length > 0) {
        throw new InvalidFormatTemplate(template, unknown);
    }
}

export function formatDate(date: CalendarDate, template: string): string {
    validateDateFormat(template);
    return template.replace(CODE_RE, (_m, code: string) => FORMAT_CODES[code](date));
}
