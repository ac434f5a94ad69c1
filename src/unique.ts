import fs from 'fs-extra';
import path from 'path';
import { logger } from './logger';

export type CounterPlacement = 'before-extension' | 'after-name';

export interface UniqueOptions {
    separator: string;
    placement?: CounterPlacement;
    /** Extension chain at the end of the name; parsed from the name when omitted. */
    suffixes?: readonly string[];
    /** Paths to treat as taken even though they are not on disk yet (dry runs). */
    taken?: ReadonlySet<string>;
}

const SUFFIX_SEGMENT = /^[A-Za-z0-9]{1,6}$/;

/**
 * Split a filename into stem and extension chain. A segment counts as an
 * extension when it is 1-6 letters/digits and not a bare number, so
 * "scan 2022.03.04.pdf" keeps its date in the stem. A leading dot belongs
 * to the stem.
 */
export function splitName(name: string): { stem: string; suffixes: string[] } {
    const leadingDots = /^\.*/.exec(name)?.[0] ?? '';
    const segments = name.slice(leadingDots.length).split('.');
    const suffixes: string[] = [];
    while (segments.length > 1) {
        const last = segments[segments.length - 1];
        if (!SUFFIX_SEGMENT.test(last) || /^\d+$/.test(last)) break;
        suffixes.unshift(`.${last}`);
        segments.pop();
    }
    return { stem: leadingDots + segments.join('.'), suffixes };
}

async function isTaken(candidate: string, taken?: ReadonlySet<string>): Promise<boolean> {
    return (taken?.has(candidate) ?? false) || fs.pathExists(candidate);
}

/**
 * Return `desired` if nothing is there, otherwise the first free variant
 * with `<separator><n>` added, counting from 1. Does not create the file.
 */
export async function makeUnique(desired: string, options: UniqueOptions): Promise<string> {
    if (!await isTaken(desired, options.taken)) {
        return desired;
    }
    logger.trace(`Unique name: ${desired} already exists`);

    const dir = path.dirname(desired);
    const name = path.basename(desired);
    const suffixes = options.suffixes ?? splitName(name).suffixes;
    const chain = suffixes.join('');
    const stem = chain && name.endsWith(chain) ? name.slice(0, name.length - chain.length) : name;

    for (let n = 1; ; n++) {
        const candidate = options.placement === 'after-name'
            ? path.join(dir, `${name}${options.separator}${n}`)
            : path.join(dir, `${stem}${options.separator}${n}${stem === name ? '' : chain}`);
        if (!await isTaken(candidate, options.taken)) {
            return candidate;
        }
        logger.trace(`Unique name: ${candidate} already exists`);
    }
}
