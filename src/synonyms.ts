import fs from 'fs-extra';
import { ConfigurationError } from './errors';

/** Returns the word together with its synonyms. */
export type SynonymExpander = (word: string) => ReadonlySet<string>;

export const identityExpander: SynonymExpander = (word) => new Set([word]);

export type Thesaurus = Record<string, string[]>;

export function createThesaurusExpander(thesaurus: Thesaurus): SynonymExpander {
    const entries = new Map<string, string[]>();
    for (const [word, synonyms] of Object.entries(thesaurus)) {
        const key = word.toLowerCase();
        entries.set(key, [...(entries.get(key) ?? []), ...synonyms]);
    }
    return (word) => new Set([word, ...(entries.get(word.toLowerCase()) ?? [])]);
}

function isThesaurus(value: unknown): value is Thesaurus {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
    return Object.values(value).every(
        (synonyms) => Array.isArray(synonyms) && synonyms.every((s) => typeof s === 'string'),
    );
}

/**
 * Load a JSON thesaurus of the form `{ "invoice": ["bill", "receipt"] }`.
 */
export async function loadThesaurus(file: string): Promise<SynonymExpander> {
    let data: unknown;
    try {
        data = await fs.readJSON(file);
    } catch (err) {
        throw new ConfigurationError(`Could not read synonyms file ${file}`, { cause: err });
    }
    if (!isThesaurus(data)) {
        throw new ConfigurationError(`Synonyms file ${file} must map each word to a list of strings`);
    }
    return createThesaurusExpander(data);
}
