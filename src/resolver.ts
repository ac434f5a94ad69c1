import { FolderNumberNotFound } from './errors';
import type { Folder, ProjectIndex } from './project';
import { splitWords } from './strings';
import type { SynonymExpander } from './synonyms';

export interface Candidate {
    folder: Folder;
    matchedTerms: string[];
}

export type Resolution =
    | { kind: 'selected'; folder: Folder; reason: 'number' | 'term' | 'forced'; matchedTerms: string[] }
    | { kind: 'candidates'; candidates: Candidate[] }
    | { kind: 'no-match' };

export interface ResolveOptions {
    /** Exact folder number to file into; bypasses term matching entirely. */
    jdNumber?: string;
    /** Take the first candidate in index order instead of asking. */
    force?: boolean;
}

/**
 * Build the lower-cased token set for a cleaned stem. User terms are added
 * as given (so a folder number can be passed as a term); every token is then
 * widened with its synonyms.
 */
export function tokenize(stem: string, userTerms: readonly string[] = [], expand?: SynonymExpander): Set<string> {
    const words = [...splitWords(stem), ...userTerms.filter(Boolean)];
    const tokens = new Set<string>();
    for (const word of words) {
        const expanded = expand ? expand(word) : [word];
        for (const token of [word, ...expanded]) {
            tokens.add(token.toLowerCase());
        }
    }
    return tokens;
}

export function findCandidates(tokens: ReadonlySet<string>, index: ProjectIndex): Candidate[] {
    const lowered = new Set([...tokens].map((t) => t.toLowerCase()));
    const candidates: Candidate[] = [];
    for (const folder of index.folders) {
        const matchedTerms = folder.terms.filter((term) => lowered.has(term.toLowerCase()));
        if (matchedTerms.length > 0) {
            candidates.push({ folder, matchedTerms });
        }
    }
    return candidates;
}

/**
 * Decide which folder a file belongs in.
 *
 * Order matters: an explicit number override, then a token equal to a
 * folder number, then term matching. Forcing only applies to term matches.
 */
export function resolve(tokens: ReadonlySet<string>, index: ProjectIndex, options: ResolveOptions = {}): Resolution {
    if (options.jdNumber !== undefined) {
        const folder = index.findByNumber(options.jdNumber);
        if (!folder) {
            throw new FolderNumberNotFound(options.jdNumber);
        }
        return { kind: 'selected', folder, reason: 'number', matchedTerms: [] };
    }

    for (const folder of index.folders) {
        if (folder.number !== undefined && tokens.has(folder.number)) {
            return { kind: 'selected', folder, reason: 'number', matchedTerms: [folder.number] };
        }
    }

    const candidates = findCandidates(tokens, index);
    if (candidates.length === 0) {
        return { kind: 'no-match' };
    }
    if (candidates.length === 1) {
        return { kind: 'selected', folder: candidates[0].folder, reason: 'term', matchedTerms: candidates[0].matchedTerms };
    }
    if (options.force) {
        return { kind: 'selected', folder: candidates[0].folder, reason: 'forced', matchedTerms: candidates[0].matchedTerms };
    }
    return { kind: 'candidates', candidates };
}
