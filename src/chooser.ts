import path from 'path';
import readline from 'readline';
import type { Readable, Writable } from 'stream';
import type { ChooserAnswer, FileRecord } from './file';
import type { Candidate } from './resolver';

export interface PromptStreams {
    input: Readable;
    output: Writable;
}

export function describeCandidate(candidate: Candidate): string {
    const { folder, matchedTerms } = candidate;
    const label = folder.number ? `${folder.number} ${folder.name}` : folder.name;
    return `${label} (matched: ${matchedTerms.join(', ')})`;
}

/**
 * Line-based terminal prompt used for folder choice and batch confirmation.
 * One readline interface is kept for the whole run so that answers typed
 * ahead are not lost between questions.
 */
export class Prompt {
    private rl?: readline.Interface;
    private lines?: AsyncIterator<string>;

    constructor(private readonly streams: PromptStreams = { input: process.stdin, output: process.stdout }) {}

    /** Resolves to undefined once the input has ended. */
    async ask(question: string): Promise<string | undefined> {
        if (!this.rl || !this.lines) {
            this.rl = readline.createInterface({ input: this.streams.input, terminal: false });
            this.lines = this.rl[Symbol.asyncIterator]();
        }
        this.streams.output.write(question);
        const next = await this.lines.next();
        return next.done ? undefined : next.value.trim();
    }

    readonly choose = async (candidates: Candidate[], file: FileRecord): Promise<ChooserAnswer> => {
        const lines = [
            `Several folders match ${path.basename(file.path)}:`,
            ...candidates.map((candidate, i) => `  ${i + 1}) ${describeCandidate(candidate)}`),
            '  s) leave in place',
            '  q) abort',
        ];
        this.streams.output.write(`${lines.join('\n')}\n`);

        for (;;) {
            const answer = await this.ask(`Choose 1-${candidates.length}, s or q: `);
            if (answer === undefined) return { kind: 'abort' };

            const key = answer.toLowerCase();
            if (key === 's') return { kind: 'skip' };
            if (key === 'q') return { kind: 'abort' };

            const choice = Number(key);
            if (Number.isInteger(choice) && choice >= 1 && choice <= candidates.length) {
                return { kind: 'folder', folder: candidates[choice - 1].folder };
            }
            this.streams.output.write(`Not an option: ${answer}\n`);
        }
    };

    async confirm(question: string): Promise<boolean> {
        const answer = await this.ask(`${question} [y/N] `);
        return answer !== undefined && /^y(es)?$/i.test(answer);
    }

    close(): void {
        this.rl?.close();
        this.rl = undefined;
        this.lines = undefined;
    }
}
