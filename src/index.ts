#!/usr/bin/env node
import { Command } from 'commander';
import { describePending, runBatch } from './batch';
import { Prompt } from './chooser';
import { CONFIG, resolveSettings } from './config';
import { JdsortError, UserAbort } from './errors';
import { logger, setVerbosity } from './logger';
import { buildIndex } from './project';
import { collectFiles } from './scan';
import { identityExpander, loadThesaurus } from './synonyms';

interface CliOptions {
    case?: string;
    separator?: string;
    dateFormat?: string;
    formatDates: boolean;
    insertLocation?: string;
    splitWords?: boolean;
    keepStopwords?: boolean;
    stopword: string[];
    matchCase: string[];
    clean: boolean;
    overwrite?: boolean;
    organize: boolean;
    project?: string;
    projectType?: string;
    projectDepth?: number;
    term: string[];
    number?: string;
    synonyms?: string;
    depth?: number;
    includeDotfiles?: boolean;
    ignore: string[];
    ignoreRegex?: string;
    dryRun?: boolean;
    force?: boolean;
    confirm?: boolean;
    verbose: number;
}

const collect = (value: string, previous: string[]) => [...previous, value];
const toInt = (value: string) => Number.parseInt(value, 10);
const increaseVerbosity = (_value: string, previous: number) => previous + 1;

const program = new Command();

program
    .name('jdsort')
    .description('Clean up filenames, normalize the dates in them and file them into Johnny Decimal folders')
    .version('1.0.0')
    .argument('<paths...>', 'files or directories to process')
    .option('-c, --case <mode>', 'lower, upper, title, sentence, camel or ignore')
    .option('-s, --separator <mode>', 'dash, space, underscore, none or ignore')
    .option('-f, --date-format <template>', `strftime-style date format (default "${CONFIG.DATE_FORMAT}")`)
    .option('--no-format-dates', 'leave dates in filenames as they are')
    .option('--insert-location <where>', 'put the date before or after the name')
    .option('--split-words', 'split camelCase words apart')
    .option('--keep-stopwords', 'do not strip stopwords')
    .option('--stopword <word>', 'extra stopword to strip (repeatable)', collect, [])
    .option('--match-case <phrase>', 'phrase whose casing is kept as written (repeatable)', collect, [])
    .option('--no-clean', 'only reformat dates, leave the rest of the name alone')
    .option('--overwrite', 'replace existing files instead of numbering the new name')
    .option('--no-organize', 'rename in place, never move into the project')
    .option('-p, --project <path>', 'project root to file into')
    .option('--project-type <type>', 'jd (Johnny Decimal) or folder')
    .option('--project-depth <number>', 'levels indexed in a folder project', toInt)
    .option('-t, --term <term>', 'extra term to match folders with (repeatable)', collect, [])
    .option('-n, --number <number>', 'file everything into the folder with this number')
    .option('--synonyms <file>', 'JSON thesaurus used to widen folder matching')
    .option('-d, --depth <number>', 'levels to walk into input directories', toInt)
    .option('--include-dotfiles', 'process dotfiles too')
    .option('-i, --ignore <name>', 'filename to skip (repeatable)', collect, [])
    .option('--ignore-regex <pattern>', 'skip filenames matching this regex')
    .option('--dry-run', 'show what would change without renaming anything')
    .option('--force', 'take the first matching folder instead of asking')
    .option('--confirm', 'list the changes and ask before renaming')
    .option('-v, --verbose', 'more logging (repeat for trace)', increaseVerbosity, 0)
    .parse(process.argv);

async function main(): Promise<number> {
    const options = program.opts<CliOptions>();
    setVerbosity(options.verbose);

    const settings = resolveSettings({
        clean: options.clean,
        formatDates: options.formatDates,
        dateFormat: options.dateFormat,
        insertLocation: options.insertLocation,
        separator: options.separator,
        case: options.case,
        splitWords: options.splitWords,
        stripStopwords: options.keepStopwords ? false : undefined,
        stopwords: options.stopword,
        matchCase: options.matchCase.length > 0 ? options.matchCase : undefined,
        overwrite: options.overwrite,
        organize: options.organize,
        force: options.force,
        terms: options.term,
        number: options.number,
        depth: options.depth,
        ignoreDotfiles: options.includeDotfiles ? false : undefined,
        ignore: options.ignore,
        ignoreRegex: options.ignoreRegex,
        project: options.project,
        projectType: options.projectType,
        projectDepth: options.projectDepth,
        dryRun: options.dryRun,
        confirm: options.confirm,
    });

    if (settings.dryRun) logger.info('Running in DRY-RUN mode');

    const index = settings.project && settings.organize
        ? await buildIndex(settings.project.path, { type: settings.project.type, depth: settings.project.depth })
        : undefined;
    if (index) logger.info(`Project ${index.root}: ${index.size} usable folders`);

    const expand = options.synonyms ? await loadThesaurus(options.synonyms) : identityExpander;

    const files = await collectFiles(program.args, {
        depth: settings.depth,
        ignoreDotfiles: settings.ignoreDotfiles,
        ignoredFiles: settings.ignoredFiles,
        ignoreFileRegex: settings.ignoreFileRegex,
        onProgress: ({ discovered }) => logger.debug(`Discovered ${discovered} files`),
    });
    if (files.length === 0) {
        logger.info('No files to process.');
        return 0;
    }

    const prompt = new Prompt();
    try {
        const { summary } = await runBatch(files, settings, { index, expand, choose: prompt.choose }, {
            confirm: settings.confirm
                ? async (pending) => {
                    process.stdout.write(pending.map((record) => `  ${describePending(record)}\n`).join(''));
                    return prompt.confirm(`Apply ${pending.length} change(s)?`);
                }
                : undefined,
        });
        return summary.failed > 0 ? 1 : 0;
    } finally {
        prompt.close();
    }
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err) => {
        if (err instanceof UserAbort) {
            logger.warn(err.message);
        } else if (err instanceof JdsortError) {
            logger.error(err.message);
        } else {
            logger.error(err, 'Unhandled exception');
        }
        process.exit(1);
    });
