import fs from 'fs-extra';
import path from 'path';
import { CONFIG } from './config';
import { InvalidProjectPath } from './errors';
import { logger } from './logger';

export type FolderLevel = 'area' | 'category' | 'subcategory' | 'other';
export type ProjectType = 'jd' | 'folder';

export interface Folder {
    path: string;
    level: FolderLevel;
    /** `NN-NN`, `NN` or `NN.NN` depending on level; absent for flat projects. */
    number?: string;
    name: string;
    terms: string[];
    area?: string;
    category?: string;
}

const LEVEL_PATTERNS: Record<Exclude<FolderLevel, 'other'>, RegExp> = {
    area: /^(\d{2}-\d{2})[- _](.*)$/,
    category: /^(\d{2})[- _](.*)$/,
    subcategory: /^(\d{2}\.\d{2})[- _](.*)$/,
};

interface NumberedDir {
    path: string;
    number: string;
    name: string;
}

/**
 * Usable folders of one project, in path order. Built once per run and
 * never modified afterwards.
 */
export class ProjectIndex {
    readonly folders: readonly Folder[];

    constructor(readonly root: string, readonly type: ProjectType, folders: Folder[]) {
        this.folders = Object.freeze([...folders].sort((a, b) => comparePaths(a.path, b.path)));
    }

    findByNumber(number: string): Folder | undefined {
        return this.folders.find((f) => f.number === number);
    }

    get size(): number {
        return this.folders.length;
    }
}

export interface IndexOptions {
    type?: ProjectType;
    /** Levels below the root to index for flat projects. */
    depth?: number;
    sidecarName?: string;
}

function comparePaths(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

export function parseFolderName(dirName: string, level: FolderLevel): { number?: string; name: string } | undefined {
    if (level === 'other') {
        return { name: dirName.trim() };
    }
    const match = LEVEL_PATTERNS[level].exec(dirName);
    if (!match) return undefined;
    return { number: match[1], name: match[2].trim() };
}

async function listDirs(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
        .filter((e) => e.isDirectory())
        .map((e) => e.name)
        .sort();
}

async function numberedChildren(dir: string, level: Exclude<FolderLevel, 'other'>): Promise<NumberedDir[]> {
    const children: NumberedDir[] = [];
    for (const name of await listDirs(dir)) {
        const parsed = parseFolderName(name, level);
        if (parsed?.number !== undefined) {
            children.push({ path: path.join(dir, name), number: parsed.number, name: parsed.name });
        }
    }
    return children;
}

/**
 * Terms a folder matches on: the words of its display name plus any
 * non-comment lines of its sidecar file. Duplicates (ignoring case) are dropped.
 */
export async function readFolderTerms(folderPath: string, name: string, sidecarName: string = CONFIG.SIDECAR_FILE): Promise<string[]> {
    const terms: string[] = [];
    const seen = new Set<string>();
    const add = (term: string) => {
        const key = term.toLowerCase();
        if (!term || seen.has(key)) return;
        seen.add(key);
        terms.push(term);
    };

    name.split(/[- _]/).forEach(add);

    const sidecar = path.join(folderPath, sidecarName);
    if (await fs.pathExists(sidecar)) {
        const content = await fs.readFile(sidecar, 'utf-8');
        for (const line of content.split(/\r?\n/)) {
            const term = line.trim();
            if (term.startsWith('#')) continue;
            add(term);
        }
    }
    return terms;
}

async function hasSidecar(folderPath: string, sidecarName: string): Promise<boolean> {
    return fs.pathExists(path.join(folderPath, sidecarName));
}

async function makeFolder(
    dir: NumberedDir,
    level: FolderLevel,
    sidecarName: string,
    parents: { area?: string; category?: string } = {},
): Promise<Folder> {
    return {
        path: dir.path,
        level,
        number: dir.number || undefined,
        name: dir.name,
        terms: await readFolderTerms(dir.path, dir.name, sidecarName),
        ...parents,
    };
}

async function indexJohnnyDecimal(root: string, sidecarName: string): Promise<Folder[]> {
    const folders: Folder[] = [];

    for (const area of await numberedChildren(root, 'area')) {
        const categories = await numberedChildren(area.path, 'category');
        if (categories.length === 0 || await hasSidecar(area.path, sidecarName)) {
            folders.push(await makeFolder(area, 'area', sidecarName, { area: area.path }));
        }

        for (const category of categories) {
            const subcategories = await numberedChildren(category.path, 'subcategory');
            if (subcategories.length === 0 || await hasSidecar(category.path, sidecarName)) {
                folders.push(await makeFolder(category, 'category', sidecarName, { area: area.path, category: category.path }));
            }

            for (const subcategory of subcategories) {
                folders.push(await makeFolder(subcategory, 'subcategory', sidecarName, { area: area.path, category: category.path }));
            }
        }
    }
    return folders;
}

async function indexFlat(root: string, depth: number, sidecarName: string): Promise<Folder[]> {
    const folders: Folder[] = [];

    const walk = async (dir: string, level: number) => {
        if (level > depth) return;
        for (const name of await listDirs(dir)) {
            if (name.startsWith('.')) continue;
            const child = path.join(dir, name);
            folders.push(await makeFolder({ path: child, number: '', name }, 'other', sidecarName));
            await walk(child, level + 1);
        }
    };

    await walk(root, 1);
    return folders;
}

/**
 * Index the usable folders under a project root.
 *
 * Johnny Decimal projects keep the deepest numbered folder on each branch,
 * plus any folder that carries a sidecar file. Flat projects keep every
 * directory down to `depth`.
 */
export async function buildIndex(rootPath: string, options: IndexOptions = {}): Promise<ProjectIndex> {
    const type = options.type ?? 'jd';
    const sidecarName = options.sidecarName ?? CONFIG.SIDECAR_FILE;
    const root = path.resolve(rootPath);

    if (!await fs.pathExists(root)) {
        throw new InvalidProjectPath(root, 'does not exist');
    }
    if (!(await fs.stat(root)).isDirectory()) {
        throw new InvalidProjectPath(root, 'not a directory');
    }

    const folders = type === 'jd'
        ? await indexJohnnyDecimal(root, sidecarName)
        : await indexFlat(root, options.depth ?? CONFIG.PROJECT_DEPTH, sidecarName);

    logger.trace(`Indexed ${folders.length} usable folders in ${root}`);
    return new ProjectIndex(root, type, folders);
}
