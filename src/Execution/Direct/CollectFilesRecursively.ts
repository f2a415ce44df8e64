import { promises as fs, constants, type Stats } from 'fs';
import * as path from 'path';
import { log } from '../../Common/Log.js';
import { DescribeError, DirectoryReadError, FileReadError } from '../../Common/Errors.js';

const LEADING_CURRENT_DIR = /^(\.[/\\]+)+/;
const SEPARATORS = /[/\\]+/g;

/**
 * Orders paths lexicographically with separators ranking below every other character,
 * so a directory's files stay together ("a/b" sorts before "a.b" and "aab").
 * @example
 * ['a.b', 'a/b'].sort(ComparePaths); // ['a/b', 'a.b']
 */
export function ComparePaths(a: string, b: string): number {
    const left = a.replace(SEPARATORS, `\0`);
    const right = b.replace(SEPARATORS, `\0`);
    if (left === right) {
        return 0;
    }
    return left < right ? -1 : 1;
}

/** Strips leading `./` segments. */
export function NormalizePath(filePath: string): string {
    return filePath.replace(LEADING_CURRENT_DIR, ``);
}

function matchesExtension(fileName: string, extensions: readonly string[]): boolean {
    if (extensions.length === 0) {
        return true;
    }
    return extensions.includes(path.extname(fileName).slice(1));
}

async function __SearchFiles(currentPath: string, extensions: readonly string[], visited: Set<string>, out: string[]): Promise<void> {
    let entries: string[];
    try {
        // symlinked directories are followed; the real path guards against cycles
        const realPath = await fs.realpath(currentPath);
        if (visited.has(realPath)) {
            return;
        }
        visited.add(realPath);
        entries = await fs.readdir(currentPath);
    } catch(error) {
        const failure = new DirectoryReadError(`Failed reading files in directory '${currentPath}': ${DescribeError(error)}`, { path: currentPath }, error);
        log.error(failure.message, `CollectFiles`);
        return;
    }

    for (const entry of entries) {
        const itemPath = path.join(currentPath, entry);
        let stat: Stats;
        try {
            stat = await fs.stat(itemPath);
        } catch(error) {
            log.warning(`Unable to stat '${itemPath}': ${DescribeError(error)}`, `CollectFiles`);
            continue;
        }
        if (stat.isDirectory()) {
            await __SearchFiles(itemPath, extensions, visited, out);
            continue;
        }
        if (!stat.isFile() || !matchesExtension(entry, extensions)) {
            continue;
        }
        try {
            await fs.access(itemPath, constants.R_OK);
        } catch(error) {
            const failure = new FileReadError(`Unable to read file '${itemPath}'`, { path: itemPath }, error);
            log.warning(failure.message, `CollectFiles`);
            continue;
        }
        out.push(itemPath);
    }
}

/**
 * Lists the files under a directory, recursively, filtered by extension.
 * Unreadable directories and files are reported and skipped.
 * @param dirPath string - Directory to walk
 * @param extensions readonly string[] - Extensions without the dot; empty accepts every file
 * @returns Promise<string[]> - Normalized, sorted (see ComparePaths), de-duplicated paths
 * @example
 * const files = await CollectFilesRecursively('./src', ['php', 'html']);
 */
export async function CollectFilesRecursively(dirPath: string, extensions: readonly string[]): Promise<string[]> {
    const found: string[] = [];
    await __SearchFiles(dirPath, extensions, new Set(), found);

    const unique = new Set(found.map(NormalizePath));
    return [...unique].sort(ComparePaths);
}
