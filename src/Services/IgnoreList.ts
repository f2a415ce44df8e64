import { readFile } from 'fs/promises';
import { log } from '../Common/Log.js';
import { DescribeError } from '../Common/Errors.js';

/**
 * Words that are never reported even when they are in the dictionary.
 * File format: one word per line, case-insensitive; blank lines and `#` comments are skipped.
 */
export class IgnoreList {
    private readonly _words: ReadonlySet<string>;

    constructor(words: Iterable<string> = []) {
        this._words = new Set(
            Array.from(words, word => {
                return word.toLowerCase();
            }),
        );
    }

    /**
     * Parses ignore-list text.
     * @param contents string - File contents
     * @example
     * IgnoreList.Parse('# project names\nTeh\n').Has('teh'); // true
     */
    public static Parse(contents: string): IgnoreList {
        const words: string[] = [];
        for (const rawLine of contents.split(`\n`)) {
            const line = rawLine.trim();
            if (line === `` || line.startsWith(`#`)) {
                continue;
            }
            words.push(line);
        }
        return new IgnoreList(words);
    }

    /**
     * Loads an ignore list. A missing or unreadable file is reported and treated as empty.
     * @param path string - Path to the ignore-list file
     * @returns Promise<IgnoreList>
     */
    public static async Load(path: string): Promise<IgnoreList> {
        try {
            const contents = await readFile(path, `utf-8`);
            return IgnoreList.Parse(contents);
        } catch(err) {
            log.warning(`Ignore-words file '${path}' could not be read: ${DescribeError(err)}`, `IgnoreList`);
            return new IgnoreList();
        }
    }

    public get size(): number {
        return this._words.size;
    }

    /** Case-insensitive membership test. */
    public Has(word: string): boolean {
        return this._words.has(word.toLowerCase());
    }
}
