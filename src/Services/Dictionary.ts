import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { log } from '../Common/Log.js';
import { DescribeError, DictionaryLoadError } from '../Common/Errors.js';

/** Bundled dictionary shipped with the package. */
export const DEFAULT_DICTIONARY_PATH = fileURLToPath(new URL(`../../data/dictionary.txt`, import.meta.url));

const SEPARATOR = `->`;

/**
 * Dictionary is the immutable typo -> corrections table.
 * Load it once and share the instance; it is never mutated after construction.
 */
export class Dictionary {
    /** lowercase misspelling -> corrections (last one is a caveat when 2 or more) */
    private readonly _entries: ReadonlyMap<string, readonly string[]>;

    /**
     * @param entries ReadonlyMap<string, readonly string[]> - Parsed entries keyed by lowercase typo
     */
    constructor(entries: ReadonlyMap<string, readonly string[]>) {
        this._entries = entries;
    }

    /**
     * Parses dictionary text: one `typo->correction1,correction2,...` entry per line.
     * Lines without `->` are ignored; a repeated typo replaces the earlier entry.
     * @param contents string - Dictionary file contents
     * @returns Dictionary - Parsed dictionary (possibly empty)
     * @example
     * const dictionary = Dictionary.Parse('teh->the\nrecieve->receive');
     */
    public static Parse(contents: string): Dictionary {
        const entries = new Map<string, readonly string[]>();

        for (const rawLine of contents.split(`\n`)) {
            const line = rawLine.trim();
            const separatorIndex = line.indexOf(SEPARATOR);
            if (separatorIndex === -1) {
                continue;
            }
            const typo = line.slice(0, separatorIndex);
            const corrections = line
                .slice(separatorIndex + SEPARATOR.length)
                .split(`,`)
                .map(correction => {
                    return correction.trim();
                });
            entries.set(typo, Object.freeze(corrections));
        }
        return new Dictionary(entries);
    }

    /**
     * Reads and parses a dictionary file.
     * @param path string - Path to the dictionary file
     * @returns Promise<Dictionary>
     * @throws DictionaryLoadError if the file cannot be read, is empty, or has no entries
     * @example
     * const dictionary = await Dictionary.Load(DEFAULT_DICTIONARY_PATH);
     */
    public static async Load(path: string = DEFAULT_DICTIONARY_PATH): Promise<Dictionary> {
        let contents: string;
        try {
            contents = await readFile(path, `utf-8`);
        } catch(err) {
            throw new DictionaryLoadError(`Failed to load dictionary '${path}': ${DescribeError(err)}`, { path }, err);
        }
        if (!contents.trim()) {
            throw new DictionaryLoadError(`Dictionary '${path}' is empty`, { path });
        }
        const dictionary = Dictionary.Parse(contents);
        if (dictionary.size === 0) {
            throw new DictionaryLoadError(`Dictionary '${path}' has no 'typo->correction' entries`, { path });
        }
        log.debug(`Loaded ${dictionary.size} dictionary entries from ${path}`, `Dictionary`);
        return dictionary;
    }

    /** Number of entries. */
    public get size(): number {
        return this._entries.size;
    }

    /**
     * Case-insensitive lookup.
     * @param word string - Word in any casing
     * @returns readonly string[] | undefined - Corrections, or undefined when the word is not a known typo
     */
    public Lookup(word: string): readonly string[] | undefined {
        return this._entries.get(word.toLowerCase());
    }

    /** Whether `word` (any casing) is a known typo. */
    public Has(word: string): boolean {
        return this._entries.has(word.toLowerCase());
    }
}
