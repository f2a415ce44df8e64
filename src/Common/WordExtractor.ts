/**
 * Candidate word extraction.
 * Free text (strings, comments, markup) is split into alphanumeric runs; identifiers are split on
 * camelCase / PascalCase / ACRONYMCase / snake_case boundaries.
 */

export interface WordMatch {
    word: string; // word exactly as found
    offset: number; // index of the word within the scanned text
}

// 3+ alphanumerics, optionally followed by a contraction suffix ("wasn't")
const WORD_PATTERN = /[a-z0-9]{3,}(?:'[a-z]+)?/gi;
// lowercase run | Capitalized word | ACRONYM not followed by a lowercase letter
const IDENTIFIER_PART_PATTERN = /[a-z]+|[A-Z](?:[a-z]+|[A-Z]+(?![a-z]))/g;
// lower->Upper or ACRONYM->Word
const COMPOUND_PATTERN = /[a-z][A-Z]|[A-Z][A-Z][a-z]/;

function* matchAll(pattern: RegExp, text: string): Generator<WordMatch> {
    // fresh regex per call so concurrent iterations never share lastIndex
    const regex = new RegExp(pattern.source, pattern.flags);
    let match: RegExpExecArray | null;

    while ((match = regex.exec(text))) {
        yield { word: match[0], offset: match.index };
    }
}

/**
 * Lazily extracts words of free text.
 * @param text string - Decoded string content, comment or markup
 * @returns Generator<WordMatch> - matches in left-to-right order
 * @example
 * [...ExtractWords("it wasn't here")]; // [{ word: "wasn't", offset: 3 }, { word: 'here', offset: 10 }]
 */
export function ExtractWords(text: string): Generator<WordMatch> {
    return matchAll(WORD_PATTERN, text);
}

/**
 * Lazily splits an identifier into its natural-language parts.
 * @example
 * [...ExtractIdentifierParts('parseHTMLFile')].map(m => m.word); // ['parse', 'HTML', 'File']
 */
export function ExtractIdentifierParts(text: string): Generator<WordMatch> {
    return matchAll(IDENTIFIER_PART_PATTERN, text);
}

/** True when a word found in free text looks like an embedded camelCase or ACRONYMCase name. */
export function LooksLikeCompoundWord(word: string): boolean {
    return COMPOUND_PATTERN.test(word);
}
