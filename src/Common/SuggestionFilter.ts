/**
 * Shapes dictionary corrections into what is reported for a match.
 * When a dictionary entry has two or more fields, the last one is a caveat explaining why the
 * fix might not apply (it may be empty), not a correction.
 */

// Anything that could not appear in a bare identifier
const NON_IDENTIFIER_CHAR = /[^a-zA-Z0-9_\x7f-\uffff]/;

/**
 * Drops corrections that are not usable in the given context.
 * In an identifier, corrections containing characters such as `'` or `-` cannot replace the word;
 * the caveat entry is never dropped. Returns null when no real correction is left.
 * @param suggestions readonly string[] - Corrections from the dictionary
 * @param contextIsIdentifier boolean - Whether the word came from a code identifier
 * @returns readonly string[] | null - Corrections to report, or null to suppress the finding
 * @example
 * FilterSuggestions(["wasn't", 'contraction'], true); // null
 */
export function FilterSuggestions(suggestions: readonly string[], contextIsIdentifier: boolean): readonly string[] | null {
    if (!contextIsIdentifier) {
        return suggestions;
    }
    const hasCaveat = suggestions.length >= 2;
    const corrections = hasCaveat ? suggestions.slice(0, -1) : suggestions;
    const usable = corrections.filter(correction => {
        return !NON_IDENTIFIER_CHAR.test(correction);
    });

    if (usable.length === corrections.length) {
        return suggestions;
    }
    if (usable.length === 0) {
        return null;
    }
    return hasCaveat ? [...usable, suggestions[suggestions.length - 1]] : usable;
}

function capitalize(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Re-cases corrections to the original word and renders the suggestion sentence.
 * @param suggestions readonly string[] - Corrections (plus caveat when 2 or more)
 * @param originalWord string - Word as found in the source
 * @returns string - e.g. `Did you mean "The"?`
 * @example
 * FormatSuggestionText(['receive'], 'Recieve'); // 'Did you mean "Receive"?'
 * FormatSuggestionText(['the', 'name clash'], 'TEH'); // 'Did you mean "THE"? : not always fixable: name clash'
 */
export function FormatSuggestionText(suggestions: readonly string[], originalWord: string): string {
    let corrections = suggestions.map(suggestion => {
        return suggestion.trim();
    });
    const reason = corrections.length > 1 ? corrections.pop() : undefined;

    const firstLower = originalWord.search(/[a-z]/);
    if (firstLower === -1) {
        corrections = corrections.map(correction => {
            return correction.toUpperCase();
        });
    } else if (firstLower > 0) {
        corrections = corrections.map(capitalize);
    }

    const quoted = corrections.map(correction => {
        return JSON.stringify(correction);
    });
    let text = `Did you mean ${quoted.join(` or `)}?`;
    if (reason) {
        text += ` : not always fixable: ${reason}`;
    }
    return text;
}
