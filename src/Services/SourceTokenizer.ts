/**
 * SourceTokenizer classifies PHP-style source into the spans the typo scanner cares about:
 * inline text outside `<?php ... ?>`, comments, string literals (with interpolated parts split
 * out), heredoc / nowdoc bodies, identifiers and `$variables`. Everything else (operators,
 * numbers, whitespace) is skipped. It is not a full lexer; it only needs span boundaries and lines.
 */
import { QuoteStyle, SpanKind, type TextSpan } from '../Domain/index.js';
import { LineCounter } from '../Common/LineCounter.js';
import { TokenizeError } from '../Common/Errors.js';

const OPEN_TAG = /<\?(?:php(?=\s|$)|=)/gi;
const IDENTIFIER_START = /[a-zA-Z_\u0080-\uffff]/;
const IDENTIFIER_RUN = /[a-zA-Z0-9_\u0080-\uffff]*/y;
const NUMBER_RUN = /[0-9][0-9a-zA-Z_.]*/y;
const HEREDOC_START = /<<<[ \t]*(["']?)([a-zA-Z_\u0080-\uffff][a-zA-Z0-9_\u0080-\uffff]*)\1\r?\n/y;

function isIdentifierStart(ch: string | undefined): boolean {
    return ch !== undefined && IDENTIFIER_START.test(ch);
}

function isWhitespace(ch: string): boolean {
    return ch === ` ` || ch === `\t` || ch === `\n` || ch === `\r` || ch === `\f` || ch === `\v`;
}

export class SourceTokenizer {
    private readonly _source: string;
    private readonly _lines: LineCounter;
    private _pos = 0;
    private _spans: TextSpan[] = [];

    constructor(source: string) {
        this._source = source;
        this._lines = new LineCounter(source, `physical`);
    }

    /**
     * Splits the whole source into spans, in source order.
     * @returns TextSpan[] - Classified spans
     * @throws TokenizeError on an unterminated string literal or heredoc
     */
    public Tokenize(): TextSpan[] {
        this._pos = 0;
        this._spans = [];
        while (this._pos < this._source.length) {
            this.__inlineText();
            this.__code();
        }
        return this._spans;
    }

    /** 1-based line of an absolute offset. */
    private __lineAt(offset: number): number {
        return 1 + this._lines.LineForOffset(offset);
    }

    private __push(kind: SpanKind.Identifier | SpanKind.Variable | SpanKind.InlineText | SpanKind.Comment | SpanKind.StringLiteralRaw, start: number, end: number): void {
        this._spans.push({ kind, text: this._source.slice(start, end), startLine: this.__lineAt(start) });
    }

    private __pushFragment(start: number, end: number, quote: QuoteStyle): void {
        if (end <= start) {
            return;
        }
        this._spans.push({
            kind: SpanKind.StringLiteralEscaped,
            text: this._source.slice(start, end),
            startLine: this.__lineAt(start),
            quote,
        });
    }

    /** Text up to the next open tag; consumes the tag. */
    private __inlineText(): void {
        OPEN_TAG.lastIndex = this._pos;
        const match = OPEN_TAG.exec(this._source);
        const end = match ? match.index : this._source.length;
        if (end > this._pos) {
            this.__push(SpanKind.InlineText, this._pos, end);
        }
        this._pos = match ? end + match[0].length : end;
    }

    /** Code up to and including the next close tag. */
    private __code(): void {
        const src = this._source;
        while (this._pos < src.length) {
            const ch = src[this._pos];
            const next = src[this._pos + 1];

            if (isWhitespace(ch)) {
                this._pos++;
            } else if (ch === `?` && next === `>`) {
                this._pos += 2;
                // a single newline directly after the close tag belongs to the tag
                if (src.startsWith(`\r\n`, this._pos)) {
                    this._pos += 2;
                } else if (src[this._pos] === `\n`) {
                    this._pos++;
                }
                return;
            } else if (ch === `#` && next === `[`) {
                // attribute opener, not a comment
                this._pos += 2;
            } else if (ch === `#` || (ch === `/` && next === `/`)) {
                this.__lineComment();
            } else if (ch === `/` && next === `*`) {
                const close = src.indexOf(`*/`, this._pos + 2);
                const end = close === -1 ? src.length : close + 2;
                this.__push(SpanKind.Comment, this._pos, end);
                this._pos = end;
            } else if (ch === `'` || ch === `"`) {
                this.__quoted(this._pos);
            } else if ((ch === `b` || ch === `B`) && (next === `'` || next === `"`)) {
                this.__quoted(this._pos + 1, this._pos);
            } else if (ch === `<` && src.startsWith(`<<<`, this._pos)) {
                this.__heredoc();
            } else if (ch === `$` && isIdentifierStart(next)) {
                const end = this.__identifierEnd(this._pos + 1);
                this.__push(SpanKind.Variable, this._pos, end);
                this._pos = end;
            } else if (isIdentifierStart(ch)) {
                const end = this.__identifierEnd(this._pos);
                this.__push(SpanKind.Identifier, this._pos, end);
                this._pos = end;
            } else if (ch >= `0` && ch <= `9`) {
                NUMBER_RUN.lastIndex = this._pos;
                const number = NUMBER_RUN.exec(src);
                this._pos += number ? number[0].length : 1;
            } else {
                this._pos++;
            }
        }
    }

    private __identifierEnd(start: number): number {
        IDENTIFIER_RUN.lastIndex = start + 1;
        const run = IDENTIFIER_RUN.exec(this._source);
        return start + 1 + (run ? run[0].length : 0);
    }

    /** `//` or `#` comment, ended by a newline or a close tag. */
    private __lineComment(): void {
        const src = this._source;
        let end = this._pos;
        while (end < src.length && src[end] !== `\n` && !(src[end] === `?` && src[end + 1] === `>`)) {
            end++;
        }
        this.__push(SpanKind.Comment, this._pos, end);
        this._pos = end;
    }

    /** Index of the closing quote for a literal opened at `open`, honouring backslash escapes. */
    private __findClosingQuote(open: number, quote: string): number {
        const src = this._source;
        let i = open + 1;
        while (i < src.length) {
            if (src[i] === `\\`) {
                i += 2;
                continue;
            }
            if (src[i] === quote) {
                return i;
            }
            i++;
        }
        throw new TokenizeError(`Unterminated string literal`, { line: this.__lineAt(open) });
    }

    /**
     * Quoted literal at `open`. Constant literals become one raw span (quotes and prefix kept);
     * double-quoted literals with `$` interpolation are split into fragments.
     */
    private __quoted(open: number, prefixStart: number = open): void {
        const quote = this._source[open];
        const close = this.__findClosingQuote(open, quote);
        if (quote === `"` && this._source.slice(open + 1, close).includes(`$`)) {
            this.__interpolated(open + 1, close);
        } else {
            this.__push(SpanKind.StringLiteralRaw, prefixStart, close + 1);
        }
        this._pos = close + 1;
    }

    /** `<<<LABEL`, `<<<"LABEL"` (heredoc) or `<<<'LABEL'` (nowdoc). */
    private __heredoc(): void {
        const src = this._source;
        HEREDOC_START.lastIndex = this._pos;
        const header = HEREDOC_START.exec(src);
        if (!header) {
            // `<<<` that is not a heredoc opener
            this._pos += 3;
            return;
        }
        const isNowdoc = header[1] === `'`;
        const label = header[2];
        const closing = new RegExp(`^[ \\t]*${label}(?![a-zA-Z0-9_\\u0080-\\uffff])`);
        const bodyStart = this._pos + header[0].length;

        let lineStart = bodyStart;
        for (;;) {
            const newline = src.indexOf(`\n`, lineStart);
            const lineText = src.slice(lineStart, newline === -1 ? src.length : newline);
            const closeMatch = closing.exec(lineText);
            if (closeMatch) {
                // the newline before the closing label is not part of the body
                const bodyEnd = Math.max(bodyStart, lineStart - 1);
                const trimmedEnd = bodyEnd > bodyStart && src[bodyEnd - 1] === `\r` ? bodyEnd - 1 : bodyEnd;
                if (isNowdoc) {
                    this.__pushFragment(bodyStart, trimmedEnd, QuoteStyle.Nowdoc);
                } else {
                    this.__interpolated(bodyStart, trimmedEnd);
                }
                this._pos = lineStart + closeMatch[0].length;
                return;
            }
            if (newline === -1) {
                throw new TokenizeError(`Unterminated heredoc '${label}'`, { line: this.__lineAt(this._pos) });
            }
            lineStart = newline + 1;
        }
    }

    /**
     * Splits an interpolated body [start, end) into literal fragments and embedded names:
     * `$name` -> Variable, `$name->prop` -> Variable + Identifier, `{$...}` / `${...}` are skipped.
     */
    private __interpolated(start: number, end: number): void {
        const src = this._source;
        let fragmentStart = start;
        let i = start;

        while (i < end) {
            const ch = src[i];
            if (ch === `\\`) {
                i += 2;
                continue;
            }
            if (ch === `$` && isIdentifierStart(src[i + 1])) {
                this.__pushFragment(fragmentStart, i, QuoteStyle.Double);
                let nameEnd = Math.min(this.__identifierEnd(i + 1), end);
                this.__push(SpanKind.Variable, i, nameEnd);
                if (src.startsWith(`->`, nameEnd) && isIdentifierStart(src[nameEnd + 2])) {
                    const propertyEnd = Math.min(this.__identifierEnd(nameEnd + 2), end);
                    this.__push(SpanKind.Identifier, nameEnd + 2, propertyEnd);
                    nameEnd = propertyEnd;
                } else if (src[nameEnd] === `[`) {
                    const bracket = src.indexOf(`]`, nameEnd);
                    nameEnd = bracket === -1 || bracket >= end ? nameEnd : bracket + 1;
                }
                i = nameEnd;
                fragmentStart = i;
                continue;
            }
            if ((ch === `{` && src[i + 1] === `$`) || (ch === `$` && src[i + 1] === `{`)) {
                this.__pushFragment(fragmentStart, i, QuoteStyle.Double);
                i = this.__skipBraces(i + (ch === `{` ? 0 : 1), end);
                fragmentStart = i;
                continue;
            }
            i++;
        }
        this.__pushFragment(fragmentStart, end, QuoteStyle.Double);
    }

    /** Skips a balanced `{...}` group starting at `open`; returns the index after it. */
    private __skipBraces(open: number, end: number): number {
        let depth = 0;
        for (let i = open; i < end; i++) {
            const ch = this._source[i];
            if (ch === `{`) {
                depth++;
            } else if (ch === `}`) {
                depth--;
                if (depth === 0) {
                    return i + 1;
                }
            }
        }
        return end;
    }
}

/**
 * Convenience wrapper around SourceTokenizer.
 * @param source string - File contents
 * @returns TextSpan[] - Spans in source order
 * @throws TokenizeError on an unterminated string literal or heredoc
 * @example
 * const spans = TokenizeSource('<?php // hello');
 */
export function TokenizeSource(source: string): TextSpan[] {
    return new SourceTokenizer(source).Tokenize();
}
