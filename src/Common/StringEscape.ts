/**
 * Decoding of escape sequences inside quoted string literals.
 *
 * Double-quoted literals (and heredoc / interpolated fragments) understand
 * `\n \r \t \v \e \f \\ \$ \"`, octal `\0`..`\377`, hex `\xH`/`\xHH` and `\u{H+}`.
 * Single-quoted literals only unescape `\\` and `\'`. Nowdoc bodies are taken verbatim.
 * Unknown sequences stay in the output exactly as written.
 */
import { QuoteStyle } from '../Domain/index.js';
import { InvalidEscapeError } from './Errors.js';

/** Stands in for an escape sequence that decodes to a newline (private use area, never a line break). */
export const NEWLINE_PLACEHOLDER = `\uE000`;

const SIMPLE_ESCAPES: Record<string, string> = {
    n: `\n`,
    r: `\r`,
    t: `\t`,
    v: `\v`,
    e: `\x1b`,
    f: `\f`,
    '\\': `\\`,
    $: `$`,
    '"': `"`,
};

const OCTAL_DIGIT = /[0-7]/;
const HEX_DIGIT = /[0-9a-fA-F]/;
const HEX_RUN = /^[0-9a-fA-F]+$/;

interface DecodeMode {
    /** Replace escapes that produce `\n` with NEWLINE_PLACEHOLDER. */
    placeholder: boolean;
    /** Throw on malformed escapes; otherwise keep them verbatim. */
    strict: boolean;
    /** Receives the output offset of every escape that produced `\n`. */
    newlineOffsets?: number[];
}

/** Placeholder decode plus where its escaped newlines are. */
export interface EscapedNewlineDecode {
    text: string;
    /** Ascending offsets into `text` of the escapes that decoded to a newline */
    newlineOffsets: number[];
}

function isDigit(ch: string | undefined, pattern: RegExp): boolean {
    return ch !== undefined && pattern.test(ch);
}

/** Reads up to `max` characters matching `pattern` starting at `start`. */
function readRun(body: string, start: number, pattern: RegExp, max: number): string {
    let end = start;
    while (end < body.length && end - start < max && isDigit(body[end], pattern)) {
        end++;
    }
    return body.slice(start, end);
}

function decodeSingle(body: string): string {
    let out = ``;
    for (let i = 0; i < body.length; i++) {
        const ch = body[i];
        const next = body[i + 1];
        if (ch === `\\` && (next === `\\` || next === `'`)) {
            out += next;
            i++;
            continue;
        }
        out += ch;
    }
    return out;
}

function decodeDouble(body: string, mode: DecodeMode): string {
    let out = ``;
    const emit = (decoded: string): void => {
        if (decoded === `\n`) {
            mode.newlineOffsets?.push(out.length);
        }
        out += mode.placeholder && decoded === `\n` ? NEWLINE_PLACEHOLDER : decoded;
    };

    let i = 0;
    while (i < body.length) {
        const ch = body[i];
        if (ch !== `\\` || i + 1 >= body.length) {
            out += ch;
            i++;
            continue;
        }
        const next = body[i + 1];
        const simple = SIMPLE_ESCAPES[next];
        if (simple !== undefined) {
            emit(simple);
            i += 2;
            continue;
        }
        if (isDigit(next, OCTAL_DIGIT)) {
            const digits = readRun(body, i + 1, OCTAL_DIGIT, 3);
            emit(String.fromCharCode(parseInt(digits, 8) & 0xff));
            i += 1 + digits.length;
            continue;
        }
        if (next === `x` && isDigit(body[i + 2], HEX_DIGIT)) {
            const digits = readRun(body, i + 2, HEX_DIGIT, 2);
            emit(String.fromCharCode(parseInt(digits, 16)));
            i += 2 + digits.length;
            continue;
        }
        if (next === `u` && body[i + 2] === `{`) {
            const close = body.indexOf(`}`, i + 3);
            const digits = close === -1 ? `` : body.slice(i + 3, close);
            const codePoint = HEX_RUN.test(digits) ? parseInt(digits, 16) : NaN;
            if (Number.isNaN(codePoint) || codePoint > 0x10ffff) {
                if (mode.strict) {
                    throw new InvalidEscapeError(`Invalid UTF-8 codepoint escape sequence`, {
                        offset: i,
                        sequence: body.slice(i, close === -1 ? i + 3 : close + 1),
                    });
                }
                out += `\\u`;
                i += 2;
                continue;
            }
            emit(String.fromCodePoint(codePoint));
            i = close + 1;
            continue;
        }
        // Unknown escape: backslash is kept
        out += ch;
        i++;
    }
    return out;
}

function decodeBody(body: string, quote: QuoteStyle, mode: DecodeMode): string {
    switch (quote) {
        case QuoteStyle.Single:
            return decodeSingle(body);
        case QuoteStyle.Nowdoc:
            return body;
        case QuoteStyle.Double:
            return decodeDouble(body, mode);
    }
}

/** Splits a lexed literal (`'..'`, `"..."`, optional `b` prefix) into body and quote style. */
function unquote(raw: string): { body: string; quote: QuoteStyle } {
    const text = raw.startsWith(`b`) || raw.startsWith(`B`) ? raw.slice(1) : raw;
    const first = text[0];
    if (text.length >= 2 && (first === `'` || first === `"`) && text.endsWith(first)) {
        return {
            body: text.slice(1, -1),
            quote: first === `'` ? QuoteStyle.Single : QuoteStyle.Double,
        };
    }
    return { body: raw, quote: QuoteStyle.Double };
}

/**
 * Decodes the body of a literal (no surrounding quotes) according to its quoting convention.
 * @param body string - Literal contents as written in source
 * @param quote QuoteStyle - Convention that produced the literal
 * @returns string - Runtime value of the literal
 * @throws InvalidEscapeError when a `\u{...}` escape is malformed
 * @example
 * DecodeEscapes('a\\tb', QuoteStyle.Double); // 'a\tb'
 */
export function DecodeEscapes(body: string, quote: QuoteStyle): string {
    return decodeBody(body, quote, { placeholder: false, strict: true });
}

/**
 * Decodes a complete quoted literal as lexed, quotes included.
 * Text without matching quotes is decoded as a double-quoted body.
 * @throws InvalidEscapeError when a `\u{...}` escape is malformed
 * @example
 * DecodeQuotedLiteral(`'it\\'s'`); // "it's"
 */
export function DecodeQuotedLiteral(raw: string): string {
    const { body, quote } = unquote(raw);
    return DecodeEscapes(body, quote);
}

/**
 * Decodes like DecodeEscapes / DecodeQuotedLiteral, except escapes that would produce a newline
 * become NEWLINE_PLACEHOLDER and malformed escapes are kept verbatim instead of throwing.
 * Used only for line counting; when the regular decode succeeds both results have the same length.
 * @param raw string - Literal as lexed (quote omitted) or literal body (quote given)
 * @param quote QuoteStyle - Convention of `raw` when it is a body without quotes
 */
export function DecodeWithNewlinePlaceholder(raw: string, quote?: QuoteStyle): string {
    return DecodeWithEscapedNewlines(raw, quote).text;
}

/**
 * Placeholder decode that also reports where escaped newlines ended up. Line counting relies on
 * these offsets rather than on the placeholder, which may appear literally in the source.
 * @example
 * DecodeWithEscapedNewlines('"a\\nb"').newlineOffsets; // [1]
 */
export function DecodeWithEscapedNewlines(raw: string, quote?: QuoteStyle): EscapedNewlineDecode {
    const target = quote === undefined ? unquote(raw) : { body: raw, quote };
    const newlineOffsets: number[] = [];
    const text = decodeBody(target.body, target.quote, { placeholder: true, strict: false, newlineOffsets });
    return { text, newlineOffsets };
}
