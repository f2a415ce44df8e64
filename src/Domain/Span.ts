/**
 * Span & finding model for the typo scanner.
 * Spans are produced by a tokenizer (or synthesized for plaintext scans); findings are produced by the scanner.
 */

/** Lexical region a span of text was classified as. */
export enum SpanKind {
    /** Literal body without quotes (interpolated fragment, heredoc or nowdoc); decoded per its `quote`. */
    StringLiteralEscaped = 'StringLiteralEscaped',
    /** Complete quoted literal as lexed, quotes included. */
    StringLiteralRaw = 'StringLiteralRaw',
    /** Bare code identifier (function, class, constant, keyword). */
    Identifier = 'Identifier',
    /** Identifier written with a leading `$`. */
    Variable = 'Variable',
    /** Text outside of code blocks (markup, templates, plaintext files). */
    InlineText = 'InlineText',
    /** Line, block or doc comment. */
    Comment = 'Comment',
}

/** Escape convention of the literal a string fragment came from. */
export enum QuoteStyle {
    Double = 'double',
    Single = 'single',
    /** Nowdoc bodies have no escape sequences. */
    Nowdoc = 'nowdoc',
}

interface SpanBase {
    text: string; // raw source text of the span
    startLine: number; // 1-based line where the span starts
}

export interface EscapedStringSpan extends SpanBase {
    kind: SpanKind.StringLiteralEscaped;
    quote: QuoteStyle;
}

export interface RawStringSpan extends SpanBase {
    kind: SpanKind.StringLiteralRaw;
}

export interface IdentifierSpan extends SpanBase {
    kind: SpanKind.Identifier | SpanKind.Variable;
}

export interface TextRegionSpan extends SpanBase {
    kind: SpanKind.InlineText | SpanKind.Comment;
}

/** A contiguous run of source text classified by kind. */
export type TextSpan = EscapedStringSpan | RawStringSpan | IdentifierSpan | TextRegionSpan;

/** One reported candidate misspelling. */
export interface TypoFinding {
    /** Word as it appeared in the source (original casing). */
    word: string;
    spanKind: SpanKind;
    /** 1-based absolute line number. */
    line: number;
    /** Corrections after filtering; when 2 or more, the last one is a caveat. */
    suggestions: readonly string[];
}

/** How the scanner interprets its input. */
export enum ScanMode {
    Tokenized = 'tokenized',
    PlainText = 'plaintext',
}

/**
 * Which characters count as line breaks inside string literals.
 * `decoded`: every character that decodes to a newline (escaped or literal).
 * `physical`: only newlines written literally in the source.
 */
export type LinePolicy = `decoded` | `physical`;
