import { ScanMode, SpanKind, type LinePolicy, type TextSpan, type TypoFinding } from '../Domain/index.js';
import { InvalidEscapeError, TokenizeError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { LineCounter } from '../Common/LineCounter.js';
import { DecodeEscapes, DecodeQuotedLiteral } from '../Common/StringEscape.js';
import { FilterSuggestions } from '../Common/SuggestionFilter.js';
import { ExtractIdentifierParts, ExtractWords, LooksLikeCompoundWord } from '../Common/WordExtractor.js';
import type { Dictionary } from './Dictionary.js';
import { TokenizeSource } from './SourceTokenizer.js';

export interface TypoScannerOptions {
    /** Line break policy inside string literals (default `decoded`). */
    linePolicy?: LinePolicy;
}

/**
 * TypoScanner turns classified spans into typo findings.
 * Findings come out in span order, and left to right within a span.
 * The scanner holds no per-scan state; one instance can serve any number of files.
 */
export class TypoScanner {
    private readonly _dictionary: Dictionary;
    private readonly _linePolicy: LinePolicy;

    /**
     * @param dictionary Dictionary - Shared, already loaded dictionary
     * @param options TypoScannerOptions - Scanner options
     */
    constructor(dictionary: Dictionary, options: TypoScannerOptions = {}) {
        this._dictionary = dictionary;
        this._linePolicy = options.linePolicy ?? `decoded`;
    }

    /**
     * Scans spans produced by a tokenizer.
     * In PlainText mode every span is read as inline text: no escape decoding, no identifier splitting.
     * @param spans Iterable<TextSpan> - Spans of one file, in source order
     * @param mode ScanMode - Tokenized (default) or PlainText
     * @returns TypoFinding[] - Findings in span order
     * @example
     * const findings = scanner.Scan([{ kind: SpanKind.Comment, text: '// teh end', startLine: 3 }]);
     */
    public Scan(spans: Iterable<TextSpan>, mode: ScanMode = ScanMode.Tokenized): TypoFinding[] {
        const findings: TypoFinding[] = [];
        for (const span of spans) {
            if (mode === ScanMode.PlainText) {
                this.__scanFreeText({ kind: SpanKind.InlineText, text: span.text, startLine: span.startLine }, span.text, findings);
            } else {
                this.__scanSpan(span, findings);
            }
        }
        return findings;
    }

    /**
     * Scans raw file text. Tokenized mode runs the built-in source tokenizer and falls back to
     * plaintext (with a warning) when the text cannot be tokenized.
     * @param text string - Whole file contents
     * @param mode ScanMode - How to read the text
     */
    public ScanText(text: string, mode: ScanMode = ScanMode.Tokenized): TypoFinding[] {
        if (mode === ScanMode.PlainText) {
            return this.Scan([{ kind: SpanKind.InlineText, text, startLine: 1 }], ScanMode.PlainText);
        }
        let spans: TextSpan[];
        try {
            spans = TokenizeSource(text);
        } catch(err) {
            if (!(err instanceof TokenizeError)) {
                throw err;
            }
            log.warning(`${err.message} (line ${err.details?.line ?? `?`}); scanning as plaintext`, `TypoScanner`);
            return this.ScanText(text, ScanMode.PlainText);
        }
        return this.Scan(spans);
    }

    /**
     * Entry point for analysis hosts: spans from the host's own tokenizer, or null for plaintext.
     * @param fileText string - Whole file contents
     * @param tokens Iterable<TextSpan> | null - Host tokens for the file
     */
    public ScanFile(fileText: string, tokens: Iterable<TextSpan> | null): TypoFinding[] {
        if (tokens === null) {
            return this.ScanText(fileText, ScanMode.PlainText);
        }
        return this.Scan(tokens);
    }

    private __scanSpan(span: TextSpan, findings: TypoFinding[]): void {
        switch (span.kind) {
            case SpanKind.StringLiteralEscaped:
            case SpanKind.StringLiteralRaw: {
                let decoded: string;
                try {
                    decoded = span.kind === SpanKind.StringLiteralEscaped ? DecodeEscapes(span.text, span.quote) : DecodeQuotedLiteral(span.text);
                } catch(err) {
                    if (!(err instanceof InvalidEscapeError)) {
                        throw err;
                    }
                    log.debug(`Skipping string literal at line ${span.startLine}: ${err.message}`, `TypoScanner`);
                    return;
                }
                this.__scanFreeText(span, decoded, findings);
                return;
            }
            case SpanKind.Identifier:
                this.__scanIdentifier(span, span.text, findings);
                return;
            case SpanKind.Variable:
                this.__scanIdentifier(span, span.text.replace(/^\$/, ``), findings);
                return;
            case SpanKind.InlineText:
            case SpanKind.Comment:
                this.__scanFreeText(span, span.text, findings);
                return;
        }
    }

    /** Word extraction over decoded text; lines come from a per-span LineCounter. */
    private __scanFreeText(span: TextSpan, text: string, findings: TypoFinding[]): void {
        const counter = LineCounter.ForSpan(span, this._linePolicy);
        const report = (word: string, offset: number, suggestions: readonly string[]): void => {
            findings.push({
                word,
                spanKind: span.kind,
                line: span.startLine + counter.LineForOffset(offset),
                suggestions,
            });
        };

        for (const { word, offset } of ExtractWords(text)) {
            const suggestions = this._dictionary.Lookup(word);
            if (suggestions) {
                report(word, offset, suggestions);
                continue;
            }
            if (!LooksLikeCompoundWord(word)) {
                continue;
            }
            // code-like names inside comments / strings, e.g. "call getTehValue()"
            const parts = [...ExtractIdentifierParts(word)];
            if (parts.length < 2) {
                continue;
            }
            for (const part of parts) {
                const partSuggestions = this._dictionary.Lookup(part.word);
                if (partSuggestions) {
                    report(part.word, offset + part.offset, partSuggestions);
                }
            }
        }
    }

    /** Identifier parts all report the span's start line. */
    private __scanIdentifier(span: TextSpan, text: string, findings: TypoFinding[]): void {
        for (const { word } of ExtractIdentifierParts(text)) {
            const suggestions = this._dictionary.Lookup(word);
            if (!suggestions) {
                continue;
            }
            const filtered = FilterSuggestions(suggestions, true);
            if (!filtered) {
                continue;
            }
            findings.push({ word, spanKind: span.kind, line: span.startLine, suggestions: filtered });
        }
    }
}
