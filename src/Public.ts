/**
 * Library surface for analysis hosts that embed the scanner.
 */
export { SpanKind, QuoteStyle, ScanMode, EVENT_NAMES } from './Domain/index.js';
export type { TextSpan, TypoFinding, LinePolicy, EventName } from './Domain/index.js';
export { Dictionary, DEFAULT_DICTIONARY_PATH } from './Services/Dictionary.js';
export { IgnoreList } from './Services/IgnoreList.js';
export { TypoScanner, type TypoScannerOptions } from './Services/TypoScanner.js';
export { SourceTokenizer, TokenizeSource } from './Services/SourceTokenizer.js';
export { BatchScanner, FormatFinding, LooksBinary, SPAN_KIND_DESCRIPTIONS } from './Services/BatchScanner.js';
export { FilterSuggestions, FormatSuggestionText } from './Common/SuggestionFilter.js';
export { ExtractWords, ExtractIdentifierParts, type WordMatch } from './Common/WordExtractor.js';
export { DecodeEscapes, DecodeQuotedLiteral, DecodeWithNewlinePlaceholder, DecodeWithEscapedNewlines, NEWLINE_PLACEHOLDER, type EscapedNewlineDecode } from './Common/StringEscape.js';
export { LineCounter } from './Common/LineCounter.js';
export * from './Common/Errors.js';
