/**
 * Domain interfaces and types for the typo scanner.
 */

// Spans & findings
export { SpanKind, QuoteStyle, ScanMode } from './Span.js';
export type {
    TextSpan,
    EscapedStringSpan,
    RawStringSpan,
    IdentifierSpan,
    TextRegionSpan,
    TypoFinding,
    LinePolicy,
} from './Span.js';

// Utility Types
export type { EventName } from './Utility.js';

// Event Names constant
export { EVENT_NAMES } from './Utility.js';
