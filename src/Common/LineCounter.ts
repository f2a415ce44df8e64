import { SpanKind, type LinePolicy, type TextSpan } from '../Domain/index.js';
import { DecodeWithEscapedNewlines } from './StringEscape.js';

/** Number of entries in a sorted list that are below `value`. */
function countBelow(sorted: readonly number[], value: number): number {
    let low = 0;
    let high = sorted.length;
    while (low < high) {
        const mid = (low + high) >>> 1;
        if (sorted[mid] < value) {
            low = mid + 1;
        } else {
            high = mid;
        }
    }
    return low;
}

/**
 * LineCounter maps offsets inside one span's decoded text to the number of line breaks before them.
 * The cursor remembers the last queried offset so that nearby queries only scan the delta.
 * Create one per span; never reuse across texts.
 */
export class LineCounter {
    /** Text the offsets index into */
    private readonly _countingText: string;
    private readonly _length: number;
    /** Offsets of escape sequences that decoded to a newline; counted only under the decoded policy */
    private readonly _escapedBreaks: readonly number[];
    /** Last queried offset */
    private _lastOffset = 0;
    /** Line breaks in _countingText[0.._lastOffset) */
    private _lastLine = 0;

    /**
     * @param countingText string - Text the offsets refer to
     * @param policy LinePolicy - Whether escaped newlines count as line breaks
     * @param escapedBreaks readonly number[] - Ascending offsets of escaped newlines in `countingText`
     */
    constructor(countingText: string, policy: LinePolicy = `decoded`, escapedBreaks: readonly number[] = []) {
        this._countingText = countingText;
        this._length = countingText.length;
        this._escapedBreaks = policy === `decoded` ? escapedBreaks : [];
    }

    /**
     * Builds a counter for a span. String literals count over their placeholder decode, so offsets
     * found in the decoded literal line up; other spans count over their raw text.
     * @param span TextSpan - Span being scanned
     * @param policy LinePolicy - Line break policy for escaped newlines
     * @example
     * const counter = LineCounter.ForSpan(span, 'decoded');
     * const line = span.startLine + counter.LineForOffset(match.offset);
     */
    public static ForSpan(span: TextSpan, policy: LinePolicy = `decoded`): LineCounter {
        switch (span.kind) {
            case SpanKind.StringLiteralEscaped: {
                const decoded = DecodeWithEscapedNewlines(span.text, span.quote);
                return new LineCounter(decoded.text, policy, decoded.newlineOffsets);
            }
            case SpanKind.StringLiteralRaw: {
                const decoded = DecodeWithEscapedNewlines(span.text);
                return new LineCounter(decoded.text, policy, decoded.newlineOffsets);
            }
            default:
                return new LineCounter(span.text, policy);
        }
    }

    /** Length of the counting text. */
    public get length(): number {
        return this._length;
    }

    /**
     * @param offset number - 0-based offset, clamped to [0, length]
     * @returns number - line breaks before `offset` (0 on the first line)
     */
    public LineForOffset(offset: number): number {
        const target = Math.min(Math.max(offset, 0), this._length);
        if (target > this._lastOffset) {
            this._lastLine += this.__countBreaks(this._lastOffset, target);
        } else if (target < this._lastOffset) {
            this._lastLine -= this.__countBreaks(target, this._lastOffset);
        }
        this._lastOffset = target;
        return this._lastLine;
    }

    private __countBreaks(from: number, to: number): number {
        let count = countBelow(this._escapedBreaks, to) - countBelow(this._escapedBreaks, from);
        for (let i = from; i < to; i++) {
            if (this._countingText[i] === `\n`) {
                count++;
            }
        }
        return count;
    }
}
