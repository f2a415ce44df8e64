import { describe, it, expect } from 'vitest';
import { TokenizeSource } from '../src/Services/SourceTokenizer.js';
import { TokenizeError } from '../src/Common/Errors.js';
import { QuoteStyle, SpanKind } from '../src/Domain/index.js';

describe('SourceTokenizer', () => {
    it('should classify inline text, comments, strings and names', () => {
        const source = [
            '<h1>Helo</h1>',
            '<?php',
            '// first comment',
            "$userNmae = 'it\\'s';",
            'echo "Hi $name, welcome\\n";',
            '/* block',
            ' comment */',
            'function getValue() {}',
            '?>',
            'trailing text',
            '',
        ].join('\n');

        expect(TokenizeSource(source)).toEqual([
            { kind: SpanKind.InlineText, text: '<h1>Helo</h1>\n', startLine: 1 },
            { kind: SpanKind.Comment, text: '// first comment', startLine: 3 },
            { kind: SpanKind.Variable, text: '$userNmae', startLine: 4 },
            { kind: SpanKind.StringLiteralRaw, text: "'it\\'s'", startLine: 4 },
            { kind: SpanKind.Identifier, text: 'echo', startLine: 5 },
            { kind: SpanKind.StringLiteralEscaped, text: 'Hi ', startLine: 5, quote: QuoteStyle.Double },
            { kind: SpanKind.Variable, text: '$name', startLine: 5 },
            { kind: SpanKind.StringLiteralEscaped, text: ', welcome\\n', startLine: 5, quote: QuoteStyle.Double },
            { kind: SpanKind.Comment, text: '/* block\n comment */', startLine: 6 },
            { kind: SpanKind.Identifier, text: 'function', startLine: 8 },
            { kind: SpanKind.Identifier, text: 'getValue', startLine: 8 },
            { kind: SpanKind.InlineText, text: 'trailing text\n', startLine: 10 },
        ]);
    });

    it('should split heredocs and keep nowdocs whole', () => {
        const source = [
            '<?php',
            '$a = <<<EOT',
            'Hello $who',
            '  thier',
            'EOT;',
            "$b = <<<'RAW'",
            'no $interp here\\n',
            'RAW;',
            '',
        ].join('\n');

        expect(TokenizeSource(source)).toEqual([
            { kind: SpanKind.Variable, text: '$a', startLine: 2 },
            { kind: SpanKind.StringLiteralEscaped, text: 'Hello ', startLine: 3, quote: QuoteStyle.Double },
            { kind: SpanKind.Variable, text: '$who', startLine: 3 },
            { kind: SpanKind.StringLiteralEscaped, text: '\n  thier', startLine: 3, quote: QuoteStyle.Double },
            { kind: SpanKind.Variable, text: '$b', startLine: 6 },
            { kind: SpanKind.StringLiteralEscaped, text: 'no $interp here\\n', startLine: 7, quote: QuoteStyle.Nowdoc },
        ]);
    });

    it('should end a hash comment at the close tag', () => {
        expect(TokenizeSource('<?php # note ?>after')).toEqual([
            { kind: SpanKind.Comment, text: '# note ', startLine: 1 },
            { kind: SpanKind.InlineText, text: 'after', startLine: 1 },
        ]);
    });

    it('should not treat attributes as comments', () => {
        expect(TokenizeSource('<?php #[Attr]')).toEqual([{ kind: SpanKind.Identifier, text: 'Attr', startLine: 1 }]);
    });

    it('should skip complex interpolation', () => {
        expect(TokenizeSource('<?php echo "A {$obj->naem} B";')).toEqual([
            { kind: SpanKind.Identifier, text: 'echo', startLine: 1 },
            { kind: SpanKind.StringLiteralEscaped, text: 'A ', startLine: 1, quote: QuoteStyle.Double },
            { kind: SpanKind.StringLiteralEscaped, text: ' B', startLine: 1, quote: QuoteStyle.Double },
        ]);
    });

    it('should keep the binary prefix on constant literals', () => {
        expect(TokenizeSource("<?php $x = b'raw';")).toEqual([
            { kind: SpanKind.Variable, text: '$x', startLine: 1 },
            { kind: SpanKind.StringLiteralRaw, text: "b'raw'", startLine: 1 },
        ]);
    });

    it('should read text without an open tag as inline text', () => {
        expect(TokenizeSource('just teh text')).toEqual([{ kind: SpanKind.InlineText, text: 'just teh text', startLine: 1 }]);
    });

    it('should throw TokenizeError on an unterminated string', () => {
        expect(() => TokenizeSource("<?php\n$x = 'oops;")).toThrow(TokenizeError);
    });

    it('should throw TokenizeError on an unterminated heredoc', () => {
        expect(() => TokenizeSource('<?php\n$x = <<<EOT\nbody\n')).toThrow(TokenizeError);
    });
});
