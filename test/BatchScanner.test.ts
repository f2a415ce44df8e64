import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { BatchScanner, FormatFinding, LooksBinary } from '../src/Services/BatchScanner.js';
import { Dictionary } from '../src/Services/Dictionary.js';
import { IgnoreList } from '../src/Services/IgnoreList.js';
import { MetricsService } from '../src/Services/MetricsService.js';
import { TypoScanner } from '../src/Services/TypoScanner.js';
import { MainEventBus } from '../src/Events/MainEventBus.js';
import { SpanKind } from '../src/Domain/index.js';
import type { ValidatedConfig } from '../src/Types/Config.js';

const dictionary = Dictionary.Parse('teh->the\nrecieve->receive\nthier->their');

interface Harness {
    batch: BatchScanner;
    output: string[];
    metrics: MetricsService;
}

function createHarness(config: Partial<Pick<ValidatedConfig, 'fileExtensions' | 'plaintext' | 'withContext'>> = {}, ignoreList = new IgnoreList()): Harness {
    const metrics = new MetricsService();
    const eventBus = new MainEventBus(metrics);
    const output: string[] = [];
    eventBus.On('output', line => {
        output.push(line);
    });
    const batch = new BatchScanner({
        scanner: new TypoScanner(dictionary),
        ignoreList,
        config: { fileExtensions: ['php'], plaintext: false, withContext: false, ...config },
        eventBus,
        metrics,
    });
    return { batch, output, metrics };
}

describe('LooksBinary', () => {
    it('should accept text with tabs and line breaks', () => {
        expect(LooksBinary(Buffer.from('hello\tworld\r\n'))).toBe(false);
    });

    it('should flag control bytes', () => {
        expect(LooksBinary(Buffer.from([0x3c, 0x00]))).toBe(true);
        expect(LooksBinary(Buffer.from([0x1b]))).toBe(true);
        expect(LooksBinary(Buffer.from([0x7f]))).toBe(true);
    });

    it('should only inspect the first 1024 bytes', () => {
        expect(LooksBinary(Buffer.concat([Buffer.alloc(1024, 0x61), Buffer.from([0x00])]))).toBe(false);
    });
});

describe('FormatFinding', () => {
    it('should render a result line', () => {
        const finding = { word: 'Teh', spanKind: SpanKind.Comment, line: 3, suggestions: ['the'] };
        expect(FormatFinding('a.php', finding, 'a comment')).toBe('a.php:3: Saw a possible typo "Teh" in a comment (Did you mean "The"?)');
    });
});

describe('BatchScanner', () => {
    let root: string;

    beforeEach(async () => {
        root = await mkdtemp(path.join(tmpdir(), 'typo-scan-batch-'));
        await mkdir(path.join(root, 'sub'));
        await writeFile(path.join(root, 'b.php'), '<?php\n// teh\n');
        await writeFile(path.join(root, 'a.php'), "<?php\necho 'recieve';\n");
        await writeFile(path.join(root, 'sub', 'c.php'), '<?php\n$thier = 1;\n');
        await writeFile(path.join(root, 'notes.txt'), 'teh');
        await writeFile(path.join(root, 'bin.php'), Buffer.concat([Buffer.from('<?'), Buffer.from([0x00]), Buffer.from(' teh recieve')]));
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    it('should scan directories in sorted order and skip binary files', async () => {
        const { batch, output, metrics } = createHarness();
        expect(await batch.Run([root])).toBe(3);
        expect(output).toEqual([
            `${root}/a.php:2: Saw a possible typo "recieve" in a string literal (Did you mean "receive"?)`,
            `${root}/b.php:2: Saw a possible typo "teh" in a comment (Did you mean "the"?)`,
            `${root}/sub/c.php:2: Saw a possible typo "thier" in a variable (Did you mean "their"?)`,
        ]);
        const snapshot = metrics.Snapshot();
        expect(snapshot.filesScanned).toBe(3);
        expect(snapshot.filesSkipped).toBe(1);
        expect(snapshot.findings).toBe(3);
    });

    it('should report nothing for a binary file', async () => {
        const { batch, output } = createHarness();
        expect(await batch.Run([path.join(root, 'bin.php')])).toBe(0);
        expect(output).toEqual([]);
    });

    it('should check every file when no extensions are configured', async () => {
        const { batch, output } = createHarness({ fileExtensions: [] });
        expect(await batch.Run([root])).toBe(4);
        expect(output[2]).toBe(`${root}/notes.txt:1: Saw a possible typo "teh" in inline HTML (Did you mean "the"?)`);
    });

    it('should scan each file once per run', async () => {
        const { batch, output } = createHarness();
        const file = path.join(root, 'b.php');
        expect(await batch.Run([file, file, root])).toBe(3);
        expect(output[0]).toBe(`${file}:2: Saw a possible typo "teh" in a comment (Did you mean "the"?)`);
        expect(output).toHaveLength(3);
    });

    it('should log and skip missing paths', async () => {
        const { batch, output, metrics } = createHarness();
        expect(await batch.Run([path.join(root, 'missing.php')])).toBe(0);
        expect(output).toEqual([]);
        expect(metrics.Snapshot().filesSkipped).toBe(1);
    });

    it('should print the trimmed source line with context enabled', async () => {
        const file = path.join(root, 'ctx.php');
        await writeFile(file, "<?php\n    $x = 'teh';   \n");
        const { batch, output } = createHarness({ withContext: true });
        expect(await batch.Run([file])).toBe(1);
        expect(output).toEqual([`${file}:2: Saw a possible typo "teh" in a string literal (Did you mean "the"?)`, `    $x = 'teh';`]);
    });

    it('should not print findings from the ignore list', async () => {
        const { batch, output } = createHarness({}, IgnoreList.Parse('TEH'));
        expect(await batch.Run([path.join(root, 'b.php'), path.join(root, 'a.php')])).toBe(1);
        expect(output).toEqual([`${root}/a.php:2: Saw a possible typo "recieve" in a string literal (Did you mean "receive"?)`]);
    });

    it('should describe plaintext findings as plain text', async () => {
        const { batch, output } = createHarness({ plaintext: true });
        expect(await batch.Run([path.join(root, 'b.php')])).toBe(1);
        expect(output).toEqual([`${root}/b.php:2: Saw a possible typo "teh" in plain text (Did you mean "the"?)`]);
    });
});
