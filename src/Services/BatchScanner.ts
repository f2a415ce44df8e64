import { promises as fs, type Stats } from 'fs';
import * as path from 'path';
import { ScanMode, SpanKind, type TypoFinding } from '../Domain/index.js';
import { log } from '../Common/Log.js';
import { DescribeError, FileReadError } from '../Common/Errors.js';
import { FormatSuggestionText } from '../Common/SuggestionFilter.js';
import { CollectFilesRecursively, NormalizePath } from '../Execution/Direct/CollectFilesRecursively.js';
import type { MainEventBus } from '../Events/MainEventBus.js';
import type { ValidatedConfig } from '../Types/Config.js';
import { metricsService, type MetricsService } from './MetricsService.js';
import type { IgnoreList } from './IgnoreList.js';
import type { TypoScanner } from './TypoScanner.js';

/** How many leading bytes are inspected by the binary-file heuristic. */
export const BINARY_SNIFF_BYTES = 1024;

/** Human readable name of each span kind, used in result lines. */
export const SPAN_KIND_DESCRIPTIONS: Record<SpanKind, string> = {
    [SpanKind.StringLiteralEscaped]: `a string literal`,
    [SpanKind.StringLiteralRaw]: `a string literal`,
    [SpanKind.Identifier]: `a token`,
    [SpanKind.Variable]: `a variable`,
    [SpanKind.InlineText]: `inline HTML`,
    [SpanKind.Comment]: `a comment`,
};

const PLAINTEXT_DESCRIPTION = `plain text`;

/**
 * Binary-file heuristic: any control byte other than tab, LF or CR in the first BINARY_SNIFF_BYTES bytes.
 * @param contents Uint8Array - File contents (only the head is inspected)
 * @example
 * LooksBinary(Buffer.from([0x3c, 0x00])); // true
 */
export function LooksBinary(contents: Uint8Array): boolean {
    const limit = Math.min(contents.length, BINARY_SNIFF_BYTES);
    for (let i = 0; i < limit; i++) {
        const byte = contents[i];
        if ((byte < 0x20 && byte !== 0x09 && byte !== 0x0a && byte !== 0x0d) || byte === 0x7f) {
            return true;
        }
    }
    return false;
}

/**
 * Renders one result line.
 * @example
 * FormatFinding('a.php', finding, 'a comment');
 * // 'a.php:3: Saw a possible typo "teh" in a comment (Did you mean "the"?)'
 */
export function FormatFinding(filePath: string, finding: TypoFinding, description: string): string {
    const suggestion = FormatSuggestionText(finding.suggestions, finding.word);
    return `${filePath}:${finding.line}: Saw a possible typo ${JSON.stringify(finding.word)} in ${description} (${suggestion})`;
}

export interface BatchScannerOptions {
    scanner: TypoScanner;
    ignoreList: IgnoreList;
    config: Pick<ValidatedConfig, `fileExtensions` | `plaintext` | `withContext`>;
    eventBus: MainEventBus;
    metrics?: MetricsService;
}

/**
 * BatchScanner walks files and directories, scans each file once and emits result lines
 * on the event bus (`output`). Recoverable problems are logged and the run continues.
 */
export class BatchScanner {
    private readonly _scanner: TypoScanner;
    private readonly _ignoreList: IgnoreList;
    private readonly _config: BatchScannerOptions[`config`];
    private readonly _eventBus: MainEventBus;
    private readonly _metrics: MetricsService;
    /** Resolved paths already scanned during this run */
    private readonly _checked = new Set<string>();

    constructor(options: BatchScannerOptions) {
        this._scanner = options.scanner;
        this._ignoreList = options.ignoreList;
        this._config = options.config;
        this._eventBus = options.eventBus;
        this._metrics = options.metrics ?? metricsService;
    }

    /**
     * Scans every given file and directory.
     * @param paths readonly string[] - Files and/or directories
     * @returns Promise<number> - Number of findings reported
     * @example
     * const count = await batch.Run(['src', 'index.php']);
     */
    public async Run(paths: readonly string[]): Promise<number> {
        let total = 0;
        for (const target of paths) {
            let stat: Stats;
            try {
                stat = await fs.stat(target);
            } catch(err) {
                log.error(`Failed to find file/folder '${target}': ${DescribeError(err)}`, `BatchScanner`);
                this._metrics.IncFileSkipped();
                continue;
            }
            log.debug(`Checking ${target} ${JSON.stringify(this._config.fileExtensions)}`, `BatchScanner`);

            if (stat.isDirectory()) {
                const files = await CollectFilesRecursively(target, this._config.fileExtensions);
                for (const file of files) {
                    total += await this.CheckFile(file);
                }
            } else {
                total += await this.CheckFile(NormalizePath(target));
            }
        }
        return total;
    }

    /**
     * Scans one file unless it was already scanned in this run.
     * @param filePath string - Path as it should appear in result lines
     * @returns Promise<number> - Findings reported for the file
     */
    public async CheckFile(filePath: string): Promise<number> {
        const key = path.resolve(filePath);
        if (this._checked.has(key)) {
            return 0;
        }
        this._checked.add(key);

        let contents: Buffer;
        try {
            contents = await fs.readFile(filePath);
        } catch(err) {
            const failure = new FileReadError(`Failed to read contents of '${filePath}': ${DescribeError(err)}`, { path: filePath }, err);
            log.error(failure.message, `BatchScanner`);
            this.__skip(filePath, failure.message);
            return 0;
        }
        if (LooksBinary(contents)) {
            log.debug(`Skipping binary file '${filePath}'`, `BatchScanner`);
            this.__skip(filePath, `binary`);
            return 0;
        }

        this._eventBus.Emit(`scan.file`, filePath);
        this._metrics.IncFileScanned();
        const text = contents.toString(`utf-8`);
        const mode = this._config.plaintext ? ScanMode.PlainText : ScanMode.Tokenized;
        const findings = this._scanner.ScanText(text, mode);
        const lines = this._config.withContext ? text.split(`\n`) : [];

        let reported = 0;
        for (const finding of findings) {
            if (this._ignoreList.Has(finding.word)) {
                continue;
            }
            const description = this._config.plaintext ? PLAINTEXT_DESCRIPTION : SPAN_KIND_DESCRIPTIONS[finding.spanKind];
            this._eventBus.Emit(`output`, FormatFinding(filePath, finding, description));
            if (this._config.withContext) {
                // decoded escapes can place a finding past the last physical line
                const sourceLine = lines[finding.line - 1]?.trim();
                if (sourceLine) {
                    this._eventBus.Emit(`output`, `    ${sourceLine}`);
                }
            }
            this._eventBus.Emit(`scan.finding`, filePath, finding);
            this._metrics.IncFinding();
            reported++;
        }
        return reported;
    }

    private __skip(filePath: string, reason: string): void {
        this._metrics.IncFileSkipped();
        this._eventBus.Emit(`scan.skipped`, filePath, reason);
    }
}
