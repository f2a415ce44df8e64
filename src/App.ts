/**
 * Command line application: parses arguments, loads configuration and the dictionary once,
 * then runs the batch scanner over the given paths.
 */
import { parseArgs } from 'util';
import { log, SetLogLevel } from './Common/Log.js';
import { AppError, DescribeError } from './Common/Errors.js';
import { MAIN_EVENT_BUS, type MainEventBus } from './Events/MainEventBus.js';
import { ConfigService } from './Services/ConfigService.js';
import { Dictionary } from './Services/Dictionary.js';
import { IgnoreList } from './Services/IgnoreList.js';
import { TypoScanner } from './Services/TypoScanner.js';
import { BatchScanner } from './Services/BatchScanner.js';
import { metricsService } from './Services/MetricsService.js';

/** Highest exit status a process can report. */
const MAX_EXIT_STATUS = 255;

const USAGE = `Usage: typo-scan [--help|-h|help] [options] path/to/file.php path/to/folder

  -h, --help, help
    Print this help text

  -p, --plaintext
    Read the files as plain text instead of as PHP source.

  -c, --with-context
    Print the trimmed source line below each finding.

  --extensions=php,html
    When scanning folders, only check files with these extensions. Defaults to php.
    If the value is the empty string, every file is checked.

  --dictionary=path         Dictionary file (typo->correction per line)
  --ignore-words=path       Words that are never reported, one per line
  --config=path             JSON or YAML config file (also TYPO_SCAN_CONFIG)
  --line-policy=decoded|physical
    Whether escaped newlines inside string literals advance the reported line (default: decoded)
  --log-level=debug|info|warn|error
`;

/** Parsed command line. */
interface CliArguments {
    help: boolean;
    paths: string[];
    configPath?: string;
    overrides: Record<string, unknown>;
}

/**
 * Splits `--extensions` into a list; the empty string means "all files".
 * @example
 * ParseExtensions('php, .html'); // ['php', 'html']
 */
export function ParseExtensions(value: string): string[] {
    return value
        .split(`,`)
        .map(extension => {
            return extension.trim().replace(/^\.+/, ``);
        })
        .filter(extension => {
            return extension !== ``;
        });
}

/**
 * Parses argv (without the node and script entries).
 * @throws TypeError from util.parseArgs on unknown options or missing values
 */
export function ParseCliArguments(argv: readonly string[]): CliArguments {
    const { values, positionals } = parseArgs({
        args: [...argv],
        allowPositionals: true,
        strict: true,
        options: {
            help: { type: `boolean`, short: `h` },
            plaintext: { type: `boolean`, short: `p` },
            'with-context': { type: `boolean`, short: `c` },
            extensions: { type: `string` },
            dictionary: { type: `string` },
            'ignore-words': { type: `string` },
            config: { type: `string` },
            'line-policy': { type: `string` },
            'log-level': { type: `string` },
        },
    });

    const help = values.help === true || positionals.includes(`help`);
    return {
        help,
        paths: positionals.filter(positional => {
            return positional !== `help`;
        }),
        configPath: values.config,
        overrides: {
            plaintext: values.plaintext,
            withContext: values[`with-context`],
            fileExtensions: values.extensions === undefined ? undefined : ParseExtensions(values.extensions),
            dictionaryPath: values.dictionary,
            ignoreWordsFile: values[`ignore-words`],
            linePolicy: values[`line-policy`],
            logLevel: values[`log-level`],
        },
    };
}

/**
 * Application entry point for the typo scanner CLI.
 */
export class TypoScanApp {
    /** Event bus for scan output and progress. */
    public eventBus: MainEventBus;

    /** Loads and validates the run configuration */
    private _configService: ConfigService;

    /** Sink for result lines */
    private readonly _write: (line: string) => void;

    /**
     * @param eventBus MainEventBus - Bus the app publishes on
     * @param write (line: string) => void - Sink for result lines (stdout by default)
     */
    public constructor(eventBus: MainEventBus = MAIN_EVENT_BUS, write: (line: string) => void = line => process.stdout.write(`${line}\n`)) {
        this.eventBus = eventBus;
        this._configService = new ConfigService(this.eventBus);
        this._write = write;
    }

    /**
     * Runs a full scan.
     * @param argv readonly string[] - Command line arguments
     * @param env NodeJS.ProcessEnv - Environment for config overrides
     * @returns Promise<number> - Exit status: number of findings (capped at 255), or 1 on fatal errors
     * @example
     * process.exitCode = await new TypoScanApp().Run(process.argv.slice(2));
     */
    public async Run(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
        let cli: CliArguments;
        try {
            cli = ParseCliArguments(argv);
        } catch(err) {
            this.__printUsage(`Error: ${DescribeError(err)}`);
            return 1;
        }
        if (cli.help) {
            this.__printUsage();
            return 0;
        }
        if (cli.paths.length === 0) {
            this.__printUsage(`Error: Expected 1 or more files or folders to analyze`);
            return 1;
        }

        const detachHandlers = this.__setupEventHandlers();
        try {
            const config = await this._configService.Load(cli.configPath ?? env.TYPO_SCAN_CONFIG, cli.overrides, env);
            SetLogLevel(config.logLevel);

            // Loaded once; every file shares the same read-only instance
            const dictionary = await Dictionary.Load(config.dictionaryPath);
            const ignoreList = config.ignoreWordsFile ? await IgnoreList.Load(config.ignoreWordsFile) : new IgnoreList();
            const scanner = new TypoScanner(dictionary, { linePolicy: config.linePolicy });
            const batch = new BatchScanner({ scanner, ignoreList, config, eventBus: this.eventBus });

            const findings = await batch.Run(cli.paths);
            log.debug(`Run finished: ${JSON.stringify(metricsService.Snapshot())}`, `App`);
            return Math.min(findings, MAX_EXIT_STATUS);
        } catch(err) {
            if (err instanceof AppError) {
                log.critical(err.message, `App`, err.code);
                return 1;
            }
            throw err;
        } finally {
            detachHandlers();
        }
    }

    /**
     * Routes `output` lines to the sink for the duration of one run.
     * @returns () => void - Removes the listeners again; the bus may be shared by other apps
     */
    private __setupEventHandlers(): () => void {
        const onOutput = (line: string): void => {
            this._write(line);
        };
        const onSkipped = (filePath: string, reason: string): void => {
            log.debug(`Skipped ${filePath} (${reason})`, `App`);
        };
        this.eventBus.On(`output`, onOutput);
        this.eventBus.On(`scan.skipped`, onSkipped);
        return () => {
            this.eventBus.off(`output`, onOutput);
            this.eventBus.off(`scan.skipped`, onSkipped);
        };
    }

    private __printUsage(message?: string): void {
        if (message) {
            process.stderr.write(`${message}\n\n`);
        }
        process.stderr.write(USAGE);
    }
}
