// Diagnostics go to stderr; stdout carries scan results only.

/**
 * Returns the current timestamp in ISO format.
 * @returns string - Current ISO timestamp
 * @example
 * const ts = GetTimestamp(); // '2025-06-24T12:34:56.789Z'
 */
export function GetTimestamp(): string {
    return new Date().toISOString();
}

/**
 * Log levels for application logging.
 */
export enum LogLevel {
    Critical = 'CRITICAL',
    Error = 'ERROR',
    Warning = 'WARNING',
    Info = 'INFO',
    Debug = 'DEBUG',
}

/** Threshold names accepted from configuration. */
export type LogLevelName = `debug` | `info` | `warn` | `error`;

// Supported log levels with numeric severity (lower is more verbose)
const LOG_LEVELS: Record<LogLevel, number> = {
    [LogLevel.Debug]: 0,
    [LogLevel.Info]: 1,
    [LogLevel.Warning]: 2,
    [LogLevel.Error]: 3,
    [LogLevel.Critical]: 4,
};

const NAME_TO_LEVEL: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.Debug,
    info: LogLevel.Info,
    warn: LogLevel.Warning,
    error: LogLevel.Error,
};

let threshold: LogLevel = LogLevel.Info;

function isLevelName(value: string): value is LogLevelName {
    return Object.prototype.hasOwnProperty.call(NAME_TO_LEVEL, value);
}

/**
 * Sets the minimum level that is written out.
 * @param level LogLevel | LogLevelName - New threshold
 * @example
 * SetLogLevel('warn');
 */
export function SetLogLevel(level: LogLevel | LogLevelName): void {
    threshold = isLevelName(level) ? NAME_TO_LEVEL[level] : level;
}

/** Current minimum level. */
export function GetLogLevel(): LogLevel {
    return threshold;
}

/**
 * Logs a message at the specified log level, prepending a timestamp.
 * @param level LogLevel - Level of the log
 * @param message string - Message to log
 * @param from string - Source identifier
 * @param context string - Optional context or details
 * @example
 * log(LogLevel.Info, 'Scan started', 'App');
 */
export function log(level: LogLevel, message: string, from: string, context?: string): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[threshold]) {
        return;
    }
    const timestamp = GetTimestamp();
    const body = context ? `[${context}] ${message}` : message;
    const formatted = `[${timestamp}] [${level}] [${from}] ${body}`;
    const logger = console;

    switch (level) {
        case LogLevel.Critical:
        case LogLevel.Error:
            logger.error(formatted);
            break;
        case LogLevel.Warning:
            logger.warn(formatted);
            break;
        case LogLevel.Info:
        case LogLevel.Debug:
            // console.info/debug write to stdout; keep them on the diagnostic stream
            logger.error(formatted);
            break;
    }
}

/**
 * Shorthand helpers per level.
 */
export namespace log {
    /**
     * Logs a critical level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function critical(message: string, from: string, context?: string): void {
        log(LogLevel.Critical, message, from, context);
    }

    /**
     * Logs an error level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function error(message: string, from: string, context?: string): void {
        log(LogLevel.Error, message, from, context);
    }

    /**
     * Logs a warning level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function warning(message: string, from: string, context?: string): void {
        log(LogLevel.Warning, message, from, context);
    }

    /** Logs an informational level message. */
    export function info(message: string, from: string, context?: string): void {
        log(LogLevel.Info, message, from, context);
    }

    /** Logs a debug level message. */
    export function debug(message: string, from: string, context?: string): void {
        log(LogLevel.Debug, message, from, context);
    }
}
