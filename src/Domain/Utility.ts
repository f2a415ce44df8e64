/**
 * Utility types shared across the scanner.
 */

/**
 * Central enumeration of well-known event names for typed event bus helpers.
 * Extend as new events are introduced.
 */
export const EVENT_NAMES = {
    configLoaded: 'config.loaded',
    scanFile: 'scan.file',
    scanSkipped: 'scan.skipped',
    scanFinding: 'scan.finding',
    output: 'output',
} as const;

/** Type union of event string literals. */
export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];
