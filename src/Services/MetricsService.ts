/**
 * MetricsService provides in-memory counters for a scan run.
 */

export interface MetricsSnapshot {
    filesScanned: number; // files whose contents were scanned
    filesSkipped: number; // binary, unreadable or missing files
    findings: number; // findings printed (after the ignore list)
    eventsPublished: Record<string, number>; // counts per event name
    collectedAt: number; // epoch ms when snapshot taken
}

/**
 * MetricsService – central mutable counter set.
 */
export class MetricsService {
    private _state: Omit<MetricsSnapshot, 'collectedAt'> = {
        filesScanned: 0,
        filesSkipped: 0,
        findings: 0,
        eventsPublished: {},
    };

    /** Increment scanned file counter */
    public IncFileScanned(): void {
        this._state.filesScanned++;
    }
    /** Increment skipped file counter */
    public IncFileSkipped(): void {
        this._state.filesSkipped++;
    }
    /** Increment finding counter */
    public IncFinding(): void {
        this._state.findings++;
    }
    /** Increment event publish counter */
    public IncEvent(eventName: string): void {
        this._state.eventsPublished[eventName] = (this._state.eventsPublished[eventName] ?? 0) + 1;
    }

    /** Obtain a point-in-time immutable snapshot */
    public Snapshot(): MetricsSnapshot {
        return {
            filesScanned: this._state.filesScanned,
            filesSkipped: this._state.filesSkipped,
            findings: this._state.findings,
            eventsPublished: { ...this._state.eventsPublished },
            collectedAt: Date.now(),
        };
    }

    /** Reset all counters (primarily for tests) */
    public Reset(): void {
        this._state.filesScanned = 0;
        this._state.filesSkipped = 0;
        this._state.findings = 0;
        this._state.eventsPublished = {};
    }
}

/** Global singleton instance. */
export const metricsService = new MetricsService();
