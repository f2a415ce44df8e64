/**
 * Central event bus for scan progress and output.
 */
import { EventEmitter } from 'events';
import type { EventName, TypoFinding } from '../Domain/index.js';
import type { ValidatedConfig } from '../Types/Config.js';
import { metricsService, type MetricsService } from '../Services/MetricsService.js';

/** Listener arguments per event. */
export interface EventPayloads {
    'config.loaded': [config: ValidatedConfig];
    'scan.file': [filePath: string];
    'scan.skipped': [filePath: string, reason: string];
    'scan.finding': [filePath: string, finding: TypoFinding];
    output: [line: string];
}

/**
 * MainEventBus is the central event system for internal communication.
 * The CLI listens to `output` for result lines; tests attach their own listeners.
 */
export class MainEventBus extends EventEmitter {
    private readonly _metrics: MetricsService;

    /**
     * Creates a new MainEventBus instance.
     * @param metrics MetricsService - Counter set that records every emitted event
     * @example
     * const bus = new MainEventBus();
     */
    constructor(metrics: MetricsService = metricsService) {
        super();
        this._metrics = metrics;
    }
    /** Typed emit helper enforcing known event names. */
    public Emit<T extends EventName>(eventName: T, ...args: EventPayloads[T]): boolean {
        this._metrics.IncEvent(eventName);
        return super.emit(eventName, ...args);
    }
    /** Typed on helper enforcing known event names. */
    public On<T extends EventName>(eventName: T, listener: (...args: EventPayloads[T]) => void): this {
        super.on(eventName, listener);
        return this;
    }
}

/**
 * Global event bus instance for the application.
 * @example
 * import { MAIN_EVENT_BUS } from './Events/MainEventBus.js';
 * MAIN_EVENT_BUS.On('output', line => process.stdout.write(line + '\n'));
 */
export const MAIN_EVENT_BUS = new MainEventBus();
