/**
 * @file Materialization Bus
 *
 * Forwards every MaterializationEvent to external observers (UI,
 * sensors, telemetry). Typed facade over Node.js EventEmitter.
 *
 * Dispatch is fire-and-forget: `publish` defers delivery to the next
 * turn of the event loop, so a slow or throwing observer never holds up
 * the engine. Observer exceptions are logged.
 *
 * @module dag/events
 */

import { EventEmitter } from 'events';
import { silentLogger, type Logger } from '../../log/logger.js';
import { assetKey_toString } from '../graph/assetKey.js';
import type { MaterializationEvent, MaterializationObserver } from './types.js';

/** Internal event channel. */
const CHANNEL = 'materialization' as const;

export class MaterializationBus {
    private readonly emitter: EventEmitter;
    private pending: number = 0;
    private readonly drainWaiters: Array<() => void> = [];

    constructor(private readonly logger: Logger = silentLogger) {
        this.emitter = new EventEmitter();
        this.emitter.setMaxListeners(0);
    }

    /**
     * Subscribe to materialization events.
     *
     * @returns Unsubscribe function.
     */
    subscribe(observer: MaterializationObserver): () => void {
        const guarded = (event: MaterializationEvent): void => {
            try {
                observer(event);
            } catch (err: unknown) {
                this.logger.warn(`observer failed on '${assetKey_toString(event.key)}'`, err);
            }
        };
        this.emitter.on(CHANNEL, guarded);
        return (): void => {
            this.emitter.off(CHANNEL, guarded);
        };
    }

    /**
     * Queue an event for delivery to all subscribers. Returns immediately.
     */
    publish(event: MaterializationEvent): void {
        this.pending++;
        setImmediate((): void => {
            this.emitter.emit(CHANNEL, event);
            this.pending--;
            if (this.pending === 0) {
                this.drainWaiters.splice(0).forEach((resolve: () => void): void => resolve());
            }
        });
    }

    /** Resolves once every queued event has been delivered. */
    drain(): Promise<void> {
        if (this.pending === 0) return Promise.resolve();
        return new Promise<void>((resolve: () => void): void => {
            this.drainWaiters.push(resolve);
        });
    }

    get observerCount(): number {
        return this.emitter.listenerCount(CHANNEL);
    }
}
