/**
 * @file Materialization Log
 *
 * Append-only log of MaterializationEvents with a latest-per-key index.
 * All writes go through `event_append`, which is synchronous, so
 * concurrently running invocations can never lose an append. Events are
 * frozen on the way in and never removed.
 *
 * @module dag/events
 */

import { assetKey_canonical, assetKey_toString } from '../graph/assetKey.js';
import type { AssetKeyInput } from '../graph/types.js';
import type { MaterializationEvent } from './types.js';

export class MaterializationLog {
    private readonly entries: MaterializationEvent[] = [];
    private readonly byKey: Map<string, MaterializationEvent[]> = new Map();

    /**
     * Append one event. Returns the frozen stored instance.
     */
    event_append(event: MaterializationEvent): MaterializationEvent {
        const stored: MaterializationEvent = Object.freeze({
            ...event,
            metadata: Object.freeze({ ...event.metadata }),
        });
        this.entries.push(stored);

        const canonical: string = assetKey_toString(stored.key);
        const history: MaterializationEvent[] | undefined = this.byKey.get(canonical);
        if (history) {
            history.push(stored);
        } else {
            this.byKey.set(canonical, [stored]);
        }
        return stored;
    }

    /** Current materialization of a key, or null if it never materialized. */
    latest_get(key: AssetKeyInput): MaterializationEvent | null {
        const history: MaterializationEvent[] | undefined = this.byKey.get(assetKey_canonical(key));
        if (!history || history.length === 0) return null;
        return history[history.length - 1];
    }

    /** Every event for a key, oldest first. */
    history_list(key: AssetKeyInput): readonly MaterializationEvent[] {
        return [...(this.byKey.get(assetKey_canonical(key)) ?? [])];
    }

    /** Every event appended by one run, in append order. */
    run_list(runId: string): readonly MaterializationEvent[] {
        return this.entries.filter((event: MaterializationEvent): boolean => event.runId === runId);
    }

    /** Whether any event carries this run id. */
    run_has(runId: string): boolean {
        return this.entries.some((event: MaterializationEvent): boolean => event.runId === runId);
    }

    get size(): number {
        return this.entries.length;
    }
}
