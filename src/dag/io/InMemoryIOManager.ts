/**
 * @file In-Memory I/O Manager
 *
 * Map-backed IOManager. Source asset values can be seeded at
 * construction, standing in for external state.
 *
 * @module dag/io
 */

import { assetKey_canonical, assetKey_toString } from '../graph/assetKey.js';
import type { AssetKey, AssetKeyInput, MetadataMap } from '../graph/types.js';
import type { IOManager } from './types.js';

interface StoredValue {
    value: unknown;
    metadata: MetadataMap;
}

export class InMemoryIOManager implements IOManager {
    private readonly values: Map<string, StoredValue> = new Map();

    /**
     * @param seed - Initial values by key (e.g. source assets)
     */
    constructor(seed: Iterable<[AssetKeyInput, unknown]> = []) {
        for (const [key, value] of seed) {
            this.values.set(assetKey_canonical(key), { value, metadata: {} });
        }
    }

    async asset_store(key: AssetKey, value: unknown, metadata: MetadataMap): Promise<void> {
        this.values.set(assetKey_toString(key), { value, metadata });
    }

    async asset_load(key: AssetKey): Promise<unknown> {
        const canonical: string = assetKey_toString(key);
        const stored: StoredValue | undefined = this.values.get(canonical);
        if (!stored) {
            throw new Error(`No value stored for '${canonical}'`);
        }
        return stored.value;
    }

    /** Synchronous peek for callers and tests; undefined if absent. */
    value_get(key: AssetKeyInput): unknown {
        return this.values.get(assetKey_canonical(key))?.value;
    }

    /** Whether a value is present for the key. */
    value_has(key: AssetKeyInput): boolean {
        return this.values.has(assetKey_canonical(key));
    }

    metadata_get(key: AssetKeyInput): MetadataMap | null {
        return this.values.get(assetKey_canonical(key))?.metadata ?? null;
    }
}
