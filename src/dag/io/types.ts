/**
 * @file I/O Manager Contract
 *
 * The engine never touches asset values directly: every hand-off
 * between steps goes through this interface. Values are opaque to the
 * scheduler.
 *
 * @module dag/io
 */

import type { AssetKey, MetadataMap } from '../graph/types.js';

export interface IOManager {
    /**
     * Persist the value produced for a key. Anything thrown is recorded
     * by the engine as a StoreError.
     */
    asset_store(key: AssetKey, value: unknown, metadata: MetadataMap): Promise<void>;

    /**
     * Load the current value of a key. Source assets must be loadable
     * from external state alone. Anything thrown (including a missing
     * value) is recorded by the engine as a LoadError.
     */
    asset_load(key: AssetKey): Promise<unknown>;
}
