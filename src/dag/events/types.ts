/**
 * @file Materialization Event Types
 *
 * @module dag/events
 */

import type { AssetKey, MetadataMap } from '../graph/types.js';

/**
 * Immutable record of one asset being produced.
 *
 * @property stepId - Producing step; null for externally reported events
 * @property codeVersion - Code version active when the value was produced
 * @property timestamp - ISO timestamp
 */
export interface MaterializationEvent {
    readonly key: AssetKey;
    readonly runId: string;
    readonly stepId: string | null;
    readonly timestamp: string;
    readonly codeVersion: string | null;
    readonly metadata: MetadataMap;
}

export type MaterializationObserver = (event: MaterializationEvent) => void;
