/**
 * @file Slot Result Constructors
 *
 * Helpers computations use to build their StepOutput.
 *
 * @module dag/execution
 */

import { assetKey_canonical } from '../graph/assetKey.js';
import type { AssetKeyInput, MetadataMap } from '../graph/types.js';
import type { Declined, Produced, SlotResult, StepOutput } from './types.js';

export function produced(value: unknown, metadata: MetadataMap = {}): Produced {
    return { kind: 'produced', value, metadata };
}

const DECLINED: Declined = Object.freeze({ kind: 'declined' });

export function declined(): Declined {
    return DECLINED;
}

/**
 * Build a StepOutput from [key, result] pairs, canonicalizing keys.
 *
 * @example
 * return output_build([['orders/clean', produced(rows)], ['orders/rejects', declined()]]);
 */
export function output_build(entries: Array<[AssetKeyInput, SlotResult]>): StepOutput {
    const out: Record<string, SlotResult> = {};
    for (const [key, result] of entries) {
        out[assetKey_canonical(key)] = result;
    }
    return out;
}
