/**
 * @file Selection Query Types
 *
 * Already-parsed selection requests. The textual grammar that produces
 * them lives outside the engine.
 *
 * @module dag/selection
 */

import type { AssetKeyInput } from '../graph/types.js';

/**
 * @property depth - Hops to follow; omitted means the full lineage
 */
export type SelectionQuery =
    | { kind: 'all' }
    | { kind: 'keys'; keys: readonly AssetKeyInput[] }
    | { kind: 'group'; group: string }
    | { kind: 'prefix'; prefix: AssetKeyInput }
    | { kind: 'upstream'; of: SelectionQuery; depth?: number }
    | { kind: 'downstream'; of: SelectionQuery; depth?: number }
    | { kind: 'union'; queries: readonly SelectionQuery[] }
    | { kind: 'intersection'; queries: readonly SelectionQuery[] }
    | { kind: 'difference'; left: SelectionQuery; right: SelectionQuery };
