/**
 * @file Staleness Type Definitions
 *
 * @module dag/staleness
 */

export type StalenessReason = 'never-materialized' | 'code-version-changed';

/**
 * Staleness of one computed asset.
 *
 * A key is stale when it has never materialized, or when the code
 * version declared for its slot differs from the one recorded on its
 * latest materialization event.
 *
 * @property reason - Why the key is stale; null when it is current
 * @property recordedCodeVersion - Code version on the latest event (null if none)
 */
export interface StalenessEntry {
    key: string;
    stale: boolean;
    reason: StalenessReason | null;
    declaredCodeVersion: string | null;
    recordedCodeVersion: string | null;
}
