/**
 * @file Asset Keys
 *
 * Multi-segment asset identifiers. Keys compare structurally and are
 * frozen at construction. Maps throughout the engine are keyed by the
 * canonical string form (segments joined with '/'), which is also the
 * display and sort order.
 *
 * @module dag/graph
 */

import type { AssetKey, AssetKeyInput } from './types.js';

export const KEY_SEPARATOR = '/';

/**
 * Build an AssetKey from a path string, a segment array, or an existing key.
 *
 * @throws When the key is empty or any segment is empty or contains '/'
 */
export function assetKey_create(input: AssetKeyInput): AssetKey {
    const segments: readonly string[] = typeof input === 'string'
        ? input.split(KEY_SEPARATOR)
        : assetKey_is(input) ? input.path : input;

    if (segments.length === 0) {
        throw new Error('Asset key must have at least one segment');
    }
    for (const segment of segments) {
        if (segment.length === 0) {
            throw new Error(`Asset key '${segments.join(KEY_SEPARATOR)}' has an empty segment`);
        }
        if (segment.includes(KEY_SEPARATOR)) {
            throw new Error(`Asset key segment '${segment}' must not contain '${KEY_SEPARATOR}'`);
        }
    }
    if (assetKey_is(input) && Object.isFrozen(input) && Object.isFrozen(input.path)) {
        return input;
    }
    return Object.freeze({ path: Object.freeze([...segments]) });
}

function assetKey_is(input: AssetKeyInput): input is AssetKey {
    return typeof input === 'object' && 'path' in input;
}

/** Canonical string form. */
export function assetKey_toString(key: AssetKey): string {
    return key.path.join(KEY_SEPARATOR);
}

/** Parse the canonical string form back into a key. */
export function assetKey_parse(str: string): AssetKey {
    return assetKey_create(str);
}

/** Canonical string of any accepted key input. */
export function assetKey_canonical(input: AssetKeyInput): string {
    return assetKey_toString(assetKey_create(input));
}

export function assetKey_equals(a: AssetKey, b: AssetKey): boolean {
    if (a.path.length !== b.path.length) return false;
    return a.path.every((segment: string, i: number): boolean => segment === b.path[i]);
}

/** Total order over canonical strings. */
export function assetKey_compare(a: AssetKey, b: AssetKey): number {
    return canonical_compare(assetKey_toString(a), assetKey_toString(b));
}

/** Comparator for canonical strings (code-unit order, locale independent). */
export function canonical_compare(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

/** Final segment; the name an input parameter matches against. */
export function assetKey_name(key: AssetKey): string {
    return key.path[key.path.length - 1];
}

export function assetKey_hasPrefix(key: AssetKey, prefix: AssetKey): boolean {
    if (prefix.path.length > key.path.length) return false;
    return prefix.path.every((segment: string, i: number): boolean => segment === key.path[i]);
}
