/**
 * @file In-Memory I/O Manager Tests
 *
 * @module dag/io
 */

import { describe, it, expect } from 'vitest';
import { assetKey_create } from '../graph/assetKey.js';
import { InMemoryIOManager } from './InMemoryIOManager.js';

describe('dag/io/InMemoryIOManager', (): void => {

    it('should serve seeded values', async (): Promise<void> => {
        const io = new InMemoryIOManager([['raw/orders', [1, 2]]]);
        await expect(io.asset_load(assetKey_create(['raw', 'orders']))).resolves.toEqual([1, 2]);
        expect(io.value_has('raw/orders')).toBe(true);
        expect(io.metadata_get('raw/orders')).toEqual({});
    });

    it('should store values with their metadata', async (): Promise<void> => {
        const io = new InMemoryIOManager();
        await io.asset_store(assetKey_create('model'), 'weights', { rows: 3 });

        expect(io.value_get('model')).toBe('weights');
        expect(io.metadata_get('model')).toEqual({ rows: 3 });
        await expect(io.asset_load(assetKey_create('model'))).resolves.toBe('weights');
    });

    it('should reject loading a key that was never stored', async (): Promise<void> => {
        const io = new InMemoryIOManager();
        await expect(io.asset_load(assetKey_create('a/b'))).rejects.toThrow("No value stored for 'a/b'");
        expect(io.value_get('a/b')).toBeUndefined();
        expect(io.metadata_get('a/b')).toBeNull();
    });
});
