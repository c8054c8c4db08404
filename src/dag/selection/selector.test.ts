/**
 * @file Selection Engine Tests
 *
 * Query evaluation, lineage depth and non-subsettable expansion.
 *
 * @module dag/selection
 */

import { describe, it, expect } from 'vitest';
import { UnknownDependencyError } from '../errors.js';
import type { ComputeFn, StepOutput } from '../execution/types.js';
import { canonical_compare } from '../graph/assetKey.js';
import { graph_resolve } from '../graph/resolver.js';
import type { AssetGraph } from '../graph/types.js';
import { lineage_collect, selection_resolve } from './selector.js';
import type { SelectionQuery } from './types.js';

const noop: ComputeFn = (): StepOutput => ({});

/**
 * raw/orders ─▶ clean ─▶ enrich (orders/enriched, orders/flagged) ─▶ report (reports/daily, reports/weekly)
 * raw/users  ─────────────┘
 *
 * enrich is not subsettable; report is.
 */
const graph: AssetGraph = graph_resolve([
    { kind: 'source', key: 'raw/orders', group: 'ingest' },
    { kind: 'source', key: 'raw/users', group: 'ingest' },
    { kind: 'step', id: 'clean', outputs: [{ key: 'orders/clean' }], inputs: [{ name: 'orders' }], compute: noop },
    {
        kind: 'step',
        id: 'enrich',
        outputs: [{ key: 'orders/enriched' }, { key: 'orders/flagged' }],
        inputs: [{ name: 'clean' }, { name: 'users' }],
        compute: noop,
    },
    {
        kind: 'step',
        id: 'report',
        outputs: [{ key: 'reports/daily' }, { key: 'reports/weekly' }],
        inputs: [{ name: 'enriched' }],
        subsettable: true,
        group: 'reporting',
        compute: noop,
    },
]);

function select(query: SelectionQuery): string[] {
    return [...selection_resolve(graph, query)].sort(canonical_compare);
}

describe('dag/selection/selector', (): void => {

    it('should select every slot of a non-subsettable step', (): void => {
        expect(select({ kind: 'keys', keys: ['orders/flagged'] })).toEqual(['orders/enriched', 'orders/flagged']);
    });

    it('should keep a subset of a subsettable step', (): void => {
        expect(select({ kind: 'keys', keys: [['reports', 'daily']] })).toEqual(['reports/daily']);
    });

    it('should select by group and by prefix', (): void => {
        expect(select({ kind: 'group', group: 'ingest' })).toEqual(['raw/orders', 'raw/users']);
        expect(select({ kind: 'group', group: 'reporting' })).toEqual(['reports/daily', 'reports/weekly']);
        expect(select({ kind: 'prefix', prefix: 'orders' })).toEqual(['orders/clean', 'orders/enriched', 'orders/flagged']);
    });

    it('should select every node', (): void => {
        expect(select({ kind: 'all' })).toHaveLength(7);
    });

    it('should follow the full upstream lineage', (): void => {
        expect(select({ kind: 'upstream', of: { kind: 'keys', keys: ['reports/daily'] } })).toEqual([
            'orders/clean',
            'orders/enriched',
            'orders/flagged',
            'raw/orders',
            'raw/users',
            'reports/daily',
        ]);
    });

    it('should stop the lineage at the given depth', (): void => {
        expect(select({ kind: 'upstream', of: { kind: 'keys', keys: ['reports/daily'] }, depth: 1 }))
            .toEqual(['orders/enriched', 'orders/flagged', 'reports/daily']);
        expect(select({ kind: 'downstream', of: { kind: 'keys', keys: ['raw/orders'] }, depth: 0 }))
            .toEqual(['raw/orders']);
    });

    it('should follow the downstream lineage', (): void => {
        expect(select({ kind: 'downstream', of: { kind: 'keys', keys: ['raw/users'] } })).toEqual([
            'orders/enriched',
            'orders/flagged',
            'raw/users',
            'reports/daily',
            'reports/weekly',
        ]);
    });

    it('should combine queries with set algebra', (): void => {
        expect(select({
            kind: 'difference',
            left: { kind: 'all' },
            right: { kind: 'group', group: 'ingest' },
        })).toEqual(['orders/clean', 'orders/enriched', 'orders/flagged', 'reports/daily', 'reports/weekly']);

        expect(select({
            kind: 'intersection',
            queries: [{ kind: 'prefix', prefix: 'reports' }, { kind: 'keys', keys: ['reports/weekly'] }],
        })).toEqual(['reports/weekly']);

        expect(select({
            kind: 'union',
            queries: [{ kind: 'keys', keys: ['raw/users'] }, { kind: 'keys', keys: ['reports/daily'] }],
        })).toEqual(['raw/users', 'reports/daily']);

        expect(select({ kind: 'intersection', queries: [] })).toEqual([]);
    });

    it('should expand after set algebra, so a sibling cannot be subtracted', (): void => {
        expect(select({
            kind: 'difference',
            left: { kind: 'keys', keys: ['orders/enriched'] },
            right: { kind: 'keys', keys: ['orders/flagged'] },
        })).toEqual(['orders/enriched', 'orders/flagged']);
    });

    it('should reject unknown and malformed keys', (): void => {
        let caught: unknown = null;
        try {
            selection_resolve(graph, { kind: 'keys', keys: ['ghost'] });
        } catch (err: unknown) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(UnknownDependencyError);
        expect(caught instanceof UnknownDependencyError && caught.phase).toBe('selection');
        expect(caught instanceof UnknownDependencyError && caught.reference).toBe('ghost');

        expect((): unknown => selection_resolve(graph, { kind: 'prefix', prefix: 'a//b' }))
            .toThrow(UnknownDependencyError);
    });

    it('should reject a negative depth', (): void => {
        expect((): unknown => selection_resolve(graph, {
            kind: 'upstream',
            of: { kind: 'all' },
            depth: -1,
        })).toThrow(RangeError);
    });

    it('should collect lineage over any adjacency', (): void => {
        const adjacency = new Map<string, readonly string[]>([['a', ['b']], ['b', ['c']], ['c', []]]);
        expect([...lineage_collect(['a'], adjacency)]).toEqual(['a', 'b', 'c']);
        expect([...lineage_collect(['a'], adjacency, 1)]).toEqual(['a', 'b']);
    });
});
