/**
 * @file Selection Engine
 *
 * Evaluates a parsed SelectionQuery against a graph and closes the
 * result over step boundaries: selecting any slot of a non-subsettable
 * step selects all of that step's slots, while a subsettable step keeps
 * only the slots asked for.
 *
 * @module dag/selection
 */

import { UnknownDependencyError } from '../errors.js';
import { assetKey_create, assetKey_hasPrefix, assetKey_toString } from '../graph/assetKey.js';
import type { AssetGraph, AssetKey, AssetKeyInput, OutputSlot, Step } from '../graph/types.js';
import type { SelectionQuery } from './types.js';

/**
 * Resolve a query to a set of canonical keys, expanded over
 * non-subsettable steps.
 *
 * @throws UnknownDependencyError (phase 'selection') for keys not in the graph
 */
export function selection_resolve(graph: AssetGraph, query: SelectionQuery): Set<string> {
    return selection_expand(graph, query_evaluate(graph, query));
}

/**
 * Add every sibling slot of any non-subsettable step with a selected slot.
 */
export function selection_expand(graph: AssetGraph, keys: ReadonlySet<string>): Set<string> {
    const expanded = new Set<string>(keys);
    for (const canonical of keys) {
        const stepId: string | null = graph.nodes.get(canonical)?.stepId ?? null;
        if (stepId === null) continue;
        const step: Step | undefined = graph.steps.get(stepId);
        if (!step || step.subsettable) continue;
        for (const slot of step.outputs) {
            expanded.add(assetKey_toString(slot.key));
        }
    }
    return expanded;
}

/**
 * Every key reachable from `start` by following `adjacency`, including
 * `start` itself, up to `depth` hops (unbounded when undefined).
 */
export function lineage_collect(
    start: Iterable<string>,
    adjacency: ReadonlyMap<string, readonly string[]>,
    depth?: number,
): Set<string> {
    const seen = new Set<string>(start);
    let frontier: string[] = [...seen];
    let hops: number = 0;

    while (frontier.length > 0 && (depth === undefined || hops < depth)) {
        const next: string[] = [];
        for (const id of frontier) {
            for (const neighbour of adjacency.get(id) ?? []) {
                if (!seen.has(neighbour)) {
                    seen.add(neighbour);
                    next.push(neighbour);
                }
            }
        }
        frontier = next;
        hops++;
    }
    return seen;
}

/** Output slots of a step that fall in a selection. */
export function selectedSlots_list(step: Step, selected: ReadonlySet<string>): OutputSlot[] {
    return step.outputs.filter((slot: OutputSlot): boolean => selected.has(assetKey_toString(slot.key)));
}

function query_evaluate(graph: AssetGraph, query: SelectionQuery): Set<string> {
    switch (query.kind) {
        case 'all':
            return new Set<string>(graph.nodes.keys());

        case 'keys':
            return new Set<string>(query.keys.map((key: AssetKeyInput): string => key_require(graph, key)));

        case 'group': {
            const out = new Set<string>();
            for (const [canonical, node] of graph.nodes) {
                if (node.group === query.group) out.add(canonical);
            }
            return out;
        }

        case 'prefix': {
            const prefix: AssetKey = selectionKey_build(query.prefix);
            const out = new Set<string>();
            for (const [canonical, node] of graph.nodes) {
                if (assetKey_hasPrefix(node.key, prefix)) out.add(canonical);
            }
            return out;
        }

        case 'upstream':
            return lineage_collect(query_evaluate(graph, query.of), graph.upstream, depth_check(query.depth));

        case 'downstream':
            return lineage_collect(query_evaluate(graph, query.of), graph.downstream, depth_check(query.depth));

        case 'union': {
            const out = new Set<string>();
            for (const sub of query.queries) {
                for (const key of query_evaluate(graph, sub)) out.add(key);
            }
            return out;
        }

        case 'intersection': {
            const [first, ...rest] = query.queries.map((sub: SelectionQuery): Set<string> => query_evaluate(graph, sub));
            if (!first) return new Set<string>();
            return new Set<string>([...first].filter((key: string): boolean =>
                rest.every((set: Set<string>): boolean => set.has(key))));
        }

        case 'difference': {
            const right: Set<string> = query_evaluate(graph, query.right);
            return new Set<string>([...query_evaluate(graph, query.left)].filter((key: string): boolean => !right.has(key)));
        }
    }
}

function key_require(graph: AssetGraph, key: AssetKeyInput): string {
    const canonical: string = assetKey_toString(selectionKey_build(key));
    if (!graph.nodes.has(canonical)) {
        throw new UnknownDependencyError(canonical, 'selection', `Selection names unknown asset '${canonical}'`);
    }
    return canonical;
}

function selectionKey_build(key: AssetKeyInput): AssetKey {
    try {
        return assetKey_create(key);
    } catch {
        const shown: string = typeof key === 'string' ? key : JSON.stringify(key);
        throw new UnknownDependencyError(shown, 'selection', `Selection names invalid asset key ${shown}`);
    }
}

function depth_check(depth: number | undefined): number | undefined {
    if (depth !== undefined && (!Number.isInteger(depth) || depth < 0)) {
        throw new RangeError(`Selection depth must be a non-negative integer, got ${depth}`);
    }
    return depth;
}
