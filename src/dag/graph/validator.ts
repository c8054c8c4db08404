/**
 * @file Graph Validator
 *
 * Structural checks run while resolving a graph: asset-level cycle
 * detection and step-level cycle detection (two steps feeding each other
 * through different outputs can never both run once in a plan).
 *
 * Cycle detection is a DFS with on-stack marking, so the reported
 * cycle is the actual path, in edge order. Nodes are visited in ascending
 * id order so the same graph always reports the same cycle.
 *
 * @module dag/graph
 */

import { CyclicDependencyError } from '../errors.js';
import { canonical_compare } from './assetKey.js';

/**
 * Find one cycle in a directed graph.
 *
 * @param ids - Every node id
 * @param next - Successors of a node (edges point along data flow)
 * @returns The cycle with its first id repeated at the end, or null
 */
export function cycle_find(
    ids: Iterable<string>,
    next: (id: string) => readonly string[],
): string[] | null {
    const visited = new Set<string>();
    const onStack = new Set<string>();

    for (const root of [...ids].sort(canonical_compare)) {
        if (visited.has(root)) continue;

        // One frame per node on the current path; frames hold the successor cursor.
        const frames: DfsFrame[] = [frame_open(root, next, visited, onStack)];
        while (frames.length > 0) {
            const top: DfsFrame = frames[frames.length - 1];
            if (top.index >= top.successors.length) {
                onStack.delete(top.id);
                frames.pop();
                continue;
            }
            const succ: string = top.successors[top.index++];
            if (onStack.has(succ)) {
                const path: string[] = frames.map((frame: DfsFrame): string => frame.id);
                return [...path.slice(path.indexOf(succ)), succ];
            }
            if (!visited.has(succ)) {
                frames.push(frame_open(succ, next, visited, onStack));
            }
        }
    }
    return null;
}

interface DfsFrame {
    id: string;
    successors: string[];
    index: number;
}

function frame_open(
    id: string,
    next: (id: string) => readonly string[],
    visited: Set<string>,
    onStack: Set<string>,
): DfsFrame {
    visited.add(id);
    onStack.add(id);
    return { id, successors: [...next(id)].sort(canonical_compare), index: 0 };
}

/**
 * Throw CyclicDependencyError if the asset-level graph has a cycle.
 *
 * @param downstream - Canonical key → keys depending on it
 */
export function assetCycles_check(downstream: ReadonlyMap<string, readonly string[]>): void {
    const cycle: string[] | null = cycle_find(
        downstream.keys(),
        (id: string): readonly string[] => downstream.get(id) ?? [],
    );
    if (cycle) {
        throw new CyclicDependencyError(cycle, 'asset');
    }
}

/**
 * Throw CyclicDependencyError if steps depend on each other in a cycle.
 *
 * @param stepDownstream - Step id → ids of steps consuming one of its outputs
 */
export function stepCycles_check(stepDownstream: ReadonlyMap<string, ReadonlySet<string>>): void {
    const cycle: string[] | null = cycle_find(
        stepDownstream.keys(),
        (id: string): readonly string[] => [...(stepDownstream.get(id) ?? [])],
    );
    if (cycle) {
        throw new CyclicDependencyError(cycle, 'step');
    }
}

/**
 * Kahn's algorithm with ties broken by ascending id.
 *
 * @param ids - Every node id
 * @param upstream - Id → ids it depends on
 * @param downstream - Id → ids depending on it
 * @returns Ids, upstream first. Assumes the graph is acyclic.
 */
export function topologicalOrder_compute(
    ids: Iterable<string>,
    upstream: ReadonlyMap<string, readonly string[]>,
    downstream: ReadonlyMap<string, readonly string[]>,
): string[] {
    const inDegree = new Map<string, number>();
    for (const id of ids) {
        inDegree.set(id, (upstream.get(id) ?? []).length);
    }

    const ready: string[] = [...inDegree.entries()]
        .filter(([, deg]: [string, number]): boolean => deg === 0)
        .map(([id]: [string, number]): string => id)
        .sort(canonical_compare);

    const order: string[] = [];
    let current: string | undefined;
    while ((current = ready.shift()) !== undefined) {
        order.push(current);

        for (const child of downstream.get(current) ?? []) {
            const deg: number = (inDegree.get(child) ?? 1) - 1;
            inDegree.set(child, deg);
            if (deg === 0) {
                sorted_insert(ready, child);
            }
        }
    }
    return order;
}

function sorted_insert(list: string[], id: string): void {
    let i: number = 0;
    while (i < list.length && canonical_compare(list[i], id) < 0) i++;
    list.splice(i, 0, id);
}
