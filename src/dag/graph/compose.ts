/**
 * @file Graph Composition
 *
 * Composes graphs resolved in separate locations into one. A source
 * node in one location is a weak reference by key: when another
 * location computes the same key, lineage is merged (the source's
 * dependents now hang off the computed node) but the computed node stays
 * authoritative for materialization. The key is recorded in
 * `sourceReferences`.
 *
 * @module dag/graph
 */

import { DuplicateKeyError, InvalidDeclarationError } from '../errors.js';
import { graph_assemble } from './resolver.js';
import type { AssetGraph, AssetNode, DependencyEdge, Step } from './types.js';

/**
 * Compose resolved graphs.
 *
 * @throws DuplicateKeyError when two graphs compute the same key,
 *   InvalidDeclarationError on a step id used by two graphs,
 *   CyclicDependencyError when the merged lineage forms a cycle
 */
export function graphs_compose(graphs: readonly AssetGraph[]): AssetGraph {
    const nodes = new Map<string, AssetNode>();
    const steps = new Map<string, Step>();
    const edges: DependencyEdge[] = [];
    const sourceReferences = new Set<string>();

    for (const graph of graphs) {
        for (const ref of graph.sourceReferences) {
            sourceReferences.add(ref);
        }

        for (const [canonical, node] of graph.nodes) {
            const existing: AssetNode | undefined = nodes.get(canonical);
            if (!existing) {
                nodes.set(canonical, node);
                continue;
            }
            if (!existing.isSource && !node.isSource) {
                throw new DuplicateKeyError(canonical, [existing.site, node.site]);
            }
            if (existing.isSource !== node.isSource) {
                sourceReferences.add(canonical);
            }
            if (existing.isSource && !node.isSource) {
                nodes.set(canonical, node);
            }
        }

        for (const [id, step] of graph.steps) {
            const existing: Step | undefined = steps.get(id);
            if (existing) {
                throw new InvalidDeclarationError(step.site, `step id '${id}' is also declared at ${existing.site}`);
            }
            steps.set(id, step);
        }

        edges.push(...graph.edges);
    }

    return graph_assemble(nodes, steps, edges, sourceReferences);
}
