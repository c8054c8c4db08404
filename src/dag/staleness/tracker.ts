/**
 * @file Staleness Tracker
 *
 * Compares each computed asset's declared code version with the version
 * recorded on its latest materialization. Informational only: the engine
 * never consults it when scheduling.
 *
 * Source assets are never stale; their values live outside the engine.
 *
 * @module dag/staleness
 */

import type { MaterializationLog } from '../events/MaterializationLog.js';
import type { MaterializationEvent } from '../events/types.js';
import { assetKey_toString } from '../graph/assetKey.js';
import { graph_node } from '../graph/resolver.js';
import type { AssetGraph, AssetKeyInput, AssetNode } from '../graph/types.js';
import type { StalenessEntry } from './types.js';

export class StalenessTracker {
    constructor(
        private readonly graph: AssetGraph,
        private readonly log: MaterializationLog,
    ) {}

    /**
     * Whether a key needs re-materializing.
     *
     * @throws UnknownDependencyError for keys not in the graph
     */
    public isStale(key: AssetKeyInput): boolean {
        return this.entry_build(graph_node(this.graph, key)).stale;
    }

    /**
     * Check one key and explain the verdict.
     *
     * @throws UnknownDependencyError for keys not in the graph
     */
    public staleness_check(key: AssetKeyInput): StalenessEntry {
        return this.entry_build(graph_node(this.graph, key));
    }

    /**
     * Every computed (non-source) key in topological order.
     */
    public staleness_report(): StalenessEntry[] {
        const entries: StalenessEntry[] = [];
        for (const canonical of this.graph.topologicalOrder) {
            const node: AssetNode | undefined = this.graph.nodes.get(canonical);
            if (!node || node.isSource) continue;
            entries.push(this.entry_build(node));
        }
        return entries;
    }

    private entry_build(node: AssetNode): StalenessEntry {
        const latest: MaterializationEvent | null = this.log.latest_get(node.key);
        const entry: StalenessEntry = {
            key: assetKey_toString(node.key),
            stale: false,
            reason: null,
            declaredCodeVersion: node.codeVersion,
            recordedCodeVersion: latest?.codeVersion ?? null,
        };
        if (node.isSource) return entry;

        if (latest === null) {
            entry.stale = true;
            entry.reason = 'never-materialized';
        } else if (latest.codeVersion !== node.codeVersion) {
            entry.stale = true;
            entry.reason = 'code-version-changed';
        }
        return entry;
    }
}
