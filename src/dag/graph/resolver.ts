/**
 * @file Graph Resolver
 *
 * Turns a finalized list of declarations into a frozen AssetGraph:
 * merges sources and steps, binds every step input to an upstream node
 * (the binding table), builds adjacency, rejects cycles and caches one
 * topological order.
 *
 * Resolution either returns a complete graph or throws a ResolutionError;
 * there is no partially usable result. It is deterministic: resolving
 * the same declarations twice yields identical nodes, edges and order.
 *
 * @module dag/graph
 */

import {
    DuplicateKeyError,
    InvalidDeclarationError,
    UnknownDependencyError,
    message_of,
} from '../errors.js';
import { retryPolicy_normalize } from '../execution/retry.js';
import {
    assetKey_create,
    assetKey_name,
    assetKey_toString,
    canonical_compare,
} from './assetKey.js';
import {
    DEFAULT_GROUP,
    type AssetDeclaration,
    type AssetGraph,
    type AssetKey,
    type AssetKeyInput,
    type AssetNode,
    type DependencyEdge,
    type InputSlot,
    type OutputSlot,
    type RetryPolicy,
    type SourceAssetDeclaration,
    type Step,
    type StepDeclaration,
} from './types.js';
import {
    assetCycles_check,
    stepCycles_check,
    topologicalOrder_compute,
} from './validator.js';

export interface ResolveOptions {
    /** Retry delay for policies that omit `delayMs` (default 1000). */
    defaultRetryDelayMs?: number;
}

/** A key claimed by a declaration, before nodes are built. */
interface KeyClaim {
    key: AssetKey;
    site: string;
    stepId: string | null;
}

/**
 * Resolve declarations into an AssetGraph.
 *
 * @throws DuplicateKeyError, UnknownDependencyError, CyclicDependencyError,
 *   InvalidDeclarationError
 */
export function graph_resolve(
    declarations: readonly AssetDeclaration[],
    options: ResolveOptions = {},
): AssetGraph {
    const defaultRetryDelayMs: number = options.defaultRetryDelayMs ?? 1000;
    const sources: Array<{ decl: SourceAssetDeclaration; site: string }> = [];
    const stepDecls: Array<{ decl: StepDeclaration; site: string }> = [];

    declarations.forEach((decl: AssetDeclaration, index: number): void => {
        if (decl.kind === 'source') {
            sources.push({ decl, site: decl.site ?? `source #${index}` });
        } else {
            stepDecls.push({ decl, site: decl.site ?? `step '${decl.id}' (#${index})` });
        }
    });

    // ── Claim keys ──────────────────────────────────────────────
    const claims = new Map<string, KeyClaim>();
    const claim = (input: AssetKeyInput, site: string, stepId: string | null): AssetKey => {
        const key: AssetKey = key_build(input, site);
        const canonical: string = assetKey_toString(key);
        const prior: KeyClaim | undefined = claims.get(canonical);
        if (prior) {
            throw new DuplicateKeyError(canonical, [prior.site, site]);
        }
        claims.set(canonical, { key, site, stepId });
        return key;
    };

    for (const { decl, site } of sources) {
        claim(decl.key, site, null);
    }

    const stepIds = new Set<string>();
    for (const { decl, site } of stepDecls) {
        if (!decl.id || decl.id.trim() !== decl.id) {
            throw new InvalidDeclarationError(site, `step id '${decl.id}' must be a non-empty trimmed string`);
        }
        if (stepIds.has(decl.id)) {
            throw new InvalidDeclarationError(site, `step id '${decl.id}' is declared twice`);
        }
        stepIds.add(decl.id);
        if (decl.outputs.length === 0) {
            throw new InvalidDeclarationError(site, `step '${decl.id}' declares no outputs`);
        }
        for (const output of decl.outputs) {
            claim(output.key, site, decl.id);
        }
    }

    // ── Bind inputs (the binding table) ─────────────────────────
    const byName = new Map<string, string[]>();
    for (const [canonical, { key }] of claims) {
        const name: string = assetKey_name(key);
        byName.set(name, [...(byName.get(name) ?? []), canonical]);
    }

    const nodes = new Map<string, AssetNode>();
    const steps = new Map<string, Step>();
    const edges: DependencyEdge[] = [];

    for (const { decl, site } of sources) {
        const key: AssetKey = key_build(decl.key, site);
        nodes.set(assetKey_toString(key), Object.freeze({
            key,
            dependencies: Object.freeze([]),
            codeVersion: null,
            group: decl.group ?? DEFAULT_GROUP,
            isSource: true,
            stepId: null,
            description: decl.description ?? null,
            metadata: Object.freeze({ ...(decl.metadata ?? {}) }),
            site,
        }));
    }

    for (const { decl, site } of stepDecls) {
        const inputs: InputSlot[] = inputs_bind(decl, site, claims, byName);
        const internal: Map<string, ReadonlySet<string>> = internalDependencies_resolve(decl, site, inputs);
        const outputs: OutputSlot[] = decl.outputs.map((output): OutputSlot => Object.freeze({
            key: key_build(output.key, site),
            required: output.required ?? true,
            codeVersion: output.codeVersion ?? decl.codeVersion ?? null,
        }));

        for (const [index, output] of decl.outputs.entries()) {
            const slot: OutputSlot = outputs[index];
            const canonical: string = assetKey_toString(slot.key);
            const feeding: ReadonlySet<string> = internal.get(canonical) ?? new Set<string>();
            const dependencies: DependencyEdge[] = inputs
                .filter((input: InputSlot): boolean => feeding.has(assetKey_toString(input.key)))
                .map((input: InputSlot): DependencyEdge => Object.freeze({
                    upstream: input.key,
                    downstream: slot.key,
                    kind: input.kind,
                    inputName: input.kind === 'loaded' ? input.name : null,
                }));
            edges.push(...dependencies);

            nodes.set(canonical, Object.freeze({
                key: slot.key,
                dependencies: Object.freeze(dependencies),
                codeVersion: slot.codeVersion,
                group: output.group ?? decl.group ?? DEFAULT_GROUP,
                isSource: false,
                stepId: decl.id,
                description: output.description ?? decl.description ?? null,
                metadata: Object.freeze({ ...(output.metadata ?? {}) }),
                site,
            }));
        }

        let retryPolicy: RetryPolicy | null = null;
        if (decl.retryPolicy) {
            try {
                retryPolicy = retryPolicy_normalize(decl.retryPolicy, defaultRetryDelayMs);
            } catch (err: unknown) {
                throw new InvalidDeclarationError(site, `invalid retry policy: ${message_of(err)}`);
            }
        }

        steps.set(decl.id, Object.freeze({
            id: decl.id,
            outputs: Object.freeze(outputs),
            inputs: Object.freeze(inputs),
            subsettable: decl.subsettable ?? false,
            internalDependencies: internal,
            retryPolicy,
            configSchema: decl.configSchema ?? null,
            compute: decl.compute,
            site,
        }));
    }

    return graph_assemble(nodes, steps, edges, new Set<string>());
}

/**
 * Build adjacency, check cycles and order nodes. Shared with graph
 * composition, which assembles from already-resolved parts.
 */
export function graph_assemble(
    nodes: ReadonlyMap<string, AssetNode>,
    steps: ReadonlyMap<string, Step>,
    edges: readonly DependencyEdge[],
    sourceReferences: ReadonlySet<string>,
): AssetGraph {
    const upstreamSets = new Map<string, Set<string>>();
    const downstreamSets = new Map<string, Set<string>>();
    for (const id of nodes.keys()) {
        upstreamSets.set(id, new Set<string>());
        downstreamSets.set(id, new Set<string>());
    }
    for (const edge of edges) {
        const up: string = assetKey_toString(edge.upstream);
        const down: string = assetKey_toString(edge.downstream);
        upstreamSets.get(down)?.add(up);
        downstreamSets.get(up)?.add(down);
    }

    const upstream: Map<string, readonly string[]> = adjacency_freeze(upstreamSets);
    const downstream: Map<string, readonly string[]> = adjacency_freeze(downstreamSets);

    assetCycles_check(downstream);
    stepCycles_check(stepAdjacency_build(nodes, steps));

    const sortedEdges: DependencyEdge[] = [...edges].sort(edge_compare);

    return Object.freeze({
        nodes: map_sorted(nodes),
        steps: map_sorted(steps),
        edges: Object.freeze(sortedEdges),
        upstream,
        downstream,
        topologicalOrder: Object.freeze(topologicalOrder_compute(nodes.keys(), upstream, downstream)),
        sourceReferences,
    });
}

// ─── Lookups ────────────────────────────────────────────────────

/**
 * @throws UnknownDependencyError when the key is not in the graph
 */
export function graph_node(graph: AssetGraph, key: AssetKeyInput): AssetNode {
    const canonical: string = assetKey_toString(assetKey_create(key));
    const node: AssetNode | undefined = graph.nodes.get(canonical);
    if (!node) {
        throw new UnknownDependencyError(canonical, 'selection', `Unknown asset key '${canonical}'`);
    }
    return node;
}

/** The step computing a key, or null for a source. */
export function graph_stepOf(graph: AssetGraph, key: AssetKeyInput): Step | null {
    const node: AssetNode = graph_node(graph, key);
    return node.stepId === null ? null : graph.steps.get(node.stepId) ?? null;
}

/** The output slot for a computed key, or null for a source. */
export function graph_slotOf(graph: AssetGraph, key: AssetKeyInput): OutputSlot | null {
    const step: Step | null = graph_stepOf(graph, key);
    if (!step) return null;
    const canonical: string = assetKey_toString(assetKey_create(key));
    return step.outputs.find((slot: OutputSlot): boolean => assetKey_toString(slot.key) === canonical) ?? null;
}

// ─── Internals ──────────────────────────────────────────────────

function key_build(input: AssetKeyInput, site: string): AssetKey {
    try {
        return assetKey_create(input);
    } catch (err: unknown) {
        throw new InvalidDeclarationError(site, message_of(err));
    }
}

/**
 * Bind loaded inputs (by key, or by name against final key segments)
 * and explicit deps. A key bound both ways is kept as loaded.
 */
function inputs_bind(
    decl: StepDeclaration,
    site: string,
    claims: ReadonlyMap<string, KeyClaim>,
    byName: ReadonlyMap<string, string[]>,
): InputSlot[] {
    const bound: InputSlot[] = [];
    const names = new Set<string>();
    const loadedKeys = new Set<string>();

    for (const input of decl.inputs ?? []) {
        if (names.has(input.name)) {
            throw new InvalidDeclarationError(site, `step '${decl.id}' declares input '${input.name}' twice`);
        }
        names.add(input.name);

        let canonical: string;
        if (input.key !== undefined) {
            canonical = assetKey_toString(key_build(input.key, site));
            if (!claims.has(canonical)) {
                throw new UnknownDependencyError(
                    canonical,
                    'resolution',
                    `Step '${decl.id}' input '${input.name}' references unknown asset '${canonical}'`,
                );
            }
        } else {
            const candidates: string[] = byName.get(input.name) ?? [];
            if (candidates.length === 0) {
                throw new UnknownDependencyError(
                    input.name,
                    'resolution',
                    `Step '${decl.id}' input '${input.name}' matches no asset by name`,
                );
            }
            if (candidates.length > 1) {
                throw new UnknownDependencyError(
                    input.name,
                    'resolution',
                    `Step '${decl.id}' input '${input.name}' is ambiguous: ${[...candidates].sort(canonical_compare).join(', ')}`,
                );
            }
            canonical = candidates[0];
        }

        const claimed: KeyClaim | undefined = claims.get(canonical);
        if (claimed) {
            loadedKeys.add(canonical);
            const slot: InputSlot = { name: input.name, key: claimed.key, kind: 'loaded' };
            bound.push(Object.freeze(slot));
        }
    }

    for (const dep of decl.deps ?? []) {
        const canonical: string = assetKey_toString(key_build(dep, site));
        const claimed: KeyClaim | undefined = claims.get(canonical);
        if (!claimed) {
            throw new UnknownDependencyError(
                canonical,
                'resolution',
                `Step '${decl.id}' depends on unknown asset '${canonical}'`,
            );
        }
        if (loadedKeys.has(canonical) || names.has(canonical)) continue;
        names.add(canonical);
        const slot: InputSlot = { name: canonical, key: claimed.key, kind: 'explicit' };
        bound.push(Object.freeze(slot));
    }

    return bound;
}

/**
 * Output canonical key → canonical input keys that feed it. Outputs the
 * declaration leaves out are fed by every input.
 */
function internalDependencies_resolve(
    decl: StepDeclaration,
    site: string,
    inputs: readonly InputSlot[],
): Map<string, ReadonlySet<string>> {
    const inputKeys = new Set<string>(inputs.map((input: InputSlot): string => assetKey_toString(input.key)));
    const outputKeys: string[] = decl.outputs.map((output): string => assetKey_toString(key_build(output.key, site)));
    const declared = new Map<string, ReadonlySet<string>>();

    for (const [rawOutput, rawInputs] of Object.entries(decl.internalDependencies ?? {})) {
        const output: string = assetKey_toString(key_build(rawOutput, site));
        if (!outputKeys.includes(output)) {
            throw new UnknownDependencyError(
                output,
                'resolution',
                `Step '${decl.id}' internal dependencies name '${output}', which is not one of its outputs`,
            );
        }
        const feeding = new Set<string>();
        for (const rawInput of rawInputs) {
            const input: string = assetKey_toString(key_build(rawInput, site));
            if (!inputKeys.has(input)) {
                throw new UnknownDependencyError(
                    input,
                    'resolution',
                    `Step '${decl.id}' internal dependencies for '${output}' name '${input}', which is not one of its inputs`,
                );
            }
            feeding.add(input);
        }
        declared.set(output, Object.freeze(feeding));
    }

    const resolved = new Map<string, ReadonlySet<string>>();
    for (const output of outputKeys) {
        resolved.set(output, declared.get(output) ?? inputKeys);
    }
    return resolved;
}

/** Step id → ids of steps that consume one of its outputs (self included). */
function stepAdjacency_build(
    nodes: ReadonlyMap<string, AssetNode>,
    steps: ReadonlyMap<string, Step>,
): Map<string, Set<string>> {
    const adjacency = new Map<string, Set<string>>();
    for (const id of steps.keys()) {
        adjacency.set(id, new Set<string>());
    }
    for (const step of steps.values()) {
        for (const input of step.inputs) {
            const producer: string | null = nodes.get(assetKey_toString(input.key))?.stepId ?? null;
            if (producer !== null) {
                adjacency.get(producer)?.add(step.id);
            }
        }
    }
    return adjacency;
}

function adjacency_freeze(sets: Map<string, Set<string>>): Map<string, readonly string[]> {
    const out = new Map<string, readonly string[]>();
    for (const id of [...sets.keys()].sort(canonical_compare)) {
        out.set(id, Object.freeze([...(sets.get(id) ?? [])].sort(canonical_compare)));
    }
    return out;
}

function map_sorted<T>(map: ReadonlyMap<string, T>): Map<string, T> {
    return new Map([...map.entries()].sort(([a]: [string, T], [b]: [string, T]): number => canonical_compare(a, b)));
}

function edge_compare(a: DependencyEdge, b: DependencyEdge): number {
    return canonical_compare(assetKey_toString(a.downstream), assetKey_toString(b.downstream))
        || canonical_compare(assetKey_toString(a.upstream), assetKey_toString(b.upstream));
}
