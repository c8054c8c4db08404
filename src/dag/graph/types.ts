/**
 * @file Asset Graph Type Definitions
 *
 * Core types for the asset graph: keys, declarations as they arrive from
 * the intake layer, and the resolved, frozen graph that the selection,
 * plan and execution layers consume.
 *
 * Design principle: the graph layer is pure topology. It binds inputs,
 * validates structure and orders nodes; it never loads or stores values.
 *
 * @module dag/graph
 */

import type { z } from 'zod';
import type { ComputeFn } from '../execution/types.js';

// ─── Keys ───────────────────────────────────────────────────────

/**
 * A multi-segment asset identifier. Construct with `assetKey_create`,
 * which validates and freezes it.
 */
export interface AssetKey {
    readonly path: readonly string[];
}

/** Anything the declaration surface accepts as a key: 'a/b', ['a', 'b'] or an AssetKey. */
export type AssetKeyInput = string | readonly string[] | AssetKey;

/** Group every node falls into unless it declares one. */
export const DEFAULT_GROUP = 'default';

// ─── Metadata ───────────────────────────────────────────────────

export type MetadataScalar = string | number | boolean | null;

/** Metadata values are scalars or JSON-like structures of scalars. */
export type MetadataValue =
    | MetadataScalar
    | readonly MetadataValue[]
    | { readonly [key: string]: MetadataValue };

export type MetadataMap = Readonly<Record<string, MetadataValue>>;

// ─── Retry ──────────────────────────────────────────────────────

export type BackoffShape = 'constant' | 'exponential';
export type JitterMode = 'none' | 'symmetric';

/**
 * Re-execution policy after a raised failure. A deliberate decline is
 * never retried.
 *
 * @property maxRetries - Retries after the first attempt
 * @property delayMs - Base delay before the first retry
 * @property maxDelayMs - Upper bound on any computed delay (null: unbounded)
 */
export interface RetryPolicy {
    maxRetries: number;
    delayMs: number;
    backoff: BackoffShape;
    jitter: JitterMode;
    maxDelayMs: number | null;
}

/** Declaration form of a RetryPolicy; omitted fields take defaults. */
export interface RetryPolicyInput {
    maxRetries: number;
    delayMs?: number;
    backoff?: BackoffShape;
    jitter?: JitterMode;
    maxDelayMs?: number;
}

// ─── Config ─────────────────────────────────────────────────────

export type StepConfig = Readonly<Record<string, unknown>>;

/** Schema a step's run config is validated against before the step runs. */
export type StepConfigSchema = z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;

// ─── Declarations (intake) ──────────────────────────────────────

/**
 * An asset with no computation; its value is supplied externally.
 *
 * @property site - Where it was declared (file, module); defaults to a positional label
 */
export interface SourceAssetDeclaration {
    kind: 'source';
    key: AssetKeyInput;
    group?: string;
    description?: string;
    metadata?: MetadataMap;
    site?: string;
}

/**
 * One output slot of a step.
 *
 * @property required - A required slot that is not produced fails the step (default true)
 * @property codeVersion - Overrides the step's code version for this slot
 */
export interface OutputDeclaration {
    key: AssetKeyInput;
    required?: boolean;
    codeVersion?: string;
    group?: string;
    description?: string;
    metadata?: MetadataMap;
}

/**
 * A loaded input. When `key` is omitted, the input binds by name to the
 * one node whose final key segment equals `name`.
 */
export interface InputDeclaration {
    name: string;
    key?: AssetKeyInput;
}

/**
 * A computation unit producing one or more assets.
 *
 * @property deps - Explicit (ordering-only) upstreams; no value is passed in
 * @property subsettable - Whether the engine may request a strict subset of outputs
 * @property internalDependencies - Output key → upstream keys that feed it;
 *   outputs not listed are fed by every input
 * @property codeVersion - Default code version for every slot
 */
export interface StepDeclaration {
    kind: 'step';
    id: string;
    outputs: OutputDeclaration[];
    inputs?: InputDeclaration[];
    deps?: AssetKeyInput[];
    subsettable?: boolean;
    internalDependencies?: Record<string, AssetKeyInput[]>;
    retryPolicy?: RetryPolicyInput;
    configSchema?: StepConfigSchema;
    codeVersion?: string;
    group?: string;
    description?: string;
    compute: ComputeFn;
    site?: string;
}

export type AssetDeclaration = SourceAssetDeclaration | StepDeclaration;

// ─── Resolved Graph ─────────────────────────────────────────────

/**
 * `explicit`: upstream must complete first, no data flows.
 * `loaded`: upstream's value is loaded through the I/O manager and passed in.
 */
export type DependencyKind = 'explicit' | 'loaded';

/**
 * @property inputName - Name the value is passed under (loaded edges only)
 */
export interface DependencyEdge {
    readonly upstream: AssetKey;
    readonly downstream: AssetKey;
    readonly kind: DependencyKind;
    readonly inputName: string | null;
}

/**
 * One asset in the resolved graph.
 *
 * @property stepId - Step that computes this asset; null for sources
 * @property codeVersion - Declared code version; null for sources or unversioned slots
 * @property site - Declaration site, reported on duplicate keys
 */
export interface AssetNode {
    readonly key: AssetKey;
    readonly dependencies: readonly DependencyEdge[];
    readonly codeVersion: string | null;
    readonly group: string;
    readonly isSource: boolean;
    readonly stepId: string | null;
    readonly description: string | null;
    readonly metadata: MetadataMap;
    readonly site: string;
}

export interface OutputSlot {
    readonly key: AssetKey;
    readonly required: boolean;
    readonly codeVersion: string | null;
}

/**
 * An input after binding: the binding table entry for one input name.
 * Explicit deps are named by their canonical key.
 */
export interface InputSlot {
    readonly name: string;
    readonly key: AssetKey;
    readonly kind: DependencyKind;
}

/**
 * @property internalDependencies - Output canonical key → canonical keys of
 *   the inputs that feed it (always fully populated after resolution)
 */
export interface Step {
    readonly id: string;
    readonly outputs: readonly OutputSlot[];
    readonly inputs: readonly InputSlot[];
    readonly subsettable: boolean;
    readonly internalDependencies: ReadonlyMap<string, ReadonlySet<string>>;
    readonly retryPolicy: RetryPolicy | null;
    readonly configSchema: StepConfigSchema | null;
    readonly compute: ComputeFn;
    readonly site: string;
}

/**
 * The resolved, immutable asset graph.
 *
 * @property nodes - Canonical key → node
 * @property steps - Step id → step
 * @property upstream - Canonical key → canonical keys it depends on (sorted)
 * @property downstream - Canonical key → canonical keys depending on it (sorted)
 * @property topologicalOrder - Canonical keys, upstream first, ties by key order
 * @property sourceReferences - Keys a composed graph saw declared as a source
 *   in one location and computed in another (lineage merged, storage not)
 */
export interface AssetGraph {
    readonly nodes: ReadonlyMap<string, AssetNode>;
    readonly steps: ReadonlyMap<string, Step>;
    readonly edges: readonly DependencyEdge[];
    readonly upstream: ReadonlyMap<string, readonly string[]>;
    readonly downstream: ReadonlyMap<string, readonly string[]>;
    readonly topologicalOrder: readonly string[];
    readonly sourceReferences: ReadonlySet<string>;
}
