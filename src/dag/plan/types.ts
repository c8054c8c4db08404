/**
 * @file Execution Plan Types
 *
 * @module dag/plan
 */

import type { AssetGraph, AssetKey, DependencyKind, Step } from '../graph/types.js';

/**
 * How an invocation uses one upstream.
 *
 * `wait`: explicit edge, ordering only. `fetch`: loaded edge, the value is
 * loaded through the I/O manager.
 *
 * @property producer - Step id of the invocation producing the upstream in
 *   this plan; null when the upstream is read from prior state (source
 *   assets, or keys outside the plan)
 */
export interface InputBinding {
    readonly name: string;
    readonly key: AssetKey;
    readonly kind: DependencyKind;
    readonly mode: 'wait' | 'fetch';
    readonly producer: string | null;
}

/**
 * One step scheduled once within a plan.
 *
 * @property requested - Output slots to attempt, in declaration order
 * @property bindings - Inputs feeding at least one requested output
 * @property feeds - Requested output canonical key → canonical upstream keys feeding it
 * @property dependsOn - Step ids of in-plan invocations that must finish first
 */
export interface StepInvocation {
    readonly stepId: string;
    readonly step: Step;
    readonly requested: readonly AssetKey[];
    readonly bindings: readonly InputBinding[];
    readonly feeds: ReadonlyMap<string, readonly string[]>;
    readonly dependsOn: readonly string[];
}

/**
 * @property selected - Canonical keys after step expansion (sources included)
 * @property order - Step ids in a valid execution order, ties by id
 */
export interface ExecutionPlan {
    readonly graph: AssetGraph;
    readonly selected: ReadonlySet<string>;
    readonly invocations: ReadonlyMap<string, StepInvocation>;
    readonly order: readonly string[];
}
