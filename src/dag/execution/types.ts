/**
 * @file Execution Type Definitions
 *
 * The computation contract (what a step receives and returns) and the
 * RunResult the engine hands back after executing a plan.
 *
 * @module dag/execution
 */

import type {
    AssetKey,
    AssetKeyInput,
    MetadataMap,
    StepConfig,
} from '../graph/types.js';
import type { MaterializationEvent } from '../events/types.js';
import type { ExecutionError } from '../errors.js';
import type { Logger } from '../../log/logger.js';

// ─── Computation Contract ───────────────────────────────────────

/** The step emitted a value for the slot. */
export interface Produced {
    readonly kind: 'produced';
    readonly value: unknown;
    readonly metadata: MetadataMap;
}

/** The step deliberately did not emit the slot. */
export interface Declined {
    readonly kind: 'declined';
}

export type SlotResult = Produced | Declined;

/**
 * What a computation returns: canonical output key → result. A requested
 * slot missing from the record counts as declined.
 */
export type StepOutput = Readonly<Record<string, SlotResult>>;

/**
 * How an upstream of this invocation ended in the current run.
 * `external`: it was not part of this run and was read from prior state.
 */
export type UpstreamOutcome = 'produced' | 'declined' | 'external';

/**
 * Everything a computation receives for one attempt.
 *
 * @property requested - Output slots this attempt must produce; on a retry,
 *   slots an earlier attempt materialized are left out
 * @property inputs - Loaded upstream values, by input name
 * @property upstreamOutcomes - Canonical upstream key → outcome, for every bound upstream
 * @property upstreamEvents - Canonical upstream key → latest recorded event
 *   (null when none), for every bound upstream
 * @property config - Run config for this step, validated against its schema when it has one
 * @property attempt - 1 for the first attempt, incremented per retry
 * @property signal - Aborted when the run is cancelled
 */
export interface ComputeContext {
    readonly runId: string;
    readonly stepId: string;
    readonly attempt: number;
    readonly requested: readonly AssetKey[];
    readonly inputs: Readonly<Record<string, unknown>>;
    readonly upstreamOutcomes: Readonly<Record<string, UpstreamOutcome>>;
    readonly upstreamEvents: Readonly<Record<string, MaterializationEvent | null>>;
    readonly config: StepConfig;
    readonly signal: AbortSignal;
    readonly logger: Logger;
    isRequested(key: AssetKeyInput): boolean;
}

export type ComputeFn = (context: ComputeContext) => StepOutput | Promise<StepOutput>;

// ─── Run Result ─────────────────────────────────────────────────

export type InvocationStatus =
    | 'pending'
    | 'running'
    | 'succeeded'
    | 'failed'
    | 'skipped'
    | 'cancelled';

export type SlotOutcome =
    | { readonly status: 'materialized'; readonly event: MaterializationEvent }
    | { readonly status: 'skipped'; readonly reason: string }
    | { readonly status: 'failed'; readonly error: ExecutionError }
    | { readonly status: 'cancelled' };

/**
 * Terminal state of one step invocation.
 *
 * @property attempts - Times the computation was called (0 if it never ran)
 * @property retryDelays - Delay in ms before each retry, in order
 * @property error - Originating error for a failed invocation
 * @property shortCircuited - Step ids failed without running because of this failure
 * @property slots - Canonical key → outcome, for every requested slot
 */
export interface InvocationResult {
    readonly stepId: string;
    readonly status: InvocationStatus;
    readonly attempts: number;
    readonly retryDelays: readonly number[];
    readonly requested: readonly string[];
    readonly slots: ReadonlyMap<string, SlotOutcome>;
    readonly error: ExecutionError | null;
    readonly shortCircuited: readonly string[];
}

export type RunStatus = 'succeeded' | 'failed' | 'cancelled';

/**
 * @property slots - Canonical key → outcome across all invocations
 * @property events - Events appended by this run, in append order
 */
export interface RunResult {
    readonly runId: string;
    readonly status: RunStatus;
    readonly invocations: ReadonlyMap<string, InvocationResult>;
    readonly slots: ReadonlyMap<string, SlotOutcome>;
    readonly events: readonly MaterializationEvent[];
    readonly startedAt: string;
    readonly finishedAt: string;
}
