/**
 * @file Execution Engine
 *
 * Runs an ExecutionPlan to completion and reports every invocation and
 * every requested slot on a RunResult. Execution errors are recorded on
 * the result, never thrown.
 *
 * Per invocation:
 *   pending → running → succeeded | skipped | failed
 *   running → pending (retry timer) → running ...
 *   pending → cancelled (run aborted before it started)
 *
 * Data hand-off between steps goes only through the IOManager. Every
 * produced slot is stored, appended to the MaterializationLog and
 * published on the bus, in that order.
 *
 * @module dag/execution
 */

import type { z } from 'zod';
import {
    ConfigValidationError,
    LoadError,
    MissingRequiredOutputError,
    StepComputeError,
    StoreError,
    UpstreamFailedError,
    type ExecutionError,
} from '../errors.js';
import type { MaterializationBus } from '../events/MaterializationBus.js';
import type { MaterializationLog } from '../events/MaterializationLog.js';
import type { MaterializationEvent } from '../events/types.js';
import { assetKey_canonical, assetKey_toString } from '../graph/assetKey.js';
import type { AssetKey, AssetKeyInput, MetadataMap, OutputSlot, RetryPolicy, StepConfig } from '../graph/types.js';
import type { IOManager } from '../io/types.js';
import { invocation_requestedKeys } from '../plan/compiler.js';
import type { ExecutionPlan, InputBinding, StepInvocation } from '../plan/types.js';
import { silentLogger, type Logger } from '../../log/logger.js';
import { retryDelay_compute, retry_allowed } from './retry.js';
import type {
    ComputeContext,
    InvocationResult,
    InvocationStatus,
    RunResult,
    RunStatus,
    SlotOutcome,
    SlotResult,
    StepOutput,
    UpstreamOutcome,
} from './types.js';

export const DEFAULT_MAX_CONCURRENCY = 4;

/**
 * @property random - Uniform [0, 1) source for retry jitter
 */
export interface ExecutionEngineOptions {
    ioManager: IOManager;
    log: MaterializationLog;
    bus?: MaterializationBus;
    logger?: Logger;
    maxConcurrency?: number;
    random?: () => number;
}

/**
 * @property config - Run config by step id
 * @property maxConcurrency - Overrides the engine default for this run
 */
export interface ExecuteOptions {
    runId: string;
    signal?: AbortSignal;
    config?: Readonly<Record<string, StepConfig>>;
    maxConcurrency?: number;
}

export class ExecutionEngine {
    private readonly logger: Logger;

    constructor(private readonly options: ExecutionEngineOptions) {
        this.logger = (options.logger ?? silentLogger).child('ENGINE');
    }

    /**
     * Execute a plan. Resolves once every invocation is terminal.
     *
     * @throws RangeError (as a rejection) when the concurrency limit is not a positive integer
     */
    public execute(plan: ExecutionPlan, options: ExecuteOptions): Promise<RunResult> {
        const maxConcurrency: number =
            options.maxConcurrency ?? this.options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
        if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
            return Promise.reject(new RangeError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`));
        }
        return new RunScheduler(plan, options, maxConcurrency, this.options, this.logger).run_start();
    }
}

// ─── Per-run state ──────────────────────────────────────────────

interface InvocationState {
    readonly invocation: StepInvocation;
    status: InvocationStatus;
    attempts: number;
    readonly retryDelays: number[];
    readonly slots: Map<string, SlotOutcome>;
    error: ExecutionError | null;
    readonly shortCircuited: string[];
    readonly waitingOn: Set<string>;
    /** Requested slots left to attempt after skip propagation. */
    active: readonly OutputSlot[];
    config: StepConfig;
}

type AttemptOutcome =
    | { kind: 'done' }
    | { kind: 'failed'; error: ExecutionError; retryable: boolean };

const TERMINAL: ReadonlySet<InvocationStatus> = new Set<InvocationStatus>(['succeeded', 'failed', 'skipped', 'cancelled']);

function status_isTerminal(status: InvocationStatus): boolean {
    return TERMINAL.has(status);
}

class RunScheduler {
    private readonly states: Map<string, InvocationState> = new Map();
    private readonly dependents: Map<string, string[]> = new Map();
    private readonly position: Map<string, number> = new Map();
    private readonly producerOf: Map<string, string> = new Map();
    private readonly ready: string[] = [];
    private readonly timers: Map<string, ReturnType<typeof setTimeout>> = new Map();
    private readonly events: MaterializationEvent[] = [];
    private readonly signal: AbortSignal;
    private readonly random: () => number;
    private readonly startedAt: string = new Date().toISOString();
    private running: number = 0;
    private finished: boolean = false;
    private resolveRun: ((result: RunResult) => void) | null = null;

    constructor(
        private readonly plan: ExecutionPlan,
        private readonly options: ExecuteOptions,
        private readonly maxConcurrency: number,
        private readonly engine: ExecutionEngineOptions,
        private readonly logger: Logger,
    ) {
        this.signal = options.signal ?? new AbortController().signal;
        this.random = engine.random ?? Math.random;

        plan.order.forEach((stepId: string, index: number): void => {
            this.position.set(stepId, index);
            this.dependents.set(stepId, []);
        });
        for (const stepId of plan.order) {
            const invocation: StepInvocation | undefined = plan.invocations.get(stepId);
            if (!invocation) continue;
            this.states.set(stepId, {
                invocation,
                status: 'pending',
                attempts: 0,
                retryDelays: [],
                slots: new Map(),
                error: null,
                shortCircuited: [],
                waitingOn: new Set(invocation.dependsOn),
                active: [],
                config: {},
            });
            for (const dep of invocation.dependsOn) {
                this.dependents.get(dep)?.push(stepId);
            }
            for (const key of invocation_requestedKeys(invocation)) {
                this.producerOf.set(key, stepId);
            }
        }
    }

    public run_start(): Promise<RunResult> {
        return new Promise<RunResult>((resolve: (result: RunResult) => void): void => {
            this.resolveRun = resolve;
            this.logger.info(`run '${this.options.runId}': ${this.states.size} invocation(s)`);

            if (this.signal.aborted) {
                this.run_cancel();
                return;
            }
            this.signal.addEventListener('abort', this.abort_handle, { once: true });

            const roots: InvocationState[] = [...this.states.values()]
                .filter((state: InvocationState): boolean => state.waitingOn.size === 0);
            roots.forEach((state: InvocationState): void => this.invocation_ready(state));
            this.pump();
            this.completion_check();
        });
    }

    // ─── Scheduling ─────────────────────────────────────────────

    /**
     * Decide what an invocation whose upstream invocations are all
     * terminal still has to do. Requested outputs fed by a loaded input
     * whose slot was skipped in this run are skipped without running.
     */
    private invocation_ready(state: InvocationState): void {
        const { invocation } = state;
        const loaded: Set<string> = new Set(
            invocation.bindings
                .filter((binding: InputBinding): boolean => binding.kind === 'loaded')
                .map((binding: InputBinding): string => assetKey_toString(binding.key)),
        );

        const active: OutputSlot[] = [];
        for (const slot of invocation.step.outputs) {
            const canonical: string = assetKey_toString(slot.key);
            const feeding: readonly string[] | undefined = invocation.feeds.get(canonical);
            if (feeding === undefined) continue;
            const blockedBy: string | undefined = feeding.find((upstream: string): boolean =>
                loaded.has(upstream) && this.slotOutcome_get(upstream)?.status === 'skipped');
            if (blockedBy !== undefined) {
                state.slots.set(canonical, { status: 'skipped', reason: `upstream '${blockedBy}' was not materialized` });
            } else {
                active.push(slot);
            }
        }
        state.active = active;

        if (active.length === 0) {
            this.logger.debug(`step '${invocation.stepId}' skipped: no requested output has its inputs`);
            state.status = 'skipped';
            this.invocation_settle(state);
            return;
        }
        this.ready_push(invocation.stepId);
    }

    private ready_push(stepId: string): void {
        this.ready.push(stepId);
        this.ready.sort((a: string, b: string): number =>
            (this.position.get(a) ?? 0) - (this.position.get(b) ?? 0));
    }

    private pump(): void {
        let stepId: string | undefined;
        while (
            !this.signal.aborted &&
            this.running < this.maxConcurrency &&
            (stepId = this.ready.shift()) !== undefined
        ) {
            const state: InvocationState | undefined = this.states.get(stepId);
            if (!state || state.status !== 'pending') continue;
            this.attempt_launch(state);
        }
    }

    private attempt_launch(state: InvocationState): void {
        state.status = 'running';
        state.attempts++;
        this.running++;
        void this.attempt_run(state).then(
            (outcome: AttemptOutcome): void => this.attempt_settle(state, outcome),
            (err: unknown): void => this.attempt_settle(state, {
                kind: 'failed',
                error: new StepComputeError(state.invocation.stepId, err),
                retryable: false,
            }),
        );
    }

    private attempt_settle(state: InvocationState, outcome: AttemptOutcome): void {
        this.running--;
        const stepId: string = state.invocation.stepId;
        const policy: RetryPolicy | null = state.invocation.step.retryPolicy;

        if (outcome.kind === 'done') {
            const materialized: boolean = state.active.some((slot: OutputSlot): boolean =>
                state.slots.get(assetKey_toString(slot.key))?.status === 'materialized');
            state.status = materialized ? 'succeeded' : 'skipped';
            this.logger.debug(`step '${stepId}' ${state.status} after ${state.attempts} attempt(s)`);
            this.invocation_settle(state);
        } else if (
            outcome.retryable &&
            !this.signal.aborted &&
            policy !== null &&
            retry_allowed(policy, state.attempts)
        ) {
            this.retry_schedule(state, policy, outcome.error);
        } else {
            this.invocation_fail(state, outcome.error);
        }

        this.pump();
        this.completion_check();
    }

    private retry_schedule(state: InvocationState, policy: RetryPolicy, error: ExecutionError): void {
        const stepId: string = state.invocation.stepId;
        const delay: number = retryDelay_compute(policy, state.attempts, this.random);
        state.retryDelays.push(delay);
        state.status = 'pending';
        this.logger.warn(`step '${stepId}' attempt ${state.attempts} failed: ${error.message}; retrying in ${delay}ms`);

        const timer: ReturnType<typeof setTimeout> = setTimeout((): void => {
            this.timers.delete(stepId);
            this.ready_push(stepId);
            this.pump();
        }, delay);
        this.timers.set(stepId, timer);
    }

    /** Release dependents of a succeeded or skipped invocation. */
    private invocation_settle(state: InvocationState): void {
        const stepId: string = state.invocation.stepId;
        for (const dependentId of this.dependents.get(stepId) ?? []) {
            const dependent: InvocationState | undefined = this.states.get(dependentId);
            if (!dependent || status_isTerminal(dependent.status)) continue;
            dependent.waitingOn.delete(stepId);
            if (dependent.waitingOn.size === 0) {
                this.invocation_ready(dependent);
            }
        }
    }

    /**
     * Mark an invocation failed and fail its whole downstream closure
     * with UpstreamFailedError naming it.
     */
    private invocation_fail(state: InvocationState, error: ExecutionError): void {
        const originId: string = state.invocation.stepId;
        state.status = 'failed';
        state.error = error;
        for (const slot of state.active) {
            const canonical: string = assetKey_toString(slot.key);
            if (state.slots.get(canonical)?.status !== 'materialized') {
                state.slots.set(canonical, { status: 'failed', error });
            }
        }
        this.logger.error(`step '${originId}' failed: ${error.message}`);

        const queue: string[] = [...(this.dependents.get(originId) ?? [])];
        let nextId: string | undefined;
        while ((nextId = queue.shift()) !== undefined) {
            const dependent: InvocationState | undefined = this.states.get(nextId);
            if (!dependent || status_isTerminal(dependent.status)) continue;

            const upstreamError = new UpstreamFailedError(nextId, originId);
            dependent.status = 'failed';
            dependent.error = upstreamError;
            for (const key of invocation_requestedKeys(dependent.invocation)) {
                dependent.slots.set(key, { status: 'failed', error: upstreamError });
            }
            state.shortCircuited.push(nextId);
            queue.push(...(this.dependents.get(nextId) ?? []));
        }
    }

    private readonly abort_handle = (): void => {
        this.run_cancel();
    };

    /** Stop scheduling; everything not yet running ends cancelled. */
    private run_cancel(): void {
        for (const timer of this.timers.values()) {
            clearTimeout(timer);
        }
        this.timers.clear();
        this.ready.length = 0;

        for (const state of this.states.values()) {
            if (state.status !== 'pending') continue;
            state.status = 'cancelled';
            for (const key of invocation_requestedKeys(state.invocation)) {
                const current: SlotOutcome | undefined = state.slots.get(key);
                if (current?.status !== 'materialized' && current?.status !== 'skipped') {
                    state.slots.set(key, { status: 'cancelled' });
                }
            }
        }
        this.logger.warn(`run '${this.options.runId}' cancelled`);
        this.completion_check();
    }

    private completion_check(): void {
        if (this.finished || this.running > 0) return;
        for (const state of this.states.values()) {
            if (!status_isTerminal(state.status)) return;
        }
        this.finished = true;
        this.signal.removeEventListener('abort', this.abort_handle);
        const result: RunResult = this.result_build();
        this.logger.info(`run '${this.options.runId}' ${result.status}`);
        this.resolveRun?.(result);
    }

    // ─── One attempt ────────────────────────────────────────────

    private async attempt_run(state: InvocationState): Promise<AttemptOutcome> {
        const { invocation } = state;
        const stepId: string = invocation.stepId;

        // 1. Config, validated once before the first attempt
        if (state.attempts === 1) {
            const configError: ConfigValidationError | null = this.config_resolve(state);
            if (configError) {
                return { kind: 'failed', error: configError, retryable: false };
            }
        }

        // Slots an earlier attempt already materialized are not requested again
        const pending: OutputSlot[] = state.active.filter((slot: OutputSlot): boolean =>
            state.slots.get(assetKey_toString(slot.key))?.status !== 'materialized');
        const activeKeys: Set<string> = new Set(
            pending.map((slot: OutputSlot): string => assetKey_toString(slot.key)));
        const feeding = new Set<string>();
        for (const key of activeKeys) {
            for (const upstream of invocation.feeds.get(key) ?? []) {
                feeding.add(upstream);
            }
        }

        // 2. Inputs
        const inputs: Record<string, unknown> = {};
        const upstreamOutcomes: Record<string, UpstreamOutcome> = {};
        const upstreamEvents: Record<string, MaterializationEvent | null> = {};
        for (const binding of invocation.bindings) {
            const canonical: string = assetKey_toString(binding.key);
            upstreamOutcomes[canonical] = this.upstreamOutcome_get(binding, canonical);
            upstreamEvents[canonical] = this.engine.log.latest_get(binding.key);
            if (binding.mode !== 'fetch' || !feeding.has(canonical)) continue;
            try {
                inputs[binding.name] = await this.engine.ioManager.asset_load(binding.key);
            } catch (err: unknown) {
                return { kind: 'failed', error: new LoadError(canonical, err), retryable: true };
            }
        }

        // 3. Compute
        const context: ComputeContext = {
            runId: this.options.runId,
            stepId,
            attempt: state.attempts,
            requested: Object.freeze(pending.map((slot: OutputSlot): AssetKey => slot.key)),
            inputs: Object.freeze(inputs),
            upstreamOutcomes: Object.freeze(upstreamOutcomes),
            upstreamEvents: Object.freeze(upstreamEvents),
            config: state.config,
            signal: this.signal,
            logger: this.logger.child(stepId),
            isRequested: (key: AssetKeyInput): boolean => {
                try {
                    return activeKeys.has(assetKey_canonical(key));
                } catch {
                    return false;
                }
            },
        };

        let output: StepOutput;
        try {
            output = await invocation.step.compute(context);
        } catch (err: unknown) {
            return { kind: 'failed', error: new StepComputeError(stepId, err), retryable: true };
        }
        if (typeof output !== 'object' || output === null) {
            const err = new TypeError('computation did not return an output record');
            return { kind: 'failed', error: new StepComputeError(stepId, err), retryable: false };
        }
        for (const key of Object.keys(output)) {
            if (!activeKeys.has(key)) {
                this.logger.warn(`step '${stepId}' returned unrequested output '${key}'; ignored`);
            }
        }

        // 4. Slots, in declaration order
        for (const slot of pending) {
            const canonical: string = assetKey_toString(slot.key);
            const result: SlotResult | undefined = output[canonical];

            if (result !== undefined && result.kind === 'produced') {
                try {
                    await this.engine.ioManager.asset_store(slot.key, result.value, result.metadata);
                } catch (err: unknown) {
                    return { kind: 'failed', error: new StoreError(canonical, err), retryable: true };
                }
                const event: MaterializationEvent = this.event_record(stepId, slot, result.metadata);
                state.slots.set(canonical, { status: 'materialized', event });
                continue;
            }

            if (slot.required) {
                return { kind: 'failed', error: new MissingRequiredOutputError(stepId, canonical), retryable: false };
            }
            state.slots.set(canonical, { status: 'skipped', reason: 'declined' });
        }
        return { kind: 'done' };
    }

    private config_resolve(state: InvocationState): ConfigValidationError | null {
        const stepId: string = state.invocation.stepId;
        const raw: StepConfig = this.options.config?.[stepId] ?? {};
        const schema = state.invocation.step.configSchema;
        if (schema === null) {
            state.config = Object.freeze({ ...raw });
            return null;
        }
        const parsed = schema.safeParse(raw);
        if (!parsed.success) {
            return new ConfigValidationError(
                stepId,
                parsed.error.issues.map((issue: z.ZodIssue): string => `[${issue.path.join('.')}] ${issue.message}`),
            );
        }
        state.config = Object.freeze(parsed.data);
        return null;
    }

    private upstreamOutcome_get(binding: InputBinding, canonical: string): UpstreamOutcome {
        if (binding.producer === null) return 'external';
        return this.slotOutcome_get(canonical)?.status === 'materialized' ? 'produced' : 'declined';
    }

    /** Outcome so far of a slot produced in this run; undefined for external keys. */
    private slotOutcome_get(canonical: string): SlotOutcome | undefined {
        const producer: string | undefined = this.producerOf.get(canonical);
        if (producer === undefined) return undefined;
        return this.states.get(producer)?.slots.get(canonical);
    }

    private event_record(stepId: string, slot: OutputSlot, metadata: MetadataMap): MaterializationEvent {
        const event: MaterializationEvent = this.engine.log.event_append({
            key: slot.key,
            runId: this.options.runId,
            stepId,
            timestamp: new Date().toISOString(),
            codeVersion: slot.codeVersion,
            metadata,
        });
        this.events.push(event);
        this.engine.bus?.publish(event);
        this.logger.debug(`materialized '${assetKey_toString(slot.key)}'`);
        return event;
    }

    // ─── Result ─────────────────────────────────────────────────

    private result_build(): RunResult {
        const invocations = new Map<string, InvocationResult>();
        const slots = new Map<string, SlotOutcome>();

        for (const stepId of this.plan.order) {
            const state: InvocationState | undefined = this.states.get(stepId);
            if (!state) continue;
            const requested: string[] = invocation_requestedKeys(state.invocation);
            const stateSlots = new Map<string, SlotOutcome>();
            for (const key of requested) {
                const outcome: SlotOutcome | undefined = state.slots.get(key);
                if (outcome === undefined) continue;
                stateSlots.set(key, outcome);
                slots.set(key, outcome);
            }
            invocations.set(stepId, Object.freeze({
                stepId,
                status: state.status,
                attempts: state.attempts,
                retryDelays: Object.freeze([...state.retryDelays]),
                requested: Object.freeze(requested),
                slots: stateSlots,
                error: state.error,
                shortCircuited: Object.freeze([...state.shortCircuited]),
            }));
        }

        return Object.freeze({
            runId: this.options.runId,
            status: runStatus_derive([...invocations.values()]),
            invocations,
            slots,
            events: Object.freeze([...this.events]),
            startedAt: this.startedAt,
            finishedAt: new Date().toISOString(),
        });
    }
}

function runStatus_derive(invocations: readonly InvocationResult[]): RunStatus {
    if (invocations.some((result: InvocationResult): boolean => result.status === 'failed')) return 'failed';
    if (invocations.some((result: InvocationResult): boolean => result.status === 'cancelled')) return 'cancelled';
    return 'succeeded';
}
