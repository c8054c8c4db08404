/**
 * @file Asset Graph Error Taxonomy
 *
 * Every error the engine raises or records derives from AssetFlowError
 * and carries a stable `code`. Resolution errors abort graph
 * construction, selection errors abort one request, and execution
 * errors are recorded on the RunResult instead of being thrown.
 *
 * @module dag/errors
 */

export type ErrorCode =
    | 'DUPLICATE_KEY'
    | 'UNKNOWN_DEPENDENCY'
    | 'CYCLIC_DEPENDENCY'
    | 'INVALID_DECLARATION'
    | 'MISSING_REQUIRED_OUTPUT'
    | 'STORE_ERROR'
    | 'LOAD_ERROR'
    | 'STEP_COMPUTE_ERROR'
    | 'UPSTREAM_FAILED'
    | 'CONFIG_VALIDATION'
    | 'DUPLICATE_RUN';

/**
 * Base class for all engine errors.
 */
export class AssetFlowError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

// ─── Resolution ─────────────────────────────────────────────────

/** Raised while building a graph. No partial graph survives one of these. */
export class ResolutionError extends AssetFlowError {}

export class DuplicateKeyError extends ResolutionError {
    constructor(
        public readonly key: string,
        public readonly sites: [string, string],
    ) {
        super('DUPLICATE_KEY', `Asset key '${key}' is declared twice: ${sites[0]} and ${sites[1]}`);
    }
}

/**
 * An input, internal dependency or selection names a key that is not in
 * the graph. Shared by resolution and selection; `phase` tells them apart.
 */
export class UnknownDependencyError extends AssetFlowError {
    constructor(
        public readonly reference: string,
        public readonly phase: 'resolution' | 'selection',
        detail: string,
    ) {
        super('UNKNOWN_DEPENDENCY', detail);
    }
}

export class CyclicDependencyError extends ResolutionError {
    /**
     * @param cycle - Keys (or step ids for a step-level cycle) in edge
     *   order, first element repeated at the end.
     * @param level - Whether the cycle runs through assets or through steps
     */
    constructor(
        public readonly cycle: string[],
        public readonly level: 'asset' | 'step' = 'asset',
    ) {
        super('CYCLIC_DEPENDENCY', `Cyclic ${level} dependency: ${cycle.join(' -> ')}`);
    }
}

export class InvalidDeclarationError extends ResolutionError {
    constructor(public readonly site: string, detail: string) {
        super('INVALID_DECLARATION', `${site}: ${detail}`);
    }
}

// ─── Execution ──────────────────────────────────────────────────

/** Recorded against one invocation (and its downstream closure) on a RunResult. */
export class ExecutionError extends AssetFlowError {}

export class MissingRequiredOutputError extends ExecutionError {
    constructor(public readonly stepId: string, public readonly key: string) {
        super('MISSING_REQUIRED_OUTPUT', `Step '${stepId}' did not produce required output '${key}'`);
    }
}

export class StoreError extends ExecutionError {
    constructor(public readonly key: string, cause: unknown) {
        super('STORE_ERROR', `Failed to store '${key}': ${message_of(cause)}`, { cause });
    }
}

export class LoadError extends ExecutionError {
    constructor(public readonly key: string, cause: unknown) {
        super('LOAD_ERROR', `Failed to load '${key}': ${message_of(cause)}`, { cause });
    }
}

/** Wraps anything a computation throws. */
export class StepComputeError extends ExecutionError {
    constructor(public readonly stepId: string, cause: unknown) {
        super('STEP_COMPUTE_ERROR', `Step '${stepId}' raised: ${message_of(cause)}`, { cause });
    }
}

export class UpstreamFailedError extends ExecutionError {
    constructor(public readonly stepId: string, public readonly originStepId: string) {
        super('UPSTREAM_FAILED', `Step '${stepId}' not executed: upstream step '${originStepId}' failed`);
    }
}

export class ConfigValidationError extends ExecutionError {
    constructor(public readonly stepId: string, public readonly issues: string[]) {
        super('CONFIG_VALIDATION', `Invalid config for step '${stepId}': ${issues.join('; ')}`);
    }
}

// ─── Submission ─────────────────────────────────────────────────

export class DuplicateRunError extends AssetFlowError {
    constructor(public readonly runId: string) {
        super('DUPLICATE_RUN', `Run id '${runId}' has already been submitted`);
    }
}

/** Render an unknown thrown value as a message. */
export function message_of(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
