/**
 * @file Asset Instance
 *
 * Facade over one resolved graph and the state that outlives a run: the
 * materialization log, the event bus and the I/O manager. Runs are
 * submitted here; staleness and externally observed materializations
 * are read and reported here.
 *
 * @module dag/instance
 */

import { randomUUID } from 'crypto';
import { SettingsService, type EngineSettings } from '../../config/settings.js';
import { logger_create, type Logger } from '../../log/logger.js';
import { DuplicateRunError } from '../errors.js';
import { MaterializationBus } from '../events/MaterializationBus.js';
import { MaterializationLog } from '../events/MaterializationLog.js';
import type { MaterializationEvent, MaterializationObserver } from '../events/types.js';
import { ExecutionEngine } from '../execution/engine.js';
import type { RunResult } from '../execution/types.js';
import { graph_node, graph_resolve } from '../graph/resolver.js';
import type { AssetDeclaration, AssetGraph, AssetKeyInput, AssetNode, MetadataMap, StepConfig } from '../graph/types.js';
import { InMemoryIOManager } from '../io/InMemoryIOManager.js';
import type { IOManager } from '../io/types.js';
import { plan_compile } from '../plan/compiler.js';
import type { ExecutionPlan } from '../plan/types.js';
import { selection_resolve } from '../selection/selector.js';
import type { SelectionQuery } from '../selection/types.js';
import { StalenessTracker } from '../staleness/tracker.js';
import type { StalenessEntry } from '../staleness/types.js';

/**
 * @property settings - Source of concurrency, retry delay and log level defaults
 * @property random - Uniform [0, 1) source for retry jitter
 */
export interface AssetInstanceOptions {
    ioManager?: IOManager;
    log?: MaterializationLog;
    bus?: MaterializationBus;
    logger?: Logger;
    settings?: SettingsService;
    random?: () => number;
}

/**
 * @property config - Run config by step id
 * @property maxConcurrency - Overrides the configured limit for this run
 */
export interface SubmitRunOptions {
    signal?: AbortSignal;
    config?: Readonly<Record<string, StepConfig>>;
    maxConcurrency?: number;
}

/**
 * @property runId - Run id stamped on the event; generated when omitted
 */
export interface ReportOptions {
    metadata?: MetadataMap;
    runId?: string;
}

export class AssetInstance {
    public readonly ioManager: IOManager;
    public readonly log: MaterializationLog;
    public readonly bus: MaterializationBus;
    public readonly logger: Logger;

    private readonly settings: SettingsService;
    private readonly engine: ExecutionEngine;
    private readonly tracker: StalenessTracker;
    private readonly submitted: Set<string> = new Set();

    constructor(public readonly graph: AssetGraph, options: AssetInstanceOptions = {}) {
        this.settings = options.settings ?? SettingsService.instance_get();
        this.logger = options.logger ?? logger_create({ level: this.settings.snapshot().logLevel });
        this.ioManager = options.ioManager ?? new InMemoryIOManager();
        this.log = options.log ?? new MaterializationLog();
        this.bus = options.bus ?? new MaterializationBus(this.logger.child('BUS'));
        this.engine = new ExecutionEngine({
            ioManager: this.ioManager,
            log: this.log,
            bus: this.bus,
            logger: this.logger,
            random: options.random,
        });
        this.tracker = new StalenessTracker(graph, this.log);
    }

    /**
     * Resolve declarations and wrap the graph. Steps without an explicit
     * retry delay take the configured default.
     */
    public static fromDeclarations(
        declarations: readonly AssetDeclaration[],
        options: AssetInstanceOptions = {},
    ): AssetInstance {
        const settings: SettingsService = options.settings ?? SettingsService.instance_get();
        const graph: AssetGraph = graph_resolve(declarations, {
            defaultRetryDelayMs: settings.snapshot().retryDelayMs,
        });
        return new AssetInstance(graph, { ...options, settings });
    }

    /** Resolve a selection query to canonical keys. */
    public select(query: SelectionQuery): Set<string> {
        return selection_resolve(this.graph, query);
    }

    /** Compile a plan for a selection query. */
    public plan(query: SelectionQuery): ExecutionPlan {
        return plan_compile(this.graph, this.select(query));
    }

    /**
     * Execute a plan, or the plan for a selection query.
     *
     * Rejects with DuplicateRunError when the run id was already
     * submitted or already appears in the log, and with
     * UnknownDependencyError when the selection names an unknown key.
     * Execution failures are reported on the RunResult.
     */
    public async submitRun(
        target: ExecutionPlan | SelectionQuery,
        runId: string,
        options: SubmitRunOptions = {},
    ): Promise<RunResult> {
        if (this.submitted.has(runId) || this.log.run_has(runId)) {
            throw new DuplicateRunError(runId);
        }
        const plan: ExecutionPlan = 'kind' in target ? this.plan(target) : target;
        this.submitted.add(runId);

        const current: EngineSettings = this.settings.snapshot();
        return this.engine.execute(plan, {
            runId,
            signal: options.signal,
            config: options.config,
            maxConcurrency: options.maxConcurrency ?? current.maxConcurrency,
        });
    }

    /** @throws UnknownDependencyError for keys not in the graph */
    public isStale(key: AssetKeyInput): boolean {
        return this.tracker.isStale(key);
    }

    public staleness_report(): StalenessEntry[] {
        return this.tracker.staleness_report();
    }

    /**
     * Record a materialization that happened outside the engine, such as
     * a source asset observed upstream. Nothing is stored through the
     * I/O manager.
     *
     * @throws UnknownDependencyError for keys not in the graph
     */
    public materialization_report(key: AssetKeyInput, options: ReportOptions = {}): MaterializationEvent {
        const node: AssetNode = graph_node(this.graph, key);
        const event: MaterializationEvent = this.log.event_append({
            key: node.key,
            runId: options.runId ?? `report-${randomUUID()}`,
            stepId: null,
            timestamp: new Date().toISOString(),
            codeVersion: node.codeVersion,
            metadata: options.metadata ?? {},
        });
        this.bus.publish(event);
        return event;
    }

    /** @returns Unsubscribe function. */
    public subscribe(observer: MaterializationObserver): () => void {
        return this.bus.subscribe(observer);
    }
}
