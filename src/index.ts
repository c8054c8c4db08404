/**
 * @file Public API
 *
 * @module assetflow
 */

export * from './dag/errors.js';
export * from './dag/graph/types.js';
export {
    KEY_SEPARATOR,
    assetKey_create,
    assetKey_parse,
    assetKey_toString,
    assetKey_canonical,
    assetKey_equals,
    assetKey_compare,
    assetKey_name,
    assetKey_hasPrefix,
} from './dag/graph/assetKey.js';
export { graph_resolve, graph_node, graph_stepOf, graph_slotOf } from './dag/graph/resolver.js';
export type { ResolveOptions } from './dag/graph/resolver.js';
export { graphs_compose } from './dag/graph/compose.js';
export { manifest_parse } from './dag/graph/parser/manifest.js';
export type { ComputeLookup, ParsedManifest } from './dag/graph/parser/manifest.js';

export type { SelectionQuery } from './dag/selection/types.js';
export { selection_resolve, selection_expand } from './dag/selection/selector.js';

export type { ExecutionPlan, StepInvocation, InputBinding } from './dag/plan/types.js';
export { plan_compile } from './dag/plan/compiler.js';

export type * from './dag/execution/types.js';
export { produced, declined, output_build } from './dag/execution/outputs.js';
export { retryPolicy_normalize, retryDelay_compute } from './dag/execution/retry.js';
export { ExecutionEngine, DEFAULT_MAX_CONCURRENCY } from './dag/execution/engine.js';
export type { ExecutionEngineOptions, ExecuteOptions } from './dag/execution/engine.js';

export type { MaterializationEvent, MaterializationObserver } from './dag/events/types.js';
export { MaterializationLog } from './dag/events/MaterializationLog.js';
export { MaterializationBus } from './dag/events/MaterializationBus.js';

export type { IOManager } from './dag/io/types.js';
export { InMemoryIOManager } from './dag/io/InMemoryIOManager.js';

export type { StalenessEntry, StalenessReason } from './dag/staleness/types.js';
export { StalenessTracker } from './dag/staleness/tracker.js';

export { AssetInstance } from './dag/instance/AssetInstance.js';
export type { AssetInstanceOptions, SubmitRunOptions, ReportOptions } from './dag/instance/AssetInstance.js';

export { SettingsService, SETTINGS_ENV } from './config/settings.js';
export type { EngineSettings, SettingsKey, SettingSource } from './config/settings.js';
export { logger_create, silentLogger, LOG_LEVELS } from './log/logger.js';
export type { Logger, LogLevel, LogSink, LoggerOptions } from './log/logger.js';
