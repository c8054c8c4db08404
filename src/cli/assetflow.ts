/**
 * @file assetflow CLI
 *
 * Structural inspection of a declaration manifest:
 *
 *   assetflow graph  <manifest.yaml>              topological listing
 *   assetflow select <manifest.yaml> <selection>  selection preview
 *   assetflow plan   <manifest.yaml> [selection]  compiled plan (default '*')
 *
 * Steps are bound to placeholder computations; nothing is executed.
 *
 * @module cli
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { AssetFlowError, message_of } from '../dag/errors.js';
import type { ComputeFn, StepOutput } from '../dag/execution/types.js';
import { assetKey_toString, canonical_compare } from '../dag/graph/assetKey.js';
import { manifest_parse, type ParsedManifest } from '../dag/graph/parser/manifest.js';
import { graph_resolve } from '../dag/graph/resolver.js';
import type { AssetGraph, AssetKey, AssetNode, DependencyEdge } from '../dag/graph/types.js';
import { plan_compile } from '../dag/plan/compiler.js';
import type { ExecutionPlan, InputBinding, StepInvocation } from '../dag/plan/types.js';
import { selection_resolve } from '../dag/selection/selector.js';
import { selection_parse } from './selectionArg.js';

/** Where the CLI reads and writes; the entry point wires it to the process. */
export interface CliIO {
    stdout(line: string): void;
    stderr(line: string): void;
    file_read(path: string): string;
}

/**
 * @property color - Emit ANSI colors (default: chalk's own detection)
 */
export interface CliOptions {
    color?: boolean;
}

export const USAGE: string = 'Usage: assetflow <graph|select|plan> <manifest.yaml> [selection]';

const COMMANDS: readonly string[] = ['graph', 'select', 'plan'];

/**
 * Run one CLI invocation.
 *
 * @returns Process exit code: 0 on success, 1 on a manifest, graph or
 *   selection error, 2 on bad usage
 */
export function cli_run(argv: readonly string[], io: CliIO, options: CliOptions = {}): number {
    const style: ChalkInstance = options.color === undefined
        ? new Chalk()
        : new Chalk({ level: options.color ? 1 : 0 });
    const [command, manifestPath, selectionText] = argv;

    if (command === undefined || !COMMANDS.includes(command) || manifestPath === undefined) {
        io.stderr(USAGE);
        return 2;
    }
    if (command === 'select' && selectionText === undefined) {
        io.stderr('select needs a selection argument');
        io.stderr(USAGE);
        return 2;
    }

    try {
        const manifest: ParsedManifest = manifest_parse(io.file_read(manifestPath), placeholder_lookup);
        const graph: AssetGraph = graph_resolve(manifest.declarations);

        switch (command) {
            case 'graph':
                graph_render(manifest, graph, style).forEach((line: string): void => io.stdout(line));
                break;
            case 'select': {
                const keys: string[] = [...selection_resolve(graph, selection_parse(selectionText ?? '*'))]
                    .sort(canonical_compare);
                keys.forEach((key: string): void => io.stdout(style.cyan(key)));
                io.stdout(style.dim(`${keys.length} asset(s) selected`));
                break;
            }
            default: {
                const selected: Set<string> = selection_resolve(graph, selection_parse(selectionText ?? '*'));
                plan_render(plan_compile(graph, selected), style).forEach((line: string): void => io.stdout(line));
            }
        }
        return 0;
    } catch (err: unknown) {
        const label: string = err instanceof AssetFlowError ? err.code : 'ERROR';
        io.stderr(style.red(`${label}: ${message_of(err)}`));
        return 1;
    }
}

const placeholder: ComputeFn = (): StepOutput => ({});

function placeholder_lookup(): ComputeFn {
    return placeholder;
}

/**
 * One line per asset in topological order, followed by its upstreams.
 */
export function graph_render(manifest: ParsedManifest, graph: AssetGraph, style: ChalkInstance): string[] {
    const lines: string[] = [
        `${style.bold(manifest.name)} ${style.dim(`(${graph.nodes.size} assets, ${graph.steps.size} steps)`)}`,
    ];
    for (const canonical of graph.topologicalOrder) {
        const node: AssetNode | undefined = graph.nodes.get(canonical);
        if (!node) continue;
        const origin: string = node.isSource ? style.yellow('source') : `step:${node.stepId ?? ''}`;
        lines.push(`${style.cyan(canonical)} [${node.group}] ${origin}`);

        const upstream: DependencyEdge[] = [...node.dependencies].sort((a: DependencyEdge, b: DependencyEdge): number =>
            canonical_compare(assetKey_toString(a.upstream), assetKey_toString(b.upstream)));
        for (const edge of upstream) {
            lines.push(`  <- ${assetKey_toString(edge.upstream)} ${style.dim(`(${edge.kind})`)}`);
        }
    }
    return lines;
}

/**
 * One line per invocation in execution order, followed by its bindings.
 */
export function plan_render(plan: ExecutionPlan, style: ChalkInstance): string[] {
    const lines: string[] = [];
    for (const stepId of plan.order) {
        const invocation: StepInvocation | undefined = plan.invocations.get(stepId);
        if (!invocation) continue;
        const requested: string = invocation.requested.map((key: AssetKey): string => assetKey_toString(key)).join(', ');
        lines.push(`${style.bold(stepId)}: ${requested}`);
        for (const binding of invocation.bindings) {
            lines.push(`  ${binding.mode} ${assetKey_toString(binding.key)} ${binding_origin(binding, style)}`);
        }
    }
    lines.push(style.dim(`${plan.order.length} invocation(s)`));
    return lines;
}

function binding_origin(binding: InputBinding, style: ChalkInstance): string {
    return binding.producer === null ? style.dim('(external)') : `<- ${binding.producer}`;
}
