/**
 * @file Step Compiler
 *
 * Compiles a set of selected keys into an ExecutionPlan: one invocation
 * per step that owns a selected key, carrying the requested output
 * subset and the input bindings those outputs need. Source keys in the
 * selection are dropped; sources are never executed.
 *
 * @module dag/plan
 */

import { UnknownDependencyError } from '../errors.js';
import { assetKey_toString, canonical_compare } from '../graph/assetKey.js';
import type { AssetGraph, AssetKey, InputSlot, OutputSlot, Step } from '../graph/types.js';
import { topologicalOrder_compute } from '../graph/validator.js';
import { selectedSlots_list, selection_expand } from '../selection/selector.js';
import type { ExecutionPlan, InputBinding, StepInvocation } from './types.js';

/**
 * Compile selected keys into a plan.
 *
 * @throws UnknownDependencyError (phase 'selection') for keys not in the graph
 */
export function plan_compile(graph: AssetGraph, selectedKeys: Iterable<string>): ExecutionPlan {
    const requestedKeys = new Set<string>();
    for (const canonical of selectedKeys) {
        if (!graph.nodes.has(canonical)) {
            throw new UnknownDependencyError(canonical, 'selection', `Cannot plan unknown asset '${canonical}'`);
        }
        requestedKeys.add(canonical);
    }
    const selected: Set<string> = selection_expand(graph, requestedKeys);

    // Steps owning at least one selected key, with the slots asked of them.
    const requestedByStep = new Map<string, OutputSlot[]>();
    for (const step of graph.steps.values()) {
        const slots: OutputSlot[] = selectedSlots_list(step, selected);
        if (slots.length > 0) {
            requestedByStep.set(step.id, slots);
        }
    }

    // Which canonical key is produced by which invocation in this plan.
    const producedBy = new Map<string, string>();
    for (const [stepId, slots] of requestedByStep) {
        for (const slot of slots) {
            producedBy.set(assetKey_toString(slot.key), stepId);
        }
    }

    const invocations = new Map<string, StepInvocation>();
    for (const [stepId, slots] of requestedByStep) {
        const step: Step | undefined = graph.steps.get(stepId);
        if (!step) continue;
        invocations.set(stepId, invocation_build(step, slots, producedBy));
    }

    const order: string[] = invocationOrder_compute(invocations);

    return Object.freeze({
        graph,
        selected,
        invocations,
        order: Object.freeze(order),
    });
}

/** Canonical keys of the requested slots of an invocation. */
export function invocation_requestedKeys(invocation: StepInvocation): string[] {
    return invocation.requested.map((key: AssetKey): string => assetKey_toString(key));
}

function invocation_build(
    step: Step,
    slots: readonly OutputSlot[],
    producedBy: ReadonlyMap<string, string>,
): StepInvocation {
    const feeds = new Map<string, readonly string[]>();
    const needed = new Set<string>();
    for (const slot of slots) {
        const canonical: string = assetKey_toString(slot.key);
        const feeding: string[] = [...(step.internalDependencies.get(canonical) ?? [])].sort(canonical_compare);
        feeds.set(canonical, Object.freeze(feeding));
        feeding.forEach((key: string): void => {
            needed.add(key);
        });
    }

    const bindings: InputBinding[] = step.inputs
        .filter((input: InputSlot): boolean => needed.has(assetKey_toString(input.key)))
        .map((input: InputSlot): InputBinding => {
            const producer: string | undefined = producedBy.get(assetKey_toString(input.key));
            return Object.freeze({
                name: input.name,
                key: input.key,
                kind: input.kind,
                mode: input.kind === 'loaded' ? 'fetch' : 'wait',
                producer: producer !== undefined && producer !== step.id ? producer : null,
            });
        });

    const dependsOn: string[] = [...new Set<string>(
        bindings
            .map((binding: InputBinding): string | null => binding.producer)
            .filter((producer: string | null): producer is string => producer !== null),
    )].sort(canonical_compare);

    return Object.freeze({
        stepId: step.id,
        step,
        requested: Object.freeze(slots.map((slot: OutputSlot): AssetKey => slot.key)),
        bindings: Object.freeze(bindings),
        feeds,
        dependsOn: Object.freeze(dependsOn),
    });
}

function invocationOrder_compute(invocations: ReadonlyMap<string, StepInvocation>): string[] {
    const upstream = new Map<string, readonly string[]>();
    const downstream = new Map<string, string[]>();
    for (const id of invocations.keys()) {
        downstream.set(id, []);
    }
    for (const invocation of invocations.values()) {
        upstream.set(invocation.stepId, invocation.dependsOn);
        for (const dep of invocation.dependsOn) {
            downstream.get(dep)?.push(invocation.stepId);
        }
    }
    return topologicalOrder_compute(invocations.keys(), upstream, downstream);
}
