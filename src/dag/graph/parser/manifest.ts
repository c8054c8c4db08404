/**
 * @file Declaration Manifest Parser
 *
 * Parses a YAML declaration manifest into the AssetDeclaration list the
 * resolver consumes. Computations cannot live in YAML, so each step
 * names one and the caller supplies the lookup.
 *
 * The YAML is validated against `ManifestSchema` (Zod) at the boundary
 * before any field access.
 *
 * @module dag/graph/parser
 */

import type { ComputeFn } from '../../execution/types.js';
import type {
    AssetDeclaration,
    InputDeclaration,
    OutputDeclaration,
    SourceAssetDeclaration,
    StepDeclaration,
} from '../types.js';
import { issues_format, yaml_parse } from './common.js';
import {
    ManifestSchema,
    type RawSource,
    type RawStep,
} from './schemas.js';

/** Finds the computation a step names; undefined when there is none. */
export type ComputeLookup = (name: string) => ComputeFn | undefined;

export interface ParsedManifest {
    name: string;
    description: string;
    declarations: AssetDeclaration[];
}

/**
 * Parse a declaration manifest.
 *
 * @param yamlStr - Raw YAML string
 * @param computations - Lookup, or a record of computations by name
 * @throws On schema violations or a step naming an unknown computation
 */
export function manifest_parse(
    yamlStr: string,
    computations: ComputeLookup | Readonly<Record<string, ComputeFn>>,
): ParsedManifest {
    const raw: unknown = yaml_parse(yamlStr);

    // ── Boundary: validate the full document before touching any fields ──────
    const result = ManifestSchema.safeParse(raw);
    if (!result.success) {
        throw new Error(`Invalid manifest: ${issues_format(result.error)}`);
    }
    const doc = result.data;

    const lookup: ComputeLookup = typeof computations === 'function'
        ? computations
        : (name: string): ComputeFn | undefined => computations[name];

    const declarations: AssetDeclaration[] = [
        ...doc.sources.map((source: RawSource, i: number): SourceAssetDeclaration =>
            source_build(source, `${doc.name}:sources[${i}]`)),
        ...doc.steps.map((step: RawStep, i: number): StepDeclaration =>
            step_build(step, `${doc.name}:steps[${i}]`, lookup)),
    ];

    return {
        name: doc.name,
        description: doc.description,
        declarations,
    };
}

function source_build(source: RawSource, site: string): SourceAssetDeclaration {
    return {
        kind: 'source',
        key: source.key,
        group: source.group,
        description: source.description,
        metadata: source.metadata,
        site,
    };
}

/**
 * Build a StepDeclaration from a schema-validated step record. Zod has
 * already checked shapes; this binds the computation and normalizes
 * input shorthand.
 */
function step_build(step: RawStep, site: string, lookup: ComputeLookup): StepDeclaration {
    const computeName: string = step.compute ?? step.id;
    const compute: ComputeFn | undefined = lookup(computeName);
    if (!compute) {
        throw new Error(`Invalid manifest: ${site} references unknown computation '${computeName}'`);
    }

    const outputs: OutputDeclaration[] = step.outputs.map((output): OutputDeclaration => ({
        key: output.key,
        required: output.required,
        codeVersion: output.codeVersion,
        group: output.group,
        description: output.description,
        metadata: output.metadata,
    }));

    const inputs: InputDeclaration[] = step.inputs.map((input): InputDeclaration =>
        typeof input === 'string' ? { name: input } : { name: input.name, key: input.key });

    return {
        kind: 'step',
        id: step.id,
        outputs,
        inputs,
        deps: step.deps,
        subsettable: step.subsettable,
        internalDependencies: step.internalDependencies,
        retryPolicy: step.retry,
        codeVersion: step.codeVersion,
        group: step.group,
        description: step.description,
        compute,
        site,
    };
}
