/**
 * @file Declaration Manifest Schemas
 *
 * Zod runtime schemas for YAML declaration manifests. Each schema
 * corresponds to one section of the manifest: the header, a source
 * entry, and a step entry with its outputs, inputs and retry policy.
 *
 * Optional fields are permissive (`.default()`, `.optional()`) so that
 * manifests only declare what is non-default. Keys may be written as
 * 'a/b' or as a list of segments.
 *
 * @module dag/graph/parser/schemas
 */

import { z } from 'zod';
import type { MetadataValue } from '../types.js';

// ─── Shared ─────────────────────────────────────────────────────

const KeySchema = z.union([
    z.string().min(1, 'key must be non-empty'),
    z.array(z.string().min(1, 'key segments must be non-empty')).min(1, 'key must have at least one segment'),
]);

const MetadataValueSchema: z.ZodType<MetadataValue> = z.lazy(() => z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(MetadataValueSchema),
    z.record(z.string(), MetadataValueSchema),
]));

const MetadataSchema = z.record(z.string(), MetadataValueSchema);

// ─── Sources ────────────────────────────────────────────────────

export const SourceSchema = z.object({
    key:         KeySchema,
    group:       z.string().min(1).optional(),
    description: z.string().optional(),
    metadata:    MetadataSchema.optional(),
});

// ─── Steps ──────────────────────────────────────────────────────

export const OutputSchema = z.object({
    key:         KeySchema,
    required:    z.boolean().default(true),
    codeVersion: z.string().optional(),
    group:       z.string().min(1).optional(),
    description: z.string().optional(),
    metadata:    MetadataSchema.optional(),
});

/**
 * An input is either a bare name (bound by name matching) or
 * `{ name, key }` bound by explicit key.
 */
const InputSchema = z.union([
    z.string().min(1),
    z.object({
        name: z.string().min(1, 'input name is required'),
        key:  KeySchema.optional(),
    }),
]);

export const RetrySchema = z.object({
    maxRetries: z.number().int().nonnegative(),
    delayMs:    z.number().nonnegative().optional(),
    backoff:    z.enum(['constant', 'exponential']).optional(),
    jitter:     z.enum(['none', 'symmetric']).optional(),
    maxDelayMs: z.number().nonnegative().optional(),
});

/**
 * Step ids are identifiers; `compute` names the registered computation
 * and defaults to the id.
 */
export const StepSchema = z.object({
    id:                   z.string().regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/, 'step id has invalid format'),
    compute:              z.string().min(1).optional(),
    outputs:              z.array(OutputSchema).min(1, 'outputs must be a non-empty array'),
    inputs:               z.array(InputSchema).default([]),
    deps:                 z.array(KeySchema).default([]),
    subsettable:          z.boolean().default(false),
    internalDependencies: z.record(z.string(), z.array(KeySchema)).optional(),
    retry:                RetrySchema.optional(),
    codeVersion:          z.string().optional(),
    group:                z.string().min(1).optional(),
    description:          z.string().optional(),
});

// ─── Manifest (full document) ───────────────────────────────────

export const ManifestSchema = z.object({
    name:        z.string().min(1, 'manifest name is required'),
    description: z.string().default(''),
    sources:     z.array(SourceSchema).default([]),
    steps:       z.array(StepSchema).default([]),
}).refine(
    (doc): boolean => doc.sources.length + doc.steps.length > 0,
    { message: 'manifest must declare at least one source or step' },
);

export type RawSource   = z.infer<typeof SourceSchema>;
export type RawStep     = z.infer<typeof StepSchema>;
