/**
 * @file Shared Parsing Utilities
 *
 * @module dag/graph/parser
 */

import yaml from 'js-yaml';
import type { z } from 'zod';

/** Parse a YAML string into a JS object. */
export function yaml_parse(yamlStr: string): unknown {
    return yaml.load(yamlStr);
}

/** Flatten zod issues into one `[path] message; ...` line. */
export function issues_format(error: z.ZodError): string {
    return error.issues
        .map((issue: z.ZodIssue): string => `[${issue.path.join('.')}] ${issue.message}`)
        .join('; ');
}
