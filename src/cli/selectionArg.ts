/**
 * @file CLI Selection Argument
 *
 * The command line's compact selection form, parsed into a SelectionQuery.
 *
 *   *              every asset
 *   key            one asset ('raw/orders')
 *   group:name     every asset in a group
 *   prefix:a/b     every asset under a key prefix
 *   +key           key and everything upstream of it
 *   key+           key and everything downstream of it
 *   +key+          both lineages
 *
 * Comma-separated terms are unioned.
 *
 * @module cli
 */

import type { SelectionQuery } from '../dag/selection/types.js';

/**
 * @throws On an empty selection or an empty term
 */
export function selection_parse(text: string): SelectionQuery {
    const terms: string[] = text.split(',').map((term: string): string => term.trim());
    if (terms.length === 1 && terms[0] === '') {
        throw new Error('Empty selection');
    }
    const queries: SelectionQuery[] = terms.map(term_parse);
    return queries.length === 1 ? queries[0] : { kind: 'union', queries };
}

function term_parse(term: string): SelectionQuery {
    if (term === '') {
        throw new Error('Empty term in selection');
    }
    if (term === '*') {
        return { kind: 'all' };
    }
    if (term.startsWith('group:')) {
        return { kind: 'group', group: name_require(term.slice('group:'.length), term) };
    }
    if (term.startsWith('prefix:')) {
        return { kind: 'prefix', prefix: name_require(term.slice('prefix:'.length), term) };
    }

    const up: boolean = term.startsWith('+');
    const down: boolean = term.length > 1 && term.endsWith('+');
    const key: string = name_require(term.slice(up ? 1 : 0, down ? -1 : undefined), term);
    const base: SelectionQuery = { kind: 'keys', keys: [key] };

    if (up && down) {
        return {
            kind: 'union',
            queries: [{ kind: 'upstream', of: base }, { kind: 'downstream', of: base }],
        };
    }
    if (up) return { kind: 'upstream', of: base };
    if (down) return { kind: 'downstream', of: base };
    return base;
}

function name_require(value: string, term: string): string {
    if (value === '') {
        throw new Error(`Selection term '${term}' names nothing`);
    }
    return value;
}
