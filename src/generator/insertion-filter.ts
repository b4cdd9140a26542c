/**
 * @file insertion-filter.ts
 * @module generator/insertion-filter
 * @created 2026-10-13
 * @license MIT
 *
 * @fileoverview Selects which members of a container are inserted into a document.
 */

import type { Element } from '../model/types.js';
import { ConfigError } from '../model/errors.js';

/**
 * Filter settings as written in a document-set file.
 *
 * Each field takes one pattern or a list of patterns:
 * - `+pattern` includes matching members
 * - `-pattern` excludes matching members
 * - a bare pattern includes
 * - `all` includes everything
 *
 * Patterns are regular expressions matched from the start of the value.
 * The last matching pattern wins; when none matches, a list starting
 * with an include excludes the member and a list starting with an
 * exclude keeps it.
 */
export interface InsertionFilterSpec {
    /** Patterns on the member's short name */
    name?: string | string[];
    /** Patterns on the member's kind (e.g., "-enum-value") */
    kind?: string | string[];
    /** Patterns on the protection level; members without one count as public */
    prot?: string | string[];
}

/**
 * Protection filter applied when a document does not mention `prot`.
 */
export const DEFAULT_PROT_FILTER = ['+public', '+protected'];

interface CompiledPattern {
    include: boolean;
    regex: RegExp;
}

type PatternList = CompiledPattern[] | null;

/**
 * Compiled member filter.
 *
 * @example
 * ```typescript
 * const filter = new InsertionFilter({ name: '-internal', prot: 'all' });
 * const visible = graph.childrenOf(classId).filter(m => filter.accepts(m));
 * ```
 */
export class InsertionFilter {
    private name: PatternList;
    private kind: PatternList;
    private prot: PatternList;

    /**
     * @throws ConfigError if a pattern is not a valid regular expression
     */
    constructor(spec: InsertionFilterSpec = {}) {
        this.name = compile(spec.name);
        this.kind = compile(spec.kind);
        this.prot = compile(spec.prot ?? DEFAULT_PROT_FILTER);
    }

    /**
     * Whether a member passes every configured pattern list.
     */
    accepts(element: Element): boolean {
        return (
            matches(this.name, element.name) &&
            matches(this.kind, element.kind) &&
            matches(this.prot, element.prot ?? 'public')
        );
    }
}

function compile(patterns: string | string[] | undefined): PatternList {
    if (patterns === undefined) return null;
    const list = Array.isArray(patterns) ? patterns : [patterns];
    if (list.some(p => p.toLowerCase() === 'all' || p.toLowerCase() === '+all')) return null;

    return list.map(pattern => {
        const include = !pattern.startsWith('-');
        const body = pattern.startsWith('+') || pattern.startsWith('-') ? pattern.slice(1) : pattern;
        try {
            return { include, regex: new RegExp(`^(?:${body})`) };
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ConfigError(`Invalid filter pattern "${pattern}": ${reason}`);
        }
    });
}

function matches(patterns: PatternList, value: string): boolean {
    if (patterns === null || patterns.length === 0) return true;

    let accepted = !patterns[0].include;
    for (const pattern of patterns) {
        if (pattern.regex.test(value)) {
            accepted = pattern.include;
        }
    }
    return accepted;
}
