/**
 * @file reference-resolver.ts
 * @module resolver/reference-resolver
 * @created 2026-10-13
 * @license MIT
 *
 * @fileoverview Resolves symbolic references between documented elements.
 */

import { compareIds, type ElementGraph } from '../model/element-graph.js';
import { segmentsKey, splitQualifiedName } from '../model/qualified-name.js';
import { isContainerKind, type Element, type ElementKind, type TypeRef } from '../model/types.js';

/**
 * Outcome of resolving one reference.
 *
 * `text` always carries the original reference text, so unresolved
 * references can be rendered verbatim.
 */
export type ResolvedReference =
    | { resolved: true; element: Element; text: string }
    | { resolved: false; text: string };

/**
 * Per-lookup restrictions.
 */
export interface ResolveOptions {
    /** Only consider elements of this kind */
    kind?: ElementKind;
    /** Only consider elements declared in this language */
    language?: string;
}

/**
 * Resolver-wide settings.
 */
export interface ResolverOptions {
    /**
     * Fall back to matching the reference against the end of any qualified
     * name in the graph when scoped lookups fail (default: true).
     */
    globalSuffixMatch?: boolean;
}

/**
 * Type reference that did not resolve, with the element it appears in.
 */
export interface UnresolvedTypeUse {
    elementId: string;
    qualifiedName: string;
    /** Which field holds the reference (e.g., "returns", "params[0]") */
    field: string;
    text: string;
}

/**
 * Resolves reference text to elements of an {@link ElementGraph}.
 *
 * Lookup order:
 * 1. Exact qualified-name match
 * 2. The reference relative to each scope enclosing the context, innermost first
 * 3. Any element whose qualified name ends with the reference (optional)
 *
 * The first step that yields candidates decides. Among its candidates the
 * context element itself wins, then elements declared in the context's
 * language, then the lowest id.
 *
 * @example
 * ```typescript
 * const resolver = new ReferenceResolver(graph);
 * const ref = resolver.resolve('Point', drawFunction);
 * if (ref.resolved) {
 *   console.log(ref.element.qualifiedName); // "geo::Point"
 * }
 * ```
 */
export class ReferenceResolver {
    private graph: ElementGraph;
    private globalSuffixMatch: boolean;

    /**
     * Create a resolver over a frozen graph.
     * @param graph - Element graph to search
     * @param options - Resolver settings
     */
    constructor(graph: ElementGraph, options: ResolverOptions = {}) {
        this.graph = graph;
        this.globalSuffixMatch = options.globalSuffixMatch ?? true;
    }

    /**
     * Resolve reference text as seen from a context element.
     *
     * Never throws for unknown names; a miss yields `{ resolved: false }`.
     *
     * @param referenceText - Possibly partially qualified name
     * @param context - Element the reference appears in, or undefined for a global lookup
     * @param options - Kind and language restrictions
     */
    resolve(referenceText: string, context?: Element, options: ResolveOptions = {}): ResolvedReference {
        const text = referenceText;
        const segments = splitQualifiedName(referenceText);
        if (segments.length === 0) {
            return { resolved: false, text };
        }

        for (const candidates of this.candidateSteps(segments, context)) {
            const matching = candidates.filter(e => this.accepts(e, options));
            if (matching.length > 0) {
                return { resolved: true, element: this.tieBreak(matching, context), text };
            }
        }

        return { resolved: false, text };
    }

    /**
     * Resolve a type reference. Only the base name is looked up; qualifiers
     * and template arguments are left to the caller.
     */
    resolveType(ref: TypeRef, context?: Element): ResolvedReference {
        return this.resolve(ref.name, context);
    }

    /**
     * Find every type reference in the graph that does not resolve.
     * Nested template arguments are checked as well.
     */
    collectUnresolved(): UnresolvedTypeUse[] {
        const misses: UnresolvedTypeUse[] = [];

        for (const element of this.graph.elements()) {
            for (const [field, ref] of typeUses(element)) {
                this.collectMisses(element, field, ref, misses);
            }
        }

        return misses;
    }

    private collectMisses(element: Element, field: string, ref: TypeRef, misses: UnresolvedTypeUse[]): void {
        if (!this.resolveType(ref, element).resolved) {
            misses.push({
                elementId: element.id,
                qualifiedName: element.qualifiedName,
                field,
                text: ref.name,
            });
        }
        for (const arg of ref.args ?? []) {
            this.collectMisses(element, `${field}<>`, arg, misses);
        }
    }

    /**
     * Produce candidate lists lazily, one per lookup step.
     */
    private *candidateSteps(segments: string[], context?: Element): Generator<Element[]> {
        const key = segmentsKey(segments);

        yield this.graph.lookupByName(key);

        if (context) {
            for (const scope of this.enclosingScopes(context)) {
                yield this.graph.lookupByName(segmentsKey([...scope, ...segments]));
            }
        }

        if (this.globalSuffixMatch) {
            const last = segments[segments.length - 1];
            yield this.graph.lookupByShortName(last).filter(e => {
                const candidate = splitQualifiedName(e.qualifiedName);
                return endsWith(candidate, segments);
            });
        }
    }

    /**
     * Scope prefixes around the context, innermost first.
     *
     * A container contributes its own name as the innermost scope, so a
     * class can refer to its nested types by their short names.
     */
    private enclosingScopes(context: Element): string[][] {
        const segments = splitQualifiedName(context.qualifiedName);
        const innermost = isContainerKind(context.kind) ? segments.length : segments.length - 1;
        const scopes: string[][] = [];
        for (let length = innermost; length > 0; length--) {
            scopes.push(segments.slice(0, length));
        }
        return scopes;
    }

    private accepts(element: Element, options: ResolveOptions): boolean {
        if (options.kind && element.kind !== options.kind) return false;
        if (options.language && element.language !== options.language) return false;
        return true;
    }

    private tieBreak(candidates: Element[], context?: Element): Element {
        if (context && candidates.some(c => c.id === context.id)) {
            return context;
        }
        const sameLanguage = context ? candidates.filter(c => c.language === context.language) : [];
        const pool = sameLanguage.length > 0 ? sameLanguage : candidates;
        return [...pool].sort((a, b) => compareIds(a.id, b.id))[0];
    }
}

function endsWith(haystack: string[], needle: string[]): boolean {
    if (needle.length > haystack.length) return false;
    const offset = haystack.length - needle.length;
    return needle.every((segment, i) => haystack[offset + i] === segment);
}

/**
 * All type references held by an element, labelled by field.
 */
export function typeUses(element: Element): Array<[string, TypeRef]> {
    const uses: Array<[string, TypeRef]> = [];

    switch (element.kind) {
        case 'class':
            element.bases.forEach((base, i) => uses.push([`bases[${i}]`, base]));
            element.typeParams.forEach((p, i) => p.type && uses.push([`typeParams[${i}]`, p.type]));
            break;
        case 'function':
            element.params.forEach((p, i) => p.type && uses.push([`params[${i}]`, p.type]));
            if (element.returns?.type) uses.push(['returns', element.returns.type]);
            element.throws.forEach((t, i) => uses.push([`throws[${i}]`, t.type]));
            break;
        case 'member':
        case 'parameter':
            if (element.type) uses.push(['type', element.type]);
            break;
        case 'enum':
            if (element.underlying) uses.push(['underlying', element.underlying]);
            break;
        case 'alias':
            if (element.target) uses.push(['target', element.target]);
            break;
        case 'namespace':
        case 'enum-value':
            break;
    }

    return uses;
}
