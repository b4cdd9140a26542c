/**
 * @file element-graph.ts
 * @module model/element-graph
 * @created 2026-10-12
 * @license MIT
 *
 * @fileoverview In-memory graph of documented elements, built once per run.
 */

import type { Element, ElementKind, ElementRecord } from './types.js';
import { DuplicateElementError, MalformedInputError } from './errors.js';
import { nameKey, splitQualifiedName } from './qualified-name.js';

/**
 * Compare element ids by code unit, never by locale.
 */
export function compareIds(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Read-only graph of all documented elements.
 *
 * Elements form a rooted forest through containment (`childIds`), plus
 * symbolic reference edges (types, bases, alias targets) that are resolved
 * later by the {@link ReferenceResolver}.
 *
 * Construction validates the whole input and throws a
 * {@link GraphConstructionError} subclass on the first problem:
 * - duplicate element ids
 * - children that do not exist
 * - elements claimed by more than one parent
 * - containment cycles
 *
 * @example
 * ```typescript
 * const graph = new ElementGraph(records);
 * const [point] = graph.lookupByName('geo::Point', 'cpp');
 * for (const member of graph.childrenOf(point.id)) {
 *   console.log(member.name);
 * }
 * ```
 */
export class ElementGraph {
    private byId: Map<string, Element> = new Map();
    private byName: Map<string, Element[]> = new Map();
    private byShortName: Map<string, Element[]> = new Map();
    private rootIds: string[] = [];

    /**
     * Build the graph from extractor records.
     * @param records - Element records in declaration order
     */
    constructor(records: readonly ElementRecord[]) {
        const parents = new Map<string, string>();

        for (const record of records) {
            if (this.byId.has(record.id)) {
                throw new DuplicateElementError(record.id);
            }
            // Placeholder until parents are known; replaced below
            this.byId.set(record.id, toElement(record, undefined));
        }

        for (const record of records) {
            for (const childId of record.children ?? []) {
                if (!this.byId.has(childId)) {
                    throw new MalformedInputError(`Unknown child id "${childId}"`, record.id);
                }
                if (childId === record.id) {
                    throw new MalformedInputError('Element contains itself', record.id);
                }
                const previous = parents.get(childId);
                if (previous !== undefined) {
                    throw new MalformedInputError(
                        `Element "${childId}" is claimed by both "${previous}" and "${record.id}"`,
                        childId
                    );
                }
                parents.set(childId, record.id);
            }
        }

        this.assertAcyclic(parents);

        for (const record of records) {
            const element = Object.freeze(toElement(record, parents.get(record.id)));
            this.byId.set(element.id, element);
            this.addToIndex(this.byName, nameKey(element.qualifiedName), element);
            const segments = splitQualifiedName(element.qualifiedName);
            this.addToIndex(this.byShortName, segments[segments.length - 1] ?? element.name, element);
            if (element.parentId === undefined) {
                this.rootIds.push(element.id);
            }
        }

        for (const bucket of [...this.byName.values(), ...this.byShortName.values()]) {
            bucket.sort((a, b) => compareIds(a.id, b.id));
        }
    }

    /**
     * Number of elements in the graph.
     */
    get size(): number {
        return this.byId.size;
    }

    /**
     * Find an element by id.
     * @returns The element, or undefined if no element has this id
     */
    lookupById(id: string): Element | undefined {
        return this.byId.get(id);
    }

    /**
     * Find all elements with the given qualified name.
     *
     * Ambiguity is expected (overloads, the same name in several languages);
     * results are ordered by id.
     *
     * @param qualifiedName - Name with any of the `::`, `.` or `/` separators
     * @param languageHint - Only return elements declared in this language
     */
    lookupByName(qualifiedName: string, languageHint?: string): Element[] {
        const matches = this.byName.get(nameKey(qualifiedName)) ?? [];
        return languageHint ? matches.filter(e => e.language === languageHint) : [...matches];
    }

    /**
     * Find all elements whose last name segment equals `shortName`, ordered by id.
     */
    lookupByShortName(shortName: string): Element[] {
        return [...(this.byShortName.get(shortName) ?? [])];
    }

    /**
     * Get the owned elements of a container in declaration order.
     */
    childrenOf(id: string): Element[] {
        const element = this.byId.get(id);
        if (!element) return [];
        return element.childIds.map(childId => this.require(childId));
    }

    /**
     * Get the element that owns the given element.
     */
    parentOf(id: string): Element | undefined {
        const parentId = this.byId.get(id)?.parentId;
        return parentId === undefined ? undefined : this.byId.get(parentId);
    }

    /**
     * Get the chain of containers from the outermost down to the element's parent.
     */
    ancestorsOf(id: string): Element[] {
        const chain: Element[] = [];
        let parent = this.parentOf(id);
        while (parent) {
            chain.unshift(parent);
            parent = this.parentOf(parent.id);
        }
        return chain;
    }

    /**
     * Elements without a parent, in input order.
     */
    roots(): Element[] {
        return this.rootIds.map(id => this.require(id));
    }

    /**
     * Iterate over all elements in input order.
     */
    *elements(): IterableIterator<Element> {
        yield* this.byId.values();
    }

    /**
     * Count elements per kind.
     */
    countByKind(): Map<ElementKind, number> {
        const counts = new Map<ElementKind, number>();
        for (const element of this.byId.values()) {
            counts.set(element.kind, (counts.get(element.kind) ?? 0) + 1);
        }
        return counts;
    }

    private require(id: string): Element {
        const element = this.byId.get(id);
        if (!element) {
            throw new MalformedInputError(`Unknown element id "${id}"`);
        }
        return element;
    }

    private addToIndex(index: Map<string, Element[]>, key: string, element: Element): void {
        const bucket = index.get(key);
        if (bucket) {
            bucket.push(element);
        } else {
            index.set(key, [element]);
        }
    }

    /**
     * Walk up from every element; revisiting one means containment loops.
     */
    private assertAcyclic(parents: Map<string, string>): void {
        const verified = new Set<string>();

        for (const start of parents.keys()) {
            const path = new Set<string>();
            let current: string | undefined = start;

            while (current !== undefined && !verified.has(current)) {
                if (path.has(current)) {
                    throw new MalformedInputError('Containment cycle detected', current);
                }
                path.add(current);
                current = parents.get(current);
            }

            for (const id of path) {
                verified.add(id);
            }
        }
    }
}

/**
 * Expand a record into its kind-specific element shape with defaults applied.
 */
function toElement(record: ElementRecord, parentId: string | undefined): Element {
    const core = {
        id: record.id,
        name: record.name,
        qualifiedName: record.qualifiedName ?? record.name,
        language: record.language,
        brief: record.brief ?? '',
        description: record.description ?? '',
        sections: record.sections ?? [],
        include: record.include,
        prot: record.prot,
        parentId,
        childIds: record.children ?? [],
    };

    switch (record.kind) {
        case 'namespace':
            return { ...core, kind: 'namespace' };
        case 'class':
            return {
                ...core,
                kind: 'class',
                keyword: record.keyword ?? 'class',
                bases: record.bases ?? [],
                typeParams: record.typeParams ?? [],
            };
        case 'function':
            return {
                ...core,
                kind: 'function',
                params: record.params ?? [],
                returns: record.returns,
                throws: record.throws ?? [],
                typeParams: record.typeParams ?? [],
                isStatic: record.static ?? false,
                isConst: record.const ?? false,
            };
        case 'member':
            return {
                ...core,
                kind: 'member',
                type: record.type,
                initializer: record.initializer,
                isStatic: record.static ?? false,
            };
        case 'enum':
            return { ...core, kind: 'enum', underlying: record.underlying };
        case 'enum-value':
            return { ...core, kind: 'enum-value', initializer: record.initializer };
        case 'alias':
            return { ...core, kind: 'alias', target: record.target };
        case 'parameter':
            return { ...core, kind: 'parameter', type: record.type, defaultValue: record.defaultValue };
    }
}
