/**
 * @file anchor-registry.ts
 * @module generator/anchor-registry
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Named anchors shared by all documents of one generation run.
 */

import type { ElementGraph } from '../model/element-graph.js';
import { DuplicateAnchorError, UnknownAnchorError } from '../model/errors.js';
import type { Element } from '../model/types.js';
import { findAnchorDefinitions, findAnchorLinks } from './description-converter.js';
import type { DocumentPlan } from './document-plan.js';

/**
 * A named anchor and the document holding it.
 */
export interface NamedAnchor {
    name: string;
    documentId: string;
    /** Text used by links that bring none of their own */
    linkText?: string;
}

/**
 * Global anchor names, independent of element ids.
 *
 * Anchors come from document-set entries and from `{@anchor name text}`
 * tags in descriptions; descriptions link to them with `{@link #name}`.
 * Like the insertion tracker, a registry belongs to a single run.
 *
 * @example
 * ```typescript
 * const anchors = new AnchorRegistry();
 * anchors.register('units', 'geometry', 'Units of measure');
 * anchors.lookup('units'); // { name: 'units', documentId: 'geometry', linkText: 'Units of measure' }
 * ```
 */
export class AnchorRegistry {
    private anchors: Map<string, NamedAnchor> = new Map();

    /**
     * @throws DuplicateAnchorError if the name is already registered
     */
    register(name: string, documentId: string, linkText?: string): void {
        const existing = this.anchors.get(name);
        if (existing) {
            throw new DuplicateAnchorError(name, existing.documentId, documentId);
        }
        this.anchors.set(name, linkText ? { name, documentId, linkText } : { name, documentId });
    }

    /**
     * @throws UnknownAnchorError if no anchor has this name
     */
    lookup(name: string): NamedAnchor {
        const anchor = this.anchors.get(name);
        if (!anchor) {
            throw new UnknownAnchorError(name);
        }
        return anchor;
    }

    get(name: string): NamedAnchor | undefined {
        return this.anchors.get(name);
    }

    /**
     * Anchors in registration order.
     */
    all(): NamedAnchor[] {
        return [...this.anchors.values()];
    }
}

/**
 * Register every anchor of a plan before rendering starts, then check that
 * each anchor link in a planned element names a registered anchor.
 *
 * Anchors in descriptions belong to the element's owning document.
 *
 * @throws DuplicateAnchorError if a name is defined twice
 * @throws UnknownAnchorError if a description links to an undefined anchor
 */
export function registerPlannedAnchors(registry: AnchorRegistry, graph: ElementGraph, plan: DocumentPlan): void {
    for (const doc of plan.documents()) {
        for (const anchor of doc.anchors) {
            registry.register(anchor.name, doc.id, anchor.text);
        }
    }

    const planned = [...graph.elements()].filter(element => plan.ownerOf(element.id) !== undefined);
    for (const element of planned) {
        const owner = plan.ownerOf(element.id);
        if (owner === undefined) continue;
        for (const text of renderedTexts(element)) {
            for (const tag of findAnchorDefinitions(text)) {
                registry.register(tag.name, owner, tag.text);
            }
        }
    }

    for (const element of planned) {
        for (const text of renderedTexts(element)) {
            for (const name of findAnchorLinks(text)) {
                registry.lookup(name);
            }
        }
    }
}

/**
 * Description texts the renderer converts for an element.
 */
export function renderedTexts(element: Element): string[] {
    switch (element.kind) {
        case 'enum-value':
            // Shown as one table cell of its enum
            return [element.brief || element.description];
        case 'parameter':
            return [];
        case 'class':
            return [...coreTexts(element), ...element.typeParams.map(p => p.description ?? '')];
        case 'function':
            return [
                ...coreTexts(element),
                ...element.typeParams.map(p => p.description ?? ''),
                ...element.params.map(p => p.description ?? ''),
                element.returns?.description ?? '',
                ...element.throws.map(t => t.description ?? ''),
            ];
        case 'namespace':
        case 'member':
        case 'enum':
        case 'alias':
            return coreTexts(element);
    }
}

function coreTexts(element: Element): string[] {
    return [element.brief, element.description, ...element.sections.map(section => section.text)];
}
