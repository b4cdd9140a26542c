/**
 * @file document-plan.ts
 * @module generator/document-plan
 * @created 2026-10-14
 * @license MIT
 *
 * @fileoverview Decides which elements each output document inserts and where links point.
 */

import type { ElementGraph } from '../model/element-graph.js';
import type { Element } from '../model/types.js';
import { ConfigError } from '../model/errors.js';
import type { ReferenceResolver } from '../resolver/reference-resolver.js';
import { sanitizeFileName } from '../shared/utils/sanitize.js';
import { InsertionFilter, type InsertionFilterSpec } from './insertion-filter.js';

/**
 * Named anchor placed at the top of a document.
 */
export interface DocumentAnchor {
    name: string;
    /** Text used by links to the anchor that bring none of their own */
    text?: string;
}

/**
 * One output document as requested by the user.
 */
export interface DocumentSpec {
    /** Unique document id; also the base of the output file name */
    id: string;
    /** Page title (defaults to the id) */
    title?: string;
    /** Language used to pick elements and format signatures */
    language?: string;
    /** Scope the `insert` names are resolved from (e.g., "geo" lets "Point" find geo::Point) */
    namespace?: string;
    /** Qualified names of the elements inserted in full, in order */
    insert: string[];
    /** Element ids inserted in full after the named ones */
    insertIds?: string[];
    /** Member filter for this document */
    filter?: InsertionFilterSpec;
    /** Named anchors placed below the title */
    anchors?: DocumentAnchor[];
}

/**
 * A document with its roots resolved.
 */
export interface PlannedDocument {
    id: string;
    title: string;
    /** Output file name relative to the output directory (e.g., "geometry.md") */
    fileName: string;
    language?: string;
    /** Elements inserted in full at the top level, in order */
    rootIds: string[];
    filter: InsertionFilter;
    anchors: DocumentAnchor[];
}

/**
 * Insert entry that did not name any element.
 */
export interface UnresolvedPlanEntry {
    documentId: string;
    name: string;
}

/**
 * Resolved set of output documents with element ownership.
 *
 * Every element that is planned to appear in full has exactly one owning
 * document: the first document (in plan order) that inserts it as a root,
 * or failing that, the first document whose roots contain it. Links to an
 * element point at its owning document, independent of generation order.
 */
export class DocumentPlan {
    private planned: PlannedDocument[];
    private owners: Map<string, string> = new Map();
    private misses: UnresolvedPlanEntry[] = [];

    /**
     * Resolve document specs against the graph.
     *
     * @param graph - Element graph
     * @param resolver - Resolver used for the `insert` names
     * @param specs - Documents in output order
     * @throws ConfigError on duplicate document ids or file names
     */
    constructor(
        private readonly graph: ElementGraph,
        resolver: ReferenceResolver,
        specs: DocumentSpec[]
    ) {
        const ids = new Set<string>();
        const fileNames = new Set<string>();

        this.planned = specs.map(spec => {
            if (ids.has(spec.id)) {
                throw new ConfigError(`Duplicate document id "${spec.id}"`);
            }
            ids.add(spec.id);

            const fileName = `${sanitizeFileName(spec.id)}.md`;
            if (fileNames.has(fileName)) {
                throw new ConfigError(`Document "${spec.id}" would overwrite ${fileName}`);
            }
            fileNames.add(fileName);

            const scope = spec.namespace === undefined ? undefined : this.namespaceScope(resolver, spec);
            const rootIds: string[] = [];
            for (const name of spec.insert) {
                const ref = resolver.resolve(name, scope, { language: spec.language });
                if (ref.resolved) {
                    rootIds.push(ref.element.id);
                } else {
                    this.misses.push({ documentId: spec.id, name });
                }
            }
            for (const id of spec.insertIds ?? []) {
                if (graph.lookupById(id)) {
                    rootIds.push(id);
                } else {
                    this.misses.push({ documentId: spec.id, name: id });
                }
            }

            return {
                id: spec.id,
                title: spec.title ?? spec.id,
                fileName,
                language: spec.language,
                rootIds,
                filter: new InsertionFilter(spec.filter),
                anchors: spec.anchors ?? [],
            };
        });

        // Explicit roots claim ownership before anything reached through a container
        for (const doc of this.planned) {
            for (const rootId of doc.rootIds) {
                if (!this.owners.has(rootId)) this.owners.set(rootId, doc.id);
            }
        }
        for (const doc of this.planned) {
            for (const rootId of doc.rootIds) {
                this.claimDescendants(rootId, doc);
            }
        }
    }

    /**
     * One document inserting every root element of the graph.
     */
    static singlePage(graph: ElementGraph, resolver: ReferenceResolver, title = 'API Reference'): DocumentPlan {
        return new DocumentPlan(graph, resolver, [
            { id: 'index', title, insert: [], insertIds: graph.roots().map(e => e.id) },
        ]);
    }

    /**
     * One document per root element of the graph.
     */
    static perRoot(graph: ElementGraph, resolver: ReferenceResolver): DocumentPlan {
        const seenIds = new Set<string>();
        const seenFiles = new Set<string>();
        const taken = (id: string): boolean => seenIds.has(id) || seenFiles.has(sanitizeFileName(id));
        const specs: DocumentSpec[] = [];
        for (const root of graph.roots()) {
            let id = root.qualifiedName;
            // Overloads, same-named roots in several languages and names differing
            // only in case would share a document id or file name
            if (taken(id)) id = `${root.qualifiedName}-${root.id}`;
            // Truncated long names can still collide
            for (let n = 2; taken(id); n++) id = `root-${n}`;
            seenIds.add(id);
            seenFiles.add(sanitizeFileName(id));
            specs.push({ id, title: root.qualifiedName, language: root.language, insert: [], insertIds: [root.id] });
        }
        return new DocumentPlan(graph, resolver, specs);
    }

    /**
     * Documents in output order.
     */
    documents(): PlannedDocument[] {
        return [...this.planned];
    }

    /**
     * Find a planned document by id.
     */
    getDocument(id: string): PlannedDocument | undefined {
        return this.planned.find(d => d.id === id);
    }

    /**
     * Document planned to hold the element's full body, if any.
     */
    ownerOf(elementId: string): string | undefined {
        return this.owners.get(elementId);
    }

    /**
     * Insert entries that matched no element.
     */
    unresolvedEntries(): UnresolvedPlanEntry[] {
        return [...this.misses];
    }

    private namespaceScope(resolver: ReferenceResolver, spec: DocumentSpec): Element {
        const ref = resolver.resolve(spec.namespace ?? '', undefined, { kind: 'namespace', language: spec.language });
        if (!ref.resolved) {
            throw new ConfigError(`Document "${spec.id}" uses unknown namespace "${spec.namespace}"`);
        }
        return ref.element;
    }

    private claimDescendants(elementId: string, doc: PlannedDocument): void {
        for (const child of this.graph.childrenOf(elementId)) {
            if (!isRenderedMember(child) || !doc.filter.accepts(child)) continue;
            const owner = this.owners.get(child.id);
            if (owner === undefined) {
                this.owners.set(child.id, doc.id);
            } else if (owner !== doc.id) {
                // Owned elsewhere: shown as a link here, so its members stay with the owner
                continue;
            }
            this.claimDescendants(child.id, doc);
        }
    }
}

/**
 * Parameter elements are documented inside their function, never on their own.
 */
export function isRenderedMember(element: Element): boolean {
    return element.kind !== 'parameter';
}
