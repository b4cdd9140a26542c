/**
 * @file insertion-tracker.ts
 * @module generator/insertion-tracker
 * @created 2026-10-13
 * @license MIT
 *
 * @fileoverview Run-scoped record of which elements were fully rendered into which documents.
 */

import { compareIds } from '../model/element-graph.js';
import { TrackerClosedError } from '../model/errors.js';

/**
 * Result of asking to insert an element's full body into a document.
 */
export type InsertionOutcome = 'inserted' | 'already-inserted';

/**
 * One full insertion of an element into a document.
 */
export interface InsertionRecord {
    elementId: string;
    documentId: string;
    /** Qualified names of the elements whose rendering led here, outermost first */
    trail: readonly string[];
}

/**
 * Element fully inserted into more than one document.
 */
export interface DuplicateInsertion {
    elementId: string;
    documentIds: string[];
}

/**
 * Tracks full insertions and links for one generation run.
 *
 * State only grows: a pair, once inserted, stays inserted. The check and the
 * mark in {@link requestFullInsertion} happen in one synchronous step, so
 * document jobs interleaving on the event loop can never both see a pair as
 * new. Create one tracker per run; {@link finish} seals it.
 *
 * @example
 * ```typescript
 * const tracker = new InsertionTracker();
 * tracker.requestFullInsertion('3', 'doc2'); // 'inserted'
 * tracker.requestFullInsertion('3', 'doc2'); // 'already-inserted'
 * tracker.isInserted('3', 'doc1');           // false
 * ```
 */
export class InsertionTracker {
    private inserted: Map<string, InsertionRecord> = new Map();
    private documentsByElement: Map<string, Set<string>> = new Map();
    private linked: Map<string, Set<string>> = new Map();
    private closed = false;

    /**
     * Claim the full insertion of an element into a document.
     *
     * @param elementId - Element to insert
     * @param documentId - Target document
     * @param trail - Rendering path that led to this insertion, for diagnostics
     * @returns 'inserted' on the first call for the pair, 'already-inserted' afterwards
     * @throws TrackerClosedError if the run has finished
     */
    requestFullInsertion(elementId: string, documentId: string, trail: readonly string[] = []): InsertionOutcome {
        if (this.closed) {
            throw new TrackerClosedError();
        }

        const key = pairKey(elementId, documentId);
        if (this.inserted.has(key)) {
            return 'already-inserted';
        }

        this.inserted.set(key, { elementId, documentId, trail: [...trail] });
        addTo(this.documentsByElement, elementId, documentId);
        return 'inserted';
    }

    /**
     * Whether the element's full body was inserted into the document.
     */
    isInserted(elementId: string, documentId: string): boolean {
        return this.inserted.has(pairKey(elementId, documentId));
    }

    /**
     * Whether the element's full body was inserted into any other document.
     */
    isInsertedElsewhere(elementId: string, documentId: string): boolean {
        const documents = this.documentsByElement.get(elementId);
        if (!documents) return false;
        for (const id of documents) {
            if (id !== documentId) return true;
        }
        return false;
    }

    /**
     * Documents containing the element's full body, sorted.
     */
    documentsContaining(elementId: string): string[] {
        return sorted(this.documentsByElement.get(elementId));
    }

    /**
     * Elements fully inserted into a document, in insertion order.
     */
    insertedInto(documentId: string): string[] {
        const ids: string[] = [];
        for (const record of this.inserted.values()) {
            if (record.documentId === documentId) ids.push(record.elementId);
        }
        return ids;
    }

    /**
     * Get the insertion record for a pair.
     */
    getRecord(elementId: string, documentId: string): InsertionRecord | undefined {
        return this.inserted.get(pairKey(elementId, documentId));
    }

    /**
     * All insertion records in insertion order.
     */
    records(): InsertionRecord[] {
        return [...this.inserted.values()];
    }

    /**
     * Note that a document links to an element.
     */
    recordLink(elementId: string, documentId: string): void {
        if (this.closed) {
            throw new TrackerClosedError();
        }
        addTo(this.linked, elementId, documentId);
    }

    /**
     * Documents linking to an element, sorted.
     */
    linkingDocuments(elementId: string): string[] {
        return sorted(this.linked.get(elementId));
    }

    /**
     * Elements that were linked to but never inserted anywhere, sorted by id.
     */
    linkedButNotInserted(): string[] {
        return [...this.linked.keys()].filter(id => !this.documentsByElement.has(id)).sort(compareIds);
    }

    /**
     * Elements whose full body appears in more than one document, sorted by id.
     */
    duplicateInsertions(): DuplicateInsertion[] {
        const duplicates: DuplicateInsertion[] = [];
        for (const [elementId, documents] of this.documentsByElement) {
            if (documents.size > 1) {
                duplicates.push({ elementId, documentIds: sorted(documents) });
            }
        }
        return duplicates.sort((a, b) => compareIds(a.elementId, b.elementId));
    }

    /**
     * Seal the tracker at the end of a run.
     */
    finish(): void {
        this.closed = true;
    }

    /**
     * Whether {@link finish} was called.
     */
    isFinished(): boolean {
        return this.closed;
    }
}

function pairKey(elementId: string, documentId: string): string {
    return `${documentId}\u0000${elementId}`;
}

function addTo(index: Map<string, Set<string>>, key: string, value: string): void {
    const set = index.get(key);
    if (set) {
        set.add(value);
    } else {
        index.set(key, new Set([value]));
    }
}

function sorted(values: Set<string> | undefined): string[] {
    return values ? [...values].sort(compareIds) : [];
}
