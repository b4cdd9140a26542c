/**
 * @file types.ts
 * @module generator/types
 * @created 2026-10-15
 * @license MIT
 *
 * @fileoverview Type definitions for generation runs.
 */

import type { Element } from '../model/types.js';
import type { DuplicateInsertion } from './insertion-tracker.js';

/**
 * Destination for run diagnostics. `console` satisfies it.
 */
export interface GenerationLogger {
    log(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

/**
 * Configuration options for a generation run.
 */
export interface GenerationOptions {
    /** Maximum number of documents rendered at once (default: 4) */
    concurrency?: number;
    /** Raise a ConsistencyError instead of warning at the end of the run */
    warningsAreErrors?: boolean;
    /** Enable verbose logging */
    verbose?: boolean;
    /** Diagnostics destination (default: console) */
    logger?: GenerationLogger;
}

/**
 * Progress callback for tracking generation progress.
 *
 * @param current - Number of root elements started so far, across all documents
 * @param total - Total number of root elements to render
 * @param element - The root element being rendered
 */
export type ProgressCallback = (current: number, total: number, element: Element) => void;

/**
 * A rendered output document.
 */
export interface GeneratedDocument {
    id: string;
    title: string;
    fileName: string;
    /** Complete Markdown content */
    content: string;
    /** Elements fully inserted, in insertion order */
    insertedIds: string[];
}

/**
 * Element whose rendering failed and was replaced by a placeholder.
 */
export interface FailedElement {
    elementId: string;
    documentId: string;
    reason: string;
}

/**
 * Result of a generation run.
 */
export interface GenerationResult {
    /** Documents in plan order */
    documents: GeneratedDocument[];
    /** Number of full insertions across all documents */
    inserted: number;
    failed: FailedElement[];
    /** Planned insert names that matched no element */
    unresolvedEntries: string[];
    /** Elements linked to but never inserted anywhere */
    linkedButNotInserted: string[];
    duplicateInsertions: DuplicateInsertion[];
    /** Warnings raised at the end of the run */
    warnings: string[];
    /** Time taken in milliseconds */
    elapsedMs: number;
}
