/**
 * @file types.ts
 * @module search/types
 * @created 2026-10-16
 * @license MIT
 *
 * @fileoverview Type definitions for the search index.
 */

import type { ElementKind } from '../model/types.js';

/**
 * Entry to be indexed in the search database.
 */
export interface SearchEntry {
    elementId: string;
    /** Short name (e.g., "Point") */
    name: string;
    /** Qualified name (e.g., "geo::Point") */
    qualifiedName: string;
    kind: ElementKind;
    language: string;
    /** Qualified name of the enclosing element */
    scope?: string;
    /** Link target relative to the output directory (e.g., "geometry.md#4") */
    path: string;
    brief?: string;
    /** Plain-text signature */
    signature?: string;
}

/**
 * Search result with relevance score.
 */
export interface SearchResult extends SearchEntry {
    /** BM25 score; lower is more relevant */
    score: number;
}

/**
 * Options for filtering search results.
 */
export interface SearchOptions {
    /** Filter by element kind */
    kind?: string;
    /** Filter by language */
    language?: string;
    /** Maximum number of results (default: 20) */
    limit?: number;
    /** Offset for pagination */
    offset?: number;
}
