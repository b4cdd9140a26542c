/**
 * @file search-index-reader.ts
 * @module search/search-index-reader
 * @created 2026-10-16
 * @license MIT
 *
 * @fileoverview Queries a search index database written by SearchIndexWriter.
 */

import Database from 'better-sqlite3';
import { ELEMENT_KINDS, type ElementKind } from '../model/types.js';
import type { SearchOptions, SearchResult } from './types.js';

/**
 * BM25 ranking weights for the FTS5 columns, in column order.
 */
const BM25_WEIGHTS = {
    name: 10.0,
    qualified_name: 5.0,
    kind: 2.0,
    brief: 1.0,
    signature: 1.0,
};

/**
 * Quote each token of a user query so FTS5 reads it literally.
 *
 * Trailing `*` stays a prefix wildcard and `"quoted phrases"` stay phrases.
 *
 * @example
 * escapeForFts5('geo::Point dist*') // '"geo::Point" "dist"*'
 */
export function escapeForFts5(query: string): string {
    const tokens = query.match(/"[^"]*"|\S+/g) ?? [];
    return tokens
        .map(token => {
            if (token.length >= 2 && token.startsWith('"') && token.endsWith('"')) {
                return `"${token.slice(1, -1).replace(/"/g, '""')}"`;
            }
            const hasWildcard = token.endsWith('*');
            const base = hasWildcard ? token.slice(0, -1) : token;
            if (!base) return '';
            const quoted = `"${base.replace(/"/g, '""')}"`;
            return hasWildcard ? `${quoted}*` : quoted;
        })
        .filter(Boolean)
        .join(' ');
}

/**
 * Reads and queries a search index with BM25 ranking.
 *
 * @example
 * ```typescript
 * const reader = new SearchIndexReader('./output/search.db');
 * for (const result of reader.search('Point')) {
 *   console.log(`${result.qualifiedName} (${result.kind}) ${result.path}`);
 * }
 * reader.close();
 * ```
 */
export class SearchIndexReader {
    private db: Database.Database;

    /**
     * @param dbPath - Path to the search.db file
     */
    constructor(dbPath: string) {
        this.db = new Database(dbPath, { readonly: true, fileMustExist: true });
    }

    /**
     * Search for entries matching the query.
     *
     * @returns Results sorted by relevance
     */
    search(query: string, options: SearchOptions = {}): SearchResult[] {
        const match = escapeForFts5(query);
        if (!match) return [];

        const conditions = ['entries_fts MATCH ?'];
        const params: Array<string | number> = [match];
        if (options.kind) {
            conditions.push('e.kind = ?');
            params.push(options.kind);
        }
        if (options.language) {
            conditions.push('e.language = ?');
            params.push(options.language);
        }
        params.push(options.limit ?? 20, options.offset ?? 0);

        const weights = Object.values(BM25_WEIGHTS).join(', ');
        const rows = this.db
            .prepare(
                `SELECT e.*, bm25(entries_fts, ${weights}) AS score
                 FROM entries e
                 JOIN entries_fts ON e.id = entries_fts.rowid
                 WHERE ${conditions.join(' AND ')}
                 ORDER BY score, e.id
                 LIMIT ? OFFSET ?`
            )
            .all(...params);

        return rows.map(toSearchResult);
    }

    /**
     * Number of entries per element kind.
     */
    countByKind(): Map<string, number> {
        const counts = new Map<string, number>();
        for (const row of this.db.prepare('SELECT kind, COUNT(*) AS count FROM entries GROUP BY kind ORDER BY kind').all()) {
            if (isRow(row) && typeof row.kind === 'string' && typeof row.count === 'number') {
                counts.set(row.kind, row.count);
            }
        }
        return counts;
    }

    close(): void {
        this.db.close();
    }
}

function isRow(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function isElementKind(value: unknown): value is ElementKind {
    return ELEMENT_KINDS.some(kind => kind === value);
}

function optional(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

function toSearchResult(row: unknown): SearchResult {
    if (
        !isRow(row) ||
        typeof row.element_id !== 'string' ||
        typeof row.name !== 'string' ||
        typeof row.qualified_name !== 'string' ||
        !isElementKind(row.kind) ||
        typeof row.language !== 'string' ||
        typeof row.path !== 'string' ||
        typeof row.score !== 'number'
    ) {
        throw new Error('Search index row does not match the entries schema');
    }
    return {
        elementId: row.element_id,
        name: row.name,
        qualifiedName: row.qualified_name,
        kind: row.kind,
        language: row.language,
        scope: optional(row.scope),
        path: row.path,
        brief: optional(row.brief),
        signature: optional(row.signature),
        score: row.score,
    };
}
