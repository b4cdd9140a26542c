/**
 * @file search-index-writer.ts
 * @module search/search-index-writer
 * @created 2026-10-16
 * @license MIT
 *
 * @fileoverview Creates and populates the search index database after generation.
 */

import Database from 'better-sqlite3';
import type { SearchEntry } from './types.js';
import { SCHEMA_STATEMENTS, INSERT_ENTRY } from './schema.js';

/**
 * Default batch size for committing inserts.
 */
const DEFAULT_BATCH_SIZE = 1000;

/**
 * Writes element entries to a SQLite search index with FTS5 support.
 *
 * The index is created at the root of the output directory as `search.db`.
 *
 * @example
 * ```typescript
 * const writer = new SearchIndexWriter('/output/search.db');
 * writer.addEntry({
 *   elementId: '4',
 *   name: 'Point',
 *   qualifiedName: 'geo::Point',
 *   kind: 'class',
 *   language: 'cpp',
 *   scope: 'geo',
 *   path: 'geometry.md#4',
 *   brief: 'A point in the plane.'
 * });
 * writer.close();
 * ```
 */
export class SearchIndexWriter {
    private db: Database.Database;
    private insertStmt: Database.Statement;
    private pendingCount: number = 0;
    private batchSize: number;
    private totalEntries: number = 0;

    /**
     * Create a new SearchIndexWriter.
     * @param dbPath - Path where the search.db file will be created
     * @param batchSize - Number of entries to batch before committing (default: 1000)
     */
    constructor(dbPath: string, batchSize: number = DEFAULT_BATCH_SIZE) {
        this.batchSize = batchSize;
        this.db = new Database(dbPath);

        // WAL while writing; close() switches back so search.db is a single file
        this.db.pragma('journal_mode = WAL');

        for (const stmt of SCHEMA_STATEMENTS) {
            this.db.exec(stmt);
        }

        this.insertStmt = this.db.prepare(INSERT_ENTRY);
        this.db.exec('BEGIN TRANSACTION');
    }

    /**
     * Add an entry to the search index.
     * Entries are batched and committed periodically.
     */
    addEntry(entry: SearchEntry): void {
        this.insertStmt.run(
            entry.elementId,
            entry.name,
            entry.qualifiedName,
            entry.kind,
            entry.language,
            entry.scope ?? null,
            entry.path,
            entry.brief || null,
            entry.signature ?? null
        );

        this.pendingCount++;
        this.totalEntries++;

        if (this.pendingCount >= this.batchSize) {
            this.commitBatch();
        }
    }

    private commitBatch(): void {
        if (this.pendingCount > 0) {
            this.db.exec('COMMIT');
            this.db.exec('BEGIN TRANSACTION');
            this.pendingCount = 0;
        }
    }

    /**
     * Get the total number of entries added.
     */
    getEntryCount(): number {
        return this.totalEntries;
    }

    /**
     * Commit pending entries, optimize the index and close the database.
     */
    close(): void {
        if (this.db.inTransaction) {
            this.db.exec('COMMIT');
        }

        if (this.totalEntries > 0) {
            this.db.exec("INSERT INTO entries_fts(entries_fts) VALUES('optimize')");
        }

        // Must run outside a transaction
        this.db.pragma('journal_mode = DELETE');
        this.db.exec('VACUUM');

        this.db.close();
    }
}
