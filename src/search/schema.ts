/**
 * @file schema.ts
 * @module search/schema
 * @created 2026-10-16
 * @license MIT
 *
 * @fileoverview SQL schema constants for the search index database.
 */

/**
 * SQL statement to create the main entries table.
 */
export const CREATE_ENTRIES_TABLE = `
CREATE TABLE IF NOT EXISTS entries (
        id INTEGER PRIMARY KEY,
        element_id TEXT NOT NULL,
        name TEXT NOT NULL,
        qualified_name TEXT NOT NULL,
        kind TEXT NOT NULL,
        language TEXT NOT NULL,
        scope TEXT,
        path TEXT NOT NULL,
        brief TEXT,
        signature TEXT
)`;

/**
 * SQL statement to create the FTS5 virtual table for full-text search.
 * Uses content='entries' to reference the main table.
 */
export const CREATE_FTS_TABLE = `
CREATE VIRTUAL TABLE IF NOT EXISTS entries_fts USING fts5(
        name,
        qualified_name,
        kind,
        brief,
        signature,
        content='entries',
        content_rowid='id'
)`;

/**
 * SQL trigger to keep FTS index in sync after INSERT.
 */
export const CREATE_INSERT_TRIGGER = `
CREATE TRIGGER IF NOT EXISTS entries_ai AFTER INSERT ON entries BEGIN
        INSERT INTO entries_fts(rowid, name, qualified_name, kind, brief, signature)
        VALUES (new.id, new.name, new.qualified_name, new.kind, new.brief, new.signature);
END`;

/**
 * SQL trigger to keep FTS index in sync after DELETE.
 */
export const CREATE_DELETE_TRIGGER = `
CREATE TRIGGER IF NOT EXISTS entries_ad AFTER DELETE ON entries BEGIN
        INSERT INTO entries_fts(entries_fts, rowid, name, qualified_name, kind, brief, signature)
        VALUES ('delete', old.id, old.name, old.qualified_name, old.kind, old.brief, old.signature);
END`;

export const CREATE_KIND_INDEX = `
CREATE INDEX IF NOT EXISTS idx_entries_kind ON entries(kind)`;

export const CREATE_LANGUAGE_INDEX = `
CREATE INDEX IF NOT EXISTS idx_entries_language ON entries(language)`;

/**
 * SQL statement to insert an entry.
 */
export const INSERT_ENTRY = `
INSERT INTO entries (element_id, name, qualified_name, kind, language, scope, path, brief, signature)
VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`;

/**
 * All schema statements in order of execution.
 */
export const SCHEMA_STATEMENTS = [
    CREATE_ENTRIES_TABLE,
    CREATE_FTS_TABLE,
    CREATE_INSERT_TRIGGER,
    CREATE_DELETE_TRIGGER,
    CREATE_KIND_INDEX,
    CREATE_LANGUAGE_INDEX,
];
