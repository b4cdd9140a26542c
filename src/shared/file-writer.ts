/**
 * @file file-writer.ts
 * @module shared/file-writer
 * @created 2026-10-16
 * @license MIT
 *
 * @fileoverview Writes generated documents to the output directory with statistics tracking.
 */

import { mkdirSync, writeFileSync, existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { GeneratedDocument } from '../generator/types.js';
import { escapeMarkdown } from './utils/sanitize.js';

/**
 * Statistics about write operations.
 */
export interface WriteStats {
    /** Total number of files written */
    filesWritten: number;
    /** Total number of directories created */
    directoriesCreated: number;
    /** Total bytes written across all files */
    bytesWritten: number;
}

/**
 * Name of the index page listing every document.
 */
export const INDEX_FILE_NAME = '_index.md';

/**
 * Writes Markdown documents to the output directory.
 *
 * @example
 * ```typescript
 * const writer = new FileWriter('./output');
 * for (const doc of result.documents) writer.writeDocument(doc);
 * writer.writeIndex(result.documents, 'API Reference');
 *
 * console.log(writer.getStats());
 * // { filesWritten: 2, directoriesCreated: 1, bytesWritten: 1234 }
 * ```
 */
export class FileWriter {
    private outputDir: string;
    private stats: WriteStats = {
        filesWritten: 0,
        directoriesCreated: 0,
        bytesWritten: 0,
    };
    private createdDirs: Set<string> = new Set();

    /**
     * Create a new FileWriter.
     * @param outputDir - Base directory for all output files
     */
    constructor(outputDir: string) {
        this.outputDir = outputDir;
    }

    /**
     * Write one generated document.
     * @returns Full path to the written file
     */
    writeDocument(doc: GeneratedDocument): string {
        const filePath = join(this.outputDir, doc.fileName);
        this.writeFile(filePath, doc.content);
        return filePath;
    }

    /**
     * Write the index page linking every document.
     * @returns Full path to the written index file
     */
    writeIndex(documents: readonly GeneratedDocument[], title: string): string {
        const filePath = join(this.outputDir, INDEX_FILE_NAME);
        this.writeFile(filePath, buildIndexPage(documents, title));
        return filePath;
    }

    /**
     * Write arbitrary file to the file system.
     *
     * Automatically creates parent directories if they don't exist.
     *
     * @param filePath - Full path to the output file
     * @param content - Content to write
     */
    writeFile(filePath: string, content: string): void {
        const dir = dirname(filePath);

        if (!this.createdDirs.has(dir)) {
            if (!existsSync(dir)) {
                mkdirSync(dir, { recursive: true });
                this.stats.directoriesCreated++;
            }
            this.createdDirs.add(dir);
        }

        writeFileSync(filePath, content, 'utf-8');
        this.stats.filesWritten++;
        this.stats.bytesWritten += Buffer.byteLength(content, 'utf-8');
    }

    /**
     * Get write statistics.
     * @returns Copy of the current write statistics
     */
    getStats(): WriteStats {
        return { ...this.stats };
    }
}

/**
 * Markdown for the index page: one line per document with its element count.
 */
export function buildIndexPage(documents: readonly GeneratedDocument[], title: string): string {
    const lines = [`# ${escapeMarkdown(title)}`, ''];
    for (const doc of documents) {
        const count = doc.insertedIds.length;
        lines.push(`- [${escapeMarkdown(doc.title)}](${doc.fileName}) (${count} ${count === 1 ? 'element' : 'elements'})`);
    }
    return `${lines.join('\n')}\n`;
}
