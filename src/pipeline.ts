/**
 * @file pipeline.ts
 * @module pipeline
 * @created 2026-10-16
 * @license MIT
 *
 * @fileoverview Loads extractor output, generates documents and writes the output directory.
 */

import { mkdirSync, existsSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { readElementRecords } from './extractor/record-reader.js';
import { FormatterRegistry } from './formatters/formatter-registry.js';
import { DocumentPlan } from './generator/document-plan.js';
import { GenerationDriver } from './generator/generation-driver.js';
import type { GenerationLogger, GenerationResult, ProgressCallback } from './generator/types.js';
import { ElementGraph } from './model/element-graph.js';
import { ReferenceResolver } from './resolver/reference-resolver.js';
import { collectSearchEntries } from './search/search-entries.js';
import { SearchIndexWriter } from './search/search-index-writer.js';
import { loadDocumentSpecs } from './shared/config.js';
import { FileWriter, type WriteStats } from './shared/file-writer.js';
import { validateLinks, type ValidationResult } from './shared/link-validator.js';

/**
 * File name of the search index inside the output directory.
 */
export const SEARCH_INDEX_FILE_NAME = 'search.db';

/**
 * Options for a complete generation into an output directory.
 */
export interface PipelineOptions {
    /** Extractor JSON file */
    input: string;
    /** Output directory for generated files */
    outputDir: string;
    /** Document-set file; defaults to a single page or one page per root */
    documents?: string;
    /** One document per root element when no document set is given */
    multipage?: boolean;
    /** Title of the single page and of the index page */
    title?: string;
    concurrency?: number;
    warningsAreErrors?: boolean;
    /** Disable the global suffix match step of reference resolution */
    strictResolution?: boolean;
    /** Generate searchable index (search.db) */
    index?: boolean;
    /** Validate links after writing */
    validate?: boolean;
    verbose?: boolean;
    logger?: GenerationLogger;
}

/**
 * Result of a pipeline run.
 */
export interface PipelineResult {
    generation: GenerationResult;
    writeStats: WriteStats;
    /** Number of entries indexed (if index enabled) */
    indexEntries?: number;
    validation?: ValidationResult;
}

const DEFAULT_TITLE = 'API Reference';

/**
 * Read extractor output and build the element graph.
 *
 * @throws GraphConstructionError if the input is malformed
 */
export function loadGraph(input: string): ElementGraph {
    return new ElementGraph(readElementRecords(input));
}

/**
 * Build the document plan for the given options.
 *
 * @throws ConfigError if the document set is malformed
 */
export function buildPlan(graph: ElementGraph, resolver: ReferenceResolver, options: PipelineOptions): DocumentPlan {
    if (options.documents) {
        return new DocumentPlan(graph, resolver, loadDocumentSpecs(options.documents));
    }
    if (options.multipage) {
        return DocumentPlan.perRoot(graph, resolver);
    }
    return DocumentPlan.singlePage(graph, resolver, options.title ?? DEFAULT_TITLE);
}

/**
 * Generate documentation from an extractor file into a directory.
 *
 * Nothing is written until every document has been rendered.
 *
 * @param options - Pipeline options
 * @param onProgress - Optional progress callback
 */
export async function runPipeline(options: PipelineOptions, onProgress?: ProgressCallback): Promise<PipelineResult> {
    const graph = loadGraph(options.input);
    const resolver = new ReferenceResolver(graph, { globalSuffixMatch: !options.strictResolution });
    const plan = buildPlan(graph, resolver, options);
    const formatters = new FormatterRegistry();

    const driver = new GenerationDriver({ graph, resolver, formatters });
    const generation = await driver.generate(
        plan,
        {
            concurrency: options.concurrency,
            warningsAreErrors: options.warningsAreErrors,
            verbose: options.verbose,
            logger: options.logger,
        },
        onProgress
    );

    if (!existsSync(options.outputDir)) {
        mkdirSync(options.outputDir, { recursive: true });
    }
    const writer = new FileWriter(options.outputDir);
    for (const doc of generation.documents) {
        writer.writeDocument(doc);
    }
    writer.writeIndex(generation.documents, options.title ?? DEFAULT_TITLE);

    const result: PipelineResult = { generation, writeStats: writer.getStats() };

    if (options.index) {
        const dbPath = join(options.outputDir, SEARCH_INDEX_FILE_NAME);
        // A stale index would keep entries from an earlier run
        rmSync(dbPath, { force: true });
        const indexWriter = new SearchIndexWriter(dbPath);
        try {
            for (const entry of collectSearchEntries(graph, formatters, generation)) {
                indexWriter.addEntry(entry);
            }
            result.indexEntries = indexWriter.getEntryCount();
        } finally {
            indexWriter.close();
        }
    }

    if (options.validate) {
        result.validation = validateLinks(options.outputDir, options.verbose ?? false);
    }

    return result;
}
