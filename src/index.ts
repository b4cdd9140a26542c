#!/usr/bin/env node

/**
 * @file index.ts
 * @module index
 * @created 2026-10-16
 * @license MIT
 *
 * @fileoverview CLI entry point for generating Markdown API references from extractor output.
 */

/**
 * @example
 * ```bash
 * # Generate a single-page reference
 * apiref2md ./elements.json -o ./output
 *
 * # One page per root element, with a search index and link validation
 * apiref2md ./elements.json -o ./output --multipage --index --validate
 *
 * # Show what the extractor produced
 * apiref2md info ./elements.json
 * ```
 */

import { existsSync } from 'node:fs';
import { resolve, basename } from 'node:path';

import { program } from 'commander';

import { runPipeline, loadGraph } from './pipeline.js';
import type { ProgressCallback } from './generator/types.js';
import type { Element } from './model/types.js';
import {
    ConfigError,
    ConsistencyError,
    DuplicateAnchorError,
    GraphConstructionError,
    UnknownAnchorError,
} from './model/errors.js';
import { ReferenceResolver } from './resolver/reference-resolver.js';
import { SearchIndexReader } from './search/search-index-reader.js';
import { printValidationResults } from './shared/link-validator.js';

/**
 * Command-line options for the generate command.
 */
interface GenerateOptions {
    /** Output directory path */
    output: string;
    /** Document-set file */
    documents?: string;
    multipage?: boolean;
    title: string;
    concurrency: string;
    /** Generate searchable index (search.db) */
    index?: boolean;
    /** Validate links after generation */
    validate?: boolean;
    warningsAreErrors?: boolean;
    strictResolution?: boolean;
    /** Enable verbose output */
    verbose?: boolean;
}

interface SearchCommandOptions {
    kind?: string;
    language?: string;
    limit: string;
}

/**
 * CLI entry point.
 *
 * Sets up the commander program with all available commands and options,
 * then parses command-line arguments to execute the appropriate action.
 */
async function main() {
    program
        .name('apiref2md')
        .description('Generate Markdown API reference documentation from extractor output')
        .version('1.0.0')
        .argument('<input>', 'Extractor output (JSON element records)')
        .option('-o, --output <dir>', 'Output directory', './output')
        .option('-d, --documents <file>', 'Document-set file describing the output documents')
        .option('-m, --multipage', 'Write one document per root element')
        .option('--title <title>', 'Title of the reference', 'API Reference')
        .option('-j, --concurrency <n>', 'Documents rendered at once', '4')
        .option('--index', 'Generate searchable index (search.db)')
        .option('--validate', 'Validate internal links after generation')
        .option('-W, --warnings-are-errors', 'Fail when the run produces consistency warnings')
        .option('--strict-resolution', 'Only resolve names through their enclosing scopes')
        .option('-v, --verbose', 'Enable verbose output')
        .action(generate);

    program
        .command('info')
        .description('Show element counts of an extractor file')
        .argument('<input>', 'Extractor output (JSON element records)')
        .action(showInfo);

    program
        .command('list-kinds')
        .description('List the element kinds in an extractor file')
        .argument('<input>', 'Extractor output (JSON element records)')
        .action(listKinds);

    program
        .command('unresolved')
        .description('List type references that match no documented element')
        .argument('<input>', 'Extractor output (JSON element records)')
        .action(listUnresolved);

    program
        .command('search')
        .description('Search a generated search index')
        .argument('<db>', 'Path to search.db')
        .argument('<query>', 'Search terms (prefix* and "exact phrase" supported)')
        .option('-k, --kind <kind>', 'Filter by element kind')
        .option('-l, --language <lang>', 'Filter by language')
        .option('--limit <n>', 'Maximum number of results', '20')
        .action(search);

    await program.parseAsync();
}

/**
 * Generate Markdown documents from an extractor file.
 *
 * @param inputPath - Path to the extractor JSON
 * @param options - Generation options
 */
async function generate(inputPath: string, options: GenerateOptions) {
    const resolvedPath = requireInput(inputPath);
    const outputDir = resolve(options.output);
    const concurrency = parseInt(options.concurrency, 10);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new ConfigError(`--concurrency must be a positive integer, got "${options.concurrency}"`);
    }

    console.log(`Generating from: ${basename(resolvedPath)}`);
    console.log(`Output directory: ${outputDir}`);

    const startTime = Date.now();
    const onProgress: ProgressCallback = (current: number, total: number, element: Element) => {
        const percent = Math.floor((current / total) * 100);
        if (options.verbose) {
            console.log(`[${current}/${total}] (${percent}%) Rendering: ${element.qualifiedName}`);
        } else {
            process.stdout.write(`\rProgress: ${current.toLocaleString()}/${total.toLocaleString()} (${percent}%)    `);
        }
    };

    const result = await runPipeline(
        {
            input: resolvedPath,
            outputDir,
            documents: options.documents ? resolve(options.documents) : undefined,
            multipage: options.multipage,
            title: options.title,
            concurrency,
            warningsAreErrors: options.warningsAreErrors,
            strictResolution: options.strictResolution,
            index: options.index,
            validate: options.validate,
            verbose: options.verbose,
        },
        onProgress
    );

    // Clear progress line
    if (!options.verbose) {
        process.stdout.write('\n');
    }

    const { generation, writeStats } = result;
    console.log('\n=== Generation Complete ===');
    console.log(`Time: ${((Date.now() - startTime) / 1000).toFixed(1)}s`);
    console.log(`Documents: ${generation.documents.length.toLocaleString()}`);
    console.log(`Elements inserted: ${generation.inserted.toLocaleString()}`);
    console.log(`Failed: ${generation.failed.length.toLocaleString()}`);
    console.log(`Warnings: ${generation.warnings.length.toLocaleString()}`);
    console.log(`Files written: ${writeStats.filesWritten.toLocaleString()}`);
    console.log(`Total size: ${(writeStats.bytesWritten / 1024).toFixed(1)} KB`);
    if (result.indexEntries !== undefined) {
        console.log(`Search index: ${result.indexEntries.toLocaleString()} entries (search.db)`);
    }

    if (result.validation) {
        printValidationResults(result.validation);
        if (result.validation.brokenLinks.length > 0) {
            process.exitCode = 1;
        }
    }
}

/**
 * Show information about an extractor file.
 *
 * @param inputPath - Path to the extractor JSON
 */
function showInfo(inputPath: string) {
    const resolvedPath = requireInput(inputPath);
    const graph = loadGraph(resolvedPath);

    const languages = new Set<string>();
    for (const element of graph.elements()) {
        languages.add(element.language);
    }

    console.log(`Input: ${basename(resolvedPath)}`);
    console.log(`Path: ${resolvedPath}`);
    console.log('');
    console.log(`Total elements: ${graph.size.toLocaleString()}`);
    console.log(`Root elements: ${graph.roots().length.toLocaleString()}`);
    console.log(`Languages: ${[...languages].sort().join(', ')}`);
    console.log('');
    console.log('Element kinds:');
    for (const [kind, count] of graph.countByKind()) {
        console.log(`  ${kind}: ${count.toLocaleString()}`);
    }
}

/**
 * List the element kinds present in an extractor file.
 *
 * @param inputPath - Path to the extractor JSON
 */
function listKinds(inputPath: string) {
    const graph = loadGraph(requireInput(inputPath));
    console.log('Element kinds in input:');
    for (const [kind, count] of graph.countByKind()) {
        console.log(`  ${kind}: ${count.toLocaleString()}`);
    }
}

/**
 * List type references that do not resolve.
 *
 * @param inputPath - Path to the extractor JSON
 */
function listUnresolved(inputPath: string) {
    const graph = loadGraph(requireInput(inputPath));
    const misses = new ReferenceResolver(graph).collectUnresolved();

    if (misses.length === 0) {
        console.log('All type references resolve.');
        return;
    }

    console.log(`Unresolved type references (${misses.length}):`);
    for (const miss of misses) {
        console.log(`  ${miss.qualifiedName} ${miss.field}: ${miss.text}`);
    }
}

/**
 * Query a search index.
 *
 * @param dbPath - Path to search.db
 * @param query - Search terms
 * @param options - Filters
 */
function search(dbPath: string, query: string, options: SearchCommandOptions) {
    const reader = new SearchIndexReader(requireInput(dbPath));
    try {
        const results = reader.search(query, {
            kind: options.kind,
            language: options.language,
            limit: parseInt(options.limit, 10) || 20,
        });
        if (results.length === 0) {
            console.log('No results.');
        }
        for (const result of results) {
            console.log(`${result.qualifiedName} (${result.kind}, ${result.language})  ${result.path}`);
            if (result.brief) console.log(`    ${result.brief}`);
        }
    } finally {
        reader.close();
    }
}

function requireInput(path: string): string {
    const resolvedPath = resolve(path);
    if (!existsSync(resolvedPath)) {
        throw new ConfigError(`File not found: ${resolvedPath}`);
    }
    return resolvedPath;
}

main().catch((error: unknown) => {
    if (
        error instanceof GraphConstructionError ||
        error instanceof ConfigError ||
        error instanceof ConsistencyError ||
        error instanceof DuplicateAnchorError ||
        error instanceof UnknownAnchorError
    ) {
        console.error(`Error: ${error.message}`);
    } else {
        console.error(error);
    }
    process.exitCode = 1;
});
