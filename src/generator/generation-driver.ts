/**
 * @file generation-driver.ts
 * @module generator/generation-driver
 * @created 2026-10-15
 * @license MIT
 *
 * @fileoverview Runs one generation: renders every planned document and checks the result.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { ElementGraph } from '../model/element-graph.js';
import { ConsistencyError, FormattingError } from '../model/errors.js';
import type { Element } from '../model/types.js';
import { FormatterRegistry } from '../formatters/formatter-registry.js';
import type { ReferenceResolver } from '../resolver/reference-resolver.js';
import { mapWithConcurrency } from '../shared/utils/concurrency.js';
import { escapeMarkdown } from '../shared/utils/sanitize.js';
import { AnchorRegistry, registerPlannedAnchors } from './anchor-registry.js';
import { DescriptionConverter } from './description-converter.js';
import type { DocumentPlan, PlannedDocument } from './document-plan.js';
import { anchorTag, ElementRenderer, placeholderFragment } from './element-renderer.js';
import { InsertionTracker } from './insertion-tracker.js';
import type {
    FailedElement,
    GeneratedDocument,
    GenerationLogger,
    GenerationOptions,
    GenerationResult,
    ProgressCallback,
} from './types.js';

const DEFAULT_CONCURRENCY = 4;

/**
 * Driver dependencies. Formatters and the description converter default to
 * the built-in ones.
 */
export interface GenerationDriverOptions {
    graph: ElementGraph;
    resolver: ReferenceResolver;
    formatters?: FormatterRegistry;
    descriptions?: DescriptionConverter;
}

/**
 * Orchestrates generation runs over a frozen element graph.
 *
 * Each {@link generate} call gets its own insertion tracker and anchor
 * registry, so runs never share state. Documents are rendered as concurrent jobs that yield to the
 * event loop between root elements.
 *
 * @example
 * ```typescript
 * const driver = new GenerationDriver({ graph, resolver });
 * const result = await driver.generate(DocumentPlan.singlePage(graph, resolver), { verbose: true });
 * for (const doc of result.documents) console.log(doc.fileName);
 * ```
 */
export class GenerationDriver {
    private graph: ElementGraph;
    private resolver: ReferenceResolver;
    private formatters: FormatterRegistry;
    private descriptions: DescriptionConverter;

    constructor(options: GenerationDriverOptions) {
        this.graph = options.graph;
        this.resolver = options.resolver;
        this.formatters = options.formatters ?? new FormatterRegistry();
        this.descriptions = options.descriptions ?? new DescriptionConverter();
    }

    /**
     * Render every document of the plan.
     *
     * @param plan - Documents and their root elements
     * @param options - Run options
     * @param onProgress - Optional progress callback
     * @returns Rendered documents and run statistics
     * @throws ConsistencyError if warningsAreErrors is set and the run produced warnings
     * @throws DuplicateAnchorError or UnknownAnchorError before rendering when named anchors clash or are missing
     */
    async generate(
        plan: DocumentPlan,
        options: GenerationOptions = {},
        onProgress?: ProgressCallback
    ): Promise<GenerationResult> {
        const startTime = Date.now();
        const logger: GenerationLogger = options.logger ?? console;
        const tracker = new InsertionTracker();
        const anchors = new AnchorRegistry();
        registerPlannedAnchors(anchors, this.graph, plan);
        const failed: FailedElement[] = [];

        const fail = (error: FormattingError, element: Element, documentId: string): string => {
            failed.push({ elementId: element.id, documentId, reason: error.message });
            logger.error(`Cannot render ${element.qualifiedName} into ${documentId}: ${error.message}`);
            return placeholderFragment(element, error.message);
        };

        const renderer = new ElementRenderer({
            graph: this.graph,
            resolver: this.resolver,
            tracker,
            formatters: this.formatters,
            plan,
            descriptions: this.descriptions,
            anchors,
            onChildFailure: fail,
        });

        const planned = plan.documents();
        const total = planned.reduce((sum, doc) => sum + doc.rootIds.length, 0);
        let started = 0;

        const renderDocument = async (doc: PlannedDocument): Promise<GeneratedDocument> => {
            if (options.verbose) {
                logger.log(`  -> Rendering ${doc.fileName} (${doc.rootIds.length} root elements)`);
            }

            const fragments = [`# ${escapeMarkdown(doc.title)}`];
            if (doc.anchors.length > 0) {
                fragments.push(doc.anchors.map(anchor => anchorTag(anchor.name)).join('\n'));
            }
            for (const rootId of doc.rootIds) {
                await yieldToEventLoop();
                const element = this.graph.lookupById(rootId);
                if (!element) continue;

                started++;
                onProgress?.(started, total, element);

                try {
                    fragments.push(renderer.render(element, doc.id, 'full'));
                } catch (error) {
                    if (!(error instanceof FormattingError)) throw error;
                    fragments.push(fail(error, element, doc.id));
                }
            }

            return {
                id: doc.id,
                title: doc.title,
                fileName: doc.fileName,
                content: `${fragments.join('\n\n')}\n`,
                insertedIds: tracker.insertedInto(doc.id),
            };
        };

        let documents: GeneratedDocument[];
        try {
            documents = await mapWithConcurrency(planned, options.concurrency ?? DEFAULT_CONCURRENCY, renderDocument);
        } finally {
            tracker.finish();
        }

        const unresolvedEntries = plan.unresolvedEntries().map(entry => `${entry.documentId}: ${entry.name}`);
        const linkedButNotInserted = tracker.linkedButNotInserted();
        const duplicateInsertions = tracker.duplicateInsertions();

        const warnings: string[] = [];
        for (const entry of plan.unresolvedEntries()) {
            warnings.push(`Document "${entry.documentId}" inserts "${entry.name}", which matches no element`);
        }
        if (linkedButNotInserted.length > 0) {
            warnings.push(
                `${linkedButNotInserted.length} linked element(s) are not inserted in any document: ` +
                    linkedButNotInserted.map(id => this.describe(id)).join(', ')
            );
        }
        for (const duplicate of duplicateInsertions) {
            warnings.push(
                `${this.describe(duplicate.elementId)} is inserted in full into several documents: ` +
                    duplicate.documentIds.join(', ')
            );
        }

        if (warnings.length > 0 && options.warningsAreErrors) {
            throw new ConsistencyError(warnings.join('\n'));
        }
        for (const warning of warnings) {
            logger.warn(`Warning: ${warning}`);
        }

        return {
            documents,
            inserted: tracker.records().length,
            failed,
            unresolvedEntries,
            linkedButNotInserted,
            duplicateInsertions,
            warnings,
            elapsedMs: Date.now() - startTime,
        };
    }

    private describe(elementId: string): string {
        const element = this.graph.lookupById(elementId);
        return element ? `${element.qualifiedName} (${elementId})` : elementId;
    }
}
