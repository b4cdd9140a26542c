/**
 * @file search-entries.ts
 * @module search/search-entries
 * @created 2026-10-16
 * @license MIT
 *
 * @fileoverview Builds search index entries from a generation result.
 */

import type { FormatterRegistry } from '../formatters/formatter-registry.js';
import type { SignatureWriter } from '../formatters/types.js';
import type { ElementGraph } from '../model/element-graph.js';
import type { Element, TypeRef } from '../model/types.js';
import type { GenerationResult } from '../generator/types.js';
import { linkFragment } from '../shared/utils/sanitize.js';
import type { SearchEntry } from './types.js';

/**
 * One entry per full insertion. Elements whose rendering failed are
 * indexed without a signature.
 */
export function collectSearchEntries(
    graph: ElementGraph,
    formatters: FormatterRegistry,
    result: GenerationResult
): SearchEntry[] {
    const failed = new Set(result.failed.map(f => f.elementId));
    const entries: SearchEntry[] = [];

    for (const doc of result.documents) {
        for (const elementId of doc.insertedIds) {
            const element = graph.lookupById(elementId);
            if (!element) continue;
            entries.push({
                elementId,
                name: element.name,
                qualifiedName: element.qualifiedName,
                kind: element.kind,
                language: element.language,
                scope: graph.parentOf(elementId)?.qualifiedName,
                path: `${doc.fileName}#${linkFragment(elementId)}`,
                brief: element.brief || undefined,
                signature: failed.has(elementId) ? undefined : plainSignature(element, formatters),
            });
        }
    }
    return entries;
}

/**
 * Signature as plain text, without Markdown escapes or links.
 */
export function plainSignature(element: Element, formatters: FormatterRegistry): string {
    const formatter = formatters.forLanguage(element.language);
    const [open, close] = formatter.typeArgumentBrackets;
    const type = (ref: TypeRef): string => {
        const args = ref.args && ref.args.length > 0 ? open + ref.args.map(type).join(', ') + close : '';
        return `${ref.prefix ?? ''}${ref.name}${args}${ref.suffix ?? ''}`;
    };
    const writer: SignatureWriter = { text: raw => raw, type };
    return formatter.formatSignature(element, writer);
}
