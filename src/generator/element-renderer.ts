/**
 * @file element-renderer.ts
 * @module generator/element-renderer
 * @created 2026-10-15
 * @license MIT
 *
 * @fileoverview Renders one element as a Markdown fragment, in full or as a link.
 */

import type { ElementGraph } from '../model/element-graph.js';
import { FormattingError } from '../model/errors.js';
import type {
    ClassElement,
    Element,
    EnumElement,
    FunctionElement,
    Parameter,
    TypeRef,
} from '../model/types.js';
import type { FormatterRegistry } from '../formatters/formatter-registry.js';
import type { SignatureWriter } from '../formatters/types.js';
import type { ReferenceResolver } from '../resolver/reference-resolver.js';
import {
    escapeAttribute,
    escapeMarkdown,
    escapeTableCell,
    linkFragment,
    sanitizeFileName,
} from '../shared/utils/sanitize.js';
import { AnchorRegistry } from './anchor-registry.js';
import { DescriptionConverter, type AnchorLinker } from './description-converter.js';
import { isRenderedMember, type DocumentPlan } from './document-plan.js';
import { InsertionFilter } from './insertion-filter.js';
import type { InsertionTracker } from './insertion-tracker.js';

/**
 * How an element is rendered: its whole body, or a link to it.
 */
export type RenderMode = 'full' | 'reference';

/**
 * Produces the fragment shown in place of a child whose rendering failed.
 * The renderer rethrows child failures when none is given.
 */
export type ChildFailureHandler = (error: FormattingError, element: Element, documentId: string) => string;

/**
 * Renderer dependencies.
 */
export interface ElementRendererOptions {
    graph: ElementGraph;
    resolver: ReferenceResolver;
    /** Insertion state of the current generation run */
    tracker: InsertionTracker;
    formatters: FormatterRegistry;
    /** Owning documents and per-document filters */
    plan?: DocumentPlan;
    descriptions?: DescriptionConverter;
    /** Named anchors of the current generation run */
    anchors?: AnchorRegistry;
    onChildFailure?: ChildFailureHandler;
}

const MAX_HEADING_LEVEL = 6;

/**
 * Composes Markdown for elements.
 *
 * Full renderings follow a fixed order: anchor, heading, include line,
 * signature, brief, description, kind-specific tables, sections, member
 * summary, then the members themselves. Every type and free-text reference
 * is resolved; resolved ones become links (recorded in the tracker),
 * unresolved ones keep their original text.
 *
 * @example
 * ```typescript
 * const renderer = new ElementRenderer({ graph, resolver, tracker, formatters });
 * for (const root of graph.roots()) {
 *   markdown.push(renderer.render(root, 'index', 'full'));
 * }
 * ```
 */
export class ElementRenderer {
    private graph: ElementGraph;
    private resolver: ReferenceResolver;
    private tracker: InsertionTracker;
    private formatters: FormatterRegistry;
    private plan?: DocumentPlan;
    private descriptions: DescriptionConverter;
    private anchors: AnchorRegistry;
    private onChildFailure?: ChildFailureHandler;
    private defaultFilter = new InsertionFilter();

    constructor(options: ElementRendererOptions) {
        this.graph = options.graph;
        this.resolver = options.resolver;
        this.tracker = options.tracker;
        this.formatters = options.formatters;
        this.plan = options.plan;
        this.descriptions = options.descriptions ?? new DescriptionConverter();
        this.anchors = options.anchors ?? new AnchorRegistry();
        this.onChildFailure = options.onChildFailure;
    }

    /**
     * Render an element into a document.
     *
     * A full rendering of an element already inserted into the document
     * comes back as a reference.
     *
     * @throws FormattingError if the element's signature cannot be formatted
     */
    render(element: Element, documentId: string, mode: RenderMode, trail: readonly string[] = []): string {
        if (mode === 'reference') {
            return this.renderReference(element, documentId);
        }
        return this.renderFull(element, documentId, 0, trail);
    }

    /**
     * Link target for an element as seen from a document: `#anchor` when the
     * body is (or will be) in this document, `file.md#anchor` otherwise.
     */
    linkTarget(element: Element, documentId: string): string {
        const anchor = `#${linkFragment(element.id)}`;
        const owner = this.plan?.ownerOf(element.id) ?? this.tracker.documentsContaining(element.id)[0];
        if (owner === undefined || owner === documentId) return anchor;
        return `${this.fileNameOf(owner)}${anchor}`;
    }

    /**
     * Link target for a free-text reference appearing in an element's description.
     */
    private linkFrom(context: Element, name: string, documentId: string): string | undefined {
        const ref = this.resolver.resolve(name, context);
        if (!ref.resolved) return undefined;
        this.tracker.recordLink(ref.element.id, documentId);
        return this.linkTarget(ref.element, documentId);
    }

    /**
     * Named anchors as seen from a document. An anchor's tag is emitted only
     * in the document it is registered to.
     */
    private anchorLinker(documentId: string): AnchorLinker {
        return {
            define: name => (this.anchors.get(name)?.documentId === documentId ? anchorTag(name) : ''),
            target: name => {
                const anchor = this.anchors.lookup(name);
                const fragment = `#${linkFragment(name)}`;
                return {
                    target: anchor.documentId === documentId ? fragment : `${this.fileNameOf(anchor.documentId)}${fragment}`,
                    linkText: anchor.linkText,
                };
            },
        };
    }

    private fileNameOf(documentId: string): string {
        return this.plan?.getDocument(documentId)?.fileName ?? `${sanitizeFileName(documentId)}.md`;
    }

    private renderReference(element: Element, documentId: string, text = element.name): string {
        this.tracker.recordLink(element.id, documentId);
        return `[${escapeMarkdown(text)}](${this.linkTarget(element, documentId)})`;
    }

    private renderFull(element: Element, documentId: string, depth: number, trail: readonly string[]): string {
        if (this.tracker.requestFullInsertion(element.id, documentId, trail) === 'already-inserted') {
            return this.renderReference(element, documentId);
        }

        const signature = this.formatSignature(element, documentId);
        const anchors = this.anchorLinker(documentId);
        const describe = (raw: string): string =>
            this.descriptions.convert(raw, name => this.linkFrom(element, name, documentId), anchors);

        const level = Math.min(2 + depth, MAX_HEADING_LEVEL);
        const title = depth === 0 ? element.qualifiedName : element.name;
        const blocks: string[] = [
            `${anchorTag(element.id)}\n${'#'.repeat(level)} ${escapeMarkdown(title)}`,
        ];

        const meta = [`**Kind**: ${kindLabel(element, this.graph)}`];
        if (element.include) meta.push(`**Include**: \`${element.include}\``);
        if (element.prot && element.prot !== 'public') meta.push(`**Protection**: ${element.prot}`);
        blocks.push(meta.join('  \n'));

        blocks.push(signature);
        if (element.brief) blocks.push(describe(element.brief));
        if (element.description) blocks.push(describe(element.description));

        blocks.push(...this.kindBlocks(element, documentId, trail, describe));

        for (const section of element.sections) {
            blocks.push(`**${escapeMarkdown(section.title)}**: ${describe(section.text)}`);
        }

        const members = this.members(element, documentId);
        if (members.length > 0) {
            blocks.push(this.memberSummary(members, documentId));
            const childTrail = [...trail, element.qualifiedName];
            for (const child of members) {
                blocks.push(this.renderChild(child, documentId, depth + 1, childTrail));
            }
        }

        return blocks.filter(block => block.length > 0).join('\n\n');
    }

    private renderChild(child: Element, documentId: string, depth: number, trail: readonly string[]): string {
        const owner = this.plan?.ownerOf(child.id);
        const elsewhere =
            (owner !== undefined && owner !== documentId) ||
            this.tracker.isInsertedElsewhere(child.id, documentId);
        if (elsewhere) {
            return `- ${this.renderReference(child, documentId)}`;
        }

        try {
            return this.renderFull(child, documentId, depth, trail);
        } catch (error) {
            if (error instanceof FormattingError && this.onChildFailure) {
                return this.onChildFailure(error, child, documentId);
            }
            throw error;
        }
    }

    private formatSignature(element: Element, documentId: string): string {
        const formatter = this.formatters.forLanguage(element.language);
        const writer: SignatureWriter = {
            text: raw => escapeMarkdown(raw),
            type: ref => this.renderType(ref, element, documentId, formatter.typeArgumentBrackets),
        };

        let signature: string;
        try {
            signature = formatter.formatSignature(element, writer);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new FormattingError(element.id, reason, { cause: error });
        }
        return signature ? `> ${signature}` : '';
    }

    /**
     * Render a type use, linking every part that resolves.
     */
    private renderType(
        ref: TypeRef,
        context: Element,
        documentId: string,
        brackets: readonly [string, string]
    ): string {
        const resolved = this.resolver.resolveType(ref, context);
        let out = ref.prefix ? escapeMarkdown(ref.prefix) : '';
        out += resolved.resolved
            ? this.renderReference(resolved.element, documentId, ref.name)
            : escapeMarkdown(ref.name);
        if (ref.args && ref.args.length > 0) {
            const args = ref.args.map(arg => this.renderType(arg, context, documentId, brackets));
            out += escapeMarkdown(brackets[0]) + args.join(', ') + escapeMarkdown(brackets[1]);
        }
        if (ref.suffix) out += escapeMarkdown(ref.suffix);
        return out;
    }

    private kindBlocks(
        element: Element,
        documentId: string,
        trail: readonly string[],
        describe: (raw: string) => string
    ): string[] {
        const type = (ref: TypeRef): string => this.renderType(ref, element, documentId, this.bracketsFor(element));
        const text = (raw: string | undefined): string =>
            raw ? escapeTableCell(describe(raw)) : '';

        switch (element.kind) {
            case 'class':
                return this.classBlocks(element, type, text);
            case 'function':
                return this.functionBlocks(element, type, text);
            case 'enum':
                return [this.enumValues(element, documentId, trail, text)];
            case 'alias':
                return element.target ? [`**Alias of**: ${type(element.target)}`] : [];
            case 'namespace':
            case 'member':
            case 'enum-value':
            case 'parameter':
                return [];
        }
    }

    private classBlocks(
        element: ClassElement,
        type: (ref: TypeRef) => string,
        text: (raw: string | undefined) => string
    ): string[] {
        const blocks: string[] = [];
        if (element.bases.length > 0) {
            blocks.push(`**Inherits from**: ${element.bases.map(type).join(', ')}`);
        }
        if (element.typeParams.some(p => p.description)) {
            blocks.push(parameterTable('Type Parameters', element.typeParams, type, text));
        }
        return blocks;
    }

    private functionBlocks(
        element: FunctionElement,
        type: (ref: TypeRef) => string,
        text: (raw: string | undefined) => string
    ): string[] {
        const blocks: string[] = [];
        if (element.typeParams.some(p => p.description)) {
            blocks.push(parameterTable('Type Parameters', element.typeParams, type, text));
        }
        if (element.params.length > 0) {
            blocks.push(parameterTable('Parameters', element.params, type, text));
        }
        const returns = element.returns;
        if (returns && (returns.type || returns.description)) {
            const parts = [returns.type ? type(returns.type) : '', text(returns.description)].filter(Boolean);
            blocks.push(`**Returns**: ${parts.join(' ')}`);
        }
        if (element.throws.length > 0) {
            const rows = element.throws.map(t => `| ${type(t.type)} | ${text(t.description)} |`);
            blocks.push(['**Throws**', '', '| Type | Description |', '|------|-------------|', ...rows].join('\n'));
        }
        return blocks;
    }

    private enumValues(
        element: EnumElement,
        documentId: string,
        trail: readonly string[],
        text: (raw: string | undefined) => string
    ): string {
        const values = this.graph.childrenOf(element.id).filter(child => child.kind === 'enum-value');
        if (values.length === 0) return '';

        const filter = this.filterFor(documentId);
        const rowTrail = [...trail, element.qualifiedName];
        const rows: string[] = [];
        for (const value of values) {
            if (!filter.accepts(value)) continue;
            const initializer = value.kind === 'enum-value' && value.initializer ? `\`${value.initializer}\`` : '';
            // The row is the value's full body, so it carries the anchor
            const inserted = this.tracker.requestFullInsertion(value.id, documentId, rowTrail) === 'inserted';
            const name = (inserted ? anchorTag(value.id) : '') + escapeMarkdown(value.name);
            rows.push(`| ${name} | ${initializer} | ${text(value.brief || value.description)} |`);
        }
        if (rows.length === 0) return '';
        return ['**Values**', '', '| Name | Value | Description |', '|------|-------|-------------|', ...rows].join('\n');
    }

    /**
     * Members inserted with a container. Enum values are rendered as table
     * rows by their enum, parameters inside their function.
     */
    private members(element: Element, documentId: string): Element[] {
        if (element.kind === 'enum' || element.kind === 'function') return [];
        const filter = this.filterFor(documentId);
        return this.graph
            .childrenOf(element.id)
            .filter(child => isRenderedMember(child) && child.kind !== 'enum-value' && filter.accepts(child));
    }

    private memberSummary(members: Element[], documentId: string): string {
        // The member's own body places its anchors; the summary only links
        const anchors = this.anchorLinker(documentId);
        const summaryAnchors: AnchorLinker = { define: () => '', target: name => anchors.target(name) };
        const rows = members.map(member => {
            const link = `[${escapeTableCell(escapeMarkdown(member.name))}](${this.linkTarget(member, documentId)})`;
            this.tracker.recordLink(member.id, documentId);
            const brief = this.descriptions.convert(
                member.brief,
                name => this.linkFrom(member, name, documentId),
                summaryAnchors
            );
            return `| ${link} | ${kindLabel(member, this.graph)} | ${escapeTableCell(brief)} |`;
        });
        return ['**Members**', '', '| Name | Kind | Description |', '|------|------|-------------|', ...rows].join('\n');
    }

    private filterFor(documentId: string): InsertionFilter {
        return this.plan?.getDocument(documentId)?.filter ?? this.defaultFilter;
    }

    private bracketsFor(element: Element): readonly [string, string] {
        return this.formatters.forLanguage(element.language).typeArgumentBrackets;
    }
}

/**
 * Fragment substituted for an element whose rendering failed. Keeps the
 * anchor so links to the element still land.
 */
export function placeholderFragment(element: Element, reason: string): string {
    return `${anchorTag(element.id)}\n> Documentation for \`${element.qualifiedName}\` could not be generated: ${reason}`;
}

/**
 * `<a id>` tag for an element id or anchor name.
 */
export function anchorTag(id: string): string {
    return `<a id="${escapeAttribute(id)}"></a>`;
}

function parameterTable(
    title: string,
    params: readonly Parameter[],
    type: (ref: TypeRef) => string,
    text: (raw: string | undefined) => string
): string {
    const rows = params.map(p => {
        const name = p.defaultValue ? `${escapeMarkdown(p.name)} = \`${p.defaultValue}\`` : escapeMarkdown(p.name);
        return `| ${escapeTableCell(name)} | ${p.type ? type(p.type) : ''} | ${text(p.description)} |`;
    });
    return [`**${title}**`, '', '| Name | Type | Description |', '|------|------|-------------|', ...rows].join('\n');
}

/**
 * Human-readable kind, e.g. "Struct" or "Method".
 */
export function kindLabel(element: Element, graph: ElementGraph): string {
    switch (element.kind) {
        case 'namespace':
            return 'Namespace';
        case 'class':
            return element.keyword.charAt(0).toUpperCase() + element.keyword.slice(1);
        case 'function':
            return graph.parentOf(element.id)?.kind === 'class' ? 'Method' : 'Function';
        case 'member':
            return graph.parentOf(element.id)?.kind === 'class' ? 'Field' : 'Variable';
        case 'enum':
            return 'Enum';
        case 'enum-value':
            return 'Enum value';
        case 'alias':
            return 'Alias';
        case 'parameter':
            return 'Parameter';
    }
}
