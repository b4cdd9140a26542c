/**
 * @file description-converter.ts
 * @module generator/description-converter
 * @created 2026-10-15
 * @license MIT
 *
 * @fileoverview Converts element descriptions to Markdown and resolves embedded cross-references.
 */

import * as cheerio from 'cheerio';
import TurndownService from 'turndown';

/**
 * Resolves a free-text reference.
 *
 * @param name - Referenced name as written in the description
 * @returns Link target for resolved names, undefined otherwise
 */
export type ReferenceLinker = (name: string) => string | undefined;

/**
 * Named anchors as seen from the document being rendered.
 */
export interface AnchorLinker {
    /** Markup emitted where the anchor is defined; empty when it belongs to another document */
    define(name: string): string;
    /**
     * Link target and registered link text of an anchor.
     * @throws UnknownAnchorError if no anchor has this name
     */
    target(name: string): { target: string; linkText?: string };
}

/**
 * An inline tag with its name and optional trailing text.
 */
export interface InlineTag {
    name: string;
    text?: string;
}

const MARKUP_PATTERN = /<\/?[a-zA-Z][\w-]*(\s[^>]*)?\/?>/;
const INLINE_TAG_PATTERN = /\{@(link|anchor)\s+([^\s}]+)(?:\s+([^}]*?))?\s*\}/g;
const TOKEN_PATTERN = /\uE000(\d+)\uE001/g;

/**
 * `{@anchor name text}` tags of a description, in order.
 */
export function findAnchorDefinitions(text: string): InlineTag[] {
    return findTags(text, 'anchor');
}

/**
 * Anchor names linked with `{@link #name}` in a description, in order.
 */
export function findAnchorLinks(text: string): string[] {
    return findTags(text, 'link')
        .filter(tag => tag.name.startsWith('#'))
        .map(tag => tag.name.slice(1));
}

function findTags(text: string, kind: 'link' | 'anchor'): InlineTag[] {
    const tags: InlineTag[] = [];
    for (const match of text.matchAll(INLINE_TAG_PATTERN)) {
        if (match[1] !== kind) continue;
        const label = match[3]?.trim();
        tags.push(label ? { name: match[2], text: label } : { name: match[2] });
    }
    return tags;
}

/**
 * Converts description text into Markdown.
 *
 * Two input styles are understood, and may be mixed:
 * - Inline tags: `{@link Name}`, `{@link Name label}`, `{@link #anchor}` and
 *   `{@anchor name link text}`
 * - HTML-flavoured text with `<ref>` tags (`<ref name="geo::Point">Point</ref>`
 *   or `<ref>Point</ref>`), converted to Markdown with turndown
 *
 * Resolved references become links. Unresolved ones keep their text
 * verbatim, without link markup or Markdown escapes.
 *
 * @example
 * ```typescript
 * const converter = new DescriptionConverter();
 * converter.convert('See {@link Point}.', name => (name === 'Point' ? '#4' : undefined));
 * // 'See [Point](#4).'
 * ```
 */
export class DescriptionConverter {
    private turndown: TurndownService;

    constructor() {
        this.turndown = new TurndownService({
            headingStyle: 'atx',
            codeBlockStyle: 'fenced',
            bulletListMarker: '-',
        });

        // Remove script and style tags
        this.turndown.remove(['script', 'style', 'noscript']);
    }

    /**
     * Convert a description, resolving element references through `link`
     * and named anchors through `anchors`. Without `anchors`, anchor
     * definitions are dropped and anchor links keep their text.
     *
     * @throws UnknownAnchorError if `anchors` rejects a linked anchor name
     */
    convert(text: string, link: ReferenceLinker, anchors?: AnchorLinker): string {
        if (!text.trim()) return '';
        if (!MARKUP_PATTERN.test(text)) {
            return this.replaceTags(text, link, anchors, markdown => markdown).trim();
        }

        // Finished Markdown is parked behind tokens so turndown cannot escape it
        const parked: string[] = [];
        const park = (markdown: string): string => {
            parked.push(markdown);
            return `\uE000${parked.length - 1}\uE001`;
        };

        const $ = cheerio.load(this.replaceTags(text, link, anchors, park), null, false);
        $('ref').each((_, el) => {
            const $ref = $(el);
            const label = $ref.text().trim();
            const name = $ref.attr('name')?.trim() || label;
            $ref.replaceWith(park(linkOrText(name, label || name, link)));
        });

        return this.turndown
            .turndown($.html())
            .replace(TOKEN_PATTERN, (_match, index: string) => parked[Number(index)] ?? '')
            .trim();
    }

    private replaceTags(
        text: string,
        link: ReferenceLinker,
        anchors: AnchorLinker | undefined,
        emit: (markdown: string) => string
    ): string {
        return text.replace(
            INLINE_TAG_PATTERN,
            (_match, kind: string, name: string, label: string | undefined) => {
                const shown = label?.trim();
                if (kind === 'anchor') {
                    return emit(anchors ? anchors.define(name) : '');
                }
                if (name.startsWith('#')) {
                    const anchorName = name.slice(1);
                    if (!anchors) return emit(shown || anchorName);
                    const anchor = anchors.target(anchorName);
                    return emit(`[${shown || anchor.linkText || anchorName}](${anchor.target})`);
                }
                return emit(linkOrText(name, shown || name, link));
            }
        );
    }
}

function linkOrText(name: string, shown: string, link: ReferenceLinker): string {
    const target = name ? link(name) : undefined;
    return target ? `[${shown}](${target})` : shown;
}
