/**
 * @file sanitize.ts
 * @module shared/utils/sanitize
 * @created 2026-10-13
 * @license MIT
 *
 * @fileoverview Filename, anchor and Markdown text sanitization.
 */

/**
 * Sanitizes a document id for safe use as a filename.
 *
 * Handles:
 * - Scope separators: `geo::Point` → `geo_point`
 * - Invalid characters: `<>:"/\|?*` → `_`
 * - Whitespace collapsing
 * - Length truncation (max 100 chars)
 * - Case normalization (lowercase)
 *
 * @param name - Raw name to sanitize
 * @returns Safe filename string without extension
 */
export function sanitizeFileName(name: string): string {
    let sanitized = name
        .replace(/::/g, '_')
        .replace(/[<>:"/\\|?*]/g, '_')
        .replace(/\s+/g, '_')
        .replace(/__+/g, '_')
        .replace(/^_+|_+$/g, '');

    // Truncate very long names
    if (sanitized.length > 100) {
        sanitized = sanitized.substring(0, 100);
    }

    if (!sanitized) {
        sanitized = 'unnamed';
    }

    return sanitized.toLowerCase();
}

/**
 * Encode an element id for the fragment part of a link.
 *
 * @example
 * linkFragment('classgeo_1_1Point') // 'classgeo_1_1Point'
 * linkFragment('a b')               // 'a%20b'
 */
export function linkFragment(elementId: string): string {
    return encodeURIComponent(elementId);
}

/**
 * Escape a value for an HTML attribute (used for `<a id="...">` anchors).
 */
export function escapeAttribute(value: string): string {
    return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Escape text placed in a Markdown table cell.
 * Pipes would split the cell and newlines would end the row.
 */
export function escapeTableCell(text: string): string {
    return text.replace(/\|/g, '\\|').replace(/\r?\n+/g, ' ').trim();
}

/**
 * Escape characters that Markdown would read as markup in inline text.
 *
 * Underscores are left alone: they only start emphasis at word
 * boundaries, and identifiers are full of them.
 *
 * @example
 * escapeMarkdown('template <typename T>') // 'template \\<typename T\\>'
 */
export function escapeMarkdown(text: string): string {
    return text.replace(/[\\`*[\]<>]/g, '\\$&');
}
