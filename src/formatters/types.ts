/**
 * @file types.ts
 * @module formatters/types
 * @created 2026-10-14
 * @license MIT
 *
 * @fileoverview Interfaces between the renderer and the per-language signature formatters.
 */

import type { Element, TypeRef } from '../model/types.js';

/**
 * Markdown building blocks handed to a formatter by the renderer.
 *
 * Formatters never produce Markdown markup themselves: literal code goes
 * through `text`, type uses through `type`, which resolves and links them.
 */
export interface SignatureWriter {
    /** Escape literal signature text */
    text(raw: string): string;
    /** Render a type use, linked when it resolves */
    type(ref: TypeRef): string;
}

/**
 * Pretty-prints element signatures for one language.
 */
export interface SignatureFormatter {
    /** Language tag this formatter handles (e.g., "cpp") */
    readonly language: string;
    /** Brackets around template/generic arguments */
    readonly typeArgumentBrackets: readonly [string, string];
    /**
     * Format the signature of an element.
     * @throws Error when the element cannot be formatted
     */
    formatSignature(element: Element, writer: SignatureWriter): string;
}
