/**
 * @file formatter-registry.ts
 * @module formatters/formatter-registry
 * @created 2026-10-14
 * @license MIT
 *
 * @fileoverview Maps language tags to signature formatters.
 */

import { CppFormatter } from './cpp-formatter.js';
import { GenericFormatter } from './generic-formatter.js';
import { JavaFormatter } from './java-formatter.js';
import { PythonFormatter } from './python-formatter.js';
import type { SignatureFormatter } from './types.js';

/**
 * Alternative spellings of the built-in language tags.
 */
const LANGUAGE_ALIASES: Record<string, string> = {
    'c++': 'cpp',
    cxx: 'cpp',
    c: 'cpp',
    py: 'python',
    kotlin: 'java',
};

/**
 * Registry of signature formatters by language.
 *
 * Languages without a registered formatter fall back to the
 * {@link GenericFormatter}.
 *
 * @example
 * ```typescript
 * const registry = new FormatterRegistry();
 * registry.register(new MyRubyFormatter());
 * const formatter = registry.forLanguage('cpp');
 * ```
 */
export class FormatterRegistry {
    private formatters: Map<string, SignatureFormatter> = new Map();
    private fallback: SignatureFormatter = new GenericFormatter();

    /**
     * Create a registry with the built-in formatters.
     */
    constructor() {
        for (const formatter of [new CppFormatter(), new JavaFormatter(), new PythonFormatter()]) {
            this.register(formatter);
        }
    }

    /**
     * Add or replace the formatter for its language.
     */
    register(formatter: SignatureFormatter): void {
        this.formatters.set(formatter.language, formatter);
    }

    /**
     * Get the formatter for a language tag, or the generic fallback.
     */
    forLanguage(language: string): SignatureFormatter {
        const tag = language.toLowerCase();
        return this.formatters.get(tag) ?? this.formatters.get(LANGUAGE_ALIASES[tag] ?? '') ?? this.fallback;
    }

    /**
     * Languages with a dedicated formatter.
     */
    getLanguages(): string[] {
        return [...this.formatters.keys()];
    }
}
