/**
 * @file base-formatter.ts
 * @module formatters/base-formatter
 * @created 2026-10-14
 * @license MIT
 *
 * @fileoverview Abstract base class for signature formatters with shared dispatch.
 */

import type {
    AliasElement,
    ClassElement,
    Element,
    EnumElement,
    EnumValueElement,
    FunctionElement,
    MemberElement,
    NamespaceElement,
    Parameter,
    ParameterElement,
} from '../model/types.js';
import type { SignatureFormatter, SignatureWriter } from './types.js';

/**
 * Abstract base class providing kind dispatch and shared helpers.
 *
 * Subclasses must implement:
 * - formatClass()
 * - formatFunction()
 * - formatMember()
 * - formatParameter()
 *
 * The remaining kinds have language-neutral defaults that subclasses may
 * override.
 *
 * @example
 * ```typescript
 * class RubyFormatter extends BaseFormatter {
 *   readonly language = 'ruby';
 *
 *   protected formatFunction(fn, w) {
 *     return w.text(`def ${fn.name}`) + this.parameterList(fn.params, w, p => w.text(p.name));
 *   }
 *   // ...
 * }
 * ```
 */
export abstract class BaseFormatter implements SignatureFormatter {
    abstract readonly language: string;
    readonly typeArgumentBrackets: readonly [string, string] = ['<', '>'];

    /**
     * Format the signature of any element kind.
     */
    formatSignature(element: Element, writer: SignatureWriter): string {
        switch (element.kind) {
            case 'namespace':
                return this.formatNamespace(element, writer);
            case 'class':
                return this.formatClass(element, writer);
            case 'function':
                return this.formatFunction(element, writer);
            case 'member':
                return this.formatMember(element, writer);
            case 'enum':
                return this.formatEnum(element, writer);
            case 'enum-value':
                return this.formatEnumValue(element, writer);
            case 'alias':
                return this.formatAlias(element, writer);
            case 'parameter':
                return this.formatParameter(element, writer);
        }
    }

    protected formatNamespace(element: NamespaceElement, w: SignatureWriter): string {
        return w.text(`namespace ${element.qualifiedName}`);
    }

    protected formatEnum(element: EnumElement, w: SignatureWriter): string {
        const underlying = element.underlying ? w.text(' : ') + w.type(element.underlying) : '';
        return w.text(`enum ${element.name}`) + underlying;
    }

    protected formatEnumValue(element: EnumValueElement, w: SignatureWriter): string {
        return w.text(element.initializer ? `${element.name} = ${element.initializer}` : element.name);
    }

    protected formatAlias(element: AliasElement, w: SignatureWriter): string {
        if (!element.target) {
            throw new Error(`Alias ${element.qualifiedName} has no target type`);
        }
        return w.text(`${element.name} = `) + w.type(element.target);
    }

    protected abstract formatClass(element: ClassElement, w: SignatureWriter): string;
    protected abstract formatFunction(element: FunctionElement, w: SignatureWriter): string;
    protected abstract formatMember(element: MemberElement, w: SignatureWriter): string;
    protected abstract formatParameter(element: ParameterElement, w: SignatureWriter): string;

    /**
     * Render `(a, b, c)` after checking that every parameter can be shown.
     *
     * @param params - Parameters in declaration order
     * @param w - Signature writer
     * @param render - Renders one parameter
     * @throws Error if a parameter has neither a name nor a type
     */
    protected parameterList(
        params: readonly Parameter[],
        w: SignatureWriter,
        render: (param: Parameter) => string
    ): string {
        params.forEach((param, i) => {
            if (!param.name && !param.type) {
                throw new Error(`Parameter #${i + 1} has neither a name nor a type`);
            }
        });
        return w.text('(') + params.map(render).join(w.text(', ')) + w.text(')');
    }
}
