/**
 * @file cpp-formatter.ts
 * @module formatters/cpp-formatter
 * @created 2026-10-14
 * @license MIT
 *
 * @fileoverview C++ signature formatting.
 */

import type {
    AliasElement,
    ClassElement,
    FunctionElement,
    MemberElement,
    Parameter,
    ParameterElement,
} from '../model/types.js';
import { BaseFormatter } from './base-formatter.js';
import type { SignatureWriter } from './types.js';

/**
 * Formats C++ declarations.
 *
 * @example
 * ```typescript
 * formatter.formatSignature(incrementFn, writer);
 * // 'void increment(int x = 1) const' (with linked types)
 * ```
 */
export class CppFormatter extends BaseFormatter {
    readonly language = 'cpp';

    protected formatClass(element: ClassElement, w: SignatureWriter): string {
        let signature = this.templatePrefix(element.typeParams, w) + w.text(`${element.keyword} ${element.name}`);
        if (element.bases.length > 0) {
            signature += w.text(' : ') + element.bases.map(base => w.type(base)).join(w.text(', '));
        }
        return signature;
    }

    protected formatFunction(element: FunctionElement, w: SignatureWriter): string {
        let signature = this.templatePrefix(element.typeParams, w);
        if (element.isStatic) signature += w.text('static ');
        if (element.returns?.type) signature += w.type(element.returns.type) + w.text(' ');
        signature += w.text(element.name);
        signature += this.parameterList(element.params, w, p => this.param(p, w));
        if (element.isConst) signature += w.text(' const');
        return signature;
    }

    protected formatMember(element: MemberElement, w: SignatureWriter): string {
        let signature = element.isStatic ? w.text('static ') : '';
        if (element.type) signature += w.type(element.type) + w.text(' ');
        signature += w.text(element.name);
        if (element.initializer) signature += w.text(` = ${element.initializer}`);
        return signature;
    }

    protected formatParameter(element: ParameterElement, w: SignatureWriter): string {
        return this.param({ name: element.name, type: element.type, defaultValue: element.defaultValue }, w);
    }

    protected formatAlias(element: AliasElement, w: SignatureWriter): string {
        if (!element.target) {
            throw new Error(`Alias ${element.qualifiedName} has no target type`);
        }
        return w.text(`using ${element.name} = `) + w.type(element.target);
    }

    private templatePrefix(typeParams: readonly Parameter[], w: SignatureWriter): string {
        if (typeParams.length === 0) return '';
        const params = typeParams.map(p => this.param(p, w)).join(w.text(', '));
        return w.text('template <') + params + w.text('> ');
    }

    private param(param: Parameter, w: SignatureWriter): string {
        const parts: string[] = [];
        if (param.type) parts.push(w.type(param.type));
        if (param.name) parts.push(w.text(param.name));
        let text = parts.join(w.text(' '));
        if (param.defaultValue) text += w.text(` = ${param.defaultValue}`);
        return text;
    }
}
