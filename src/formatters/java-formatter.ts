/**
 * @file java-formatter.ts
 * @module formatters/java-formatter
 * @created 2026-10-14
 * @license MIT
 *
 * @fileoverview Java signature formatting.
 */

import type {
    ClassElement,
    FunctionElement,
    MemberElement,
    NamespaceElement,
    Parameter,
    ParameterElement,
} from '../model/types.js';
import { BaseFormatter } from './base-formatter.js';
import type { SignatureWriter } from './types.js';

/**
 * Formats Java declarations, including `throws` clauses.
 */
export class JavaFormatter extends BaseFormatter {
    readonly language = 'java';

    protected formatNamespace(element: NamespaceElement, w: SignatureWriter): string {
        return w.text(`package ${element.qualifiedName}`);
    }

    protected formatClass(element: ClassElement, w: SignatureWriter): string {
        let signature = w.text(`${element.keyword} ${element.name}`) + this.generics(element.typeParams, w);
        if (element.bases.length > 0) {
            signature += w.text(' extends ') + element.bases.map(base => w.type(base)).join(w.text(', '));
        }
        return signature;
    }

    protected formatFunction(element: FunctionElement, w: SignatureWriter): string {
        let signature = element.isStatic ? w.text('static ') : '';
        if (element.typeParams.length > 0) {
            signature += this.generics(element.typeParams, w) + w.text(' ');
        }
        if (element.returns?.type) signature += w.type(element.returns.type) + w.text(' ');
        signature += w.text(element.name);
        signature += this.parameterList(element.params, w, p => this.param(p, w));
        if (element.throws.length > 0) {
            signature += w.text(' throws ') + element.throws.map(t => w.type(t.type)).join(w.text(', '));
        }
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
        return this.param({ name: element.name, type: element.type }, w);
    }

    private generics(typeParams: readonly Parameter[], w: SignatureWriter): string {
        if (typeParams.length === 0) return '';
        return w.text('<') + typeParams.map(p => w.text(p.name)).join(w.text(', ')) + w.text('>');
    }

    private param(param: Parameter, w: SignatureWriter): string {
        if (!param.type) return w.text(param.name);
        return param.name ? w.type(param.type) + w.text(` ${param.name}`) : w.type(param.type);
    }
}
