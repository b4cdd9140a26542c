/**
 * @file generic-formatter.ts
 * @module formatters/generic-formatter
 * @created 2026-10-14
 * @license MIT
 *
 * @fileoverview Language-neutral fallback formatting (`name(param: Type): Return`).
 */

import type { ClassElement, FunctionElement, MemberElement, Parameter, ParameterElement } from '../model/types.js';
import { BaseFormatter } from './base-formatter.js';
import type { SignatureWriter } from './types.js';

/**
 * Fallback for languages without a dedicated formatter.
 */
export class GenericFormatter extends BaseFormatter {
    readonly language = 'generic';

    protected formatClass(element: ClassElement, w: SignatureWriter): string {
        let signature = w.text(`${element.keyword} ${element.name}`);
        if (element.bases.length > 0) {
            signature += w.text(' : ') + element.bases.map(base => w.type(base)).join(w.text(', '));
        }
        return signature;
    }

    protected formatFunction(element: FunctionElement, w: SignatureWriter): string {
        let signature = w.text(element.name) + this.parameterList(element.params, w, p => this.param(p, w));
        if (element.returns?.type) signature += w.text(': ') + w.type(element.returns.type);
        return signature;
    }

    protected formatMember(element: MemberElement, w: SignatureWriter): string {
        return this.param({ name: element.name, type: element.type, defaultValue: element.initializer }, w);
    }

    protected formatParameter(element: ParameterElement, w: SignatureWriter): string {
        return this.param({ name: element.name, type: element.type, defaultValue: element.defaultValue }, w);
    }

    private param(param: Parameter, w: SignatureWriter): string {
        let text = w.text(param.name);
        if (param.type) text += (param.name ? w.text(': ') : '') + w.type(param.type);
        if (param.defaultValue) text += w.text(` = ${param.defaultValue}`);
        return text;
    }
}
