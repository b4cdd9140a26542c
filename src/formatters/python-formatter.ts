/**
 * @file python-formatter.ts
 * @module formatters/python-formatter
 * @created 2026-10-14
 * @license MIT
 *
 * @fileoverview Python signature formatting with type hints.
 */

import type {
    ClassElement,
    EnumElement,
    FunctionElement,
    MemberElement,
    NamespaceElement,
    Parameter,
    ParameterElement,
} from '../model/types.js';
import { BaseFormatter } from './base-formatter.js';
import type { SignatureWriter } from './types.js';

export class PythonFormatter extends BaseFormatter {
    readonly language = 'python';
    readonly typeArgumentBrackets: readonly [string, string] = ['[', ']'];

    protected formatNamespace(element: NamespaceElement, w: SignatureWriter): string {
        return w.text(`module ${element.qualifiedName}`);
    }

    protected formatClass(element: ClassElement, w: SignatureWriter): string {
        const bases = element.bases.length > 0
            ? w.text('(') + element.bases.map(base => w.type(base)).join(w.text(', ')) + w.text(')')
            : '';
        return w.text(`class ${element.name}`) + bases;
    }

    protected formatEnum(element: EnumElement, w: SignatureWriter): string {
        return w.text(`class ${element.name}(Enum)`);
    }

    protected formatFunction(element: FunctionElement, w: SignatureWriter): string {
        let signature = w.text(`def ${element.name}`);
        signature += this.parameterList(element.params, w, p => this.param(p, w));
        if (element.returns?.type) signature += w.text(' -> ') + w.type(element.returns.type);
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
        if (param.type) text += w.text(': ') + w.type(param.type);
        if (param.defaultValue) text += w.text(` = ${param.defaultValue}`);
        return text;
    }
}
