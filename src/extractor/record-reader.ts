/**
 * @file record-reader.ts
 * @module extractor/record-reader
 * @created 2026-10-12
 * @license MIT
 *
 * @fileoverview Loads and validates element records produced by the extractor adapter.
 */

import { readFileSync } from 'node:fs';
import { MalformedInputError } from '../model/errors.js';
import {
    ELEMENT_KINDS,
    type ClassKeyword,
    type DocSection,
    type ElementKind,
    type ElementRecord,
    type Parameter,
    type Protection,
    type ReturnValue,
    type ThrowsClause,
    type TypeRef,
} from '../model/types.js';

const PROTECTIONS: readonly Protection[] = ['public', 'protected', 'private'];
const CLASS_KEYWORDS: readonly ClassKeyword[] = ['class', 'struct', 'interface', 'protocol', 'union'];

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isElementKind(value: unknown): value is ElementKind {
    return ELEMENT_KINDS.some(kind => kind === value);
}

function isProtection(value: unknown): value is Protection {
    return PROTECTIONS.some(prot => prot === value);
}

function isClassKeyword(value: unknown): value is ClassKeyword {
    return CLASS_KEYWORDS.some(keyword => keyword === value);
}

/**
 * Read extractor output from a JSON file.
 *
 * @param filePath - Path to the JSON file
 * @returns Validated element records in file order
 * @throws MalformedInputError if the file is not valid JSON or a record is invalid
 */
export function readElementRecords(filePath: string): ElementRecord[] {
    const text = readFileSync(filePath, 'utf-8');
    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new MalformedInputError(`Extractor output ${filePath} is not valid JSON: ${reason}`);
    }
    return parseElementRecords(data);
}

/**
 * Validate parsed extractor output.
 *
 * Accepts either an array of records or an object with an `elements` array.
 */
export function parseElementRecords(data: unknown): ElementRecord[] {
    const list: unknown = Array.isArray(data) ? data : isObject(data) ? data.elements : undefined;
    if (!Array.isArray(list)) {
        throw new MalformedInputError('Extractor output must be an array of elements or { "elements": [...] }');
    }
    return list.map((item: unknown, index: number) => parseRecord(item, index));
}

function parseRecord(item: unknown, index: number): ElementRecord {
    if (!isObject(item)) {
        throw new MalformedInputError(`Record #${index} is not an object`);
    }

    const id = item.id;
    if (typeof id !== 'string' && typeof id !== 'number') {
        throw new MalformedInputError(`Record #${index} has no id`);
    }
    const elementId = String(id);
    if (elementId.length === 0) {
        throw new MalformedInputError(`Record #${index} has an empty id`);
    }

    const field = new FieldReader(item, elementId);
    const kind = item.kind;
    if (!isElementKind(kind)) {
        throw new MalformedInputError(`Unknown element kind "${String(kind)}"`, elementId);
    }
    const prot = item.prot;
    if (prot !== undefined && !isProtection(prot)) {
        throw new MalformedInputError(`Unknown protection "${String(prot)}"`, elementId);
    }
    const keyword = item.keyword;
    if (keyword !== undefined && !isClassKeyword(keyword)) {
        throw new MalformedInputError(`Unknown class keyword "${String(keyword)}"`, elementId);
    }

    return {
        id: elementId,
        name: field.requiredString('name'),
        qualifiedName: field.optionalString('qualifiedName'),
        kind,
        language: field.requiredString('language'),
        brief: field.optionalString('brief'),
        description: field.optionalString('description'),
        sections: field.sections(),
        include: field.optionalString('include'),
        prot,
        children: field.idList('children'),
        keyword,
        bases: field.typeRefList('bases'),
        typeParams: field.parameterList('typeParams'),
        params: field.parameterList('params'),
        returns: field.returnValue(),
        throws: field.throwsList(),
        static: field.optionalBoolean('static'),
        const: field.optionalBoolean('const'),
        type: field.optionalTypeRef('type'),
        initializer: field.optionalString('initializer'),
        underlying: field.optionalTypeRef('underlying'),
        target: field.optionalTypeRef('target'),
        defaultValue: field.optionalString('defaultValue'),
    };
}

/**
 * Typed accessors over one raw record, reporting errors against its id.
 */
class FieldReader {
    constructor(
        private readonly item: JsonObject,
        private readonly elementId: string
    ) {}

    requiredString(key: string): string {
        const value = this.item[key];
        if (typeof value !== 'string' || value.length === 0) {
            throw new MalformedInputError(`Missing or invalid "${key}"`, this.elementId);
        }
        return value;
    }

    optionalString(key: string): string | undefined {
        const value = this.item[key];
        if (value === undefined || value === null) return undefined;
        if (typeof value !== 'string') {
            throw new MalformedInputError(`"${key}" must be a string`, this.elementId);
        }
        return value;
    }

    optionalBoolean(key: string): boolean | undefined {
        const value = this.item[key];
        if (value === undefined || value === null) return undefined;
        if (typeof value !== 'boolean') {
            throw new MalformedInputError(`"${key}" must be a boolean`, this.elementId);
        }
        return value;
    }

    idList(key: string): string[] | undefined {
        const value = this.item[key];
        if (value === undefined || value === null) return undefined;
        if (!Array.isArray(value)) {
            throw new MalformedInputError(`"${key}" must be an array of ids`, this.elementId);
        }
        return value.map((id: unknown) => {
            if (typeof id !== 'string' && typeof id !== 'number') {
                throw new MalformedInputError(`"${key}" contains an invalid id`, this.elementId);
            }
            return String(id);
        });
    }

    sections(): DocSection[] | undefined {
        const value = this.item.sections;
        if (value === undefined || value === null) return undefined;

        if (Array.isArray(value)) {
            return value.map((section: unknown) => {
                if (!isObject(section) || typeof section.title !== 'string' || typeof section.text !== 'string') {
                    throw new MalformedInputError('Sections must have a title and a text', this.elementId);
                }
                return { title: section.title, text: section.text };
            });
        }
        if (isObject(value)) {
            return Object.entries(value).map(([title, text]) => {
                if (typeof text !== 'string') {
                    throw new MalformedInputError(`Section "${title}" must be a string`, this.elementId);
                }
                return { title, text };
            });
        }
        throw new MalformedInputError('"sections" must be an array or an object', this.elementId);
    }

    optionalTypeRef(key: string): TypeRef | undefined {
        return this.toTypeRef(this.item[key], key);
    }

    typeRefList(key: string): TypeRef[] | undefined {
        const value = this.item[key];
        if (value === undefined || value === null) return undefined;
        if (!Array.isArray(value)) {
            throw new MalformedInputError(`"${key}" must be an array`, this.elementId);
        }
        return value.map((entry: unknown) => this.requireTypeRef(entry, key));
    }

    parameterList(key: string): Parameter[] | undefined {
        const value = this.item[key];
        if (value === undefined || value === null) return undefined;
        if (!Array.isArray(value)) {
            throw new MalformedInputError(`"${key}" must be an array`, this.elementId);
        }
        return value.map((entry: unknown) => {
            if (!isObject(entry)) {
                throw new MalformedInputError(`"${key}" entries must be objects`, this.elementId);
            }
            const name = entry.name;
            if (name !== undefined && typeof name !== 'string') {
                throw new MalformedInputError(`"${key}" entry name must be a string`, this.elementId);
            }
            return {
                name: name ?? '',
                type: this.toTypeRef(entry.type, `${key}.type`),
                description: this.stringOf(entry.description, `${key}.description`),
                defaultValue: this.stringOf(entry.defaultValue, `${key}.defaultValue`),
            };
        });
    }

    returnValue(): ReturnValue | undefined {
        const value = this.item.returns;
        if (value === undefined || value === null) return undefined;
        if (typeof value === 'string') {
            return { type: { name: value } };
        }
        if (!isObject(value)) {
            throw new MalformedInputError('"returns" must be an object', this.elementId);
        }
        return {
            type: this.toTypeRef(value.type, 'returns.type'),
            description: this.stringOf(value.description, 'returns.description'),
        };
    }

    throwsList(): ThrowsClause[] | undefined {
        const value = this.item.throws;
        if (value === undefined || value === null) return undefined;
        if (!Array.isArray(value)) {
            throw new MalformedInputError('"throws" must be an array', this.elementId);
        }
        return value.map((entry: unknown) => {
            if (typeof entry === 'string') {
                return { type: { name: entry } };
            }
            if (!isObject(entry)) {
                throw new MalformedInputError('"throws" entries must be objects', this.elementId);
            }
            return {
                type: this.requireTypeRef(entry.type, 'throws.type'),
                description: this.stringOf(entry.description, 'throws.description'),
            };
        });
    }

    private stringOf(value: unknown, key: string): string | undefined {
        if (value === undefined || value === null) return undefined;
        if (typeof value !== 'string') {
            throw new MalformedInputError(`"${key}" must be a string`, this.elementId);
        }
        return value;
    }

    private requireTypeRef(value: unknown, key: string): TypeRef {
        const ref = this.toTypeRef(value, key);
        if (!ref) {
            throw new MalformedInputError(`"${key}" must name a type`, this.elementId);
        }
        return ref;
    }

    private toTypeRef(value: unknown, key: string): TypeRef | undefined {
        if (value === undefined || value === null) return undefined;
        if (typeof value === 'string') {
            return { name: value };
        }
        if (!isObject(value) || typeof value.name !== 'string') {
            throw new MalformedInputError(`"${key}" must be a type name or { name }`, this.elementId);
        }
        const args = value.args;
        if (args !== undefined && !Array.isArray(args)) {
            throw new MalformedInputError(`"${key}.args" must be an array`, this.elementId);
        }
        return {
            name: value.name,
            prefix: this.stringOf(value.prefix, `${key}.prefix`),
            suffix: this.stringOf(value.suffix, `${key}.suffix`),
            args: args?.map((arg: unknown) => this.requireTypeRef(arg, `${key}.args`)),
        };
    }
}
