/**
 * @file config.ts
 * @module shared/config
 * @created 2026-10-16
 * @license MIT
 *
 * @fileoverview Loads document-set files that describe which documents to generate.
 */

import { readFileSync } from 'node:fs';
import { ConfigError } from '../model/errors.js';
import type { DocumentAnchor, DocumentSpec } from '../generator/document-plan.js';
import type { InsertionFilterSpec } from '../generator/insertion-filter.js';

/**
 * Read a document-set file.
 *
 * The file holds either an array of documents or `{ "documents": [...] }`:
 *
 * ```json
 * {
 *   "documents": [
 *     { "id": "geometry", "title": "Geometry", "namespace": "geo", "insert": ["Point", "Shape"],
 *       "filter": { "prot": ["+public"], "name": "-detail_" },
 *       "anchors": [{ "name": "units", "text": "Units of measure" }] }
 *   ]
 * }
 * ```
 *
 * @param filePath - Path to the JSON file
 * @returns Document specs in file order
 * @throws ConfigError if the file cannot be read or is malformed
 */
export function loadDocumentSpecs(filePath: string): DocumentSpec[] {
    let text: string;
    try {
        text = readFileSync(filePath, 'utf-8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Cannot read document set ${filePath}: ${reason}`);
    }

    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Document set ${filePath} is not valid JSON: ${reason}`);
    }
    return parseDocumentSpecs(data);
}

/**
 * Validate parsed document-set JSON.
 *
 * @throws ConfigError naming the first invalid field
 */
export function parseDocumentSpecs(data: unknown): DocumentSpec[] {
    const list: unknown = isObject(data) ? data.documents : data;
    if (!Array.isArray(list)) {
        throw new ConfigError('Document set must be an array or an object with a "documents" array');
    }
    if (list.length === 0) {
        throw new ConfigError('Document set contains no documents');
    }
    return list.map((entry: unknown, index: number) => parseDocument(entry, `documents[${index}]`));
}

function parseDocument(entry: unknown, where: string): DocumentSpec {
    if (!isObject(entry)) {
        throw new ConfigError(`${where} must be an object`);
    }

    const id = entry.id;
    if (typeof id !== 'string' || id.trim() === '') {
        throw new ConfigError(`${where}.id must be a non-empty string`);
    }

    const spec: DocumentSpec = {
        id,
        title: optionalString(entry.title, `${where}.title`),
        language: optionalString(entry.language, `${where}.language`),
        namespace: optionalString(entry.namespace, `${where}.namespace`),
        insert: stringList(entry.insert, `${where}.insert`) ?? [],
        insertIds: stringList(entry.insertIds, `${where}.insertIds`),
    };
    if (spec.insert.length === 0 && (spec.insertIds ?? []).length === 0) {
        throw new ConfigError(`${where} inserts nothing: give "insert" or "insertIds"`);
    }

    if (entry.filter !== undefined) {
        spec.filter = parseFilter(entry.filter, `${where}.filter`);
    }
    if (entry.anchors !== undefined) {
        spec.anchors = parseAnchors(entry.anchors, `${where}.anchors`);
    }
    return spec;
}

function parseAnchors(value: unknown, where: string): DocumentAnchor[] {
    if (!Array.isArray(value)) {
        throw new ConfigError(`${where} must be an array`);
    }
    return value.map((item: unknown, index: number) => {
        // A bare string names an anchor without link text
        if (typeof item === 'string' && item.trim() !== '') return { name: item };
        if (!isObject(item) || typeof item.name !== 'string' || item.name.trim() === '') {
            throw new ConfigError(`${where}[${index}] must be a name or an object with a non-empty "name"`);
        }
        const text = optionalString(item.text, `${where}[${index}].text`);
        return text === undefined ? { name: item.name } : { name: item.name, text };
    });
}

function parseFilter(value: unknown, where: string): InsertionFilterSpec {
    if (!isObject(value)) {
        throw new ConfigError(`${where} must be an object`);
    }
    for (const key of Object.keys(value)) {
        if (key !== 'name' && key !== 'kind' && key !== 'prot') {
            throw new ConfigError(`${where}.${key} is not a filter field (expected name, kind or prot)`);
        }
    }
    return {
        name: patterns(value.name, `${where}.name`),
        kind: patterns(value.kind, `${where}.kind`),
        prot: patterns(value.prot, `${where}.prot`),
    };
}

function patterns(value: unknown, where: string): string | string[] | undefined {
    if (typeof value === 'string') return value;
    return stringList(value, where);
}

function stringList(value: unknown, where: string): string[] | undefined {
    if (value === undefined) return undefined;
    if (!Array.isArray(value)) {
        throw new ConfigError(`${where} must be an array of strings`);
    }
    return value.map((item: unknown, index: number) => {
        if (typeof item !== 'string') {
            throw new ConfigError(`${where}[${index}] must be a string`);
        }
        return item;
    });
}

function optionalString(value: unknown, where: string): string | undefined {
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
        throw new ConfigError(`${where} must be a string`);
    }
    return value;
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
