/**
 * @file setup.ts
 * @module tests/setup
 * @created 2026-10-17
 * @license MIT
 *
 * @fileoverview Shared fixtures and builders for tests.
 */

import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { resolve, dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { FormatterRegistry } from '../src/formatters/formatter-registry.js';
import { ElementRenderer } from '../src/generator/element-renderer.js';
import type { DocumentPlan } from '../src/generator/document-plan.js';
import { InsertionTracker } from '../src/generator/insertion-tracker.js';
import type { GenerationLogger } from '../src/generator/types.js';
import { ElementGraph } from '../src/model/element-graph.js';
import type { Element, ElementRecord } from '../src/model/types.js';
import { ReferenceResolver } from '../src/resolver/reference-resolver.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const FIXTURES_DIR = resolve(__dirname, 'fixtures');
export const GEOMETRY_FIXTURE = resolve(FIXTURES_DIR, 'geometry.json');
export const GEOMETRY_DOCUMENTS = resolve(FIXTURES_DIR, 'geometry-documents.json');

/**
 * Create an empty directory under the system temp dir.
 */
export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `apiref2md-${prefix}-`));
}

/**
 * Element record with the language defaulting to C++.
 */
export function rec(record: Omit<ElementRecord, 'language'> & { language?: string }): ElementRecord {
  return { ...record, language: record.language ?? 'cpp' };
}

/**
 * Class A (1) with method A.foo (2) returning B (3), plus an unrelated B.
 */
export function scenarioRecords(): ElementRecord[] {
  return [
    rec({ id: '1', name: 'A', kind: 'class', children: ['2'] }),
    rec({ id: '2', name: 'foo', qualifiedName: 'A::foo', kind: 'function', returns: { type: { name: 'B' } } }),
    rec({ id: '3', name: 'B', kind: 'class' }),
  ];
}

export function buildGraph(records: ElementRecord[]): ElementGraph {
  return new ElementGraph(records);
}

export function mustGet(graph: ElementGraph, id: string): Element {
  const element = graph.lookupById(id);
  if (!element) throw new Error(`No element ${id} in test graph`);
  return element;
}

/**
 * Renderer with a fresh tracker over the given records.
 */
export function makeRenderer(records: ElementRecord[], plan?: (graph: ElementGraph, resolver: ReferenceResolver) => DocumentPlan) {
  const graph = buildGraph(records);
  const resolver = new ReferenceResolver(graph);
  const tracker = new InsertionTracker();
  const renderer = new ElementRenderer({
    graph,
    resolver,
    tracker,
    formatters: new FormatterRegistry(),
    plan: plan?.(graph, resolver),
  });
  return { graph, resolver, tracker, renderer };
}

/**
 * Logger that records messages instead of printing them.
 */
export function recordingLogger(): GenerationLogger & { warnings: string[]; errors: string[] } {
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    warnings,
    errors,
    log: () => undefined,
    warn: (message: string) => warnings.push(message),
    error: (message: string) => errors.push(message),
  };
}
