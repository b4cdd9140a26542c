/**
 * @file search-entries.test.ts
 * @module tests/unit/search/search-entries
 * @created 2026-10-17
 * @license MIT
 *
 * @fileoverview Unit tests for building search entries from a generation result.
 */

import { FormatterRegistry } from '../../../src/formatters/formatter-registry.js';
import { DocumentPlan } from '../../../src/generator/document-plan.js';
import { GenerationDriver } from '../../../src/generator/generation-driver.js';
import type { GenerationResult } from '../../../src/generator/types.js';
import { ReferenceResolver } from '../../../src/resolver/reference-resolver.js';
import { collectSearchEntries, plainSignature } from '../../../src/search/search-entries.js';
import { buildGraph, mustGet, rec, recordingLogger, scenarioRecords } from '../../setup.js';

describe('collectSearchEntries', () => {
  it('should index every inserted element with its document path', async () => {
    const graph = buildGraph(scenarioRecords());
    const resolver = new ReferenceResolver(graph);
    const formatters = new FormatterRegistry();
    const result = await new GenerationDriver({ graph, resolver, formatters }).generate(
      DocumentPlan.singlePage(graph, resolver),
      { logger: recordingLogger() }
    );

    expect(collectSearchEntries(graph, formatters, result)).toEqual([
      {
        elementId: '1',
        name: 'A',
        qualifiedName: 'A',
        kind: 'class',
        language: 'cpp',
        scope: undefined,
        path: 'index.md#1',
        brief: undefined,
        signature: 'class A',
      },
      {
        elementId: '2',
        name: 'foo',
        qualifiedName: 'A::foo',
        kind: 'function',
        language: 'cpp',
        scope: 'A',
        path: 'index.md#2',
        brief: undefined,
        signature: 'B foo()',
      },
      {
        elementId: '3',
        name: 'B',
        qualifiedName: 'B',
        kind: 'class',
        language: 'cpp',
        scope: undefined,
        path: 'index.md#3',
        brief: undefined,
        signature: 'class B',
      },
    ]);
  });

  it('should leave out the signature of failed elements', () => {
    const graph = buildGraph([rec({ id: 'al', name: 'Broken', kind: 'alias', brief: 'Oops.' })]);
    const result: GenerationResult = {
      documents: [{ id: 'd', title: 'D', fileName: 'd.md', content: '', insertedIds: ['al'] }],
      inserted: 1,
      failed: [{ elementId: 'al', documentId: 'd', reason: 'no target' }],
      unresolvedEntries: [],
      linkedButNotInserted: [],
      duplicateInsertions: [],
      warnings: [],
      elapsedMs: 0,
    };

    const [entry] = collectSearchEntries(graph, new FormatterRegistry(), result);
    expect(entry.signature).toBeUndefined();
    expect(entry.brief).toBe('Oops.');
  });
});

describe('plainSignature', () => {
  it('should write type arguments without escapes', () => {
    const graph = buildGraph([
      rec({
        id: 'v',
        name: 'items',
        kind: 'member',
        type: { name: 'std::vector', args: [{ name: 'Point', suffix: '*' }] },
      }),
    ]);

    expect(plainSignature(mustGet(graph, 'v'), new FormatterRegistry())).toBe('std::vector<Point*> items');
  });
});
