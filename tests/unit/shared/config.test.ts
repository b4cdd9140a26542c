/**
 * @file config.test.ts
 * @module tests/unit/shared/config
 * @created 2026-10-17
 * @license MIT
 *
 * @fileoverview Unit tests for document-set loading.
 */

import { writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { loadDocumentSpecs, parseDocumentSpecs } from '../../../src/shared/config.js';
import { ConfigError } from '../../../src/model/errors.js';
import { GEOMETRY_DOCUMENTS, makeTempDir } from '../../setup.js';

describe('parseDocumentSpecs', () => {
  it('should accept a bare array', () => {
    expect(parseDocumentSpecs([{ id: 'a', insert: ['A'] }])).toEqual([
      { id: 'a', title: undefined, language: undefined, insert: ['A'], insertIds: undefined },
    ]);
  });

  it('should accept a documents object with filters', () => {
    const specs = parseDocumentSpecs({
      documents: [{ id: 'a', title: 'Alpha', insertIds: ['1'], filter: { prot: '+public', kind: ['-enum'] } }],
    });
    expect(specs[0].insert).toEqual([]);
    expect(specs[0].insertIds).toEqual(['1']);
    expect(specs[0].filter).toEqual({ name: undefined, kind: ['-enum'], prot: '+public' });
  });

  it('should reject an empty document list', () => {
    expect(() => parseDocumentSpecs([])).toThrow('Document set contains no documents');
  });

  it('should reject a document without id', () => {
    expect(() => parseDocumentSpecs([{ insert: ['A'] }])).toThrow('documents[0].id must be a non-empty string');
  });

  it('should reject a document that inserts nothing', () => {
    expect(() => parseDocumentSpecs([{ id: 'a' }])).toThrow(ConfigError);
  });

  it('should reject unknown filter fields', () => {
    expect(() => parseDocumentSpecs([{ id: 'a', insert: ['A'], filter: { size: 'x' } }])).toThrow(
      'documents[0].filter.size is not a filter field (expected name, kind or prot)'
    );
  });

  it('should read the namespace and named anchors', () => {
    const [spec] = parseDocumentSpecs([
      { id: 'geometry', namespace: 'geo', insert: ['Point'], anchors: ['overview', { name: 'units', text: 'Units of measure' }] },
    ]);
    expect(spec.namespace).toBe('geo');
    expect(spec.anchors).toEqual([{ name: 'overview' }, { name: 'units', text: 'Units of measure' }]);
  });

  it('should reject malformed anchors', () => {
    expect(() => parseDocumentSpecs([{ id: 'a', insert: ['A'], anchors: 'units' }])).toThrow(
      'documents[0].anchors must be an array'
    );
    expect(() => parseDocumentSpecs([{ id: 'a', insert: ['A'], anchors: ['units', { text: 'Units' }] }])).toThrow(
      'documents[0].anchors[1] must be a name or an object with a non-empty "name"'
    );
  });

  it('should reject non-string list items', () => {
    expect(() => parseDocumentSpecs([{ id: 'a', insert: ['A', 2] }])).toThrow('documents[0].insert[1] must be a string');
  });
});

describe('loadDocumentSpecs', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('config');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load the fixture document set', () => {
    expect(loadDocumentSpecs(GEOMETRY_DOCUMENTS).map(spec => spec.id)).toEqual(['shapes', 'points', 'misc']);
  });

  it('should report invalid JSON as ConfigError', () => {
    const file = join(dir, 'bad.json');
    writeFileSync(file, '{ nope');
    expect(() => loadDocumentSpecs(file)).toThrow(ConfigError);
  });

  it('should report a missing file as ConfigError', () => {
    expect(() => loadDocumentSpecs(join(dir, 'missing.json'))).toThrow(ConfigError);
  });
});
