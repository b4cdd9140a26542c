/**
 * @file search-index.test.ts
 * @module tests/unit/search/search-index
 * @created 2026-10-17
 * @license MIT
 *
 * @fileoverview Unit tests for SearchIndexWriter and SearchIndexReader.
 */

import { existsSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { SearchIndexWriter } from '../../../src/search/search-index-writer.js';
import { SearchIndexReader, escapeForFts5 } from '../../../src/search/search-index-reader.js';
import type { SearchEntry } from '../../../src/search/types.js';
import { makeTempDir } from '../../setup.js';

const ENTRIES: SearchEntry[] = [
  {
    elementId: '2',
    name: 'Point',
    qualifiedName: 'geo::Point',
    kind: 'class',
    language: 'cpp',
    scope: 'geo',
    path: 'points.md#2',
    brief: 'A point in the plane.',
    signature: 'struct Point',
  },
  {
    elementId: '4',
    name: 'distanceTo',
    qualifiedName: 'geo::Point::distanceTo',
    kind: 'function',
    language: 'cpp',
    scope: 'geo::Point',
    path: 'points.md#4',
    signature: 'double distanceTo(const Point& other) const',
  },
  {
    elementId: 'p1',
    name: 'Pointer',
    qualifiedName: 'Pointer',
    kind: 'class',
    language: 'java',
    path: 'pointer.md#p1',
  },
];

describe('SearchIndexWriter', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('search');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write every entry and leave a single database file', () => {
    const dbPath = join(dir, 'search.db');
    const writer = new SearchIndexWriter(dbPath, 2);
    for (const entry of ENTRIES) writer.addEntry(entry);
    expect(writer.getEntryCount()).toBe(3);
    writer.close();

    expect(existsSync(`${dbPath}-wal`)).toBe(false);
    const db = new Database(dbPath, { readonly: true });
    try {
      const row: unknown = db.prepare('SELECT COUNT(*) AS count FROM entries').get();
      expect(row).toEqual({ count: 3 });
    } finally {
      db.close();
    }
  });

  it('should close an empty index', () => {
    const writer = new SearchIndexWriter(join(dir, 'empty.db'));
    writer.close();

    const reader = new SearchIndexReader(join(dir, 'empty.db'));
    expect(reader.search('Point')).toEqual([]);
    reader.close();
  });
});

describe('SearchIndexReader', () => {
  let dir: string;
  let reader: SearchIndexReader;

  beforeAll(() => {
    dir = makeTempDir('search-read');
    const writer = new SearchIndexWriter(join(dir, 'search.db'));
    for (const entry of ENTRIES) writer.addEntry(entry);
    writer.close();
    reader = new SearchIndexReader(join(dir, 'search.db'));
  });

  afterAll(() => {
    reader.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should rank name matches first', () => {
    const results = reader.search('Point');
    expect(results[0]).toMatchObject({
      elementId: '2',
      qualifiedName: 'geo::Point',
      scope: 'geo',
      path: 'points.md#2',
      brief: 'A point in the plane.',
    });
    expect(results.map(r => r.elementId)).not.toContain('p1');
  });

  it('should support prefix queries', () => {
    expect(reader.search('Poi*').map(r => r.elementId).sort()).toEqual(['2', '4', 'p1']);
  });

  it('should filter by kind and language', () => {
    expect(reader.search('Poi*', { kind: 'function' }).map(r => r.elementId)).toEqual(['4']);
    expect(reader.search('Poi*', { language: 'java' }).map(r => r.elementId)).toEqual(['p1']);
  });

  it('should map missing optional columns to undefined', () => {
    const [pointer] = reader.search('Pointer');
    expect(pointer.scope).toBeUndefined();
    expect(pointer.brief).toBeUndefined();
    expect(pointer.signature).toBeUndefined();
  });

  it('should count entries by kind', () => {
    expect([...reader.countByKind()]).toEqual([
      ['class', 2],
      ['function', 1],
    ]);
  });

  it('should return nothing for a blank query', () => {
    expect(reader.search('   ')).toEqual([]);
  });
});

describe('escapeForFts5', () => {
  it('should quote terms and keep prefix wildcards', () => {
    expect(escapeForFts5('geo::Point dist*')).toBe('"geo::Point" "dist"*');
  });

  it('should keep phrases and drop lone wildcards', () => {
    expect(escapeForFts5('"unit circle" *')).toBe('"unit circle"');
  });
});
