/**
 * @file pipeline.test.ts
 * @module tests/integration/pipeline
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview End-to-end tests: extractor JSON in, validated Markdown directory out.
 */

import { existsSync, readFileSync, readdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { runPipeline, SEARCH_INDEX_FILE_NAME, type PipelineOptions } from '../../src/pipeline.js';
import { ConsistencyError } from '../../src/model/errors.js';
import { SearchIndexReader } from '../../src/search/search-index-reader.js';
import { INDEX_FILE_NAME } from '../../src/shared/file-writer.js';
import { GEOMETRY_DOCUMENTS, GEOMETRY_FIXTURE, makeTempDir, recordingLogger } from '../setup.js';

describe('Pipeline', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = makeTempDir('pipeline');
  });

  afterEach(() => {
    rmSync(outputDir, { recursive: true, force: true });
  });

  const run = (options: Partial<PipelineOptions> = {}) =>
    runPipeline({ input: GEOMETRY_FIXTURE, outputDir, validate: true, logger: recordingLogger(), ...options });

  const read = (file: string) => readFileSync(join(outputDir, file), 'utf-8');

  describe('single page', () => {
    it('should write one document and the index page', async () => {
      const result = await run({ title: 'Geometry' });

      expect(readdirSync(outputDir).sort()).toEqual([INDEX_FILE_NAME, 'index.md']);
      expect(read('index.md').startsWith('# Geometry\n\n<a id="1"></a>\n## geo\n\n**Kind**: Namespace')).toBe(true);
      expect(read(INDEX_FILE_NAME)).toBe('# Geometry\n\n- [Geometry](index.md) (14 elements)\n');
      expect(result.generation.warnings).toEqual([]);
      expect(result.validation?.brokenLinks).toEqual([]);
    });

    it('should leave private members out by default', async () => {
      await run();

      expect(read('index.md')).toContain('<a id="7"></a>');
      expect(read('index.md')).not.toContain('<a id="8"></a>');
    });
  });

  describe('multipage', () => {
    it('should write one document per root with valid cross links', async () => {
      const result = await run({ multipage: true });

      expect(result.generation.documents.map(doc => doc.fileName)).toEqual(['geo.md', 'draw.md']);
      expect(existsSync(join(outputDir, 'draw.md'))).toBe(true);
      expect(result.validation?.brokenLinks).toEqual([]);
    });
  });

  describe('document set', () => {
    it('should place each element with its owner and link across documents', async () => {
      const result = await run({ documents: GEOMETRY_DOCUMENTS });

      expect(result.generation.documents.map(doc => doc.fileName)).toEqual(['shapes.md', 'points.md', 'misc.md']);
      expect(read('shapes.md')).toContain('Every shape has an origin, see [Point](points.md#2).');
      expect(read('shapes.md')).not.toContain('<a id="2"></a>');
      expect(read('points.md')).toContain('<a id="2"></a>\n## geo::Point');
      expect(result.generation.warnings).toEqual(['Document "misc" inserts "geo::Missing", which matches no element']);
      expect(result.validation?.brokenLinks).toEqual([]);
    });

    it('should write nothing when warnings are errors', async () => {
      await expect(run({ documents: GEOMETRY_DOCUMENTS, warningsAreErrors: true })).rejects.toThrow(ConsistencyError);
      expect(readdirSync(outputDir)).toEqual([]);
    });
  });

  describe('search index', () => {
    it('should index inserted elements with their document paths', async () => {
      const result = await run({ documents: GEOMETRY_DOCUMENTS, index: true });
      expect(result.indexEntries).toBe(result.generation.inserted);

      const reader = new SearchIndexReader(join(outputDir, SEARCH_INDEX_FILE_NAME));
      try {
        const [hit] = reader.search('distanceTo');
        expect(hit).toMatchObject({ elementId: '4', path: 'points.md#4', scope: 'geo::Point' });
      } finally {
        reader.close();
      }
    });
  });

  describe('determinism', () => {
    it('should produce identical output across runs and concurrency levels', async () => {
      const first = await run({ documents: GEOMETRY_DOCUMENTS, concurrency: 1 });
      const second = await run({ documents: GEOMETRY_DOCUMENTS, concurrency: 8 });

      expect(second.generation.documents.map(doc => doc.content)).toEqual(
        first.generation.documents.map(doc => doc.content)
      );
    });
  });
});
