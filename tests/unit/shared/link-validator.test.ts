/**
 * @file link-validator.test.ts
 * @module tests/unit/shared/link-validator
 * @created 2026-10-17
 * @license MIT
 *
 * @fileoverview Unit tests for link and anchor validation.
 */

import { writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { extractAnchors, extractLinks, validateLinks } from '../../../src/shared/link-validator.js';
import { makeTempDir } from '../../setup.js';

describe('extractLinks', () => {
  it('should read escaped link text', () => {
    expect(extractLinks('see [Box\\<T\\>](box.md#7) and [web](https://example.com)')).toEqual([
      { text: 'Box\\<T\\>', path: 'box.md#7' },
      { text: 'web', path: 'https://example.com' },
    ]);
  });
});

describe('extractAnchors', () => {
  it('should unescape anchor ids', () => {
    expect([...extractAnchors('<a id="a&amp;b"></a>\n<a id="2"></a>')]).toEqual(['a&b', '2']);
  });
});

describe('validateLinks', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('links');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should accept links to existing files and anchors', () => {
    writeFileSync(join(dir, 'a.md'), '<a id="1"></a>\n[self](#1) [b](b.md) [b two](b.md#2) [ext](https://example.com)\n');
    writeFileSync(join(dir, 'b.md'), '<a id="2"></a>\n');

    const result = validateLinks(dir);
    expect(result.filesScanned).toBe(2);
    expect(result.totalLinks).toBe(3);
    expect(result.validLinks).toBe(3);
    expect(result.brokenLinks).toEqual([]);
  });

  it('should report missing files and anchors', () => {
    writeFileSync(join(dir, 'a.md'), '[gone](c.md) [lost](#9) [far](/abs.md)\n');

    const result = validateLinks(dir);
    expect(result.brokenLinks).toEqual([
      { sourceFile: 'a.md', linkText: 'gone', linkPath: 'c.md', reason: 'missing-file' },
      { sourceFile: 'a.md', linkText: 'lost', linkPath: '#9', reason: 'missing-anchor' },
    ]);
    expect(result.absoluteLinks).toEqual([{ file: 'a.md', link: '/abs.md' }]);
  });

  it('should decode encoded fragments', () => {
    writeFileSync(join(dir, 'a.md'), '<a id="a b"></a>\n[x](#a%20b)\n');
    expect(validateLinks(dir).validLinks).toBe(1);
  });
});
