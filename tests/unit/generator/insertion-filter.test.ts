/**
 * @file insertion-filter.test.ts
 * @module tests/unit/generator/insertion-filter
 * @created 2026-10-17
 * @license MIT
 *
 * @fileoverview Unit tests for InsertionFilter pattern matching.
 */

import { InsertionFilter } from '../../../src/generator/insertion-filter.js';
import { ConfigError } from '../../../src/model/errors.js';
import { buildGraph, mustGet, rec } from '../../setup.js';

describe('InsertionFilter', () => {
  const graph = buildGraph([
    rec({ id: 'pub', name: 'area', kind: 'function', prot: 'public' }),
    rec({ id: 'prot', name: 'origin', kind: 'member', prot: 'protected' }),
    rec({ id: 'priv', name: 'cache', kind: 'member', prot: 'private' }),
    rec({ id: 'none', name: 'detail_helper', kind: 'function' }),
    rec({ id: 'val', name: 'Red', kind: 'enum-value' }),
  ]);
  const accepted = (filter: InsertionFilter) =>
    ['pub', 'prot', 'priv', 'none', 'val'].filter(id => filter.accepts(mustGet(graph, id)));

  it('should insert public and protected members by default', () => {
    expect(accepted(new InsertionFilter())).toEqual(['pub', 'prot', 'none', 'val']);
  });

  it('should insert everything with prot all', () => {
    expect(accepted(new InsertionFilter({ prot: 'all' }))).toEqual(['pub', 'prot', 'priv', 'none', 'val']);
  });

  it('should let the last matching pattern win', () => {
    const filter = new InsertionFilter({ name: ['-detail_', '+detail_helper'], prot: 'all' });
    expect(filter.accepts(mustGet(graph, 'none'))).toBe(true);

    const reversed = new InsertionFilter({ name: ['+detail_helper', '-detail_'], prot: 'all' });
    expect(reversed.accepts(mustGet(graph, 'none'))).toBe(false);
  });

  it('should exclude unmatched values when the list starts with an include', () => {
    expect(accepted(new InsertionFilter({ kind: '+function' }))).toEqual(['pub', 'none']);
  });

  it('should keep unmatched values when the list starts with an exclude', () => {
    expect(accepted(new InsertionFilter({ kind: '-enum-value' }))).toEqual(['pub', 'prot', 'none']);
  });

  it('should anchor patterns at the start of the value', () => {
    expect(accepted(new InsertionFilter({ name: '+rea' }))).toEqual([]);
  });

  it('should reject invalid regular expressions', () => {
    expect(() => new InsertionFilter({ name: '+(' })).toThrow(ConfigError);
  });
});
