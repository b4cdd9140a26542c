/**
 * @file anchor-registry.test.ts
 * @module tests/unit/generator/anchor-registry
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Unit tests for AnchorRegistry and plan anchor registration.
 */

import { AnchorRegistry, registerPlannedAnchors, renderedTexts } from '../../../src/generator/anchor-registry.js';
import { DocumentPlan, type DocumentSpec } from '../../../src/generator/document-plan.js';
import { DuplicateAnchorError, UnknownAnchorError } from '../../../src/model/errors.js';
import type { ElementRecord } from '../../../src/model/types.js';
import { ReferenceResolver } from '../../../src/resolver/reference-resolver.js';
import { buildGraph, mustGet, rec } from '../../setup.js';

describe('AnchorRegistry', () => {
  it('should register and look up anchors', () => {
    const registry = new AnchorRegistry();
    registry.register('units', 'shapes', 'Units of measure');
    registry.register('origin', 'points');

    expect(registry.lookup('units')).toEqual({ name: 'units', documentId: 'shapes', linkText: 'Units of measure' });
    expect(registry.get('origin')).toEqual({ name: 'origin', documentId: 'points' });
    expect(registry.all().map(a => a.name)).toEqual(['units', 'origin']);
  });

  it('should reject a name registered twice', () => {
    const registry = new AnchorRegistry();
    registry.register('units', 'shapes');
    expect(() => registry.register('units', 'points')).toThrow(DuplicateAnchorError);
    expect(() => registry.register('units', 'points')).toThrow('Anchor "units" is defined in both shapes and points');
  });

  it('should reject lookups of unknown names', () => {
    const registry = new AnchorRegistry();
    expect(registry.get('nope')).toBeUndefined();
    expect(() => registry.lookup('nope')).toThrow(UnknownAnchorError);
    expect(() => registry.lookup('nope')).toThrow('Unknown anchor "nope"');
  });
});

describe('registerPlannedAnchors', () => {
  const records = (pointBrief: string): ElementRecord[] => [
    rec({
      id: 'shape',
      name: 'Shape',
      kind: 'class',
      description: '{@anchor units Units of measure}All lengths are in metres.',
      children: ['area'],
    }),
    rec({
      id: 'area',
      name: 'area',
      qualifiedName: 'Shape::area',
      kind: 'function',
      params: [{ name: 'scale', description: 'Factor, see {@link #units}.' }],
    }),
    rec({ id: 'point', name: 'Point', kind: 'class', brief: pointBrief }),
    rec({ id: 'loose', name: 'Loose', kind: 'class', brief: 'See {@link #nowhere}.' }),
  ];
  const specs: DocumentSpec[] = [
    { id: 'shapes', insert: ['Shape'], anchors: [{ name: 'overview' }] },
    { id: 'points', insert: ['Point'] },
  ];

  function register(pointBrief: string): AnchorRegistry {
    const graph = buildGraph(records(pointBrief));
    const plan = new DocumentPlan(graph, new ReferenceResolver(graph), specs);
    const registry = new AnchorRegistry();
    registerPlannedAnchors(registry, graph, plan);
    return registry;
  }

  it('should register document anchors and description anchors with their owners', () => {
    const registry = register('Relative to {@link #overview the overview}.');
    expect(registry.all()).toEqual([
      { name: 'overview', documentId: 'shapes' },
      { name: 'units', documentId: 'shapes', linkText: 'Units of measure' },
    ]);
  });

  it('should reject an anchor defined in two documents', () => {
    expect(() => register('{@anchor units}A point.')).toThrow('Anchor "units" is defined in both shapes and points');
  });

  it('should reject links to anchors nobody defines', () => {
    expect(() => register('See {@link #origin}.')).toThrow(UnknownAnchorError);
  });

  it('should ignore elements no document holds', () => {
    expect(() => register('A point.')).not.toThrow();
  });

  it('should list parameter descriptions among the texts of a function', () => {
    const graph = buildGraph(records('A point.'));
    expect(renderedTexts(mustGet(graph, 'area'))).toContain('Factor, see {@link #units}.');
  });
});
