/**
 * @file formatters.test.ts
 * @module tests/unit/formatters/formatters
 * @created 2026-10-17
 * @license MIT
 *
 * @fileoverview Unit tests for the per-language signature formatters and their registry.
 */

import { FormatterRegistry } from '../../../src/formatters/formatter-registry.js';
import type { SignatureWriter } from '../../../src/formatters/types.js';
import type { ElementRecord, TypeRef } from '../../../src/model/types.js';
import { buildGraph, mustGet, rec } from '../../setup.js';

/**
 * Writer that marks type uses so tests can see what the formatter linked.
 */
const writer: SignatureWriter = {
  text: raw => raw,
  type: (ref: TypeRef) => `{${ref.prefix ?? ''}${ref.name}${ref.suffix ?? ''}}`,
};

const registry = new FormatterRegistry();

function format(record: ElementRecord): string {
  const graph = buildGraph([record]);
  return registry.forLanguage(record.language).formatSignature(mustGet(graph, record.id), writer);
}

describe('CppFormatter', () => {
  it('should format a templated class with bases', () => {
    expect(
      format(
        rec({
          id: 'c',
          name: 'Box',
          kind: 'class',
          typeParams: [{ name: 'T', type: { name: 'typename' } }],
          bases: [{ name: 'Shape' }],
        })
      )
    ).toBe('template <{typename} T> class Box : {Shape}');
  });

  it('should format static and const functions', () => {
    expect(
      format(
        rec({
          id: 'f',
          name: 'scale',
          kind: 'function',
          static: true,
          const: true,
          params: [{ name: 'by', type: { name: 'double' }, defaultValue: '1.0' }],
          returns: { type: { name: 'Shape', suffix: '&' } },
        })
      )
    ).toBe('static {Shape&} scale({double} by = 1.0) const');
  });

  it('should format aliases as using declarations', () => {
    expect(format(rec({ id: 'a', name: 'Coord', kind: 'alias', target: { name: 'double' } }))).toBe(
      'using Coord = {double}'
    );
  });

  it('should reject parameters with neither name nor type', () => {
    expect(() => format(rec({ id: 'f', name: 'f', kind: 'function', params: [{ name: '' }] }))).toThrow(
      'Parameter #1 has neither a name nor a type'
    );
  });
});

describe('JavaFormatter', () => {
  it('should format packages, generics and throws clauses', () => {
    expect(format(rec({ id: 'p', name: 'geo', qualifiedName: 'org.geo', kind: 'namespace', language: 'java' }))).toBe(
      'package org.geo'
    );
    expect(
      format(
        rec({
          id: 'f',
          name: 'parse',
          kind: 'function',
          language: 'java',
          typeParams: [{ name: 'T' }],
          params: [{ name: 'text', type: { name: 'String' } }],
          returns: { type: { name: 'T' } },
          throws: [{ type: { name: 'IOException' } }],
        })
      )
    ).toBe('<T> {T} parse({String} text) throws {IOException}');
  });
});

describe('PythonFormatter', () => {
  it('should format functions with annotations', () => {
    expect(
      format(
        rec({
          id: 'f',
          name: 'area',
          kind: 'function',
          language: 'python',
          params: [{ name: 'self' }, { name: 'unit', type: { name: 'str' }, defaultValue: "'m'" }],
          returns: { type: { name: 'float' } },
        })
      )
    ).toBe("def area(self, unit: {str} = 'm') -> {float}");
  });

  it('should format enums as Enum subclasses', () => {
    expect(format(rec({ id: 'e', name: 'Color', kind: 'enum', language: 'py' }))).toBe('class Color(Enum)');
  });
});

describe('FormatterRegistry', () => {
  it('should resolve aliases and fall back to the generic formatter', () => {
    expect(registry.forLanguage('C++').language).toBe('cpp');
    expect(registry.forLanguage('kotlin').language).toBe('java');
    expect(registry.forLanguage('rust').language).toBe('generic');
    expect(registry.getLanguages()).toEqual(['cpp', 'java', 'python']);
  });

  it('should format with the generic formatter', () => {
    expect(
      format(
        rec({
          id: 'f',
          name: 'len',
          kind: 'function',
          language: 'rust',
          params: [{ name: 'v', type: { name: 'Vec' } }],
          returns: { type: { name: 'usize' } },
        })
      )
    ).toBe('len(v: {Vec}): {usize}');
  });
});
