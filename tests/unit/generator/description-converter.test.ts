/**
 * @file description-converter.test.ts
 * @module tests/unit/generator/description-converter
 * @created 2026-10-17
 * @license MIT
 *
 * @fileoverview Unit tests for DescriptionConverter.
 */

import {
  DescriptionConverter,
  findAnchorDefinitions,
  findAnchorLinks,
  type AnchorLinker,
  type ReferenceLinker,
} from '../../../src/generator/description-converter.js';
import { UnknownAnchorError } from '../../../src/model/errors.js';

describe('DescriptionConverter', () => {
  const converter = new DescriptionConverter();
  const link: ReferenceLinker = name => (name === 'Point' || name === 'geo::Point' ? '#4' : undefined);
  const anchors: AnchorLinker = {
    define: name => `<a id="${name}"></a>`,
    target: name => {
      if (name !== 'units') throw new UnknownAnchorError(name);
      return { target: 'shapes.md#units', linkText: 'Units of measure' };
    },
  };

  describe('plain text', () => {
    it('should resolve inline links', () => {
      expect(converter.convert('See {@link Point}.', link)).toBe('See [Point](#4).');
    });

    it('should use the link label when given', () => {
      expect(converter.convert('See {@link geo::Point the point type}.', link)).toBe('See [the point type](#4).');
    });

    it('should keep unresolved names as plain text', () => {
      expect(converter.convert('See {@link Nowhere}.', link)).toBe('See Nowhere.');
    });

    it('should return an empty string for blank input', () => {
      expect(converter.convert('   ', link)).toBe('');
    });
  });

  describe('markup', () => {
    it('should convert paragraphs and code to Markdown', () => {
      expect(converter.convert('<p>Returns <code>true</code> on success.</p><p>Second.</p>', link)).toBe(
        'Returns `true` on success.\n\nSecond.'
      );
    });

    it('should replace ref tags with links or text', () => {
      expect(converter.convert('<p>Uses <ref>Point</ref> and <ref>Line</ref>.</p>', link)).toBe(
        'Uses [Point](#4) and Line.'
      );
    });

    it('should drop script content', () => {
      expect(converter.convert('<p>Safe.</p><script>alert(1)</script>', link)).toBe('Safe.');
    });

    it('should render lists with dashes', () => {
      expect(converter.convert('<ul><li>one</li><li>two</li></ul>', link)).toBe('-   one\n-   two');
    });

    it('should keep unresolved names verbatim next to inline links', () => {
      expect(converter.convert('<p>See <ref>my_type</ref> and {@link other_thing}.</p>', link)).toBe(
        'See my_type and other_thing.'
      );
    });

    it('should resolve inline links inside markup', () => {
      expect(converter.convert('<p>Moves a {@link Point} by <code>dx</code>.</p>', link)).toBe(
        'Moves a [Point](#4) by `dx`.'
      );
    });

    it('should place anchors defined inside markup', () => {
      expect(converter.convert('<p>{@anchor units}Lengths are in <code>m</code>.</p>', link, anchors)).toBe(
        '<a id="units"></a>Lengths are in `m`.'
      );
    });
  });

  describe('named anchors', () => {
    it('should emit the anchor where it is defined', () => {
      expect(converter.convert('{@anchor units Units of measure}Lengths are in metres.', link, anchors)).toBe(
        '<a id="units"></a>Lengths are in metres.'
      );
    });

    it('should link to anchors with their registered text', () => {
      expect(converter.convert('See {@link #units}.', link, anchors)).toBe('See [Units of measure](shapes.md#units).');
    });

    it('should prefer the label written in the link', () => {
      expect(converter.convert('See {@link #units the units}.', link, anchors)).toBe(
        'See [the units](shapes.md#units).'
      );
    });

    it('should throw for unknown anchors', () => {
      expect(() => converter.convert('See {@link #nope}.', link, anchors)).toThrow(UnknownAnchorError);
    });

    it('should drop definitions and keep link text without an anchor linker', () => {
      expect(converter.convert('{@anchor units}See {@link #units} and {@link #scale the scale}.', link)).toBe(
        'See units and the scale.'
      );
    });

    it('should find anchor definitions and anchor links', () => {
      const text = '{@anchor units Units of measure} {@anchor scale} {@link #units} {@link Point} {@link #scale here}';
      expect(findAnchorDefinitions(text)).toEqual([{ name: 'units', text: 'Units of measure' }, { name: 'scale' }]);
      expect(findAnchorLinks(text)).toEqual(['units', 'scale']);
    });
  });
});
