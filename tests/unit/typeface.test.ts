import { describe, it, expect, vi } from 'vitest';
import { Typeface } from '../../src/fonts/typeface.js';
import { createMemoryFontSource, type MemoryFontSourceInit } from '../../src/fonts/font-source.js';
import { FontDataError, PreconditionError, UnsupportedFeatureError } from '../../src/errors.js';

const RED = 0xffff0000;
const GREEN = 0xff00ff00;
const BLUE = 0xff0000ff;
const WHITE = 0xffffffff;

function variableInit(): MemoryFontSourceInit {
  return {
    names: { familyName: 'Sample Sans', styleName: 'Regular' },
    nameStrings: {
      256: 'Weight',
      257: 'Width',
      258: 'Light',
      259: 'Regular',
      260: 'Bold',
      261: 'Condensed Bold'
    },
    axes: [
      { tag: 'wght', minValue: 100, defaultValue: 400, maxValue: 900, flags: 0, nameId: 256 },
      { tag: 'wdth', minValue: 75, defaultValue: 100, maxValue: 100, flags: 0, nameId: 257 }
    ],
    instances: [
      { nameId: 258, coordinates: [300, 100] },
      { nameId: 259, coordinates: [400, 100] },
      { nameId: 260, coordinates: [700, 100] },
      { nameId: 261, coordinates: [700, 75] }
    ],
    style: { weightClass: 400, widthClass: 5, selection: 0x40 }
  };
}

function staticInit(): MemoryFontSourceInit {
  return {
    names: { familyName: 'Sample Serif', styleName: 'Bold Italic' },
    style: { weightClass: 700, widthClass: 5, selection: 0x21 }
  };
}

function colorInit(): MemoryFontSourceInit {
  return {
    names: { familyName: 'Sample Emoji', styleName: 'Regular' },
    palettes: {
      entryCount: 2,
      paletteCount: 2,
      colors: [RED, GREEN, BLUE, WHITE],
      colorRecordIndices: [0, 2]
    }
  };
}

describe('Typeface', () => {
  describe('static fonts', () => {
    const typeface = Typeface.fromSource(createMemoryFontSource(staticInit()));

    it('takes names and characteristics from the source', () => {
      expect(typeface.familyName).toBe('Sample Serif');
      expect(typeface.styleName).toBe('Bold Italic');
      expect(typeface.fullName).toBe('Sample Serif Bold Italic');
      expect(typeface.weight).toBe('bold');
      expect(typeface.width).toBe('normal');
      expect(typeface.slope).toBe('italic');
    });

    it('keeps an explicit full name', () => {
      const named = Typeface.fromSource(
        createMemoryFontSource({ ...staticInit(), names: { familyName: 'Sample Serif', fullName: 'Sample Serif BdIt' } })
      );
      expect(named.fullName).toBe('Sample Serif BdIt');
      expect(named.styleName).toBe('');
    });

    it('falls back to regular/normal/plain without an OS/2 record', () => {
      const bare = Typeface.fromSource(createMemoryFontSource({ names: { familyName: 'Bare' } }));
      expect([bare.weight, bare.width, bare.slope]).toEqual(['regular', 'normal', 'plain']);
      expect(bare.fullName).toBe('Bare');
    });

    it('reports absent features as undefined', () => {
      expect(typeface.isVariable).toBe(false);
      expect(typeface.hasColorPalettes).toBe(false);
      expect(typeface.variationAxes).toBeUndefined();
      expect(typeface.namedInstances).toBeUndefined();
      expect(typeface.variationCoordinates).toBeUndefined();
      expect(typeface.paletteEntryNames).toBeUndefined();
      expect(typeface.predefinedPalettes).toBeUndefined();
      expect(typeface.associatedColors).toBeUndefined();
    });

    it('rejects derivatives for missing features', () => {
      expect(() => typeface.getVariationInstance([400])).toThrow(UnsupportedFeatureError);
      expect(() => typeface.getColorInstance([RED])).toThrow(UnsupportedFeatureError);
      expect(() => typeface.getPaletteInstance(0)).toThrow(UnsupportedFeatureError);
    });
  });

  describe('variable fonts', () => {
    it('describes the default instance', () => {
      const typeface = Typeface.fromSource(createMemoryFontSource(variableInit()));

      expect(typeface.isVariable).toBe(true);
      expect(typeface.variationCoordinates).toEqual([400, 100]);
      expect(typeface.styleName).toBe('Regular');
      expect(typeface.fullName).toBe('Sample Sans Regular');
      expect(typeface.weight).toBe('regular');
      expect(typeface.width).toBe('normal');
      expect(typeface.variationAxes?.map((axis) => axis.name)).toEqual(['Weight', 'Width']);
      expect(typeface.namedInstances?.map((instance) => instance.styleName)).toEqual([
        'Light',
        'Regular',
        'Bold',
        'Condensed Bold'
      ]);
    });

    it('derives names and characteristics for a named instance', () => {
      const root = Typeface.fromSource(createMemoryFontSource(variableInit()));
      const instance = root.getVariationInstance([700, 75]);

      expect(instance.styleName).toBe('Condensed Bold');
      expect(instance.fullName).toBe('Sample Sans Condensed Bold');
      expect(instance.familyName).toBe('Sample Sans');
      expect(instance.weight).toBe('bold');
      expect(instance.width).toBe('condensed');
      expect(instance.slope).toBe('plain');
      expect(root.weight).toBe('regular');
    });

    it('leaves the style name empty between named instances', () => {
      const root = Typeface.fromSource(createMemoryFontSource(variableInit()));
      const instance = root.getVariationInstance([500, 100]);

      expect(instance.styleName).toBe('');
      expect(instance.fullName).toBe('Sample Sans');
      expect(instance.weight).toBe('medium');
    });

    it('clamps coordinates to the axis ranges', () => {
      const root = Typeface.fromSource(createMemoryFontSource(variableInit()));
      const instance = root.getVariationInstance([1000, 50]);

      expect(instance.variationCoordinates).toEqual([900, 75]);
      expect(instance.weight).toBe('heavy');
      expect(instance.width).toBe('condensed');
    });

    it('rejects malformed coordinates', () => {
      const root = Typeface.fromSource(createMemoryFontSource(variableInit()));
      expect(() => root.getVariationInstance([400])).toThrow(PreconditionError);
      expect(() => root.getVariationInstance([Number.NaN, 100])).toThrow(PreconditionError);
    });

    it('keeps intrinsic characteristics the axes do not cover', () => {
      const init = variableInit();
      const root = Typeface.fromSource(
        createMemoryFontSource({ ...init, style: { weightClass: 400, widthClass: 5, selection: 0x01 } })
      );
      expect(root.getVariationInstance([700, 100]).slope).toBe('italic');
    });

    it('synthesizes a default instance named after the intrinsic style', () => {
      const init = variableInit();
      const root = Typeface.fromSource(
        createMemoryFontSource({
          ...init,
          names: { familyName: 'Sample Sans', styleName: 'Book' },
          instances: [{ nameId: 260, coordinates: [700, 100] }]
        })
      );

      expect(root.namedInstances?.map((instance) => instance.styleName)).toEqual(['Book', 'Bold']);
      expect(root.styleName).toBe('Book');
    });

    it('freezes what it returns', () => {
      const root = Typeface.fromSource(createMemoryFontSource(variableInit()));
      expect(Object.isFrozen(root.variationCoordinates)).toBe(true);
      expect(Object.isFrozen(root.variationAxes)).toBe(true);
      expect(Object.isFrozen(root.namedInstances?.[0])).toBe(true);
    });

    it('propagates inconsistent table data', () => {
      const source = createMemoryFontSource({
        ...variableInit(),
        instances: [{ nameId: 259, coordinates: [400] }]
      });
      expect(() => Typeface.fromSource(source)).toThrow(FontDataError);
      expect(() => Typeface.fromSource(source)).toThrow(FontDataError);
    });
  });

  describe('color fonts', () => {
    it('starts with the first predefined palette', () => {
      const typeface = Typeface.fromSource(createMemoryFontSource(colorInit()));

      expect(typeface.hasColorPalettes).toBe(true);
      expect(typeface.paletteEntryNames).toEqual(['', '']);
      expect(typeface.predefinedPalettes).toHaveLength(2);
      expect(typeface.associatedColors).toEqual([RED, GREEN]);
    });

    it('builds color instances', () => {
      const root = Typeface.fromSource(createMemoryFontSource(colorInit()));
      const instance = root.getColorInstance([BLUE, -1]);

      expect(instance.associatedColors).toEqual([BLUE, WHITE]);
      expect(instance.fullName).toBe(root.fullName);
      expect(instance.weight).toBe(root.weight);
      expect(root.associatedColors).toEqual([RED, GREEN]);
    });

    it('builds instances from a predefined palette', () => {
      const root = Typeface.fromSource(createMemoryFontSource(colorInit()));
      expect(root.getPaletteInstance(1).associatedColors).toEqual([BLUE, WHITE]);
      expect(() => root.getPaletteInstance(2)).toThrow(PreconditionError);
    });

    it('rejects colors that are not integers', () => {
      const root = Typeface.fromSource(createMemoryFontSource(colorInit()));
      expect(() => root.getColorInstance([Number.NaN, Number.POSITIVE_INFINITY])).toThrow(PreconditionError);
      expect(() => root.getColorInstance([RED, 0.5])).toThrow(PreconditionError);
    });

    it('rejects a color count that differs from the entry count', () => {
      const root = Typeface.fromSource(createMemoryFontSource(colorInit()));
      expect(() => root.getColorInstance([RED])).toThrow(PreconditionError);
    });
  });

  describe('shared defaults', () => {
    it('resolves the tables once per source', () => {
      const source = createMemoryFontSource({ ...variableInit(), palettes: colorInit().palettes });
      const axisRecords = vi.spyOn(source, 'axisRecords');
      const paletteTable = vi.spyOn(source, 'paletteTable');

      const root = Typeface.fromSource(source);
      const derived = root.getVariationInstance([700, 100]).getColorInstance([WHITE, WHITE]);
      const again = Typeface.fromSource(source);

      expect(derived.sharesDefaultsWith(root)).toBe(true);
      expect(again.sharesDefaultsWith(root)).toBe(true);
      expect(derived.variationAxes).toBe(root.variationAxes);
      expect(axisRecords).toHaveBeenCalledTimes(1);
      expect(paletteTable).toHaveBeenCalledTimes(1);
    });

    it('does not share between distinct sources', () => {
      const a = Typeface.fromSource(createMemoryFontSource(variableInit()));
      const b = Typeface.fromSource(createMemoryFontSource(variableInit()));
      expect(a.sharesDefaultsWith(b)).toBe(false);
    });

    it('carries colors across variation instances and coordinates across color instances', () => {
      const root = Typeface.fromSource(createMemoryFontSource({ ...variableInit(), palettes: colorInit().palettes }));
      const colored = root.getColorInstance([BLUE, BLUE]);
      const bold = colored.getVariationInstance([700, 100]);

      expect(bold.associatedColors).toEqual([BLUE, BLUE]);
      expect(bold.getColorInstance([RED, RED]).variationCoordinates).toEqual([700, 100]);
    });
  });

  it('prints its names and characteristics', () => {
    const typeface = Typeface.fromSource(createMemoryFontSource(staticInit()));
    expect(String(typeface)).toBe(
      'Typeface{familyName=Sample Serif, styleName=Bold Italic, fullName=Sample Serif Bold Italic, weight=bold, width=normal, slope=italic}'
    );
  });
});
