import type {
  ColorPalette,
  DefaultProperties,
  DesignCharacteristics,
  FontSource,
  IntrinsicStyle,
  NamedInstance,
  StandardNames,
  VariationAxis
} from '../types/fonts.js';
import { PreconditionError, UnsupportedFeatureError, checkArgument } from '../errors.js';
import { Lazy } from '../utils/lazy.js';
import {
  slopeFromSelection,
  weightFromWght,
  widthFromWidthClass,
  type TypeSlope,
  type TypeWeight,
  type TypeWidth
} from './characteristics.js';
import { resolvePaletteDefaults, selectDefaultPalette } from './palette-resolver.js';
import {
  DEFAULT_CHARACTERISTICS,
  composeFullName,
  defaultCoordinates,
  resolveDesignCharacteristics,
  resolveNamedStyle,
  resolveVariationDefaults
} from './variation-resolver.js';

// One cell per root font source, so every typeface built over the same source
// shares a single resolution of its fvar and CPAL tables.
const defaultsBySource = new WeakMap<FontSource, Lazy<DefaultProperties>>();

function defaultsFor(source: FontSource): Lazy<DefaultProperties> {
  let cell = defaultsBySource.get(source);
  if (!cell) {
    cell = new Lazy(() => computeDefaults(source));
    defaultsBySource.set(source, cell);
  }
  return cell;
}

function computeDefaults(source: FontSource): DefaultProperties {
  const lookup = (nameId: number) => source.resolveName(nameId);
  const variations = resolveVariationDefaults(
    source.axisRecords(),
    source.instanceRecords(),
    lookup,
    source.defaultNames().styleName
  );
  const palettes = resolvePaletteDefaults(source.paletteTable(), lookup);

  const defaults: DefaultProperties = {
    axes: Object.freeze(variations.axes.map((axis) => Object.freeze(axis))),
    namedInstances: Object.freeze(variations.namedInstances.map((instance) => Object.freeze(instance))),
    entryNames: Object.freeze(palettes.entryNames),
    predefinedPalettes: Object.freeze(palettes.predefinedPalettes.map((palette) => Object.freeze(palette)))
  };
  return Object.freeze(defaults);
}

function intrinsicCharacteristics(style: IntrinsicStyle | undefined): DesignCharacteristics {
  const design: DesignCharacteristics = { ...DEFAULT_CHARACTERISTICS };
  if (!style) return design;
  if (style.weightClass !== undefined && style.weightClass > 0) design.weight = weightFromWght(style.weightClass);
  if (style.widthClass !== undefined && style.widthClass > 0) design.width = widthFromWidthClass(style.widthClass);
  if (style.selection !== undefined) design.slope = slopeFromSelection(style.selection);
  return design;
}

function sourceNames(source: FontSource): StandardNames {
  const names = source.defaultNames();
  const familyName = names.familyName ?? '';
  const styleName = names.styleName ?? '';
  return {
    familyName,
    styleName,
    fullName: names.fullName ?? composeFullName(familyName, styleName)
  };
}

function clampToAxes(coordinates: readonly number[], axes: readonly VariationAxis[]): number[] {
  return coordinates.map((value, i) => {
    const axis = axes[i];
    if (!axis) return value;
    return Math.min(axis.maxValue, Math.max(axis.minValue, value));
  });
}

type TypefaceState = {
  source: FontSource;
  defaults: Lazy<DefaultProperties>;
  design: Readonly<DesignCharacteristics>;
  names: Readonly<StandardNames>;
  coordinates: readonly number[] | undefined;
  colors: readonly number[] | undefined;
};

/**
 * The typeface and intrinsic style of a font. Instances never change after
 * construction; `getVariationInstance` and `getColorInstance` return new
 * typefaces that share this one's default properties.
 */
export class Typeface {
  private readonly state: TypefaceState;

  private constructor(state: TypefaceState) {
    this.state = state;
  }

  static fromSource(source: FontSource): Typeface {
    const defaults = defaultsFor(source);
    const { axes, predefinedPalettes } = defaults.get();
    const coordinates = axes.length > 0 ? Object.freeze(defaultCoordinates(axes)) : undefined;
    const palette = selectDefaultPalette(predefinedPalettes);

    return new Typeface({
      source,
      defaults,
      ...Typeface.describe(source, defaults.get(), coordinates),
      coordinates,
      colors: palette?.colors
    });
  }

  /** Names and characteristics of a face sitting at `coordinates`. */
  private static describe(
    source: FontSource,
    defaults: DefaultProperties,
    coordinates: readonly number[] | undefined
  ): { names: Readonly<StandardNames>; design: Readonly<DesignCharacteristics> } {
    const names = sourceNames(source);
    const intrinsic = intrinsicCharacteristics(source.intrinsicStyle());
    if (!coordinates || coordinates.length === 0) {
      return { names: Object.freeze(names), design: Object.freeze(intrinsic) };
    }

    const styleName = resolveNamedStyle(coordinates, defaults.namedInstances) ?? '';
    const described: StandardNames = {
      familyName: names.familyName,
      styleName,
      fullName: composeFullName(names.familyName, styleName)
    };
    const design = resolveDesignCharacteristics(coordinates, defaults.axes, intrinsic);
    return { names: Object.freeze(described), design: Object.freeze(design) };
  }

  private get defaults(): DefaultProperties {
    return this.state.defaults.get();
  }

  get familyName(): string {
    return this.state.names.familyName;
  }

  get styleName(): string {
    return this.state.names.styleName;
  }

  get fullName(): string {
    return this.state.names.fullName;
  }

  get weight(): TypeWeight {
    return this.state.design.weight;
  }

  get width(): TypeWidth {
    return this.state.design.width;
  }

  get slope(): TypeSlope {
    return this.state.design.slope;
  }

  get isVariable(): boolean {
    return this.defaults.axes.length > 0;
  }

  get hasColorPalettes(): boolean {
    return this.defaults.entryNames.length > 0;
  }

  get variationAxes(): readonly VariationAxis[] | undefined {
    const axes = this.defaults.axes;
    return axes.length > 0 ? axes : undefined;
  }

  get namedInstances(): readonly NamedInstance[] | undefined {
    const instances = this.defaults.namedInstances;
    return instances.length > 0 ? instances : undefined;
  }

  get variationCoordinates(): readonly number[] | undefined {
    return this.state.coordinates;
  }

  get paletteEntryNames(): readonly string[] | undefined {
    const names = this.defaults.entryNames;
    return names.length > 0 ? names : undefined;
  }

  get predefinedPalettes(): readonly ColorPalette[] | undefined {
    const palettes = this.defaults.predefinedPalettes;
    return palettes.length > 0 ? palettes : undefined;
  }

  /** Colors currently assigned to the palette entries. */
  get associatedColors(): readonly number[] | undefined {
    return this.hasColorPalettes ? this.state.colors : undefined;
  }

  /**
   * Returns a variation instance of this typeface. Coordinates are clamped to
   * the range of their axis.
   */
  getVariationInstance(coordinates: readonly number[]): Typeface {
    const axes = this.variationAxes;
    if (!axes) {
      throw new UnsupportedFeatureError('This typeface does not support variations');
    }
    checkArgument(
      coordinates.length === axes.length,
      `The number of coordinates (${coordinates.length}) does not match the number of variation axes (${axes.length})`
    );
    if (!coordinates.every((value) => Number.isFinite(value))) {
      throw new PreconditionError('Variation coordinates must be finite numbers');
    }

    const clamped = Object.freeze(clampToAxes(coordinates, axes));
    return new Typeface({
      source: this.state.source,
      defaults: this.state.defaults,
      ...Typeface.describe(this.state.source, this.defaults, clamped),
      coordinates: clamped,
      colors: this.state.colors
    });
  }

  /** Returns a color instance of this typeface using `colors` as palette entries. */
  getColorInstance(colors: readonly number[]): Typeface {
    const entryNames = this.paletteEntryNames;
    if (!entryNames) {
      throw new UnsupportedFeatureError('This typeface does not support color palettes');
    }
    checkArgument(
      colors.length === entryNames.length,
      `Palette should have exactly ${entryNames.length} colors, got ${colors.length}`
    );
    if (!colors.every((color) => Number.isInteger(color))) {
      throw new PreconditionError('Palette colors must be integer ARGB values');
    }

    return new Typeface({
      ...this.state,
      colors: Object.freeze(colors.map((color) => color >>> 0))
    });
  }

  /** Convenience for `getColorInstance` with one of the predefined palettes. */
  getPaletteInstance(paletteIndex: number): Typeface {
    const palettes = this.predefinedPalettes;
    if (!palettes) {
      throw new UnsupportedFeatureError('This typeface does not support color palettes');
    }
    const palette = palettes[paletteIndex];
    if (!palette) {
      throw new PreconditionError(`Palette index ${paletteIndex} is out of range (0..${palettes.length - 1})`);
    }
    return this.getColorInstance(palette.colors);
  }

  /** True when both typefaces were derived from the same root font source. */
  sharesDefaultsWith(other: Typeface): boolean {
    return this.state.defaults === other.state.defaults;
  }

  toString(): string {
    return `Typeface{familyName=${this.familyName}, styleName=${this.styleName}, fullName=${this.fullName}, weight=${this.weight}, width=${this.width}, slope=${this.slope}}`;
  }
}
