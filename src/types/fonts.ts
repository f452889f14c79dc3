import type { TypeSlope, TypeWeight, TypeWidth } from '../fonts/characteristics.js';

export interface DesignCharacteristics {
  weight: TypeWeight;
  width: TypeWidth;
  slope: TypeSlope;
}

export interface StandardNames {
  familyName: string;
  styleName: string;
  fullName: string;
}

export interface VariationAxis {
  /** Four-character axis tag, e.g. `wght`. */
  tag: string;
  name: string;
  flags: number;
  defaultValue: number;
  minValue: number;
  maxValue: number;
}

export interface NamedInstance {
  styleName: string;
  /** One value per variation axis, in axis order. */
  coordinates: readonly number[];
  postScriptName?: string;
}

export interface ColorPalette {
  name: string;
  flags: number;
  /** 32-bit ARGB values. */
  colors: readonly number[];
}

// Raw records as handed over by a table provider.

export interface AxisRecord {
  tag: string | number;
  minValue: number;
  defaultValue: number;
  maxValue: number;
  flags: number;
  nameId: number;
}

export interface InstanceRecord {
  nameId: number;
  coordinates: readonly number[];
  postScriptNameId?: number;
}

export interface PaletteTable {
  entryCount: number;
  paletteCount: number;
  /** Flat ARGB color record array shared by all palettes. */
  colors: readonly number[];
  /** Index of the first color record of each palette. */
  colorRecordIndices: readonly number[];
  types?: readonly number[];
  paletteNameIds?: readonly number[];
  entryNameIds?: readonly number[];
}

/** Subset of the OS/2 table that describes a face's intrinsic style. */
export interface IntrinsicStyle {
  weightClass?: number;
  widthClass?: number;
  selection?: number;
}

export type NameLookup = (nameId: number) => string | undefined;

/**
 * Supplies already decoded font tables. Every table is optional: a font
 * without `fvar` or `CPAL` simply reports no variation or palette support.
 */
export interface FontSource {
  axisRecords(): readonly AxisRecord[] | undefined;
  instanceRecords(): readonly InstanceRecord[] | undefined;
  paletteTable(): PaletteTable | undefined;
  resolveName(nameId: number): string | undefined;
  defaultNames(): Partial<StandardNames>;
  intrinsicStyle(): IntrinsicStyle | undefined;
}

export interface VariationDefaults {
  axes: VariationAxis[];
  namedInstances: NamedInstance[];
}

export interface PaletteDefaults {
  entryNames: string[];
  predefinedPalettes: ColorPalette[];
}

/** Properties shared by a root typeface and all of its derivatives. */
export interface DefaultProperties {
  readonly axes: readonly VariationAxis[];
  readonly namedInstances: readonly NamedInstance[];
  readonly entryNames: readonly string[];
  readonly predefinedPalettes: readonly ColorPalette[];
}

export interface StyleRequest {
  /** CSS `font-weight`: 1..1000 or `normal` / `bold`. */
  weight?: number | string;
  /** CSS `font-style`: `normal`, `italic` or `oblique [angle]`. */
  style?: string;
  /** CSS `font-stretch`: keyword or percentage. */
  stretch?: number | string;
}
