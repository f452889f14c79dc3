import type {
  AxisRecord,
  FontSource,
  InstanceRecord,
  IntrinsicStyle,
  PaletteTable,
  StandardNames
} from '../types/fonts.js';

export type MemoryFontSourceInit = {
  names?: Partial<StandardNames>;
  /** Name table strings keyed by name id. */
  nameStrings?: Readonly<Record<number, string>>;
  axes?: readonly AxisRecord[];
  instances?: readonly InstanceRecord[];
  palettes?: PaletteTable;
  style?: IntrinsicStyle;
};

/** A font source over records that are already decoded and held in memory. */
export function createMemoryFontSource(init: MemoryFontSourceInit = {}): FontSource {
  const strings = init.nameStrings;
  const names: Partial<StandardNames> = { ...init.names };

  return {
    axisRecords: () => init.axes,
    instanceRecords: () => init.instances,
    paletteTable: () => init.palettes,
    resolveName(nameId: number): string | undefined {
      if (!strings) return undefined;
      return Object.prototype.hasOwnProperty.call(strings, nameId) ? strings[nameId] : undefined;
    },
    defaultNames: () => ({ ...names }),
    intrinsicStyle: () => init.style
  };
}
