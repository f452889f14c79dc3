import type { ColorPalette, NameLookup, PaletteDefaults, PaletteTable } from '../types/fonts.js';
import { FontDataError } from '../errors.js';
import { createDebugLogger } from '../utils/debug.js';

const debug = createDebugLogger('palettes');

/** Name id meaning "no name" in the CPAL label arrays. */
export const NO_NAME_ID = 0xffff;

function lookupLabel(nameId: number | undefined, lookup: NameLookup): string {
  if (nameId === undefined || nameId === NO_NAME_ID) return '';
  return lookup(nameId) ?? '';
}

function slicePalette(table: PaletteTable, index: number): number[] {
  const first = table.colorRecordIndices[index];
  if (first === undefined) {
    throw new FontDataError(`Palette ${index} has no color record index`);
  }
  if (first < 0 || first + table.entryCount > table.colors.length) {
    throw new FontDataError(
      `Palette ${index} reads colors ${first}..${first + table.entryCount - 1} but only ${table.colors.length} color records exist`
    );
  }
  return table.colors.slice(first, first + table.entryCount).map((color) => color >>> 0);
}

export function resolvePaletteDefaults(
  table: PaletteTable | undefined,
  lookup: NameLookup
): PaletteDefaults {
  if (!table || table.paletteCount === 0 || table.entryCount === 0) {
    if (table) debug('palette table declares no palettes or no entries');
    return { entryNames: [], predefinedPalettes: [] };
  }

  const predefinedPalettes: ColorPalette[] = [];
  for (let i = 0; i < table.paletteCount; i++) {
    predefinedPalettes.push({
      name: lookupLabel(table.paletteNameIds?.[i], lookup),
      flags: table.types?.[i] ?? 0,
      colors: Object.freeze(slicePalette(table, i))
    });
  }

  const entryNames: string[] = [];
  for (let i = 0; i < table.entryCount; i++) {
    entryNames.push(table.entryNameIds ? lookupLabel(table.entryNameIds[i], lookup) : '');
  }

  return { entryNames, predefinedPalettes };
}

export function selectDefaultPalette(palettes: readonly ColorPalette[]): ColorPalette | undefined {
  return palettes[0];
}
