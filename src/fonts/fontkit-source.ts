import type {
  AxisRecord,
  FontSource,
  InstanceRecord,
  IntrinsicStyle,
  PaletteTable,
  StandardNames
} from '../types/fonts.js';
import { FontDataError } from '../errors.js';
import { createDebugLogger } from '../utils/debug.js';

const debug = createDebugLogger('fontkit');

// fontkit keys name records below 256 by these names; higher ids live under
// `fontFeatures`, keyed by the numeric id.
const NAME_KEYS: readonly (string | null)[] = [
  'copyright',
  'fontFamily',
  'fontSubfamily',
  'uniqueSubfamily',
  'fullName',
  'version',
  'postscriptName',
  'trademark',
  'manufacturer',
  'designer',
  'description',
  'vendorURL',
  'designerURL',
  'license',
  'licenseURL',
  null,
  'preferredFamily',
  'preferredSubfamily',
  'compatibleFull',
  'sampleText',
  'postscriptCIDFontName',
  'wwsFamilyName',
  'wwsSubfamilyName'
];

const NAME_ID = {
  family: 1,
  subfamily: 2,
  fullName: 4,
  typographicFamily: 16,
  typographicSubfamily: 17
} as const;

const PREFERRED_LANGUAGES = ['en', 'en-US'];

type TableObject = Record<string, unknown>;

function isObject(value: unknown): value is TableObject {
  return typeof value === 'object' && value !== null;
}

function readTable(font: object, tag: string): TableObject | undefined {
  try {
    const table: unknown = Reflect.get(font, tag);
    return isObject(table) ? table : undefined;
  } catch (error) {
    // fontkit decodes tables lazily; a broken table surfaces here.
    throw new FontDataError(`Could not decode the ${tag} table: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function num(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function requireNum(record: TableObject, key: string, table: string): number {
  const value = num(record[key]);
  if (value === undefined) throw new FontDataError(`${table} record is missing numeric field "${key}"`);
  return value;
}

function numbers(value: unknown): number[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const out: number[] = [];
  for (const item of value) {
    const n = num(item);
    if (n === undefined) return undefined;
    out.push(n);
  }
  return out;
}

function records(value: unknown): TableObject[] {
  return Array.isArray(value) ? value.filter(isObject) : [];
}

function pickLanguage(entry: unknown): string | undefined {
  if (typeof entry === 'string') return entry;
  if (!isObject(entry)) return undefined;
  for (const lang of PREFERRED_LANGUAGES) {
    const value = entry[lang];
    if (typeof value === 'string') return value;
  }
  return Object.values(entry).find((value): value is string => typeof value === 'string');
}

function colorRecordToArgb(record: TableObject): number {
  const channel = (key: string) => (num(record[key]) ?? 0) & 0xff;
  return ((channel('alpha') << 24) | (channel('red') << 16) | (channel('green') << 8) | channel('blue')) >>> 0;
}

function selectionFlags(value: unknown): number | undefined {
  const n = num(value);
  if (n !== undefined) return n;
  if (!isObject(value)) return undefined;
  // Decoded as a bitfield object: { italic, ..., oblique }.
  let flags = 0;
  if (value.italic === true) flags |= 1 << 0;
  if (value.bold === true) flags |= 1 << 5;
  if (value.regular === true) flags |= 1 << 6;
  if (value.oblique === true) flags |= 1 << 9;
  return flags;
}

/**
 * Adapts a font already opened with fontkit (`fontkit.create` /
 * `fontkit.openSync`) to a {@link FontSource}, reading its decoded `fvar`,
 * `CPAL`, `name` and `OS/2` tables.
 */
export function createFontkitSource(font: object): FontSource {
  const nameRecords = (): TableObject | undefined => {
    const records = readTable(font, 'name')?.records;
    return isObject(records) ? records : undefined;
  };

  const resolveName = (nameId: number): string | undefined => {
    const all = nameRecords();
    if (!all || nameId < 0) return undefined;
    if (nameId >= 256) {
      const features = all.fontFeatures;
      return isObject(features) ? pickLanguage(features[nameId]) : undefined;
    }
    const key = NAME_KEYS[nameId] ?? String(nameId);
    return pickLanguage(all[key]);
  };

  const axisRecords = (): AxisRecord[] | undefined => {
    const fvar = readTable(font, 'fvar');
    if (!fvar) return undefined;
    return records(fvar.axis).map((axis) => {
      const tag = axis.axisTag;
      if (typeof tag !== 'string') throw new FontDataError('fvar axis record has no tag');
      return {
        tag,
        minValue: requireNum(axis, 'minValue', 'fvar axis'),
        defaultValue: requireNum(axis, 'defaultValue', 'fvar axis'),
        maxValue: requireNum(axis, 'maxValue', 'fvar axis'),
        flags: num(axis.flags) ?? 0,
        nameId: num(axis.nameID) ?? -1
      };
    });
  };

  const instanceRecords = (): InstanceRecord[] | undefined => {
    const fvar = readTable(font, 'fvar');
    if (!fvar) return undefined;
    return records(fvar.instance).map((instance) => {
      const coordinates = numbers(instance.coord);
      if (!coordinates) throw new FontDataError('fvar instance record has no coordinates');
      const record: InstanceRecord = {
        nameId: num(instance.nameID) ?? -1,
        coordinates
      };
      const psNameId = num(instance.postscriptNameID);
      if (psNameId !== undefined && psNameId !== 0xffff) record.postScriptNameId = psNameId;
      return record;
    });
  };

  const paletteTable = (): PaletteTable | undefined => {
    const cpal = readTable(font, 'CPAL');
    if (!cpal) return undefined;
    const table: PaletteTable = {
      entryCount: num(cpal.numPaletteEntries) ?? 0,
      paletteCount: num(cpal.numPalettes) ?? 0,
      colors: records(cpal.colorRecords).map(colorRecordToArgb),
      colorRecordIndices: numbers(cpal.colorRecordIndices) ?? []
    };
    const types = numbers(cpal.offsetPaletteTypeArray);
    const labels = numbers(cpal.offsetPaletteLabelArray);
    const entryLabels = numbers(cpal.offsetPaletteEntryLabelArray);
    if (types) table.types = types;
    if (labels) table.paletteNameIds = labels;
    if (entryLabels) table.entryNameIds = entryLabels;
    return table;
  };

  const defaultNames = (): Partial<StandardNames> => {
    const names: Partial<StandardNames> = {};
    const familyName = resolveName(NAME_ID.typographicFamily) ?? resolveName(NAME_ID.family);
    const styleName = resolveName(NAME_ID.typographicSubfamily) ?? resolveName(NAME_ID.subfamily);
    const fullName = resolveName(NAME_ID.fullName);
    if (familyName !== undefined) names.familyName = familyName;
    if (styleName !== undefined) names.styleName = styleName;
    if (fullName !== undefined) names.fullName = fullName;
    return names;
  };

  const intrinsicStyle = (): IntrinsicStyle | undefined => {
    const os2 = readTable(font, 'OS/2');
    if (!os2) {
      debug('font has no OS/2 table');
      return undefined;
    }
    const style: IntrinsicStyle = {};
    const weightClass = num(os2.usWeightClass);
    const widthClass = num(os2.usWidthClass);
    const selection = selectionFlags(os2.fsSelection);
    if (weightClass !== undefined) style.weightClass = weightClass;
    if (widthClass !== undefined) style.widthClass = widthClass;
    if (selection !== undefined) style.selection = selection;
    return style;
  };

  return {
    axisRecords,
    instanceRecords,
    paletteTable,
    resolveName,
    defaultNames,
    intrinsicStyle
  };
}

/** Sources for every face of a fontkit result, which may be a single font or a collection. */
export function createFontkitSources(opened: object): FontSource[] {
  const fonts: unknown = Reflect.get(opened, 'fonts');
  if (Array.isArray(fonts)) {
    return fonts.filter(isObject).map((font) => createFontkitSource(font));
  }
  return [createFontkitSource(opened)];
}
