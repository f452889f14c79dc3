import type {
  AxisRecord,
  DesignCharacteristics,
  InstanceRecord,
  NameLookup,
  NamedInstance,
  VariationAxis,
  VariationDefaults
} from '../types/fonts.js';
import { FontDataError, PreconditionError, checkArgument } from '../errors.js';
import { createDebugLogger } from '../utils/debug.js';
import {
  slopeFromItal,
  slopeFromSlnt,
  weightFromWght,
  widthFromWdth
} from './characteristics.js';
import { normalizeTag } from './sfnt-tag.js';

const debug = createDebugLogger('variations');

/** Smallest step of a 16.16 fixed-point value. */
export const COORDINATE_EPSILON = 1 / 0x10000;

export const DEFAULT_CHARACTERISTICS: Readonly<DesignCharacteristics> = Object.freeze({
  weight: 'regular',
  width: 'normal',
  slope: 'plain'
});

type CharacteristicUpdate = (design: DesignCharacteristics, value: number) => void;

const AXIS_UPDATES: ReadonlyMap<string, CharacteristicUpdate> = new Map<string, CharacteristicUpdate>([
  ['ital', (design, value) => { design.slope = slopeFromItal(value); }],
  ['slnt', (design, value) => { design.slope = slopeFromSlnt(value); }],
  ['wdth', (design, value) => { design.width = widthFromWdth(value); }],
  ['wght', (design, value) => { design.weight = weightFromWght(value); }]
]);

export function coordinatesMatch(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((value, i) => {
    const other = b[i];
    return other !== undefined && Math.abs(value - other) < COORDINATE_EPSILON;
  });
}

export function defaultCoordinates(axes: readonly VariationAxis[]): number[] {
  return axes.map((axis) => axis.defaultValue);
}

function axisTag(tag: string | number): string {
  try {
    return normalizeTag(tag);
  } catch (error) {
    if (error instanceof PreconditionError) throw new FontDataError(`Malformed axis tag: ${error.message}`);
    throw error;
  }
}

function resolveAxes(records: readonly AxisRecord[], lookup: NameLookup): VariationAxis[] {
  return records.map((record) => ({
    tag: axisTag(record.tag),
    name: lookup(record.nameId) ?? '',
    flags: record.flags,
    defaultValue: record.defaultValue,
    minValue: record.minValue,
    maxValue: record.maxValue
  }));
}

function resolveInstance(record: InstanceRecord, axisCount: number, lookup: NameLookup): NamedInstance {
  if (record.coordinates.length !== axisCount) {
    throw new FontDataError(
      `Instance record has ${record.coordinates.length} coordinates but the font declares ${axisCount} axes`
    );
  }

  const instance: NamedInstance = {
    styleName: lookup(record.nameId) ?? '',
    coordinates: Object.freeze([...record.coordinates])
  };
  const psNameId = record.postScriptNameId;
  if (psNameId !== undefined && psNameId >= 0) {
    const postScriptName = lookup(psNameId);
    if (postScriptName !== undefined) instance.postScriptName = postScriptName;
  }
  return instance;
}

/**
 * Resolves the axes and named instances of a variable font. When no instance
 * sits on the default coordinates, one is synthesized at the front of the list
 * using the face's intrinsic style name.
 */
export function resolveVariationDefaults(
  axisRecords: readonly AxisRecord[] | undefined,
  instanceRecords: readonly InstanceRecord[] | undefined,
  lookup: NameLookup,
  defaultStyleName?: string
): VariationDefaults {
  if (!axisRecords || axisRecords.length === 0) {
    return { axes: [], namedInstances: [] };
  }

  const axes = resolveAxes(axisRecords, lookup);
  const defaults = defaultCoordinates(axes);

  const seen = new Set<string>();
  for (const axis of axes) {
    if (seen.has(axis.tag)) debug(`duplicate axis tag "${axis.tag}"`);
    seen.add(axis.tag);
  }

  const namedInstances: NamedInstance[] = [];
  let hasDefaultInstance = false;

  for (const record of instanceRecords ?? []) {
    const instance = resolveInstance(record, axes.length, lookup);
    if (!hasDefaultInstance && coordinatesMatch(instance.coordinates, defaults)) {
      hasDefaultInstance = true;
    }
    namedInstances.push(instance);
  }

  if (!hasDefaultInstance) {
    debug('no named instance on default coordinates, synthesizing one');
    namedInstances.unshift({
      styleName: defaultStyleName ?? '',
      coordinates: Object.freeze(defaults)
    });
  }

  return { axes, namedInstances };
}

/** Style name of the first non-empty named instance sitting on `coordinates`. */
export function resolveNamedStyle(
  coordinates: readonly number[],
  namedInstances: readonly NamedInstance[]
): string | undefined {
  for (const instance of namedInstances) {
    if (!instance.styleName) continue;
    if (coordinatesMatch(coordinates, instance.coordinates)) return instance.styleName;
  }
  return undefined;
}

export function composeFullName(familyName: string, styleName: string): string {
  const family = familyName.trim();
  if (family && styleName) return `${family} ${styleName}`;
  return family || styleName;
}

/**
 * Derives weight, width and slope from the coordinates of the `wght`, `wdth`,
 * `ital` and `slnt` axes. Characteristics without a matching axis keep their
 * value from `base`.
 */
export function resolveDesignCharacteristics(
  coordinates: readonly number[],
  axes: readonly VariationAxis[],
  base: Readonly<DesignCharacteristics> = DEFAULT_CHARACTERISTICS
): DesignCharacteristics {
  checkArgument(
    coordinates.length === axes.length,
    `Expected ${axes.length} coordinates, got ${coordinates.length}`
  );

  const design: DesignCharacteristics = { ...base };
  axes.forEach((axis, i) => {
    const update = AXIS_UPDATES.get(axis.tag);
    const value = coordinates[i];
    if (update && value !== undefined) update(design, value);
  });
  return design;
}
