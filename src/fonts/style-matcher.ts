import type { DesignCharacteristics } from '../types/fonts.js';
import { PreconditionError } from '../errors.js';
import {
  slopeRank,
  weightRank,
  widthRank,
  type TypeSlope,
  type TypeWeight,
  type TypeWidth
} from './characteristics.js';

// Gap tables follow the CSS font matching algorithm. Rows are the desired
// value, columns the candidate value; a lower gap is a better match.

const SLOPE_GAPS: readonly (readonly number[])[] = [
  // "If the value is normal, normal faces are checked first, then oblique
  // faces, then italic faces."
  /*   plain */ [0, 2, 1],
  // "If the value is italic, italic faces are checked first, then oblique,
  // then normal faces."
  /*  italic */ [2, 0, 1],
  // "If the value is oblique, oblique faces are checked first, then italic
  // faces and then normal faces."
  /* oblique */ [2, 1, 0]
];

const WEIGHT_GAPS: readonly (readonly number[])[] = [
  // "If the desired weight is less than 400, weights below the desired weight
  // are checked in descending order followed by weights above the desired
  // weight in ascending order until a match is found."
  /* 100 */ [0, 1, 2, 3, 4, 5, 6, 7, 8],
  /* 200 */ [1, 0, 2, 3, 4, 5, 6, 7, 8],
  /* 300 */ [2, 1, 0, 3, 4, 5, 6, 7, 8],
  // "If the desired weight is 400, 500 is checked first and then the rule for
  // desired weights less than 400 is used."
  /* 400 */ [4, 3, 2, 0, 1, 5, 6, 7, 8],
  // "If the desired weight is 500, 400 is checked first and then the rule for
  // desired weights less than 400 is used."
  /* 500 */ [4, 3, 2, 1, 0, 5, 6, 7, 8],
  // "If the desired weight is greater than 500, weights above the desired
  // weight are checked in ascending order followed by weights below the
  // desired weight in descending order until a match is found."
  /* 600 */ [8, 7, 6, 5, 4, 0, 1, 2, 3],
  /* 700 */ [8, 7, 6, 5, 4, 3, 0, 1, 2],
  /* 800 */ [8, 7, 6, 5, 4, 3, 2, 0, 1],
  /* 900 */ [8, 7, 6, 5, 4, 3, 2, 1, 0]
];

function tableGap(table: readonly (readonly number[])[], row: number, column: number): number {
  const gap = table[row]?.[column];
  if (gap === undefined) throw new PreconditionError(`No gap defined for ${row}x${column}`);
  return gap;
}

export function widthGap(desired: TypeWidth, candidate: TypeWidth): number {
  return Math.abs(widthRank(desired) - widthRank(candidate));
}

export function slopeGap(desired: TypeSlope, candidate: TypeSlope): number {
  return tableGap(SLOPE_GAPS, slopeRank(desired), slopeRank(candidate));
}

export function weightGap(desired: TypeWeight, candidate: TypeWeight): number {
  return tableGap(WEIGHT_GAPS, weightRank(desired), weightRank(candidate));
}

export type StyledFace = Readonly<DesignCharacteristics>;

export type MatchDeltas = { width: number; slope: number; weight: number };

/** Gap deltas of `candidate` against `best`; negative means `candidate` is closer. */
export function matchDeltas(desired: StyledFace, candidate: StyledFace, best: StyledFace): MatchDeltas {
  return {
    width: widthGap(desired.width, candidate.width) - widthGap(desired.width, best.width),
    slope: slopeGap(desired.slope, candidate.slope) - slopeGap(desired.slope, best.slope),
    weight: weightGap(desired.weight, candidate.weight) - weightGap(desired.weight, best.weight)
  };
}

/**
 * True when `candidate` should replace `best`: no level (width, slope,
 * weight) is worse and at least one is better.
 */
export function improvesMatch(desired: StyledFace, candidate: StyledFace, best: StyledFace): boolean {
  const { width, slope, weight } = matchDeltas(desired, candidate, best);
  if (width > 0) return false;
  if (slope > 0) return false;
  if (weight > 0) return false;
  return width < 0 || slope < 0 || weight < 0;
}

/**
 * Picks the face best matching the desired width, weight and slope with a
 * single left-to-right scan. A candidate worse than the current best at any
 * level is rejected; faces that match equally well keep their list order.
 */
export function selectBestMatch<T extends StyledFace>(
  family: readonly T[] | { readonly typefaces: readonly T[] },
  width: TypeWidth,
  weight: TypeWeight,
  slope: TypeSlope
): T {
  const faces = 'typefaces' in family ? family.typefaces : family;
  const first = faces[0];
  if (first === undefined) {
    throw new PreconditionError('Cannot match a style against an empty family');
  }

  const desired: StyledFace = { width, weight, slope };
  let best = first;
  for (const current of faces.slice(1)) {
    if (improvesMatch(desired, current, best)) best = current;
  }
  return best;
}
