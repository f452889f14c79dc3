export const TYPE_WIDTHS = [
  'ultra-condensed',
  'extra-condensed',
  'condensed',
  'semi-condensed',
  'normal',
  'semi-expanded',
  'expanded',
  'extra-expanded',
  'ultra-expanded'
] as const;

export const TYPE_WEIGHTS = [
  'thin',
  'extra-light',
  'light',
  'regular',
  'medium',
  'semi-bold',
  'bold',
  'extra-bold',
  'heavy'
] as const;

export const TYPE_SLOPES = ['plain', 'italic', 'oblique'] as const;

export type TypeWidth = (typeof TYPE_WIDTHS)[number];
export type TypeWeight = (typeof TYPE_WEIGHTS)[number];
export type TypeSlope = (typeof TYPE_SLOPES)[number];

// Upper bounds (exclusive) of each bucket but the last. Width breakpoints sit
// halfway between the OS/2 width class percentages 50, 62.5, 75, 87.5, 100,
// 112.5, 125, 150 and 200.
const WDTH_BREAKPOINTS = [56.25, 68.75, 81.25, 93.75, 106.25, 118.75, 137.5, 175] as const;
const WGHT_BREAKPOINTS = [150, 250, 350, 450, 550, 650, 750, 850] as const;

const FS_SELECTION_ITALIC = 1 << 0;
const FS_SELECTION_OBLIQUE = 1 << 9;

function bucketIndex(value: number, breakpoints: readonly number[]): number {
  let i = 0;
  for (const breakpoint of breakpoints) {
    if (value < breakpoint) break;
    i++;
  }
  return i;
}

export function widthRank(width: TypeWidth): number {
  return TYPE_WIDTHS.indexOf(width);
}

export function weightRank(weight: TypeWeight): number {
  return TYPE_WEIGHTS.indexOf(weight);
}

export function slopeRank(slope: TypeSlope): number {
  return TYPE_SLOPES.indexOf(slope);
}

/** Maps a `wdth` axis value (percent of normal width). */
export function widthFromWdth(wdth: number): TypeWidth {
  if (!Number.isFinite(wdth)) return 'normal';
  return TYPE_WIDTHS[bucketIndex(wdth, WDTH_BREAKPOINTS)] ?? 'ultra-expanded';
}

/** Maps a `wght` axis value or an OS/2 `usWeightClass`. */
export function weightFromWght(wght: number): TypeWeight {
  if (!Number.isFinite(wght)) return 'regular';
  return TYPE_WEIGHTS[bucketIndex(wght, WGHT_BREAKPOINTS)] ?? 'heavy';
}

export function slopeFromItal(ital: number): TypeSlope {
  return ital >= 1 ? 'italic' : 'plain';
}

export function slopeFromSlnt(slnt: number): TypeSlope {
  return slnt !== 0 && Number.isFinite(slnt) ? 'oblique' : 'plain';
}

/** Maps an OS/2 `usWidthClass` (1..9); out of range values are clamped. */
export function widthFromWidthClass(widthClass: number): TypeWidth {
  if (!Number.isFinite(widthClass)) return 'normal';
  const index = Math.min(9, Math.max(1, Math.round(widthClass))) - 1;
  return TYPE_WIDTHS[index] ?? 'normal';
}

/** Maps OS/2 `fsSelection` flags; the oblique bit wins over the italic bit. */
export function slopeFromSelection(selection: number): TypeSlope {
  if (selection & FS_SELECTION_OBLIQUE) return 'oblique';
  if (selection & FS_SELECTION_ITALIC) return 'italic';
  return 'plain';
}

/** CSS numeric weight (100..900) of a weight bucket. */
export function weightValue(weight: TypeWeight): number {
  return (weightRank(weight) + 1) * 100;
}

export function isTypeWidth(value: string): value is TypeWidth {
  return TYPE_WIDTHS.some((candidate) => candidate === value);
}

export function isTypeWeight(value: string): value is TypeWeight {
  return TYPE_WEIGHTS.some((candidate) => candidate === value);
}

export function isTypeSlope(value: string): value is TypeSlope {
  return TYPE_SLOPES.some((candidate) => candidate === value);
}
