import type { StyleRequest } from '../types/fonts.js';
import { checkArgument } from '../errors.js';
import type { TypeSlope, TypeWeight, TypeWidth } from './characteristics.js';
import { resolveStyleRequest } from './font-style.js';
import { selectBestMatch } from './style-matcher.js';
import type { Typeface } from './typeface.js';

/** A named, non-empty collection of related typefaces. */
export class TypeFamily {
  readonly familyName: string;
  readonly typefaces: readonly Typeface[];

  constructor(familyName: string, typefaces: readonly Typeface[]) {
    checkArgument(typefaces.length > 0, 'Typefaces list cannot be empty');
    this.familyName = familyName;
    this.typefaces = Object.freeze([...typefaces]);
  }

  getTypefaceByStyle(width: TypeWidth, weight: TypeWeight, slope: TypeSlope): Typeface {
    return selectBestMatch(this.typefaces, width, weight, slope);
  }

  /** Matches CSS-style `font-weight` / `font-style` / `font-stretch` values. */
  getTypefaceForRequest(request: StyleRequest): Typeface {
    const { width, weight, slope } = resolveStyleRequest(request);
    return this.getTypefaceByStyle(width, weight, slope);
  }

  toString(): string {
    return `TypeFamily{familyName=${this.familyName}, typefaces=[${this.typefaces.join(', ')}]}`;
  }
}

/**
 * Groups typefaces by family name. Families and their members keep the order
 * in which they first appear.
 */
export function groupIntoFamilies(typefaces: readonly Typeface[]): TypeFamily[] {
  const groups = new Map<string, Typeface[]>();
  for (const typeface of typefaces) {
    const list = groups.get(typeface.familyName);
    if (list) list.push(typeface);
    else groups.set(typeface.familyName, [typeface]);
  }
  return Array.from(groups, ([familyName, members]) => new TypeFamily(familyName, members));
}
