import type { DesignCharacteristics, StyleRequest } from '../types/fonts.js';
import {
  isTypeWidth,
  weightFromWght,
  widthFromWdth,
  type TypeSlope,
  type TypeWeight,
  type TypeWidth
} from './characteristics.js';

function hasToken(s: string, token: string): boolean {
  if (!s) return false;
  return s.includes(token);
}

function hasWord(s: string, word: string): boolean {
  if (!s) return false;
  return new RegExp(`(^|[^a-z0-9])${word}([^a-z0-9]|$)`, 'i').test(s);
}

function compact(name: string): string {
  return (name || '').toLowerCase().replace(/[\s_-]+/g, '');
}

export function deriveWeightFromName(name: string): TypeWeight {
  const lower = (name || '').toLowerCase();
  const num = lower.match(/(^|[^0-9])([1-9]00)([^0-9]|$)/);
  if (num) return weightFromWght(Number(num[2]));

  const s = compact(name);
  if (hasToken(s, 'thin') || hasToken(s, 'hairline')) return 'thin';
  if (hasToken(s, 'extralight') || hasToken(s, 'ultralight')) return 'extra-light';
  if (hasToken(s, 'light')) return 'light';
  if (hasToken(s, 'medium') || hasWord(lower, 'md')) return 'medium';
  if (hasToken(s, 'semibold') || hasToken(s, 'demibold') || hasWord(lower, 'demi')) return 'semi-bold';
  if (hasToken(s, 'extrabold') || hasToken(s, 'ultrabold')) return 'extra-bold';
  if (hasToken(s, 'black') || hasToken(s, 'heavy')) return 'heavy';
  if (hasToken(s, 'bold') || hasWord(lower, 'bd')) return 'bold';

  return 'regular';
}

export function deriveSlopeFromName(name: string): TypeSlope {
  const lower = (name || '').toLowerCase();

  if (hasToken(lower, 'italic') || hasWord(lower, 'it') || hasWord(lower, 'ital')) return 'italic';
  if (hasToken(lower, 'oblique') || hasToken(lower, 'slanted') || hasWord(lower, 'obl')) return 'oblique';
  return 'plain';
}

export function deriveWidthFromName(name: string): TypeWidth {
  const s = compact(name);

  if (hasToken(s, 'ultracondensed')) return 'ultra-condensed';
  if (hasToken(s, 'extracondensed')) return 'extra-condensed';
  if (hasToken(s, 'semicondensed')) return 'semi-condensed';
  if (hasToken(s, 'condensed') || hasToken(s, 'narrow')) return 'condensed';
  if (hasToken(s, 'ultraexpanded')) return 'ultra-expanded';
  if (hasToken(s, 'extraexpanded')) return 'extra-expanded';
  if (hasToken(s, 'semiexpanded')) return 'semi-expanded';
  if (hasToken(s, 'expanded') || hasToken(s, 'extended') || hasToken(s, 'wide')) return 'expanded';
  return 'normal';
}

/** Best-effort characteristics from a style or full name such as "Condensed Bold Italic". */
export function deriveStyleFromName(name: string): DesignCharacteristics {
  return {
    weight: deriveWeightFromName(name),
    width: deriveWidthFromName(name),
    slope: deriveSlopeFromName(name)
  };
}

function resolveWeight(weight: StyleRequest['weight']): TypeWeight {
  if (weight === undefined) return 'regular';
  if (typeof weight === 'number') return weightFromWght(Math.min(1000, Math.max(1, weight)));

  const value = weight.trim().toLowerCase();
  if (value === 'bold') return 'bold';
  if (value === '' || value === 'normal') return 'regular';
  const numeric = Number(value);
  if (Number.isFinite(numeric)) return weightFromWght(Math.min(1000, Math.max(1, numeric)));
  return 'regular';
}

function resolveSlope(style: StyleRequest['style']): TypeSlope {
  const value = (style || '').trim().toLowerCase();
  if (value === 'italic') return 'italic';

  const oblique = value.match(/^oblique(?:\s+(-?[0-9.]+)deg)?$/);
  if (oblique) {
    const angle = oblique[1] === undefined ? undefined : Number(oblique[1]);
    return angle === 0 ? 'plain' : 'oblique';
  }
  return 'plain';
}

function resolveWidth(stretch: StyleRequest['stretch']): TypeWidth {
  if (stretch === undefined) return 'normal';
  if (typeof stretch === 'number') return widthFromWdth(stretch);

  const value = stretch.trim().toLowerCase();
  if (isTypeWidth(value)) return value;
  const percentage = value.match(/^([0-9.]+)%$/);
  if (percentage) return widthFromWdth(Number(percentage[1]));
  return 'normal';
}

/** Converts CSS `font-weight`, `font-style` and `font-stretch` values. */
export function resolveStyleRequest(request: StyleRequest): DesignCharacteristics {
  return {
    weight: resolveWeight(request.weight),
    width: resolveWidth(request.stretch),
    slope: resolveSlope(request.style)
  };
}
