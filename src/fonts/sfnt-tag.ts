import { PreconditionError } from '../errors.js';

/** Packs a four-character tag such as `wght` into its 32-bit form. */
export function makeTag(tag: string): number {
  if (tag.length !== 4) {
    throw new PreconditionError(`SFNT tag must have exactly 4 characters, got "${tag}"`);
  }
  let value = 0;
  for (let i = 0; i < 4; i++) {
    const code = tag.charCodeAt(i);
    if (code < 0x20 || code > 0x7e) {
      throw new PreconditionError(`SFNT tag "${tag}" contains a non-printable character`);
    }
    value = (value << 8) | code;
  }
  return value >>> 0;
}

export function tagToString(tag: number): string {
  return String.fromCharCode((tag >>> 24) & 0xff, (tag >>> 16) & 0xff, (tag >>> 8) & 0xff, tag & 0xff);
}

/** Accepts either representation and returns the four-character string. */
export function normalizeTag(tag: string | number): string {
  if (typeof tag === 'number') return tagToString(tag);
  return tagToString(makeTag(tag));
}
