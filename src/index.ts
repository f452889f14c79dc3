export * from './types/fonts.js';
export * from './types/config.js';
export * from './errors.js';

export * from './fonts/characteristics.js';
export * from './fonts/sfnt-tag.js';
export {
  COORDINATE_EPSILON,
  DEFAULT_CHARACTERISTICS,
  composeFullName,
  coordinatesMatch,
  resolveDesignCharacteristics,
  resolveNamedStyle,
  resolveVariationDefaults
} from './fonts/variation-resolver.js';
export { NO_NAME_ID, resolvePaletteDefaults, selectDefaultPalette } from './fonts/palette-resolver.js';
export {
  improvesMatch,
  matchDeltas,
  selectBestMatch,
  slopeGap,
  weightGap,
  widthGap,
  type MatchDeltas,
  type StyledFace
} from './fonts/style-matcher.js';
export { Typeface } from './fonts/typeface.js';
export { TypeFamily, groupIntoFamilies } from './fonts/type-family.js';
export { FontFile } from './fonts/font-file.js';
export * from './fonts/font-style.js';
export { createMemoryFontSource, type MemoryFontSourceInit } from './fonts/font-source.js';
export { createFontkitSource, createFontkitSources } from './fonts/fontkit-source.js';

export { Lazy } from './utils/lazy.js';
export { createDebugLogger, isDebugEnabled, type DebugLogger } from './utils/debug.js';
