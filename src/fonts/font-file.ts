import type { FontSource } from '../types/fonts.js';
import type { FontFileOptions } from '../types/config.js';
import { DEFAULT_FONT_FILE_OPTIONS } from '../types/config.js';
import { checkArgument } from '../errors.js';
import { Lazy } from '../utils/lazy.js';
import { createDebugLogger } from '../utils/debug.js';
import { groupIntoFamilies, type TypeFamily } from './type-family.js';
import { Typeface } from './typeface.js';

const debug = createDebugLogger('font-file');

function isFaceList(faces: FontSource | readonly FontSource[]): faces is readonly FontSource[] {
  return Array.isArray(faces);
}

/**
 * The faces of one font file. Typefaces are built on first access; a
 * variable face contributes one typeface per named instance unless
 * `expandNamedInstances` is turned off.
 */
export class FontFile {
  private readonly faces: readonly FontSource[];
  private readonly options: FontFileOptions;
  private readonly typefaces: Lazy<readonly Typeface[]>;

  constructor(faces: FontSource | readonly FontSource[], options: Partial<FontFileOptions> = {}) {
    this.faces = isFaceList(faces) ? [...faces] : [faces];
    checkArgument(this.faces.length > 0, 'A font file needs at least one face');
    this.options = { ...DEFAULT_FONT_FILE_OPTIONS, ...options };
    this.typefaces = new Lazy(() => Object.freeze(this.loadTypefaces()));
  }

  get faceCount(): number {
    return this.faces.length;
  }

  private loadTypefaces(): Typeface[] {
    const all: Typeface[] = [];

    this.faces.forEach((face, index) => {
      const root = Typeface.fromSource(face);
      const namedInstances = root.namedInstances;

      if (!this.options.expandNamedInstances || !namedInstances) {
        all.push(root);
        return;
      }

      debug(`face ${index}: expanding ${namedInstances.length} named instances of "${root.familyName}"`);
      for (const instance of namedInstances) {
        all.push(root.getVariationInstance(instance.coordinates));
      }
    });

    return all;
  }

  getTypefaces(): readonly Typeface[] {
    return this.typefaces.get();
  }

  getFamilies(): TypeFamily[] {
    return groupIntoFamilies(this.getTypefaces());
  }
}
