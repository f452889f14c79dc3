export interface FontFileOptions {
  /**
   * Replace each variable face by one typeface per named instance. When off,
   * every face yields a single typeface at its default coordinates.
   */
  expandNamedInstances: boolean;
}

export const DEFAULT_FONT_FILE_OPTIONS: Readonly<FontFileOptions> = Object.freeze({
  expandNamedInstances: true
});

// Convenience option presets
export const FontFilePresets = {
  /** Every named instance as its own typeface, the way font menus list them. */
  instances: { expandNamedInstances: true },
  /** One typeface per face; callers pick coordinates themselves. */
  faces: { expandNamedInstances: false }
} satisfies Record<string, FontFileOptions>;
