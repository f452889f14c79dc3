export class TypefaceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The caller broke an operation's contract, e.g. passed the wrong number of coordinates. */
export class PreconditionError extends TypefaceError {}

/** The operation needs a font feature (variations, color palettes) the typeface does not have. */
export class UnsupportedFeatureError extends TypefaceError {}

/** Table records handed over by a font source contradict their own declared counts. */
export class FontDataError extends TypefaceError {}

export function checkArgument(condition: boolean, message: string): asserts condition {
  if (!condition) throw new PreconditionError(message);
}
