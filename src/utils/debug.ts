export type DebugLogger = (...args: unknown[]) => void;

export function isDebugEnabled(): boolean {
  if (Reflect.get(globalThis, '__TYPEFACE_DEBUG__') === true) return true;
  if (typeof process !== 'undefined' && process.env?.TYPEFACE_DEBUG === '1') return true;
  return false;
}

/**
 * Scoped `console.debug` that stays silent unless `TYPEFACE_DEBUG=1` is set or
 * `globalThis.__TYPEFACE_DEBUG__` is `true`. The flag is read on every call so
 * it can be toggled at run time.
 */
export function createDebugLogger(scope: string): DebugLogger {
  return (...args: unknown[]) => {
    if (!isDebugEnabled()) return;
    console.debug(`[${scope}]`, ...args);
  };
}
