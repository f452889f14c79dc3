import { TypefaceError } from '../errors.js';

type LazyState<T> =
  | { status: 'uninitialized'; compute: () => T }
  | { status: 'initializing' }
  | { status: 'ready'; value: T }
  | { status: 'failed'; error: unknown };

/**
 * Compute-once cell. The first `get()` runs the initializer and publishes its
 * result; later reads return the same value. Readers never see a partially
 * built value: a read issued from inside the initializer throws, and a failed
 * initializer rethrows its error on every read without running again.
 */
export class Lazy<T> {
  private state: LazyState<T>;

  constructor(compute: () => T) {
    this.state = { status: 'uninitialized', compute };
  }

  static of<T>(value: T): Lazy<T> {
    const lazy = new Lazy<T>(() => value);
    lazy.get();
    return lazy;
  }

  get status(): LazyState<T>['status'] {
    return this.state.status;
  }

  get(): T {
    const state = this.state;
    switch (state.status) {
      case 'ready':
        return state.value;
      case 'failed':
        throw state.error;
      case 'initializing':
        throw new TypefaceError('Lazy value was read while it was being initialized');
      case 'uninitialized': {
        this.state = { status: 'initializing' };
        try {
          const value = state.compute();
          this.state = { status: 'ready', value };
          return value;
        } catch (error) {
          this.state = { status: 'failed', error };
          throw error;
        }
      }
    }
  }
}
