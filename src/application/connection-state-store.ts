import type { ConnectionState } from '../domain/index.js';

type StatePatch = Partial<ConnectionState>;

/**
 * Holder for the shared `ConnectionState` snapshot.
 *
 * Writers never touch fields in place: `update()` builds a new frozen
 * object and swaps it in. Since `get()`/`update()` are synchronous on a
 * single-threaded loop, a reader always sees one complete snapshot.
 */
export class ConnectionStateStore {
  private state: Readonly<ConnectionState>;

  constructor(initial: ConnectionState) {
    this.state = Object.freeze({ ...initial });
  }

  get(): Readonly<ConnectionState> {
    return this.state;
  }

  /** Applies a patch (or a patch derived from the current snapshot). */
  update(patch: StatePatch | ((current: Readonly<ConnectionState>) => StatePatch)): Readonly<ConnectionState> {
    const delta = typeof patch === 'function' ? patch(this.state) : patch;
    this.state = Object.freeze({ ...this.state, ...delta });
    return this.state;
  }
}
