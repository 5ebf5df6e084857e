import { ConcurrentMutationConflictError } from "../config/errors.js";

/**
 * Synchronous critical section around read-then-write state changes.
 *
 * Every core mutation is synchronous, so holding the gate for the duration of
 * `fn` serializes it against every other mutation on the same gate. The only
 * way to observe the gate as held is re-entry from inside `fn`, which is a
 * programming error and throws `ConcurrentMutationConflictError`.
 */
export class MutationGate {
  private readonly name: string;
  private active: string | null = null;

  constructor(name: string) {
    this.name = name;
  }

  get isHeld(): boolean {
    return this.active !== null;
  }

  run<T>(label: string, fn: () => T): T {
    if (this.active !== null) {
      throw new ConcurrentMutationConflictError(`${this.name}:${this.active}`, `${this.name}:${label}`);
    }
    this.active = label;
    try {
      return fn();
    } finally {
      this.active = null;
    }
  }
}
