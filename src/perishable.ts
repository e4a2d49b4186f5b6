export type Clock = () => number;

/**
 * Holds a value that is only considered valid until an expiry instant.
 *
 * The ingest path calls `freshen()` whenever it updates whatever the value
 * stands for; readers such as the metrics scrape call `fresh()` and get
 * nothing once updates have stopped for longer than the last validity window.
 * The expiry is a single number, so a read racing a freshen on the event
 * loop sees either the old or the new instant, never a mix.
 */
export class Perishable<T> {
  private expiresAt = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly value: T,
    private readonly clock: Clock = () => Date.now()
  ) {}

  /**
   * Marks the value valid for `validForMs` from now and returns it so the
   * caller can update it in place.
   */
  freshen(validForMs: number): T {
    this.expiresAt = this.clock() + validForMs;
    return this.value;
  }

  fresh(): T | undefined {
    return this.clock() < this.expiresAt ? this.value : undefined;
  }

  map<U>(fn: (value: T) => U): U | undefined {
    const value = this.fresh();
    return value === undefined ? undefined : fn(value);
  }
}
