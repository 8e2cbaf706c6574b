/**
 * Monotonic placeholder source for update expressions.
 *
 * Every placeholder handed out is unique for the lifetime of the sequence, so
 * expressions compiled from the same sequence never collide.
 */
export class PlaceholderSequence {
  private counter: number;

  constructor(start: number = 0) {
    this.counter = start;
  }

  next(): number {
    return this.counter++;
  }

  /**
   * Fresh attribute-name placeholder (e.g. `#u0`).
   */
  name(): string {
    return `#u${this.next()}`;
  }

  /**
   * Fresh value placeholder (e.g. `:u1`).
   */
  value(): string {
    return `:u${this.next()}`;
  }
}

/**
 * Sequence used when a caller does not inject one.
 */
export const defaultPlaceholderSequence = new PlaceholderSequence();
