/**
 * Lazy, single-use sequence of decoded records.
 */

import type { Item } from '../types/item.js';
import type { KeyValues } from '../types/key.js';

/**
 * State an item source reports back to its iterator.
 */
export interface IterationState {
  /** Batch keys given up on after the retry policy was exhausted */
  unresolvedKeys: KeyValues[];
}

/**
 * Produces raw items, recording anything it could not fetch in `state`.
 */
export type ItemSource = (state: IterationState) => AsyncGenerator<Item, void, undefined>;

/**
 * Async iterator over the records produced by one dispatched lookup.
 *
 * Store round trips happen as the iterator is consumed. It cannot be
 * restarted: issue the lookup again to iterate again.
 *
 * @example
 * ```typescript
 * const results = table.getMany(keysIn(['u1', 'u2']));
 * for await (const user of results) {
 *   console.log(user.name);
 * }
 * if (results.unresolvedKeys.length > 0) {
 *   // the store kept declining these keys
 * }
 * ```
 */
export class ResultIterator<T> implements AsyncIterableIterator<T> {
  private readonly state: IterationState = { unresolvedKeys: [] };
  private readonly items: AsyncGenerator<Item, void, undefined>;
  private finished = false;

  constructor(
    source: ItemSource,
    private readonly decode: (item: Item) => T
  ) {
    this.items = source(this.state);
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    const result = await this.items.next();
    if (result.done) {
      this.finished = true;
      return { done: true, value: undefined };
    }
    return { done: false, value: this.decode(result.value) };
  }

  async return(): Promise<IteratorResult<T, undefined>> {
    await this.items.return(undefined);
    this.finished = true;
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  /**
   * Whether the underlying source has been exhausted or closed.
   */
  get done(): boolean {
    return this.finished;
  }

  /**
   * Batch keys that were never retrieved. Only meaningful once `done`.
   */
  get unresolvedKeys(): readonly KeyValues[] {
    return this.state.unresolvedKeys;
  }

  /**
   * Drains the iterator into an array.
   */
  async toArray(): Promise<T[]> {
    const records: T[] = [];
    for await (const record of this) {
      records.push(record);
    }
    return records;
  }
}
