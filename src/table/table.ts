/**
 * Table model layer.
 *
 * Binds a schema to a transport and exposes the record-level operations:
 * reads dispatch through the query planner, writes encode records and
 * guard them with native predicates.
 */

import { type Condition, AndCondition } from '../conditions/condition.js';
import type { Predicate } from '../conditions/predicate.js';
import { ValidationError } from '../error/categories.js';
import { isConditionalCheckFailure } from '../error/mapper.js';
import { batchSource } from '../iterator/batch.js';
import { paginatedSource, singleSource } from '../iterator/paginated.js';
import { type ItemSource, ResultIterator } from '../iterator/result-iterator.js';
import { type Logger, NoopLogger, logDispatch } from '../observability/logging.js';
import { type DispatchPlan, planLookup, planSingle } from '../query/dispatcher.js';
import { type ExactKey, type LookupStrategy, byRecord, resolveExact } from '../query/strategy.js';
import { type Schema, isKeyAttribute, keyAttributes } from '../schema/schema.js';
import type { Transport } from '../transport/transport.js';
import type { DocumentRecord, Item } from '../types/item.js';
import { type KeyValues, keyFingerprint, uniqueKeys } from '../types/key.js';
import type { GetManyOptions, GetOneOptions, OverwritePolicy, SaveOptions } from '../types/options.js';
import { BatchResult } from '../types/results.js';
import { type PlaceholderSequence, defaultPlaceholderSequence } from '../updates/placeholder.js';
import { compileUpdates } from '../updates/compiler.js';
import type { Update } from '../updates/update.js';

export interface TableOptions {
  transport: Transport;
  /** Prepended to the schema's table name on every request */
  tablePrefix?: string;
  /** Default read consistency (default `true`) */
  consistentRead?: boolean;
  /** Base delay before re-sending unprocessed batch get keys (milliseconds) */
  backoffBaseMs?: number;
  logger?: Logger;
  /** Placeholder source for update expressions */
  placeholders?: PlaceholderSequence;
}

/**
 * Record-level access to one table.
 *
 * @example
 * ```typescript
 * const users = client.table(userSchema);
 *
 * await users.saveOne({ user_id: 'u1', email: 'ada@example.com' }, { overwrite: false });
 * const user = await users.getOne(byHashKey('u1'));
 * await users.updateOne(byHashKey('u1'), [visits.increment()]);
 *
 * for await (const active of users.getMany(status.eq('active'))) {
 *   console.log(active.user_id);
 * }
 * ```
 */
export class Table<T extends object = DocumentRecord> {
  readonly schema: Schema<T>;
  /** Table name as sent to the store, prefix included */
  readonly tableName: string;
  private readonly transport: Transport;
  private readonly consistentRead: boolean;
  private readonly backoffBaseMs: number;
  private readonly logger: Logger;
  private readonly placeholders: PlaceholderSequence;

  constructor(schema: Schema<T>, options: TableOptions) {
    this.schema = schema;
    this.tableName = `${options.tablePrefix ?? ''}${schema.tableName}`;
    this.transport = options.transport;
    this.consistentRead = options.consistentRead ?? true;
    this.backoffBaseMs = options.backoffBaseMs ?? 0;
    this.logger = options.logger ?? new NoopLogger();
    this.placeholders = options.placeholders ?? defaultPlaceholderSequence;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * Fetches the single record identified by `strategy`.
   *
   * @throws {ValidationError} If the strategy does not name exactly one key,
   * or carries a non-key condition
   * @throws {ExpressionError} If a condition does not bind the full key with EQ
   */
  async getOne(strategy: LookupStrategy, options: GetOneOptions = {}): Promise<T | undefined> {
    const plan = planSingle(strategy, this.schema);
    if (plan.remainder !== null) {
      throw new ValidationError(`A single-item read cannot filter on ${plan.remainder.describe()}`);
    }

    logDispatch(this.logger, plan.operation, this.tableName);
    const item = await this.transport.get({
      tableName: this.tableName,
      key: plan.key,
      consistentRead: options.consistentRead ?? this.consistentRead,
    });
    return item === undefined ? undefined : this.schema.decodeRecord(item);
  }

  /**
   * Lazily fetches every record matching `strategy`.
   *
   * Planning happens immediately, so classification and encoding errors are
   * thrown here; store round trips happen as the iterator is consumed.
   *
   * @throws {ValidationError} If `limit` is not a positive integer or a point
   * lookup cannot be resolved
   * @throws {ExpressionError} If the condition misuses key attributes
   */
  getMany(strategy: LookupStrategy, options: GetManyOptions = {}): ResultIterator<T> {
    return this.iterate(strategy, options, (item) => this.schema.decodeRecord(item));
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Stores a record, replacing any item with the same key unless `overwrite`
   * says otherwise.
   *
   * @returns The record as stored, defaults applied
   * @throws {ConditionalCheckFailedError} If the overwrite guard is not met
   * @throws {ValidationError} If the record has an unknown field or a required value is empty
   */
  async saveOne(record: T, options: SaveOptions = {}): Promise<T> {
    const item = this.schema.encodeRecord(record);
    const guard = this.overwriteGuard(options.overwrite ?? true);

    logDispatch(this.logger, 'Put', this.tableName, { guarded: guard !== null });
    await this.transport.put({ tableName: this.tableName, item, condition: guard });
    return this.schema.decodeRecord(item);
  }

  /**
   * Stores several records.
   *
   * Unconditional saves go out as one batch write; records the store never
   * processed land in `failed`. When several records share a key only the
   * last of them is written and reported. Guarded saves run one at a time and a record
   * whose guard is not met lands in `failed` while the others proceed.
   * Every record is encoded before anything is written.
   */
  async saveMany(records: readonly T[], options: SaveOptions = {}): Promise<BatchResult<T, T>> {
    const items = records.map((record) => this.schema.encodeRecord(record));
    const guard = this.overwriteGuard(options.overwrite ?? true);

    if (guard === null) {
      const lastByKey = new Map<string, number>();
      items.forEach((item, index) => {
        const fingerprint = keyFingerprint(this.schema.keyOfItem(item));
        lastByKey.delete(fingerprint);
        lastByKey.set(fingerprint, index);
      });
      const indexes = [...lastByKey.values()];

      logDispatch(this.logger, 'BatchWrite', this.tableName, { puts: indexes.length });
      const { unprocessedPuts } = await this.transport.batchWrite({
        tableName: this.tableName,
        puts: indexes.map((index) => items[index]),
        deletes: [],
      });

      const unprocessed = new Set(unprocessedPuts.map((item) => keyFingerprint(this.schema.keyOfItem(item))));
      const succeeded: T[] = [];
      const failed: T[] = [];
      for (const index of indexes) {
        const item = items[index];
        if (unprocessed.has(keyFingerprint(this.schema.keyOfItem(item)))) {
          failed.push(records[index]);
        } else {
          succeeded.push(this.schema.decodeRecord(item));
        }
      }
      return new BatchResult(succeeded, failed);
    }

    const succeeded: T[] = [];
    const failed: T[] = [];
    for (const [index, item] of items.entries()) {
      try {
        await this.transport.put({ tableName: this.tableName, item, condition: guard });
        succeeded.push(this.schema.decodeRecord(item));
      } catch (error) {
        if (!isConditionalCheckFailure(error)) {
          throw error;
        }
        failed.push(records[index]);
      }
    }
    return new BatchResult(succeeded, failed);
  }

  /**
   * Deletes the single item identified by `strategy`. The non-key part of a
   * condition strategy guards the delete.
   *
   * @returns The deleted record, or `undefined` if no item had the key
   * @throws {ConditionalCheckFailedError} If the guard is not met
   */
  async deleteOne(strategy: LookupStrategy): Promise<T | undefined> {
    const plan = planSingle(strategy, this.schema);

    logDispatch(this.logger, 'Delete', this.tableName, { guarded: plan.remainder !== null });
    const old = await this.transport.delete({
      tableName: this.tableName,
      key: plan.key,
      condition: plan.remainder?.toFilterPredicate() ?? null,
    });
    return old === undefined ? undefined : this.schema.decodeRecord(old);
  }

  /**
   * Deletes every item identified by `strategy`.
   *
   * Unguarded keys go out as one batch write, each key once. Point lookups that carry a
   * condition are deleted one at a time, and a failed guard only affects its
   * own key. Any other condition is resolved to keys through a lookup first.
   *
   * @returns Deleted keys in `succeeded`; keys that were not deleted in `failed`
   */
  async deleteMany(strategy: LookupStrategy): Promise<BatchResult<KeyValues, KeyValues>> {
    let unguarded: KeyValues[];
    let guarded: ExactKey[] = [];

    switch (strategy.kind) {
      case 'points': {
        const exact = strategy.items.map((item) => resolveExact(item, this.schema));
        unguarded = exact.filter((entry) => entry.remainder === null).map((entry) => entry.key);
        guarded = exact.filter((entry) => entry.remainder !== null);
        break;
      }
      case 'hashKey':
      case 'compositeKey':
      case 'record':
        unguarded = [resolveExact(strategy, this.schema).key];
        break;
      case 'comparison':
      case 'and':
      case 'or': {
        const plan = planLookup(strategy, this.schema);
        unguarded =
          plan.operation === 'BatchGet'
            ? [...plan.keys]
            : await this.iteratePlan(plan, {}, (item) => this.schema.keyOfItem(item)).toArray();
        break;
      }
    }

    unguarded = uniqueKeys(unguarded);
    const succeeded: KeyValues[] = [];
    const failed: KeyValues[] = [];

    if (unguarded.length > 0) {
      logDispatch(this.logger, 'BatchWrite', this.tableName, { deletes: unguarded.length });
      const { unprocessedDeletes } = await this.transport.batchWrite({
        tableName: this.tableName,
        puts: [],
        deletes: unguarded,
      });
      const unprocessed = new Set(unprocessedDeletes.map(keyFingerprint));
      for (const key of unguarded) {
        (unprocessed.has(keyFingerprint(key)) ? failed : succeeded).push(key);
      }
    }

    for (const { key, remainder } of guarded) {
      try {
        await this.transport.delete({
          tableName: this.tableName,
          key,
          condition: remainder?.toFilterPredicate() ?? null,
        });
        succeeded.push(key);
      } catch (error) {
        if (!isConditionalCheckFailure(error)) {
          throw error;
        }
        failed.push(key);
      }
    }

    return new BatchResult(succeeded, failed);
  }

  /**
   * Applies updates to the single existing item identified by `strategy`.
   *
   * The write is guarded on the key attributes existing, so it never creates
   * an item; the non-key part of a condition strategy is added to the guard.
   *
   * @returns The record as it is after the update
   * @throws {ValidationError} If there is nothing to update or an update targets
   * a key attribute or an attribute the schema does not declare
   * @throws {ConditionalCheckFailedError} If the item does not exist or the guard is not met
   */
  async updateOne(strategy: LookupStrategy, updates: readonly Update[]): Promise<T> {
    if (updates.length === 0) {
      throw new ValidationError('At least one update is required');
    }
    for (const update of updates) {
      this.checkUpdateTarget(update);
    }

    const plan = planSingle(strategy, this.schema);
    const compiled = compileUpdates(updates, { sequence: this.placeholders });
    if (compiled.expression === '') {
      throw new ValidationError('The updates leave the item unchanged');
    }

    const guards: Condition[] = keyAttributes(this.schema.keySpec).map((attribute) => attribute.exists());
    if (plan.remainder !== null) {
      guards.push(plan.remainder);
    }

    logDispatch(this.logger, 'Update', this.tableName, { updates: updates.length });
    const item = await this.transport.update({
      tableName: this.tableName,
      key: plan.key,
      update: compiled,
      condition: new AndCondition(guards).toFilterPredicate(),
    });
    return this.schema.decodeRecord(item);
  }

  /**
   * Sets every non-key field of `record` on the existing item with the
   * record's key. Empty fields are removed from the item.
   */
  updateFromRecord(record: T): Promise<T> {
    const updates: Update[] = [];
    for (const [name, value] of Object.entries(record)) {
      if (!this.schema.hasAttribute(name)) {
        throw new ValidationError(`Unknown attribute "${name}" for table "${this.schema.tableName}"`, {
          attribute: name,
        });
      }
      const attribute = this.schema.attribute(name);
      if (!isKeyAttribute(this.schema.keySpec, attribute)) {
        updates.push(attribute.set(value));
      }
    }
    return this.updateOne(byRecord(record), updates);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private iterate<R>(strategy: LookupStrategy, options: GetManyOptions, decode: (item: Item) => R): ResultIterator<R> {
    if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit < 1)) {
      throw new ValidationError(`limit must be a positive integer, got ${options.limit}`);
    }
    return this.iteratePlan(planLookup(strategy, this.schema), options, decode);
  }

  private iteratePlan<R>(plan: DispatchPlan, options: GetManyOptions, decode: (item: Item) => R): ResultIterator<R> {
    const tableName = this.tableName;
    const consistentRead = options.consistentRead ?? this.consistentRead;
    const { limit } = options;
    let source: ItemSource;

    switch (plan.operation) {
      case 'Get':
        logDispatch(this.logger, plan.operation, tableName);
        source = singleSource(() => this.transport.get({ tableName, key: plan.key, consistentRead }));
        break;
      case 'BatchGet':
        logDispatch(this.logger, plan.operation, tableName, { keys: plan.keys.length });
        source = batchSource({
          transport: this.transport,
          tableName,
          keys: plan.keys,
          consistentRead,
          limit,
          backoffBaseMs: this.backoffBaseMs,
          logger: this.logger,
        });
        break;
      case 'Query':
        logDispatch(this.logger, plan.operation, tableName, { filtered: plan.filter !== null });
        source = paginatedSource(
          (cursor, pageLimit) =>
            this.transport.query({
              tableName,
              keyCondition: plan.keyCondition,
              filter: plan.filter,
              cursor,
              limit: pageLimit,
              forward: !(options.descending ?? false),
              consistentRead,
            }),
          limit
        );
        break;
      case 'Scan':
        this.logger.warn('Scanning table', { tableName, filtered: plan.filter !== null });
        source = paginatedSource(
          (cursor, pageLimit) =>
            this.transport.scan({ tableName, filter: plan.filter, cursor, limit: pageLimit, consistentRead }),
          limit
        );
        break;
    }

    return new ResultIterator(source, decode);
  }

  private overwriteGuard(overwrite: OverwritePolicy): Predicate | null {
    if (overwrite === true) {
      return null;
    }
    if (overwrite === false) {
      const absent = keyAttributes(this.schema.keySpec).map((attribute) => attribute.notExists());
      return new AndCondition(absent).toFilterPredicate();
    }
    return overwrite.toFilterPredicate();
  }

  private checkUpdateTarget(update: Update): void {
    const [topLevel] = update.attribute.path;
    if (!this.schema.hasAttribute(topLevel)) {
      throw new ValidationError(`Unknown attribute "${update.attribute.name}" for table "${this.schema.tableName}"`, {
        attribute: update.attribute.name,
      });
    }
    if (isKeyAttribute(this.schema.keySpec, update.attribute)) {
      throw new ValidationError(`Key attribute "${update.attribute.name}" cannot be updated`, {
        attribute: update.attribute.name,
      });
    }
  }
}
