/**
 * Tests for Table
 */

import { type MockInstance, describe, it, expect, vi, beforeEach } from 'vitest';
import { Table } from '../table.js';
import { stringAttribute } from '../../attributes/factories.js';
import { ConditionalCheckFailedError, ExpressionError, ValidationError } from '../../error/categories.js';
import { NoopLogger } from '../../observability/logging.js';
import { byHashKey, byKey, keysIn, points } from '../../query/strategy.js';
import { PlaceholderSequence } from '../../updates/placeholder.js';
import {
  type Account,
  type Contact,
  accountId,
  accountSchema,
  city,
  contactSchema,
  email,
  nickname,
  owner,
  plan,
  tags,
  userId,
  visits,
} from '../../__tests__/helpers/fixtures.js';
import { MemoryTransport } from '../../__tests__/helpers/memory-transport.js';

describe('Table', () => {
  let transport: MemoryTransport;
  let logger: NoopLogger;
  let warn: MockInstance<Parameters<NoopLogger['warn']>, void>;
  let contacts: Table<Contact>;
  let accounts: Table<Account>;

  beforeEach(() => {
    transport = new MemoryTransport({
      tables: { contacts: ['user_id', 'email'], accounts: ['account_id'], test_accounts: ['account_id'] },
    });
    logger = new NoopLogger();
    warn = vi.spyOn(logger, 'warn');
    contacts = new Table(contactSchema(), { transport, logger, placeholders: new PlaceholderSequence() });
    accounts = new Table(accountSchema(), { transport, logger, placeholders: new PlaceholderSequence() });
  });

  function seedContacts(): void {
    transport.seed('contacts', [
      { user_id: 'u1', email: 'e2', visits: 2, nickname: 'Bea' },
      { user_id: 'u1', email: 'e1', visits: 1, nickname: 'Ada', tags: ['a'], profile: { city: 'Lyon' } },
      { user_id: 'u1', email: 'e3', visits: 3 },
      { user_id: 'u2', email: 'e1', visits: 9, nickname: 'Ada' },
    ]);
  }

  function seedAccounts(): void {
    transport.seed('accounts', [
      { account_id: 'a1', owner: 'o1', plan: 'free' },
      { account_id: 'a2', owner: 'o2', plan: 'pro' },
      { account_id: 'a3', owner: 'o3', plan: 'free' },
    ]);
  }

  describe('Table name', () => {
    it('should prepend the table prefix', async () => {
      const prefixed = new Table(accountSchema(), { transport, tablePrefix: 'test_' });

      await prefixed.saveOne({ account_id: 'a1', owner: 'o1' });

      expect(prefixed.tableName).toBe('test_accounts');
      expect(transport.items('test_accounts')).toEqual([{ account_id: 'a1', owner: 'o1' }]);
      expect(transport.items('accounts')).toEqual([]);
    });
  });

  describe('getOne', () => {
    beforeEach(seedContacts);

    it('should get a record by key', async () => {
      const contact = await contacts.getOne(byKey('u1', 'e3'));

      expect(contact).toEqual({ user_id: 'u1', email: 'e3', visits: 3 });
      expect(transport.calls).toEqual([
        {
          operation: 'get',
          request: { tableName: 'contacts', key: { user_id: 'u1', email: 'e3' }, consistentRead: true },
        },
      ]);
    });

    it('should resolve undefined for a missing record', async () => {
      expect(await contacts.getOne(byKey('u9', 'e1'))).toBeUndefined();
    });

    it('should accept an exact key condition', async () => {
      const contact = await contacts.getOne(userId.eq('u2').and(email.eq('e1')));

      expect(contact?.nickname).toBe('Ada');
    });

    it('should honour a per-call read consistency', async () => {
      await contacts.getOne(byKey('u1', 'e1'), { consistentRead: false });

      expect(transport.calls[0]).toMatchObject({ request: { consistentRead: false } });
    });

    it('should reject a non-key condition before calling the store', async () => {
      const condition = userId.eq('u1').and(email.eq('e1')).and(nickname.eq('Ada'));

      await expect(contacts.getOne(condition)).rejects.toThrow('A single-item read cannot filter on nickname == "Ada"');
      expect(transport.calls).toEqual([]);
    });

    it('should reject a condition that leaves the range key open', async () => {
      await expect(contacts.getOne(userId.eq('u1'))).rejects.toThrow(ExpressionError);
      expect(transport.calls).toEqual([]);
    });
  });

  describe('getMany', () => {
    beforeEach(() => {
      seedContacts();
      seedAccounts();
    });

    it('should batch get points in request order', async () => {
      const found = await accounts.getMany(keysIn(['a3', 'a9', 'a1'])).toArray();

      expect(found.map((account) => account.account_id)).toEqual(['a3', 'a1']);
      expect(transport.operations()).toEqual(['batchGet']);
    });

    it('should batch get IN on the hash key', async () => {
      const found = await accounts.getMany(accountId.in(['a2', 'a9'])).toArray();

      expect(found).toEqual([{ account_id: 'a2', owner: 'o2', plan: 'pro' }]);
      expect(transport.operations()).toEqual(['batchGet']);
    });

    it('should query by hash key in range key order', async () => {
      const found = await contacts.getMany(userId.eq('u1')).toArray();

      expect(found.map((contact) => contact.email)).toEqual(['e1', 'e2', 'e3']);
      expect(transport.calls[0]).toEqual({
        operation: 'query',
        request: {
          tableName: 'contacts',
          keyCondition: { kind: 'comparison', path: ['user_id'], operator: 'EQ', operands: ['u1'] },
          filter: null,
          cursor: undefined,
          limit: undefined,
          forward: true,
          consistentRead: true,
        },
      });
    });

    it('should query in descending order', async () => {
      const found = await contacts.getMany(userId.eq('u1'), { descending: true }).toArray();

      expect(found.map((contact) => contact.email)).toEqual(['e3', 'e2', 'e1']);
    });

    it('should filter a query on non-key attributes', async () => {
      const found = await contacts.getMany(userId.eq('u1').and(visits.gte(2))).toArray();

      expect(found.map((contact) => contact.email)).toEqual(['e2', 'e3']);
      expect(transport.calls[0]).toMatchObject({
        request: { filter: { kind: 'comparison', path: ['visits'], operator: 'GTE', operands: [2] } },
      });
    });

    it('should scan when no key is bound and warn about it', async () => {
      const found = await contacts.getMany(nickname.eq('Ada')).toArray();

      expect(found.map((contact) => contact.user_id)).toEqual(['u1', 'u2']);
      expect(transport.operations()).toEqual(['scan']);
      expect(warn).toHaveBeenCalledWith('Scanning table', { tableName: 'contacts', filtered: true });
    });

    it('should stop at the limit within one page', async () => {
      const found = await contacts.getMany(userId.eq('u1'), { limit: 2 }).toArray();

      expect(found.map((contact) => contact.email)).toEqual(['e1', 'e2']);
      expect(transport.calls).toHaveLength(1);
      expect(transport.calls[0]).toMatchObject({ request: { limit: 2 } });
    });

    it('should follow scan pages', async () => {
      const paged = new MemoryTransport({ tables: { accounts: ['account_id'] }, pageSize: 1 });
      paged.seed('accounts', [
        { account_id: 'a1', owner: 'o1' },
        { account_id: 'a2', owner: 'o2' },
        { account_id: 'a3', owner: 'o3' },
      ]);
      const table = new Table(accountSchema(), { transport: paged });

      const found = await table.getMany(owner.beginsWith('o')).toArray();

      expect(found).toHaveLength(3);
      expect(paged.operations()).toEqual(['scan', 'scan', 'scan']);
    });

    it('should not call the store until iterated', () => {
      contacts.getMany(userId.eq('u1'));

      expect(transport.calls).toEqual([]);
    });

    it('should reject an invalid limit', () => {
      expect(() => contacts.getMany(userId.eq('u1'), { limit: 0 })).toThrow(
        new ValidationError('limit must be a positive integer, got 0')
      );
      expect(() => contacts.getMany(userId.eq('u1'), { limit: 1.5 })).toThrow(ValidationError);
    });

    it('should throw planning errors immediately', () => {
      expect(() => contacts.getMany(userId.gt('u1'))).toThrow(
        'An equality expression was required for the hash key "user_id"'
      );
      expect(transport.calls).toEqual([]);
    });
  });

  describe('saveOne', () => {
    it('should store the record with defaults applied', async () => {
      const saved = await contacts.saveOne({ user_id: 'u1', email: 'e1', nickname: '' });

      expect(saved).toEqual({ user_id: 'u1', email: 'e1', status: 'active' });
      expect(transport.find('contacts', { user_id: 'u1', email: 'e1' })).toEqual({
        user_id: 'u1',
        email: 'e1',
        status: 'active',
      });
      expect(transport.calls[0]).toMatchObject({ request: { condition: null } });
    });

    it('should replace an existing item by default', async () => {
      seedAccounts();

      await accounts.saveOne({ account_id: 'a1', owner: 'o9' });

      expect(transport.find('accounts', { account_id: 'a1' })).toEqual({ account_id: 'a1', owner: 'o9' });
    });

    it('should refuse to overwrite when asked', async () => {
      seedAccounts();

      await expect(accounts.saveOne({ account_id: 'a1', owner: 'o9' }, { overwrite: false })).rejects.toBeInstanceOf(
        ConditionalCheckFailedError
      );
      expect(transport.find('accounts', { account_id: 'a1' })).toEqual({ account_id: 'a1', owner: 'o1', plan: 'free' });
    });

    it('should guard a create on every key attribute', async () => {
      await contacts.saveOne({ user_id: 'u1', email: 'e1' }, { overwrite: false });

      expect(transport.calls[0]).toMatchObject({
        request: {
          condition: {
            kind: 'and',
            children: [
              { kind: 'comparison', path: ['user_id'], operator: 'NOT_EXISTS', operands: [] },
              { kind: 'comparison', path: ['email'], operator: 'NOT_EXISTS', operands: [] },
            ],
          },
        },
      });
    });

    it('should overwrite only when the condition holds', async () => {
      seedAccounts();

      await accounts.saveOne({ account_id: 'a1', owner: 'o1', plan: 'pro' }, { overwrite: plan.eq('free') });
      const second = accounts.saveOne({ account_id: 'a1', owner: 'o1', plan: 'team' }, { overwrite: plan.eq('free') });

      await expect(second).rejects.toBeInstanceOf(ConditionalCheckFailedError);
      expect(transport.find('accounts', { account_id: 'a1' })).toEqual({ account_id: 'a1', owner: 'o1', plan: 'pro' });
    });

    it('should reject an empty required field before calling the store', async () => {
      await expect(accounts.saveOne({ account_id: 'a1', owner: '' })).rejects.toThrow(
        'Attribute "owner" is required and cannot be empty'
      );
      expect(transport.calls).toEqual([]);
    });
  });

  describe('saveMany', () => {
    it('should write unguarded records in one batch', async () => {
      const result = await accounts.saveMany([
        { account_id: 'a1', owner: 'o1' },
        { account_id: 'a2', owner: 'o2' },
      ]);

      expect(result.successCount).toBe(2);
      expect(result.failed).toEqual([]);
      expect(transport.operations()).toEqual(['batchWrite']);
      expect(transport.items('accounts')).toHaveLength(2);
    });

    it('should report unprocessed records as failed', async () => {
      vi.spyOn(transport, 'batchWrite').mockResolvedValueOnce({
        unprocessedPuts: [{ account_id: 'a2', owner: 'o2' }],
        unprocessedDeletes: [],
      });
      const second: Account = { account_id: 'a2', owner: 'o2' };

      const result = await accounts.saveMany([{ account_id: 'a1', owner: 'o1' }, second]);

      expect(result.succeeded).toEqual([{ account_id: 'a1', owner: 'o1' }]);
      expect(result.failed).toEqual([second]);
      expect(result.failed[0]).toBe(second);
    });

    it('should write a repeated key once, keeping the last record', async () => {
      const result = await accounts.saveMany([
        { account_id: 'a1', owner: 'o1' },
        { account_id: 'a2', owner: 'o2' },
        { account_id: 'a1', owner: 'o9' },
      ]);

      expect(result.succeeded).toEqual([
        { account_id: 'a2', owner: 'o2' },
        { account_id: 'a1', owner: 'o9' },
      ]);
      expect(transport.calls[0]).toMatchObject({
        request: {
          puts: [
            { account_id: 'a2', owner: 'o2' },
            { account_id: 'a1', owner: 'o9' },
          ],
        },
      });
      expect(transport.find('accounts', { account_id: 'a1' })).toEqual({ account_id: 'a1', owner: 'o9' });
    });

    it('should save guarded records one at a time', async () => {
      seedAccounts();
      const existing: Account = { account_id: 'a1', owner: 'o9' };

      const result = await accounts.saveMany([existing, { account_id: 'a4', owner: 'o4' }], { overwrite: false });

      expect(result.succeeded).toEqual([{ account_id: 'a4', owner: 'o4' }]);
      expect(result.failed).toEqual([existing]);
      expect(transport.operations()).toEqual(['put', 'put']);
    });

    it('should encode every record before writing', async () => {
      const save = accounts.saveMany([
        { account_id: 'a1', owner: 'o1' },
        { account_id: 'a2', owner: '' },
      ]);

      await expect(save).rejects.toBeInstanceOf(ValidationError);
      expect(transport.calls).toEqual([]);
    });
  });

  describe('deleteOne', () => {
    beforeEach(seedContacts);

    it('should delete a record and return it', async () => {
      const deleted = await contacts.deleteOne(byKey('u1', 'e3'));

      expect(deleted).toEqual({ user_id: 'u1', email: 'e3', visits: 3 });
      expect(transport.find('contacts', { user_id: 'u1', email: 'e3' })).toBeUndefined();
    });

    it('should resolve undefined when nothing was deleted', async () => {
      expect(await contacts.deleteOne(byKey('u9', 'e1'))).toBeUndefined();
    });

    it('should guard the delete on the non-key condition', async () => {
      const condition = userId.eq('u1').and(email.eq('e3')).and(visits.gt(5));

      await expect(contacts.deleteOne(condition)).rejects.toBeInstanceOf(ConditionalCheckFailedError);
      expect(transport.find('contacts', { user_id: 'u1', email: 'e3' })).toBeDefined();
      expect(transport.calls[0]).toMatchObject({
        request: { condition: { kind: 'comparison', path: ['visits'], operator: 'GT', operands: [5] } },
      });
    });

    it('should reject several points', async () => {
      await expect(contacts.deleteOne(points([byKey('u1', 'e1')]))).rejects.toThrow(ValidationError);
    });
  });

  describe('deleteMany', () => {
    beforeEach(() => {
      seedContacts();
      seedAccounts();
    });

    it('should delete points in one batch', async () => {
      const result = await accounts.deleteMany(keysIn(['a1', 'a2']));

      expect(result.succeeded).toEqual([{ account_id: 'a1' }, { account_id: 'a2' }]);
      expect(transport.operations()).toEqual(['batchWrite']);
      expect(transport.items('accounts')).toEqual([{ account_id: 'a3', owner: 'o3', plan: 'free' }]);
    });

    it('should send a repeated key once', async () => {
      const result = await accounts.deleteMany(keysIn(['a1', 'a1']));

      expect(result.succeeded).toEqual([{ account_id: 'a1' }]);
      expect(transport.calls).toEqual([
        { operation: 'batchWrite', request: { tableName: 'accounts', puts: [], deletes: [{ account_id: 'a1' }] } },
      ]);
    });

    it('should delete a single point', async () => {
      const result = await accounts.deleteMany(byHashKey('a2'));

      expect(result.succeeded).toEqual([{ account_id: 'a2' }]);
      expect(transport.find('accounts', { account_id: 'a2' })).toBeUndefined();
    });

    it('should resolve a condition to keys through a scan', async () => {
      const result = await accounts.deleteMany(plan.eq('free'));

      expect(result.succeeded).toEqual([{ account_id: 'a1' }, { account_id: 'a3' }]);
      expect(transport.operations()).toEqual(['scan', 'batchWrite']);
      expect(transport.items('accounts')).toEqual([{ account_id: 'a2', owner: 'o2', plan: 'pro' }]);
    });

    it('should resolve a hash key condition through a query', async () => {
      const result = await contacts.deleteMany(userId.eq('u1'));

      expect(result.successCount).toBe(3);
      expect(transport.operations()).toEqual(['query', 'batchWrite']);
      expect(transport.items('contacts')).toEqual([{ user_id: 'u2', email: 'e1', visits: 9, nickname: 'Ada' }]);
    });

    it('should skip the write when nothing matches', async () => {
      const result = await accounts.deleteMany(plan.eq('team'));

      expect(result.successCount).toBe(0);
      expect(result.failCount).toBe(0);
      expect(transport.operations()).toEqual(['scan']);
    });

    it('should delete guarded points one at a time', async () => {
      const result = await contacts.deleteMany(
        points([
          userId.eq('u1').and(email.eq('e1')).and(visits.eq(1)),
          userId.eq('u1').and(email.eq('e2')).and(visits.eq(7)),
          byKey('u2', 'e1'),
        ])
      );

      expect(result.succeeded).toEqual([
        { user_id: 'u2', email: 'e1' },
        { user_id: 'u1', email: 'e1' },
      ]);
      expect(result.failed).toEqual([{ user_id: 'u1', email: 'e2' }]);
      expect(transport.operations()).toEqual(['batchWrite', 'delete', 'delete']);
    });

    it('should report unprocessed deletes as failed', async () => {
      vi.spyOn(transport, 'batchWrite').mockResolvedValueOnce({
        unprocessedPuts: [],
        unprocessedDeletes: [{ account_id: 'a2' }],
      });

      const result = await accounts.deleteMany(keysIn(['a1', 'a2']));

      expect(result.succeeded).toEqual([{ account_id: 'a1' }]);
      expect(result.failed).toEqual([{ account_id: 'a2' }]);
    });
  });

  describe('updateOne', () => {
    beforeEach(seedContacts);

    it('should apply updates and return the new record', async () => {
      const updated = await contacts.updateOne(byKey('u1', 'e3'), [visits.increment(), nickname.set('Cy')]);

      expect(updated).toEqual({ user_id: 'u1', email: 'e3', visits: 4, nickname: 'Cy' });
      expect(transport.calls[0]).toMatchObject({
        operation: 'update',
        request: {
          key: { user_id: 'u1', email: 'e3' },
          update: {
            expression: 'SET #u2 = :u3 ADD #u0 :u1',
            names: { '#u0': 'visits', '#u2': 'nickname' },
            values: { ':u1': 1, ':u3': 'Cy' },
          },
          condition: {
            kind: 'and',
            children: [
              { kind: 'comparison', path: ['user_id'], operator: 'EXISTS', operands: [] },
              { kind: 'comparison', path: ['email'], operator: 'EXISTS', operands: [] },
            ],
          },
        },
      });
    });

    it('should never create a missing item', async () => {
      await expect(contacts.updateOne(byKey('u9', 'e1'), [visits.increment()])).rejects.toBeInstanceOf(
        ConditionalCheckFailedError
      );
      expect(transport.find('contacts', { user_id: 'u9', email: 'e1' })).toBeUndefined();
    });

    it('should add the non-key condition to the guard', async () => {
      const condition = userId.eq('u1').and(email.eq('e3')).and(visits.eq(10));

      await expect(contacts.updateOne(condition, [visits.increment()])).rejects.toBeInstanceOf(
        ConditionalCheckFailedError
      );
      expect(transport.find('contacts', { user_id: 'u1', email: 'e3' })).toEqual({
        user_id: 'u1',
        email: 'e3',
        visits: 3,
      });
    });

    it('should update nested attributes and lists', async () => {
      const updated = await contacts.updateOne(byKey('u1', 'e1'), [city.set('Paris'), tags.append('b')]);

      expect(updated.profile).toEqual({ city: 'Paris' });
      expect(updated.tags).toEqual(['a', 'b']);
    });

    it('should remove emptied attributes', async () => {
      const updated = await contacts.updateOne(byKey('u1', 'e2'), [nickname.set('')]);

      expect(updated).toEqual({ user_id: 'u1', email: 'e2', visits: 2 });
    });

    it('should reject updates to key attributes', async () => {
      await expect(contacts.updateOne(byKey('u1', 'e1'), [email.set('e9')])).rejects.toThrow(
        'Key attribute "email" cannot be updated'
      );
      expect(transport.calls).toEqual([]);
    });

    it('should reject updates to undeclared attributes', async () => {
      const age = stringAttribute('age');

      await expect(contacts.updateOne(byKey('u1', 'e1'), [age.set('3')])).rejects.toThrow(
        'Unknown attribute "age" for table "contacts"'
      );
    });

    it('should reject an empty update list', async () => {
      await expect(contacts.updateOne(byKey('u1', 'e1'), [])).rejects.toThrow('At least one update is required');
    });

    it('should reject updates that change nothing', async () => {
      await expect(contacts.updateOne(byKey('u1', 'e1'), [visits.add(0)])).rejects.toThrow(
        'The updates leave the item unchanged'
      );
      expect(transport.calls).toEqual([]);
    });

    it('should reject removing a required attribute', async () => {
      seedAccounts();

      await expect(accounts.updateOne(byHashKey('a1'), [owner.remove()])).rejects.toThrow(
        'Attribute "owner" is required and cannot be removed'
      );
    });
  });

  describe('updateFromRecord', () => {
    beforeEach(seedContacts);

    it('should set every non-key field of the record', async () => {
      const updated = await contacts.updateFromRecord({ user_id: 'u1', email: 'e2', nickname: 'Bo', visits: 5 });

      expect(updated).toEqual({ user_id: 'u1', email: 'e2', nickname: 'Bo', visits: 5 });
    });

    it('should remove fields set to an empty value', async () => {
      const updated = await contacts.updateFromRecord({ user_id: 'u1', email: 'e2', nickname: '' });

      expect(updated).toEqual({ user_id: 'u1', email: 'e2', visits: 2 });
    });

    it('should fail for a missing item', async () => {
      await expect(contacts.updateFromRecord({ user_id: 'u9', email: 'e1', visits: 1 })).rejects.toBeInstanceOf(
        ConditionalCheckFailedError
      );
    });
  });
});
