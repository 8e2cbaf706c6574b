/**
 * Tests for the query dispatcher
 */

import { describe, it, expect } from 'vitest';
import { planLookup, planSingle } from '../dispatcher.js';
import { byHashKey, byKey, byRecord, keysIn, points } from '../strategy.js';
import { ExpressionError, ValidationError } from '../../error/categories.js';
import {
  accountId,
  accountSchema,
  contactSchema,
  email,
  nickname,
  plan,
  userId,
  visits,
} from '../../__tests__/helpers/fixtures.js';

const contacts = contactSchema();
const accounts = accountSchema();

describe('planLookup', () => {
  describe('Point lookups', () => {
    it('should batch get a list of points', () => {
      const strategy = points([byKey('u1', 'e1'), byKey('u1', 'e2'), byRecord({ user_id: 'u2', email: 'e3' })]);

      expect(planLookup(strategy, contacts)).toEqual({
        operation: 'BatchGet',
        keys: [
          { user_id: 'u1', email: 'e1' },
          { user_id: 'u1', email: 'e2' },
          { user_id: 'u2', email: 'e3' },
        ],
      });
    });

    it('should drop repeated keys', () => {
      expect(planLookup(keysIn(['a', 'b', 'a']), accounts)).toEqual({
        operation: 'BatchGet',
        keys: [{ account_id: 'a' }, { account_id: 'b' }],
      });
    });

    it('should accept exact-key conditions as points', () => {
      const strategy = points([userId.eq('u1').and(email.eq('e1'))]);

      expect(planLookup(strategy, contacts)).toEqual({
        operation: 'BatchGet',
        keys: [{ user_id: 'u1', email: 'e1' }],
      });
    });

    it('should reject a point carrying a non-key condition', () => {
      const strategy = points([userId.eq('u1').and(email.eq('e1')).and(nickname.eq('x'))]);

      expect(() => planLookup(strategy, contacts)).toThrow(
        'A lookup cannot carry a non-key condition: nickname == "x"'
      );
    });

    it('should get a single point', () => {
      expect(planLookup(byHashKey('a1'), accounts)).toEqual({ operation: 'Get', key: { account_id: 'a1' } });
    });

    it('should reject points that do not match the key shape', () => {
      expect(() => planLookup(byHashKey('u1'), contacts)).toThrow(ValidationError);
      expect(() => planLookup(byKey('a1', 'x'), accounts)).toThrow('Table "accounts" has no range key');
    });
  });

  describe('Conditions', () => {
    it('should query on the hash key with a range prefix and no filter', () => {
      const dispatched = planLookup(userId.eq('u1').and(email.beginsWith('admin@')), contacts);

      expect(dispatched).toEqual({
        operation: 'Query',
        keyCondition: {
          kind: 'and',
          children: [
            { kind: 'comparison', path: ['user_id'], operator: 'EQ', operands: ['u1'] },
            { kind: 'comparison', path: ['email'], operator: 'BEGINS_WITH', operands: ['admin@'] },
          ],
        },
        filter: null,
      });
    });

    it('should filter a query on the non-key remainder', () => {
      const dispatched = planLookup(userId.eq('u1').and(visits.gte(3)), contacts);

      expect(dispatched).toEqual({
        operation: 'Query',
        keyCondition: { kind: 'comparison', path: ['user_id'], operator: 'EQ', operands: ['u1'] },
        filter: { kind: 'comparison', path: ['visits'], operator: 'GTE', operands: [3] },
      });
    });

    it('should scan with the whole condition when no key is bound', () => {
      expect(planLookup(nickname.contains('da'), contacts)).toEqual({
        operation: 'Scan',
        filter: { kind: 'comparison', path: ['nickname'], operator: 'CONTAINS', operands: ['da'] },
      });
    });

    it('should scan an OR even over key attributes', () => {
      const dispatched = planLookup(userId.eq('u1').or(userId.eq('u2')), contacts);

      expect(dispatched.operation).toBe('Scan');
    });

    it('should batch get IN on the hash key of a simple key', () => {
      expect(planLookup(accountId.in(['a', 'b', 'a']), accounts)).toEqual({
        operation: 'BatchGet',
        keys: [{ account_id: 'a' }, { account_id: 'b' }],
      });
    });

    it('should scan IN on the hash key of a composite key', () => {
      expect(planLookup(userId.in(['u1', 'u2']), contacts)).toEqual({
        operation: 'Scan',
        filter: { kind: 'comparison', path: ['user_id'], operator: 'IN', operands: ['u1', 'u2'] },
      });
    });

    it('should scan IN on the hash key combined with other comparisons', () => {
      const dispatched = planLookup(accountId.in(['a', 'b']).and(plan.eq('pro')), accounts);

      expect(dispatched.operation).toBe('Scan');
    });

    it('should reject a query without EQ on the hash key', () => {
      expect(() => planLookup(userId.gt('u1'), contacts)).toThrow(
        'An equality expression was required for the hash key "user_id"'
      );
    });

    it('should reject operators outside the key-condition grammar on a key', () => {
      expect(() => planLookup(userId.ne('u1'), contacts)).toThrow(ExpressionError);
    });

    it('should reject a range key condition without the hash key', () => {
      expect(() => planLookup(email.eq('e1'), contacts)).toThrow(ExpressionError);
    });
  });
});

describe('planSingle', () => {
  it('should resolve an exact key and its remainder', () => {
    const single = planSingle(userId.eq('u1').and(email.eq('e1')).and(nickname.eq('x')), contacts);

    expect(single.operation).toBe('Get');
    expect(single.key).toEqual({ user_id: 'u1', email: 'e1' });
    expect(single.remainder?.describe()).toBe('nickname == "x"');
  });

  it('should resolve a point without remainder', () => {
    expect(planSingle(byRecord({ user_id: 'u1', email: 'e1', nickname: 'x' }), contacts)).toEqual({
      operation: 'Get',
      key: { user_id: 'u1', email: 'e1' },
      remainder: null,
    });
  });

  it('should require both keys bound with EQ', () => {
    expect(() => planSingle(userId.eq('u1'), contacts)).toThrow(ExpressionError);
    expect(() => planSingle(userId.eq('u1').and(email.gt('a')), contacts)).toThrow(ExpressionError);
  });

  it('should reject several points', () => {
    expect(() => planSingle(keysIn(['a']), accounts)).toThrow(
      'A single-item operation cannot take several lookups'
    );
  });
});
