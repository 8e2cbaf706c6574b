/**
 * Tests for the update compiler
 */

import { describe, it, expect } from 'vitest';
import { compileUpdates } from '../compiler.js';
import { PlaceholderSequence, defaultPlaceholderSequence } from '../placeholder.js';
import { numberCodec } from '../../attributes/codecs.js';
import { EncodingError, ExpressionError, ValidationError } from '../../error/categories.js';
import { city, nickname, owner, profile, tags, visits } from '../../__tests__/helpers/fixtures.js';
import type { Update } from '../update.js';

function compile(updates: readonly Update[]) {
  return compileUpdates(updates, { sequence: new PlaceholderSequence() });
}

describe('compileUpdates', () => {
  describe('Clause grouping', () => {
    it('should group clauses as SET, ADD, REMOVE', () => {
      const compiled = compile([nickname.set('Ada'), visits.add(2), tags.remove()]);

      expect(compiled.expression).toBe('SET #u0 = :u1 ADD #u2 :u3 REMOVE #u4');
      expect(compiled.names).toEqual({ '#u0': 'nickname', '#u2': 'visits', '#u4': 'tags' });
      expect(compiled.values).toEqual({ ':u1': 'Ada', ':u3': 2 });
    });

    it('should keep the group order whatever the input order', () => {
      const compiled = compile([tags.remove(), visits.add(2), nickname.set('Ada')]);

      expect(compiled.expression).toBe('SET #u3 = :u4 ADD #u1 :u2 REMOVE #u0');
    });

    it('should use distinct name placeholders for distinct attributes', () => {
      const compiled = compile([nickname.set('X'), visits.add(1), tags.remove()]);

      expect(compiled.expression.match(/SET /g)).toHaveLength(1);
      expect(compiled.expression.match(/ADD /g)).toHaveLength(1);
      expect(compiled.expression.match(/REMOVE /g)).toHaveLength(1);
      expect(Object.keys(compiled.names)).toHaveLength(3);
      expect(Object.keys(compiled.values)).toHaveLength(2);
    });

    it('should join clauses of one group with commas', () => {
      const compiled = compile([nickname.set('Ada'), visits.set(3)]);

      expect(compiled.expression).toBe('SET #u0 = :u1, #u2 = :u3');
    });
  });

  describe('Set', () => {
    it('should remove the attribute when the value is empty', () => {
      expect(compile([nickname.set(undefined)]).expression).toBe('REMOVE #u0');
      expect(compile([nickname.set('')]).expression).toBe('REMOVE #u0');
    });

    it('should skip an empty value set only if missing', () => {
      const compiled = compile([nickname.setIfNotExists(null)]);

      expect(compiled).toEqual({ expression: '', names: {}, values: {} });
    });

    it('should guard with if_not_exists', () => {
      expect(compile([nickname.setIfNotExists('Ada')]).expression).toBe('SET #u0 = if_not_exists(#u0, :u1)');
    });

    it('should reject emptying a required attribute', () => {
      expect(() => compile([owner.set(undefined)])).toThrow(ValidationError);
      expect(() => compile([owner.setIfNotExists(undefined)])).toThrow(ValidationError);
    });

    it('should address nested attributes segment by segment', () => {
      const compiled = compile([city.set('Paris')]);

      expect(compiled.expression).toBe('SET #u0.#u1 = :u2');
      expect(compiled.names).toEqual({ '#u0': 'profile', '#u1': 'city' });
    });
  });

  describe('Remove', () => {
    it('should reject removing a required attribute', () => {
      expect(() => compile([owner.remove()])).toThrow('Attribute "owner" is required and cannot be removed');
    });
  });

  describe('Add', () => {
    it('should skip a zero or absent delta', () => {
      expect(compile([visits.add(0)]).expression).toBe('');
      expect(compile([visits.add(undefined)]).expression).toBe('');
    });

    it('should compile subtract and decrement as negative deltas', () => {
      expect(compile([visits.subtract(3)]).values).toEqual({ ':u1': -3 });
      expect(compile([visits.decrement()]).values).toEqual({ ':u1': -1 });
      expect(compile([visits.increment()]).values).toEqual({ ':u1': 1 });
    });

    it('should reject a nested target', () => {
      const score = profile.child('score', numberCodec());

      expect(() => compile([score.add(1)])).toThrow(ExpressionError);
    });

    it('should reject a non-finite delta', () => {
      expect(() => compile([visits.add(Number.POSITIVE_INFINITY)])).toThrow(EncodingError);
    });
  });

  describe('ListExtend', () => {
    it('should skip an empty value list', () => {
      expect(compile([tags.append()]).expression).toBe('');
    });

    it('should append after the existing list', () => {
      const compiled = compile([tags.append('c')]);

      expect(compiled.expression).toBe('SET #u0 = list_append(#u0, :u1)');
      expect(compiled.values).toEqual({ ':u1': ['c'] });
    });

    it('should prepend before the existing list', () => {
      const compiled = compile([tags.prepend('a', 'b')]);

      expect(compiled.expression).toBe('SET #u0 = list_append(:u1, #u0)');
      expect(compiled.values).toEqual({ ':u1': ['a', 'b'] });
    });
  });

  describe('Duplicate targets', () => {
    it('should keep the last update at its last position', () => {
      const compiled = compile([nickname.set('A'), visits.increment(), nickname.set('B')]);

      expect(compiled.expression).toBe('SET #u2 = :u3 ADD #u0 :u1');
      expect(compiled.values).toEqual({ ':u1': 1, ':u3': 'B' });
    });

    it('should let a later remove override a set', () => {
      expect(compile([nickname.set('A'), nickname.remove()]).expression).toBe('REMOVE #u0');
    });
  });

  describe('Placeholders', () => {
    it('should start from the sequence position', () => {
      const compiled = compileUpdates([nickname.set('A')], { sequence: new PlaceholderSequence(10) });

      expect(compiled.expression).toBe('SET #u10 = :u11');
    });

    it('should never reuse placeholders across compilations', () => {
      const sequence = new PlaceholderSequence();
      const first = compileUpdates([nickname.set('A')], { sequence });
      const second = compileUpdates([nickname.set('A')], { sequence });

      expect(first.expression).toBe('SET #u0 = :u1');
      expect(second.expression).toBe('SET #u2 = :u3');
    });

    it('should draw from the process-wide sequence by default', () => {
      const before = defaultPlaceholderSequence.next();
      const compiled = compileUpdates([nickname.set('A')]);

      expect(compiled.names).toEqual({ [`#u${before + 1}`]: 'nickname' });
      expect(compiled.values).toEqual({ [`:u${before + 2}`]: 'A' });
    });
  });
});
