/**
 * Update compiler.
 *
 * Turns a list of Update nodes into one update expression with flat name and
 * value placeholder tables, ready to be sent with a single update call.
 */

import type { Attribute } from '../attributes/attribute.js';
import { EncodingError, ExpressionError, ValidationError } from '../error/categories.js';
import type { AttributeValue } from '../types/key.js';
import { PlaceholderSequence, defaultPlaceholderSequence } from './placeholder.js';
import type { Update } from './update.js';

/**
 * Result of compiling updates.
 */
export interface CompiledUpdate {
  /** Complete update expression, empty when every update was a no-op */
  expression: string;
  /** Name placeholders (#uN -> attribute name segment) */
  names: Record<string, string>;
  /** Value placeholders (:uN -> encoded value) */
  values: Record<string, AttributeValue>;
}

export interface CompileOptions {
  /** Placeholder source (defaults to the process-wide sequence) */
  sequence?: PlaceholderSequence;
}

type Action = 'SET' | 'ADD' | 'REMOVE';

const ACTION_ORDER: readonly Action[] = ['SET', 'ADD', 'REMOVE'];

interface Clause {
  action: Action;
  text: string;
}

/**
 * Accumulates placeholders for one compilation.
 */
class CompilationScope {
  readonly names: Record<string, string> = {};
  readonly values: Record<string, AttributeValue> = {};
  private readonly segments = new Map<string, string>();

  constructor(private readonly sequence: PlaceholderSequence) {}

  name(attribute: Attribute<unknown>): string {
    return attribute.path
      .map((segment) => {
        let placeholder = this.segments.get(segment);
        if (placeholder === undefined) {
          placeholder = this.sequence.name();
          this.segments.set(segment, placeholder);
          this.names[placeholder] = segment;
        }
        return placeholder;
      })
      .join('.');
  }

  value(value: AttributeValue): string {
    const placeholder = this.sequence.value();
    this.values[placeholder] = value;
    return placeholder;
  }
}

function requireRemovable(attribute: Attribute<unknown>): void {
  if (attribute.required) {
    throw new ValidationError(`Attribute "${attribute.name}" is required and cannot be removed`, {
      attribute: attribute.name,
    });
  }
}

function compileOne(update: Update, scope: CompilationScope): Clause | null {
  const attribute = update.attribute;

  switch (update.kind) {
    case 'set': {
      // throws for an empty value on a required attribute
      const encoded = attribute.encode(update.value);
      if (encoded === undefined) {
        if (update.ifNotExists) {
          return null;
        }
        return { action: 'REMOVE', text: scope.name(attribute) };
      }
      const name = scope.name(attribute);
      const value = scope.value(encoded);
      return {
        action: 'SET',
        text: update.ifNotExists ? `${name} = if_not_exists(${name}, ${value})` : `${name} = ${value}`,
      };
    }

    case 'remove':
      requireRemovable(attribute);
      return { action: 'REMOVE', text: scope.name(attribute) };

    case 'add': {
      if (attribute.isNested) {
        throw new ExpressionError(`ADD cannot target the nested attribute "${attribute.name}"`);
      }
      if (update.delta === undefined || update.delta === 0) {
        return null;
      }
      if (!Number.isFinite(update.delta)) {
        throw new EncodingError(`Cannot add a non-finite delta to "${attribute.name}"`, {
          attribute: attribute.name,
        });
      }
      return { action: 'ADD', text: `${scope.name(attribute)} ${scope.value(update.delta)}` };
    }

    case 'listExtend': {
      if (update.values.length === 0) {
        return null;
      }
      const encoded = attribute.codec.encode([...update.values]);
      if (encoded === undefined) {
        return null;
      }
      const name = scope.name(attribute);
      const value = scope.value(encoded);
      return {
        action: 'SET',
        text: update.append ? `${name} = list_append(${name}, ${value})` : `${name} = list_append(${value}, ${name})`,
      };
    }
  }
}

/**
 * Keeps the last update per attribute path, at the position of its last occurrence.
 */
function lastWriteWins(updates: readonly Update[]): Update[] {
  const byPath = new Map<string, Update>();
  for (const update of updates) {
    byPath.delete(update.attribute.name);
    byPath.set(update.attribute.name, update);
  }
  return [...byPath.values()];
}

/**
 * Compiles updates into a single update expression.
 *
 * Clauses are grouped as `SET ... ADD ... REMOVE ...`; within a group they
 * keep the order of the (deduplicated) input.
 *
 * @example
 * ```typescript
 * const compiled = compileUpdates(
 *   [nickname.set('Ada'), visits.add(2), legacy.remove()],
 *   { sequence: new PlaceholderSequence() }
 * );
 * // compiled.expression: 'SET #u0 = :u1 ADD #u2 :u3 REMOVE #u4'
 * ```
 *
 * @throws {ValidationError} If a required attribute would be removed or emptied
 * @throws {ExpressionError} If ADD targets a nested attribute
 * @throws {EncodingError} If a value cannot be encoded
 */
export function compileUpdates(updates: readonly Update[], options: CompileOptions = {}): CompiledUpdate {
  const scope = new CompilationScope(options.sequence ?? defaultPlaceholderSequence);
  const groups = new Map<Action, string[]>();

  for (const update of lastWriteWins(updates)) {
    const clause = compileOne(update, scope);
    if (clause === null) {
      continue;
    }
    const group = groups.get(clause.action) ?? [];
    group.push(clause.text);
    groups.set(clause.action, group);
  }

  const expression = ACTION_ORDER.flatMap((action) => {
    const group = groups.get(action);
    return group === undefined ? [] : [`${action} ${group.join(', ')}`];
  }).join(' ');

  return { expression, names: scope.names, values: scope.values };
}
