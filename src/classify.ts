import type { ScalarValue } from './types/canonical.js';

export type ValueClass =
  | { kind: 'absent' }
  | { kind: 'scalar'; value: ScalarValue }
  | { kind: 'collection'; items: Iterable<unknown> }
  | { kind: 'complex'; value: object }
  | { kind: 'unsupported'; type: string };

/**
 * Sort a field value into the bucket the canonicalizer handles it with.
 * Does NOT throw.
 */
export function classifyValue(value: unknown): ValueClass {
  if (value === null || value === undefined) return { kind: 'absent' };

  switch (typeof value) {
    case 'string':
    case 'boolean':
    case 'number':
    case 'bigint':
      return { kind: 'scalar', value };
    case 'object':
      if (value instanceof Date) return { kind: 'scalar', value };
      if (Array.isArray(value) || value instanceof Set) return { kind: 'collection', items: value };
      return { kind: 'complex', value };
    default:
      return { kind: 'unsupported', type: typeof value };
  }
}

/**
 * Name of a value's class, for error messages.
 */
export function typeNameOf(value: object): string {
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
}
