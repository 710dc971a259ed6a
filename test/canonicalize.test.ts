import { describe, it, expect } from 'vitest';
import { canonicalize } from '../src/canonicalize.js';
import { canonicalJson } from '../src/encoder.js';
import { SchemaRegistry } from '../src/schema.js';
import {
  CyclicValueError,
  DepthLimitError,
  EncodingError,
  FieldAccessError,
} from '../src/errors.js';
import { Dog, Parent, ParentWithList, Person, ReversedPerson } from './fixtures/models.js';

class Node {
  constructor(
    public label: string,
    public next: Node | null = null,
    public extra: unknown = null,
  ) {}
}

const nodeSchema = new SchemaRegistry().register(Node, [
  { name: 'label', order: 1 },
  { name: 'next', order: 2 },
  { name: 'extra', order: 3 },
]);

describe('canonicalize', () => {
  it('emits selected fields in order-key order', () => {
    expect(canonicalize(new Person('John Doe', 30))).toEqual({
      kind: 'map',
      entries: [
        ['name', { kind: 'scalar', value: 'John Doe' }],
        ['age', { kind: 'scalar', value: 30 }],
      ],
    });
  });

  it('gives equal trees for different declaration orders', () => {
    expect(canonicalize(new ReversedPerson(30, 'John Doe'))).toEqual(
      canonicalize(new Person('John Doe', 30)),
    );
  });

  it('gives equal trees regardless of property insertion order on the instance', () => {
    const a = Object.assign(Object.create(Person.prototype), { name: 'John Doe', age: 30 });
    const b = Object.assign(Object.create(Person.prototype), { age: 30, name: 'John Doe' });
    expect(canonicalJson(canonicalize(a))).toBe(canonicalJson(canonicalize(b)));
    expect(canonicalJson(canonicalize(a))).toBe('{"name":"John Doe","age":30}');
  });

  it('returns an empty map for an absent root', () => {
    expect(canonicalize(null)).toEqual({ kind: 'map', entries: [] });
    expect(canonicalize(undefined)).toEqual({ kind: 'map', entries: [] });
  });

  it('returns an empty map for a root without selected fields', () => {
    expect(canonicalize({ name: 'plain object' })).toEqual({ kind: 'map', entries: [] });
    expect(canonicalize('text')).toEqual({ kind: 'map', entries: [] });
    expect(canonicalize([new Person('a', 1)])).toEqual({ kind: 'map', entries: [] });
  });

  it('prunes absent fields instead of writing null', () => {
    expect(canonicalJson(canonicalize(new Person(null, 30)))).toBe('{"age":30}');
    expect(canonicalJson(canonicalize(new Parent('Parent', null, null)))).toBe('{"name":"Parent"}');
  });

  it('prunes a field to the same sub-tree as a type that never declares it', () => {
    const schema = new SchemaRegistry()
      .register(Person, [{ name: 'name', order: 1 }, { name: 'age', order: 2 }])
      .register(ReversedPerson, [{ name: 'name', order: 1 }]);
    expect(canonicalize(new Person('Jane', null), { schema })).toEqual(
      canonicalize(new ReversedPerson(55, 'Jane'), { schema }),
    );
  });

  it('expands nested values recursively', () => {
    const tree = canonicalize(new Parent('Parent', 40, new Person('Child', 12)));
    expect(canonicalJson(tree)).toBe('{"name":"Parent","age":40,"child":{"name":"Child","age":12}}');
  });

  it('turns collections into lists in iteration order', () => {
    const parent = new ParentWithList('Parent', 40, [new Person('B', 2), null, new Person('A', 1)]);
    expect(canonicalJson(canonicalize(parent))).toBe(
      '{"name":"Parent","age":40,"children":[{"name":"B","age":2},{"name":"A","age":1}]}',
    );
  });

  it('keeps an empty collection as an empty list', () => {
    expect(canonicalJson(canonicalize(new ParentWithList('P', 1, [])))).toBe(
      '{"name":"P","age":1,"children":[]}',
    );
  });

  it('keeps scalar and nested collection elements', () => {
    const n = new Node('root', null, [1, 'two', [true, null], new Set(['x', 'y'])]);
    expect(canonicalJson(canonicalize(n, { schema: nodeSchema }))).toBe(
      '{"label":"root","extra":[1,"two",[true],["x","y"]]}',
    );
  });

  it('canonicalizes typed arrays, maps and boxed primitives to empty maps', () => {
    const bytes = new Node('u', null, new Uint8Array([1, 2]));
    const map = new Node('m', null, new Map([['k', 'v']]));
    const boxed = new Node('s', null, new String('x'));
    expect(canonicalJson(canonicalize(bytes, { schema: nodeSchema }))).toBe('{"label":"u","extra":{}}');
    expect(canonicalJson(canonicalize(map, { schema: nodeSchema }))).toBe('{"label":"m","extra":{}}');
    expect(canonicalJson(canonicalize(boxed, { schema: nodeSchema }))).toBe('{"label":"s","extra":{}}');
  });

  it('stores dates and bigints as scalars', () => {
    const when = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));
    const tree = canonicalize(new Node('t', null, when), { schema: nodeSchema });
    expect(tree.entries[1]).toEqual(['extra', { kind: 'scalar', value: when }]);
    expect(canonicalJson(canonicalize(new Node('b', null, 12345678901234567890n), { schema: nodeSchema }))).toBe(
      '{"label":"b","extra":12345678901234567890}',
    );
  });

  it('appends ancestor fields after the class\'s own fields', () => {
    expect(canonicalJson(canonicalize(new Dog('Rex', true)))).toBe(
      '{"name":"Rex","goodBoy":true,"species":"canine","legs":4}',
    );
  });

  it('canonicalizes a shared reference at every occurrence', () => {
    const shared = new Person('S', 1);
    const parent = new ParentWithList('P', 2, [shared, shared]);
    expect(canonicalJson(canonicalize(parent))).toBe(
      '{"name":"P","age":2,"children":[{"name":"S","age":1},{"name":"S","age":1}]}',
    );
  });

  it('rejects an object that contains itself', () => {
    const a = new Node('a');
    const b = new Node('b', a);
    a.next = b;
    expect(() => canonicalize(a, { schema: nodeSchema })).toThrow(CyclicValueError);
    expect(() => canonicalize(a, { schema: nodeSchema })).toThrow('Cyclic reference at $.next.next');
  });

  it('rejects an array that contains itself', () => {
    const list: unknown[] = [];
    list.push(list);
    expect(() => canonicalize(new Node('a', null, list), { schema: nodeSchema })).toThrow(
      'Cyclic reference at $.extra[0]',
    );
  });

  it('enforces maxDepth', () => {
    const chain = new Node('0', new Node('1', new Node('2')));
    expect(canonicalJson(canonicalize(chain, { schema: nodeSchema, maxDepth: 2 }))).toBe(
      '{"label":"0","next":{"label":"1","next":{"label":"2"}}}',
    );
    expect(() => canonicalize(chain, { schema: nodeSchema, maxDepth: 1 })).toThrow(DepthLimitError);
    expect(() => canonicalize(chain, { schema: nodeSchema, maxDepth: 1 })).toThrow(
      'Nesting deeper than 1 at $.next.next',
    );
  });

  it('wraps read failures in FieldAccessError', () => {
    class Guarded {
      get token(): string {
        throw new Error('not allowed');
      }
    }
    const schema = new SchemaRegistry().register(Guarded, [{ name: 'token', order: 1 }]);
    try {
      canonicalize(new Guarded(), { schema });
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(FieldAccessError);
      if (err instanceof FieldAccessError) {
        expect(err.typeName).toBe('Guarded');
        expect(err.field).toBe('token');
        expect(err.path).toBe('$.token');
        expect(err.cause).toBeInstanceOf(Error);
        expect(err.message).toBe('Cannot read field "token" of Guarded at $.token');
      }
    }
  });

  it('rejects symbols and functions', () => {
    expect(() => canonicalize(new Node('s', null, Symbol('s')), { schema: nodeSchema })).toThrow(
      EncodingError,
    );
    expect(() => canonicalize(new Node('f', null, () => 1), { schema: nodeSchema })).toThrow(
      'Unsupported function value at $.extra',
    );
  });
});
