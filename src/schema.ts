import { SchemaError } from './errors.js';

export interface FieldDescriptor {
  readonly name: string;
  /** Sort key within the declaring class. Need not be contiguous. */
  readonly order: number;
}

/**
 * Decides which fields of a value take part in hashing, and reads them.
 */
export interface FieldSchemaProvider {
  fieldsOf(value: object): readonly FieldDescriptor[];
  read(instance: object, field: FieldDescriptor): unknown;
}

export interface HashableField<T> {
  name: keyof T & string;
  order: number;
}

export type Constructor<T extends object = object> = abstract new (...args: never[]) => T;

/**
 * Class-keyed field registry.
 *
 * fieldsOf() walks the prototype chain of the value: the class's own fields
 * first, then each ancestor's. Every group is sorted by order on its own
 * (stable, so equal keys keep registration order). A name already emitted by
 * a subclass is not repeated for an ancestor.
 */
export class SchemaRegistry implements FieldSchemaProvider {
  private readonly byClass = new Map<unknown, readonly FieldDescriptor[]>();

  register<T extends object>(ctor: Constructor<T>, fields: ReadonlyArray<HashableField<T>>): this {
    if (this.byClass.has(ctor)) {
      throw new SchemaError('fields already registered', ctor.name);
    }

    const seen = new Set<string>();
    for (const field of fields) {
      if (seen.has(field.name)) {
        throw new SchemaError(`duplicate field "${field.name}"`, ctor.name);
      }
      if (!Number.isFinite(field.order)) {
        throw new SchemaError(`field "${field.name}" has a non-finite order`, ctor.name);
      }
      seen.add(field.name);
    }

    const sorted = fields
      .map((f): FieldDescriptor => Object.freeze({ name: f.name, order: f.order }))
      .sort((a, b) => a.order - b.order);
    this.byClass.set(ctor, Object.freeze(sorted));
    return this;
  }

  has(ctor: Constructor): boolean {
    return this.byClass.has(ctor);
  }

  /** Fields registered on exactly this class, in visiting order. */
  ownFieldsOf(ctor: Constructor): readonly FieldDescriptor[] {
    return this.byClass.get(ctor) ?? [];
  }

  fieldsOf(value: object): readonly FieldDescriptor[] {
    const result: FieldDescriptor[] = [];
    const emitted = new Set<string>();

    let proto: object | null = Object.getPrototypeOf(value);
    while (proto !== null) {
      const ctor: unknown = Object.hasOwn(proto, 'constructor')
        ? Reflect.get(proto, 'constructor')
        : undefined;
      for (const field of this.byClass.get(ctor) ?? []) {
        if (emitted.has(field.name)) continue;
        emitted.add(field.name);
        result.push(field);
      }
      proto = Object.getPrototypeOf(proto);
    }

    return result;
  }

  read(instance: object, field: FieldDescriptor): unknown {
    return Reflect.get(instance, field.name);
  }
}

/** Registry used when no schema provider is passed explicitly. */
export const defaultSchemaRegistry = new SchemaRegistry();

/**
 * Register the hashable fields of a class on the default registry.
 *
 * @example
 * class Person { constructor(public name: string, public age: number, public cache?: string) {} }
 * hashable(Person, [{ name: 'name', order: 1 }, { name: 'age', order: 2 }]);
 */
export function hashable<T extends object>(
  ctor: Constructor<T>,
  fields: ReadonlyArray<HashableField<T>>,
): void {
  defaultSchemaRegistry.register(ctor, fields);
}
