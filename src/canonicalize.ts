import type { CanonicalList, CanonicalMap, CanonicalNode } from './types/canonical.js';
import type { FieldDescriptor, FieldSchemaProvider } from './schema.js';
import { defaultSchemaRegistry } from './schema.js';
import { classifyValue, typeNameOf } from './classify.js';
import { DEFAULT_MAX_DEPTH, ROOT_PATH } from './canonical-spec.js';
import {
  CyclicValueError,
  DepthLimitError,
  DigestError,
  EncodingError,
  FieldAccessError,
} from './errors.js';

export interface CanonicalizeOptions {
  /** Defaults to defaultSchemaRegistry. */
  schema?: FieldSchemaProvider;
  /** Defaults to DEFAULT_MAX_DEPTH. */
  maxDepth?: number;
}

interface WalkContext {
  schema: FieldSchemaProvider;
  maxDepth: number;
  /** Objects on the path from the root to the node being built. */
  ancestors: Set<object>;
}

function readField(
  obj: object,
  field: FieldDescriptor,
  path: string,
  ctx: WalkContext,
): unknown {
  try {
    return ctx.schema.read(obj, field);
  } catch (err) {
    if (err instanceof DigestError) throw err;
    throw new FieldAccessError(typeNameOf(obj), field.name, path, err);
  }
}

function enter(container: object, path: string, depth: number, ctx: WalkContext): void {
  if (depth > ctx.maxDepth) throw new DepthLimitError(path, ctx.maxDepth);
  if (ctx.ancestors.has(container)) throw new CyclicValueError(path);
  ctx.ancestors.add(container);
}

function canonicalObject(
  obj: object,
  path: string,
  depth: number,
  ctx: WalkContext,
): CanonicalMap {
  enter(obj, path, depth, ctx);

  const entries: Array<readonly [string, CanonicalNode]> = [];
  for (const field of ctx.schema.fieldsOf(obj)) {
    const fieldPath = `${path}.${field.name}`;
    const node = canonicalValue(readField(obj, field, fieldPath, ctx), fieldPath, depth + 1, ctx);
    // Absent fields leave no trace in the map
    if (node !== undefined) entries.push([field.name, node]);
  }

  ctx.ancestors.delete(obj);
  return { kind: 'map', entries };
}

function canonicalCollection(
  items: Iterable<unknown>,
  path: string,
  depth: number,
  ctx: WalkContext,
): CanonicalList {
  enter(items, path, depth, ctx);

  const out: CanonicalNode[] = [];
  let i = 0;
  for (const item of items) {
    const node = canonicalValue(item, `${path}[${i}]`, depth + 1, ctx);
    if (node !== undefined) out.push(node);
    i++;
  }

  ctx.ancestors.delete(items);
  return { kind: 'list', items: out };
}

/** Returns undefined for values that are pruned. */
function canonicalValue(
  value: unknown,
  path: string,
  depth: number,
  ctx: WalkContext,
): CanonicalNode | undefined {
  const classified = classifyValue(value);

  switch (classified.kind) {
    case 'absent':
      return undefined;
    case 'scalar':
      return { kind: 'scalar', value: classified.value };
    case 'collection':
      return canonicalCollection(classified.items, path, depth, ctx);
    case 'complex':
      return canonicalObject(classified.value, path, depth, ctx);
    case 'unsupported':
      throw new EncodingError(`Unsupported ${classified.type} value`, path);
    default: {
      const _exhaustive: never = classified;
      throw new EncodingError(`Unknown value class ${String(_exhaustive)}`, path);
    }
  }
}

/**
 * Build the canonical tree of a value: its selected fields, in selection
 * order, with absent values pruned and nested values expanded.
 *
 * An absent root, or a root that is not a nested value (a scalar or a
 * collection), has no selected fields and yields the empty map.
 */
export function canonicalize(value: unknown, options: CanonicalizeOptions = {}): CanonicalMap {
  const classified = classifyValue(value);
  if (classified.kind !== 'complex') return { kind: 'map', entries: [] };

  const ctx: WalkContext = {
    schema: options.schema ?? defaultSchemaRegistry,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    ancestors: new Set(),
  };
  return canonicalObject(classified.value, ROOT_PATH, 0, ctx);
}
