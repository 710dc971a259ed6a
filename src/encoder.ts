import type { CanonicalNode, ScalarValue } from './types/canonical.js';
import { ROOT_PATH } from './canonical-spec.js';
import { EncodingError } from './errors.js';

/**
 * Deterministic tree -> bytes. Implementations must keep map entry order and
 * list item order exactly as given.
 */
export interface CanonicalEncoder {
  encode(node: CanonicalNode): Uint8Array;
}

function scalarJson(value: ScalarValue, path: string): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      if (!Number.isFinite(value)) {
        throw new EncodingError(`Non-finite number ${String(value)}`, path);
      }
      // JSON.stringify(-0) is already "0"
      return JSON.stringify(value);
    case 'bigint':
      return value.toString(10);
    default: {
      if (Number.isNaN(value.getTime())) throw new EncodingError('Invalid Date', path);
      return JSON.stringify(value.toISOString());
    }
  }
}

/**
 * Recursively encode a node as compact JSON.
 * - Map keys in insertion order, never sorted
 * - Lists order-preserved
 * - No whitespace
 */
function nodeJson(node: CanonicalNode, path: string): string {
  switch (node.kind) {
    case 'scalar':
      return scalarJson(node.value, path);
    case 'list': {
      const items = node.items.map((item, i) => nodeJson(item, `${path}[${i}]`));
      return `[${items.join(',')}]`;
    }
    case 'map': {
      const pairs = node.entries.map(([k, v]) => `${JSON.stringify(k)}:${nodeJson(v, `${path}.${k}`)}`);
      return `{${pairs.join(',')}}`;
    }
  }
}

/**
 * Produce the deterministic UTF-8 string that gets digested.
 * Implements the canonical form described in canonical-spec.ts.
 */
export function canonicalJson(node: CanonicalNode): string {
  return nodeJson(node, ROOT_PATH);
}

/**
 * Convenience: canonicalJson() encoded via globalThis.TextEncoder.
 */
export function canonicalBytes(node: CanonicalNode): Uint8Array {
  return new globalThis.TextEncoder().encode(canonicalJson(node));
}

export const jsonEncoder: CanonicalEncoder = {
  encode: canonicalBytes,
};
