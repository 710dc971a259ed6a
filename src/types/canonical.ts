export type ScalarValue = string | boolean | number | bigint | Date;

export interface CanonicalScalar {
  kind: 'scalar';
  value: ScalarValue;
}

export interface CanonicalMap {
  kind: 'map';
  /** Insertion order is the field selection order. */
  entries: ReadonlyArray<readonly [string, CanonicalNode]>;
}

export interface CanonicalList {
  kind: 'list';
  items: readonly CanonicalNode[];
}

export type CanonicalNode = CanonicalScalar | CanonicalMap | CanonicalList;
