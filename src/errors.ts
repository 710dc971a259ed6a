export class DigestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DigestError';
  }
}

export class UnsupportedAlgorithmError extends DigestError {
  constructor(public readonly algorithm: string) {
    super(`Unsupported hash algorithm: "${algorithm}"`);
    this.name = 'UnsupportedAlgorithmError';
  }
}

export class FieldAccessError extends DigestError {
  constructor(
    public readonly typeName: string,
    public readonly field: string,
    public readonly path: string,
    cause: unknown,
  ) {
    super(`Cannot read field "${field}" of ${typeName} at ${path}`, { cause });
    this.name = 'FieldAccessError';
  }
}

export class EncodingError extends DigestError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(`${message} at ${path}`);
    this.name = 'EncodingError';
  }
}

export class CyclicValueError extends DigestError {
  constructor(public readonly path: string) {
    super(`Cyclic reference at ${path}`);
    this.name = 'CyclicValueError';
  }
}

export class DepthLimitError extends DigestError {
  constructor(
    public readonly path: string,
    public readonly maxDepth: number,
  ) {
    super(`Nesting deeper than ${maxDepth} at ${path}`);
    this.name = 'DepthLimitError';
  }
}

export class SchemaError extends DigestError {
  constructor(
    message: string,
    public readonly typeName: string,
  ) {
    super(`${typeName}: ${message}`);
    this.name = 'SchemaError';
  }
}

export class ConfigurationError extends DigestError {
  constructor(
    message: string,
    public readonly errors: string[],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
