/**
 * Error types raised by mdstream.
 */

export enum ErrorCode {
  INVALID_NODE = 'invalid-node',
  INVALID_CHUNK = 'invalid-chunk'
}

export class MdstreamError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A value that is not a node was passed where a node is required
 */
export class InvalidNodeError extends MdstreamError {
  readonly value: unknown;

  constructor(value: unknown) {
    super(ErrorCode.INVALID_NODE, `Expected an AST node, got: ${describe(value)}`);
    this.value = value;
  }
}

/**
 * A stream chunk is neither text, a node nor a list of those
 */
export class InvalidChunkError extends MdstreamError {
  readonly value: unknown;

  constructor(value: unknown) {
    super(ErrorCode.INVALID_CHUNK, `Expected text, a node or a list of those, got: ${describe(value)}`);
    this.value = value;
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    return `object { ${Object.keys(value).slice(0, 5).join(', ')} }`;
  }
  return `${typeof value} ${String(value)}`;
}
