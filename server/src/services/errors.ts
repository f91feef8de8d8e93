/**
 * Error types raised by the emote pipeline.
 * Every error carries a stable `code` so callers can branch without instanceof.
 */

export type EmoteErrorCode =
  | 'VALIDATION'
  | 'IO'
  | 'DECODE'
  | 'ENCODE'
  | 'TRANSFORM'
  | 'CANCELLED'
  | 'CATALOG';

export class EmoteError extends Error {
  readonly code: EmoteErrorCode;

  constructor(code: EmoteErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }
}

/** Unsupported extension at selection time */
export class ValidationError extends EmoteError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

export class IOError extends EmoteError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super('IO', message, cause);
    this.path = path;
  }
}

/** Directory creation or file write failure inside a bundle */
export class WriteError extends IOError {
  readonly filename: string;

  constructor(filename: string, path: string, cause?: unknown) {
    super(`failed to save ${filename}`, path, cause);
    this.filename = filename;
  }
}

export class DecodeError extends EmoteError {
  /** Format the decoder attempted; 'auto' when the format was sniffed */
  readonly format: string;

  constructor(format: string, message: string, cause?: unknown) {
    super('DECODE', message, cause);
    this.format = format;
  }
}

export class EncodeError extends EmoteError {
  readonly filename: string;

  constructor(filename: string, cause?: unknown) {
    super('ENCODE', `failed to encode ${filename} as PNG`, cause);
    this.filename = filename;
  }
}

export class TransformError extends EmoteError {
  constructor(message: string, cause?: unknown) {
    super('TRANSFORM', message, cause);
  }
}

export class CancelledError extends EmoteError {
  constructor(message = 'conversion cancelled') {
    super('CANCELLED', message);
  }
}

export class CatalogError extends EmoteError {
  constructor(message: string) {
    super('CATALOG', message);
  }
}

/**
 * Flatten an error and its `cause` links into readable lines,
 * outermost first.
 */
export function describeCauseChain(error: unknown): string[] {
  const chain: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      chain.push(current.message);
      current = current.cause;
    } else {
      chain.push(String(current));
      break;
    }
  }

  return chain;
}
