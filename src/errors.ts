/**
 * Narration errors
 *
 * Every failure of the pipeline surfaces as a NarrationError subclass so the
 * CLI can report a human-readable message together with the failing chunk.
 */

export type NarrationErrorKind =
  | 'InputNotFound'
  | 'DecodeError'
  | 'SynthesisError'
  | 'PostProcessError'
  | 'MergeError'
  | 'Cancelled';

export interface NarrationErrorOptions {
  chunkIndex?: number;
  cause?: unknown;
}

export class NarrationError extends Error {
  readonly kind: NarrationErrorKind;
  readonly chunkIndex?: number;

  constructor(kind: NarrationErrorKind, message: string, options: NarrationErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'NarrationError';
    this.kind = kind;
    this.chunkIndex = options.chunkIndex;
  }
}

export class InputNotFoundError extends NarrationError {
  constructor(readonly path: string) {
    super('InputNotFound', `File ${path} not found`);
    this.name = 'InputNotFoundError';
  }
}

export class DecodeError extends NarrationError {
  constructor(message: string, options: NarrationErrorOptions = {}) {
    super('DecodeError', message, options);
    this.name = 'DecodeError';
  }
}

export class SynthesisError extends NarrationError {
  constructor(message: string, options: NarrationErrorOptions = {}) {
    super('SynthesisError', message, options);
    this.name = 'SynthesisError';
  }
}

export class PostProcessError extends NarrationError {
  constructor(message: string, options: NarrationErrorOptions = {}) {
    super('PostProcessError', message, options);
    this.name = 'PostProcessError';
  }
}

export class MergeError extends NarrationError {
  constructor(message: string, options: NarrationErrorOptions = {}) {
    super('MergeError', message, options);
    this.name = 'MergeError';
  }
}

export class CancelledError extends NarrationError {
  constructor(message = 'Narration cancelled') {
    super('Cancelled', message);
    this.name = 'CancelledError';
  }
}

/**
 * Human-readable position of a chunk, e.g. "chunk 2/3".
 */
export function describeChunk(index: number, total: number): string {
  return `chunk ${index + 1}/${total}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
