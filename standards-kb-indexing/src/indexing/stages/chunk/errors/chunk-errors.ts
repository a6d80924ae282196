/**
 * Chunk Stage Error Classes
 */

/**
 * Base error for all chunk stage errors
 */
export class ChunkError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = 'ChunkError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Chunk sizes that cannot produce valid chunks (thrown at construction)
 */
export class ChunkConfigError extends ChunkError {
  constructor(message: string) {
    super(message, 'CHUNK_INVALID_CONFIG', false);
    this.name = 'ChunkConfigError';
  }
}

/**
 * Element the chunker cannot interpret. Recorded in the chunking report and
 * skipped, never thrown out of the walk.
 */
export class MalformedElementError extends ChunkError {
  constructor(
    message: string,
    public readonly elementIndex: number,
    public readonly elementType: string,
  ) {
    super(message, 'CHUNK_MALFORMED_ELEMENT', false);
    this.name = 'MalformedElementError';
  }
}

export class TokenizerError extends ChunkError {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message, 'CHUNK_TOKENIZER_ERROR', true);
    this.name = 'TokenizerError';
  }
}
