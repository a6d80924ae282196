/**
 * Retrieval Error Classes
 */

export class RetrievalError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = 'RetrievalError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidArgumentError extends RetrievalError {
  constructor(message: string) {
    super(message, 'RETRIEVAL_INVALID_ARGUMENT', false);
    this.name = 'InvalidArgumentError';
  }
}

export class IndexNotReadyError extends RetrievalError {
  constructor(message: string = 'Lexical index has not been built') {
    super(message, 'RETRIEVAL_INDEX_NOT_READY', false);
    this.name = 'IndexNotReadyError';
  }
}

/**
 * A retrieval collaborator (vector store, embedding provider) failed
 */
export class CollaboratorFailureError extends RetrievalError {
  constructor(
    public readonly collaborator: string,
    public readonly originalError?: Error,
  ) {
    super(
      `${collaborator} failed: ${originalError?.message ?? 'unknown error'}`,
      'RETRIEVAL_COLLABORATOR_FAILURE',
      true,
    );
    this.name = 'CollaboratorFailureError';
  }
}
