export type PipelineErrorCode =
  | 'AUTH_REJECTED'
  | 'CAPACITY_EXCEEDED'
  | 'TRANSPORT_ERROR'
  | 'DECODE_ERROR'
  | 'PUBLISH_TIMEOUT';

export class PipelineError extends Error {
  constructor(readonly code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Session token missing, invalid or expired. Fatal to a socket until the token is refreshed. */
export class AuthRejected extends PipelineError {
  constructor(message = 'session token rejected', options?: { cause?: unknown }) {
    super('AUTH_REJECTED', message, options);
  }
}

/** Filtered universe does not fit in maxConnections * maxPerConnection. */
export class CapacityExceeded extends PipelineError {
  constructor(readonly required: number, readonly capacity: number) {
    super('CAPACITY_EXCEEDED', `universe of ${required} instruments exceeds capacity ${capacity}; narrow the filter`);
  }
}

export class TransportError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT_ERROR', message, options);
  }
}

export class DecodeError extends PipelineError {
  constructor(message: string) {
    super('DECODE_ERROR', message);
  }
}

export class PublishTimeout extends PipelineError {
  constructor(readonly timeoutMs: number) {
    super('PUBLISH_TIMEOUT', `queue write exceeded ${timeoutMs}ms`);
  }
}
