export type PipelineErrorCode = 'DECODE_ERROR' | 'COMMIT_FAILURE';

export class PipelineError extends Error {
  constructor(readonly code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Stream entry that is not a valid tick; acknowledged and dropped. */
export class DecodeError extends PipelineError {
  constructor(readonly entryId: string, message: string) {
    super('DECODE_ERROR', `entry ${entryId}: ${message}`);
  }
}

/** Durable write rolled back; the batch stays in the pending buffer. */
export class CommitFailure extends PipelineError {
  constructor(readonly rows: number, options?: { cause?: unknown }) {
    super('COMMIT_FAILURE', `commit of ${rows} pending ticks failed`, options);
  }
}
