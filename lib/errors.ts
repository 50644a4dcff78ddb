export type LectureErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'TRANSFORM_UNAVAILABLE'
  | 'MALFORMED_SEGMENT'
  | 'CANCELLED_RUN';

export class InvalidConfigurationError extends Error {
  readonly code = 'INVALID_CONFIGURATION' as const;
  readonly issues: string[];

  constructor(issues: string | string[]) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(`Invalid configuration: ${list.join('; ')}`);
    this.name = 'InvalidConfigurationError';
    this.issues = list;
  }
}

export class TransformUnavailableError extends Error {
  readonly code = 'TRANSFORM_UNAVAILABLE' as const;
  readonly chunkIndex: number;
  readonly attempts: number;

  constructor(chunkIndex: number, attempts: number, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : cause ? String(cause) : 'unknown failure';
    super(`Chunk ${chunkIndex} could not be transformed after ${attempts} attempt(s): ${reason}`, { cause });
    this.name = 'TransformUnavailableError';
    this.chunkIndex = chunkIndex;
    this.attempts = attempts;
  }
}

export class MalformedSegmentError extends Error {
  readonly code = 'MALFORMED_SEGMENT' as const;
  readonly chunkIndex: number;
  readonly attempts: number;
  readonly issue: string;

  constructor(chunkIndex: number, attempts: number, issue: string) {
    super(`Chunk ${chunkIndex} returned an unusable segment after ${attempts} attempt(s): ${issue}`);
    this.name = 'MalformedSegmentError';
    this.chunkIndex = chunkIndex;
    this.attempts = attempts;
    this.issue = issue;
  }
}

export class CancelledRunError extends Error {
  readonly code = 'CANCELLED_RUN' as const;

  constructor(message = 'Run cancelled') {
    super(message);
    this.name = 'CancelledRunError';
  }
}

export type LectureError =
  | InvalidConfigurationError
  | TransformUnavailableError
  | MalformedSegmentError
  | CancelledRunError;

export function isLectureError(error: unknown): error is LectureError {
  return (
    error instanceof InvalidConfigurationError ||
    error instanceof TransformUnavailableError ||
    error instanceof MalformedSegmentError ||
    error instanceof CancelledRunError
  );
}

export function throwIfCancelled(signal?: AbortSignal) {
  if (signal?.aborted) {
    throw new CancelledRunError();
  }
}
