export type ErrorKind =
  | 'validation'
  | 'staging'
  | 'provider'
  | 'internal'
  | 'aborted';

export type ValidationCode =
  | 'MISSING_PART'
  | 'EMPTY_PART'
  | 'PART_TOO_LARGE'
  | 'UNSUPPORTED_MEDIA_TYPE'
  | 'INVALID_ARCHIVE'
  | 'INVALID_REQUEST';

const VALIDATION_STATUS: Record<ValidationCode, number> = {
  MISSING_PART: 400,
  EMPTY_PART: 400,
  PART_TOO_LARGE: 413,
  UNSUPPORTED_MEDIA_TYPE: 415,
  INVALID_ARCHIVE: 400,
  INVALID_REQUEST: 400,
};

export abstract class ReviewError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends ReviewError {
  readonly kind = 'validation';
  readonly statusCode: number;

  constructor(
    readonly code: ValidationCode,
    message: string,
    readonly part?: string,
  ) {
    super(message);
    this.statusCode = VALIDATION_STATUS[code];
  }
}

export class PathTraversalError extends ReviewError {
  readonly kind = 'staging';
  readonly code = 'PATH_TRAVERSAL';
  readonly statusCode = 400;

  constructor(readonly entryName: string) {
    super(`Archive entry escapes the staging root: "${entryName}"`);
  }
}

export class ArchiveTooLargeError extends ReviewError {
  readonly kind = 'staging';
  readonly code = 'ARCHIVE_TOO_LARGE';
  readonly statusCode = 413;
}

export type ProviderFailureReason =
  | 'timeout'
  | 'network'
  | 'http'
  | 'malformed'
  | 'aborted';

/** Online generation failed. Absorbed by the orchestrator, never sent to the caller. */
export class ProviderError extends ReviewError {
  readonly kind = 'provider';
  readonly code = 'PROVIDER_FAILURE';
  readonly statusCode = 502;

  constructor(
    readonly reason: ProviderFailureReason,
    message: string,
    readonly httpStatus?: number,
  ) {
    super(message);
  }

  get retryable(): boolean {
    if (this.reason === 'aborted') return false;
    if (this.reason === 'http') {
      return (
        this.httpStatus === 429 ||
        (this.httpStatus !== undefined && this.httpStatus >= 500)
      );
    }
    return true;
  }
}

export class InternalError extends ReviewError {
  readonly kind = 'internal';
  readonly code = 'INTERNAL_ERROR';
  readonly statusCode = 500;
}

export class ReviewAbortedError extends ReviewError {
  readonly kind = 'aborted';
  readonly code = 'REQUEST_ABORTED';
  /** Non-standard "client closed request"; the client is gone by then. */
  readonly statusCode = 499;

  constructor() {
    super('Request was cancelled by the client');
  }
}

export interface ErrorBody {
  error: {
    kind: ErrorKind;
    code: string;
    message: string;
    part?: string;
  };
}
