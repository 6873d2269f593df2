/**
 * Request-level failures. Each carries the HTTP status the transport answers
 * with; property-level failures never become exceptions (see resolvers.ts).
 */
export class CalDavError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CalDavError';
  }
}

export class PathError extends CalDavError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'PathError';
  }
}

export class FilterParseError extends CalDavError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'FilterParseError';
  }
}

export class RequestParseError extends CalDavError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 400, options);
    this.name = 'RequestParseError';
  }
}

export class CalendarDataError extends CalDavError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 400, options);
    this.name = 'CalendarDataError';
  }
}

export class MergeError extends CalDavError {
  constructor(message: string) {
    super(message, 500);
    this.name = 'MergeError';
  }
}

export type StorageErrorKind =
  | 'not-found'
  | 'invalid-input'
  | 'permission-denied'
  | 'conflict'
  | 'unavailable';

const STORAGE_STATUS: Record<StorageErrorKind, number> = {
  'not-found': 404,
  'invalid-input': 400,
  'permission-denied': 403,
  conflict: 409,
  unavailable: 500,
};

export class StorageError extends CalDavError {
  constructor(
    public readonly kind: StorageErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, STORAGE_STATUS[kind], options);
    this.name = 'StorageError';
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof StorageError && error.kind === 'not-found';
}
