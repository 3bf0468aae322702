export type MediaIndexErrorCode =
  | 'ALREADY_RUNNING'
  | 'PATH_NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'DECODE_FAILURE'
  | 'INDEX_OUT_OF_RANGE';

export class MediaIndexError extends Error {
  readonly code: MediaIndexErrorCode;

  constructor(code: MediaIndexErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MediaIndexError';
    this.code = code;
  }
}

export class AlreadyRunningError extends MediaIndexError {
  readonly rootPath: string | null;

  constructor(rootPath: string | null) {
    super('ALREADY_RUNNING', `A scan is already running${rootPath ? ` for ${rootPath}` : ''}`);
    this.name = 'AlreadyRunningError';
    this.rootPath = rootPath;
  }
}

export class PathNotFoundError extends MediaIndexError {
  readonly path: string;

  constructor(path: string, detail = 'does not exist', options?: { cause?: unknown }) {
    super('PATH_NOT_FOUND', `Path ${path.trim() ? path : JSON.stringify(path)} ${detail}`, options);
    this.name = 'PathNotFoundError';
    this.path = path;
  }
}

export class PermissionDeniedError extends MediaIndexError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super('PERMISSION_DENIED', `Permission denied: ${path}`, options);
    this.name = 'PermissionDeniedError';
    this.path = path;
  }
}

export class DecodeFailureError extends MediaIndexError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    const reason = options?.cause === undefined ? '' : `: ${formatError(options.cause)}`;
    super('DECODE_FAILURE', `Could not decode ${path}${reason}`, options);
    this.name = 'DecodeFailureError';
    this.path = path;
  }
}

export class IndexOutOfRangeError extends MediaIndexError {
  readonly index: number;
  readonly rowCount: number;

  constructor(index: number, rowCount: number) {
    super('INDEX_OUT_OF_RANGE', `Row ${index} is outside [0, ${rowCount})`);
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.rowCount = rowCount;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function errorCode(error: unknown): string {
  if (error instanceof MediaIndexError) return error.code;
  if (isErrnoException(error) && error.code) return error.code;
  return 'UNKNOWN';
}

/**
 * Map a filesystem error on `path` to the indexer's taxonomy.
 * Anything that is not a missing path or an access failure is returned unchanged.
 */
export function toPathError(path: string, error: unknown): unknown {
  if (!isErrnoException(error)) return error;
  switch (error.code) {
    case 'ENOENT':
    case 'ENOTDIR':
    case 'ELOOP':
      return new PathNotFoundError(path, 'does not exist', { cause: error });
    case 'EACCES':
    case 'EPERM':
      return new PermissionDeniedError(path, { cause: error });
    default:
      return error;
  }
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
