/**
 * Error raised anywhere below the routes that should reach the client with
 * a specific status code. `details` are merged into the JSON error body.
 */
export class ApiError extends Error {
  statusCode: number;
  code: string;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class FileNotFoundError extends ApiError {
  readonly filename: string;

  constructor(filename: string) {
    super(`File not found: ${filename}`, 404, 'FILE_NOT_FOUND');
    this.name = 'FileNotFoundError';
    this.filename = filename;
  }
}

export class PdfProcessingError extends ApiError {
  constructor(message: string) {
    super(message, 422, 'PDF_PROCESSING_FAILED');
    this.name = 'PdfProcessingError';
  }
}

export class JobStateError extends ApiError {
  constructor(jobId: number, from: string, to: string) {
    super(`Job ${jobId} cannot move from ${from} to ${to}`, 409, 'INVALID_JOB_STATE');
    this.name = 'JobStateError';
  }
}

export const errors = {
  badRequest: (message: string, details?: Record<string, unknown>) =>
    new ApiError(message, 400, 'BAD_REQUEST', details),
  unauthorized: (message: string = 'Unauthorized') => new ApiError(message, 401, 'UNAUTHORIZED'),
  forbidden: (message: string = 'Unauthorized') => new ApiError(message, 403, 'FORBIDDEN'),
  notFound: (message: string = 'Not found') => new ApiError(message, 404, 'NOT_FOUND'),
  conflict: (message: string) => new ApiError(message, 409, 'CONFLICT'),
  gone: (message: string) => new ApiError(message, 410, 'GONE'),
};

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * True for errors carrying a string `code`, such as fs errors (`ENOENT`)
 * and object-store errors (`NoSuchKey`).
 */
export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const { code } = error;
  return typeof code === 'string' && codes.includes(code);
}
