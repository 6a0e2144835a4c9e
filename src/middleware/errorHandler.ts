import { NextFunction, Request, Response } from 'express';
import { MulterError } from 'multer';
import { ApiError } from '../errors';
import { formatMegabytes } from '../services/uploadService';

export interface ErrorHandlerOptions {
  production: boolean;
  maxFileSize: number;
}

function toApiError(err: unknown, options: ErrorHandlerOptions): ApiError {
  if (err instanceof ApiError) {
    return err;
  }
  if (err instanceof MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') {
      return new ApiError(`File too large. Maximum size: ${formatMegabytes(options.maxFileSize)}`, 400, 'FILE_TOO_LARGE');
    }
    return new ApiError(`File upload error: ${err.message}`, 400, 'UPLOAD_ERROR');
  }
  if (err instanceof SyntaxError && 'body' in err) {
    return new ApiError('Request body must be valid JSON', 400, 'BAD_REQUEST');
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ApiError(message || 'Internal server error', 500, 'INTERNAL_ERROR');
}

export function createErrorHandler(options: ErrorHandlerOptions) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const apiError = toApiError(err, options);

    if (apiError.statusCode >= 500) {
      console.error(`[api] ${req.method} ${req.originalUrl} failed:`, err);
    } else {
      console.log(`[api] ${req.method} ${req.originalUrl} -> ${apiError.statusCode}: ${apiError.message}`);
    }

    if (res.headersSent) {
      res.end();
      return;
    }

    const message = apiError.statusCode >= 500 && options.production ? 'Internal server error' : apiError.message;
    res.status(apiError.statusCode).json({
      error: message,
      code: apiError.code,
      ...apiError.details,
    });
  };
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    error: 'Not found',
    code: 'NOT_FOUND',
    message: 'The requested endpoint does not exist',
  });
}
