import type { NextFunction, Request, Response } from 'express';

/**
 * Pass rejections from an async route handler to the error middleware.
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
