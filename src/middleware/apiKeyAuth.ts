import { NextFunction, Request, Response } from 'express';
import { errors } from '../errors';
import { UserService } from '../services/userService';

/**
 * API key from `X-API-Key`, then `Authorization: Bearer`, then the
 * `api_key` query parameter.
 */
export function extractApiKey(req: Request): string | null {
  const header = req.get('x-api-key');
  if (header) {
    return header;
  }

  const authHeader = req.get('authorization');
  if (authHeader && authHeader.startsWith('Bearer ')) {
    const token = authHeader.slice('Bearer '.length).trim();
    if (token) {
      return token;
    }
  }

  const queryKey = req.query.api_key;
  return typeof queryKey === 'string' && queryKey ? queryKey : null;
}

export function apiKeyAuth(users: UserService) {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const apiKey = extractApiKey(req);
      if (!apiKey) {
        throw errors.unauthorized('API key required');
      }

      const user = await users.authenticateApiKey(apiKey);
      if (!user) {
        console.log(`[auth] Rejected API key for ${req.method} ${req.path}`);
        throw errors.unauthorized('Invalid or inactive API key');
      }

      req.user = user;
      next();
    } catch (error) {
      next(error);
    }
  };
}
