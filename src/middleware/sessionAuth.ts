import { NextFunction, Request, Response } from 'express';
import { errors } from '../errors';
import { UserService } from '../services/userService';

/**
 * Require a session token (from /auth/login) as `Authorization: Bearer`.
 */
export function sessionAuth(users: UserService) {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const authHeader = req.get('authorization');
      if (!authHeader) {
        throw errors.unauthorized('Missing Authorization header');
      }

      const parts = authHeader.split(' ');
      if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
        throw errors.unauthorized('Invalid Authorization header format');
      }

      const user = await users.verifySessionToken(parts[1]);
      if (!user) {
        throw errors.unauthorized('Invalid or expired token');
      }

      req.user = user;
      next();
    } catch (error) {
      next(error);
    }
  };
}
