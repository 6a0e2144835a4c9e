import { Request, Router } from 'express';
import { errors } from '../errors';
import { asyncHandler } from '../middleware/asyncHandler';
import { sessionAuth } from '../middleware/sessionAuth';
import { UserService, toUserResponse } from '../services/userService';
import { User } from '../types';
import { parseLoginRequest, parseSignupRequest } from '../utils/validators';

export interface AuthRouterDeps {
  users: UserService;
  sessionTtlSeconds: number;
}

function sessionUser(req: Request): User {
  if (!req.user) {
    throw errors.unauthorized('Missing Authorization header');
  }
  return req.user;
}

/**
 * JSON account endpoints: signup, login and API key management.
 */
export function createAuthRouter(deps: AuthRouterDeps): Router {
  const router = Router();
  const requireSession = sessionAuth(deps.users);

  router.post(
    '/signup',
    asyncHandler(async (req, res) => {
      const input = parseSignupRequest(req.body);
      const user = await deps.users.register(input);
      res.status(201).json({
        message: 'Account created successfully! You can now log in.',
        user: toUserResponse(user),
        api_key: user.apiKey,
      });
    }),
  );

  router.post(
    '/login',
    asyncHandler(async (req, res) => {
      const { username, password } = parseLoginRequest(req.body);
      const { token, user } = await deps.users.login(username, password);
      res.json({
        message: `Welcome back, ${user.username}!`,
        token,
        token_type: 'Bearer',
        expires_in: deps.sessionTtlSeconds,
        user: toUserResponse(user),
      });
    }),
  );

  router.get(
    '/profile',
    requireSession,
    asyncHandler(async (req, res) => {
      const user = sessionUser(req);
      res.json({ user: { ...toUserResponse(user), api_key: user.apiKey } });
    }),
  );

  router.post(
    '/regenerate-api-key',
    requireSession,
    asyncHandler(async (req, res) => {
      const updated = await deps.users.regenerateApiKey(sessionUser(req));
      res.json({ message: 'API key regenerated successfully!', api_key: updated.apiKey });
    }),
  );

  return router;
}
