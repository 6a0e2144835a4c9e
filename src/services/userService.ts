import { randomBytes, scrypt, timingSafeEqual } from 'crypto';
import jwt from 'jsonwebtoken';
import { UserStore } from '../db/userRepository';
import { errors } from '../errors';
import { User } from '../types';
import { SignupInput } from '../utils/validators';

const KEY_LENGTH = 64;

function deriveKey(password: string, salt: string, length: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, length, (err, key) => (err ? reject(err) : resolve(key)));
  });
}

/** 32 random bytes, url-safe base64: 43 characters */
export function generateApiKey(): string {
  return randomBytes(32).toString('base64url');
}

export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(16).toString('hex');
  const derived = await deriveKey(password, salt, KEY_LENGTH);
  return `scrypt$${salt}$${derived.toString('hex')}`;
}

export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const [scheme, salt, hash] = stored.split('$');
  if (scheme !== 'scrypt' || !salt || !hash) {
    return false;
  }
  const expected = Buffer.from(hash, 'hex');
  if (expected.length === 0) {
    return false;
  }
  const derived = await deriveKey(password, salt, expected.length);
  return timingSafeEqual(derived, expected);
}

export interface UserResponse {
  id: number;
  username: string;
  email: string;
  is_active: boolean;
  is_admin: boolean;
  created_at: string;
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    is_active: user.isActive,
    is_admin: user.isAdmin,
    created_at: user.createdAt.toISOString(),
  };
}

export interface SessionOptions {
  secret: string;
  expiresInSeconds: number;
}

/**
 * Accounts, API keys and session tokens. API keys authenticate the /api
 * endpoints; session tokens (JWT) only the account endpoints.
 */
export class UserService {
  constructor(
    private readonly users: UserStore,
    private readonly session: SessionOptions,
  ) {}

  async authenticateApiKey(apiKey: string): Promise<User | null> {
    const user = await this.users.findByApiKey(apiKey);
    if (!user || !user.isActive) {
      return null;
    }
    return user;
  }

  async register(input: SignupInput): Promise<User> {
    if (await this.users.findByUsername(input.username)) {
      throw errors.conflict('Username already exists.');
    }
    if (await this.users.findByEmail(input.email)) {
      throw errors.conflict('Email address already registered.');
    }

    const user = await this.users.create({
      username: input.username,
      email: input.email,
      passwordHash: await hashPassword(input.password),
      apiKey: generateApiKey(),
      isAdmin: false,
    });
    console.log(`[auth] New user registered: ${user.username} (${user.email})`);
    return user;
  }

  async login(login: string, password: string): Promise<{ token: string; user: User }> {
    const user = await this.users.findByLogin(login);
    if (!user || !user.isActive || !(await verifyPassword(password, user.passwordHash))) {
      console.warn(`[auth] Failed login attempt for: ${login}`);
      throw errors.unauthorized('Invalid username/email or password.');
    }

    const token = jwt.sign({ sub: String(user.id) }, this.session.secret, {
      expiresIn: this.session.expiresInSeconds,
    });
    console.log(`[auth] User ${user.username} logged in`);
    return { token, user };
  }

  async verifySessionToken(token: string): Promise<User | null> {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.session.secret);
    } catch {
      return null;
    }
    if (typeof payload === 'string' || typeof payload.sub !== 'string' || !/^\d+$/.test(payload.sub)) {
      return null;
    }
    const user = await this.users.findById(Number(payload.sub));
    return user && user.isActive ? user : null;
  }

  async regenerateApiKey(user: User): Promise<User> {
    const updated = await this.users.updateApiKey(user.id, generateApiKey());
    if (!updated) {
      throw errors.notFound('User not found');
    }
    console.log(`[auth] API key regenerated for user: ${updated.username}`);
    return updated;
  }

  /**
   * Create the default admin account when there are no users yet.
   * Returns the new account's API key, or null when users already exist.
   */
  async ensureDefaultAdmin(password: string): Promise<string | null> {
    if ((await this.users.count()) > 0) {
      return null;
    }
    const admin = await this.users.create({
      username: 'admin',
      email: 'admin@example.com',
      passwordHash: await hashPassword(password),
      apiKey: generateApiKey(),
      isAdmin: true,
    });
    console.log(`[auth] Created default admin user with API key: ${admin.apiKey}`);
    return admin.apiKey;
  }
}
