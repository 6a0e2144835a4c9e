import { NewUser, User } from '../types';
import { Queryable } from './pool';

export interface UserStore {
  create(user: NewUser): Promise<User>;
  findById(id: number): Promise<User | null>;
  findByApiKey(apiKey: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  /** Match either the username or the email address */
  findByLogin(login: string): Promise<User | null>;
  updateApiKey(id: number, apiKey: string): Promise<User | null>;
  count(): Promise<number>;
}

interface UserRow {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  api_key: string;
  is_active: boolean;
  is_admin: boolean;
  created_at: Date;
}

function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    apiKey: row.api_key,
    isActive: row.is_active,
    isAdmin: row.is_admin,
    createdAt: row.created_at,
  };
}

export class UserRepository implements UserStore {
  constructor(private readonly db: Queryable) {}

  async create(user: NewUser): Promise<User> {
    const { rows } = await this.db.query<UserRow>(
      `INSERT INTO users (username, email, password_hash, api_key, is_admin)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING *`,
      [user.username, user.email, user.passwordHash, user.apiKey, user.isAdmin],
    );
    return mapUserRow(rows[0]);
  }

  async findById(id: number): Promise<User | null> {
    return this.findOne('SELECT * FROM users WHERE id = $1', [id]);
  }

  async findByApiKey(apiKey: string): Promise<User | null> {
    return this.findOne('SELECT * FROM users WHERE api_key = $1', [apiKey]);
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.findOne('SELECT * FROM users WHERE username = $1', [username]);
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.findOne('SELECT * FROM users WHERE email = $1', [email.toLowerCase()]);
  }

  async findByLogin(login: string): Promise<User | null> {
    return this.findOne('SELECT * FROM users WHERE username = $1 OR email = LOWER($1) LIMIT 1', [login]);
  }

  async updateApiKey(id: number, apiKey: string): Promise<User | null> {
    return this.findOne('UPDATE users SET api_key = $2 WHERE id = $1 RETURNING *', [id, apiKey]);
  }

  async count(): Promise<number> {
    const { rows } = await this.db.query<{ count: string }>('SELECT COUNT(*) AS count FROM users');
    return Number(rows[0]?.count ?? 0);
  }

  private async findOne(sql: string, values: unknown[]): Promise<User | null> {
    const { rows } = await this.db.query<UserRow>(sql, values);
    return rows.length ? mapUserRow(rows[0]) : null;
  }
}
