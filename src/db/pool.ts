import fs from 'fs/promises';
import path from 'path';
import { Pool, QueryResult, QueryResultRow } from 'pg';

/**
 * The slice of `pg.Pool` the repositories use.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

/** A checked-out connection; `release` returns it to the pool. */
export interface DbClient extends Queryable {
  release(err?: Error | boolean): void;
}

/**
 * The slice of `pg.Pool` that can also hand out a dedicated connection.
 */
export interface Database extends Queryable {
  connect(): Promise<DbClient>;
}

/**
 * Run `work` inside BEGIN/COMMIT on one connection, rolling back if it throws.
 */
export async function withTransaction<T>(db: Database, work: (client: Queryable) => Promise<T>): Promise<T> {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      console.error('[db] Rollback failed:', rollbackError);
    }
    throw error;
  } finally {
    client.release();
  }
}

// Resolves from both src/db and dist/db
const SCHEMA_PATH = path.resolve(__dirname, '..', '..', 'sql', 'schema.sql');

export function createPool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err) => {
    console.error('[db] Idle client error:', err);
  });

  return pool;
}

/**
 * Apply sql/schema.sql. Every statement is idempotent.
 */
export async function migrate(db: Queryable): Promise<void> {
  const schema = await fs.readFile(SCHEMA_PATH, 'utf8');
  await db.query(schema);
  console.log('[db] Schema applied');
}

export async function checkHealth(db: Queryable): Promise<boolean> {
  try {
    await db.query('SELECT 1');
    return true;
  } catch (error) {
    console.error('[db] Health check failed:', error);
    return false;
  }
}
