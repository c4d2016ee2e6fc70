import { Pool, PoolClient, QueryResult } from 'pg';
import type { Database, Session, SqlParam } from './connection';

/**
 * Rewrites `?` placeholders to pg's positional `$1, $2, ...`. Question marks
 * inside single-quoted literals are left alone.
 */
export function toPositionalParams(sql: string): string {
  let index = 0;
  let inLiteral = false;
  let result = '';

  for (const char of sql) {
    if (char === "'") {
      inLiteral = !inLiteral;
      result += char;
    } else if (char === '?' && !inLiteral) {
      index += 1;
      result += `$${index}`;
    } else {
      result += char;
    }
  }

  return result;
}

type QueryFn = (text: string, values: SqlParam[]) => Promise<QueryResult>;

function sessionFor(query: QueryFn): Session {
  return {
    async run(sql: string, params: SqlParam[] = []): Promise<void> {
      await query(toPositionalParams(sql), params);
    },
    async get<T>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
      const result = await query(toPositionalParams(sql), params);
      return result.rows[0];
    },
    async all<T>(sql: string, params: SqlParam[] = []): Promise<T[]> {
      const result = await query(toPositionalParams(sql), params);
      return result.rows;
    },
  };
}

/**
 * PostgreSQL through a pg connection pool. Plain queries borrow a client per
 * statement; transactions hold one client from BEGIN until release.
 */
export class PostgresDatabase implements Database {
  readonly driver = 'pg';
  private pool: Pool;
  private session: Session;

  constructor(readonly connectionString: string) {
    this.pool = new Pool({
      connectionString,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });
    this.pool.on('error', (err) => {
      console.error('Idle PostgreSQL client error:', err);
    });
    this.session = sessionFor((text, values) => this.pool.query(text, values));
  }

  async connect(): Promise<void> {
    await this.ping();
  }

  run(sql: string, params?: SqlParam[]): Promise<void> {
    return this.session.run(sql, params);
  }

  get<T>(sql: string, params?: SqlParam[]): Promise<T | undefined> {
    return this.session.get<T>(sql, params);
  }

  all<T>(sql: string, params?: SqlParam[]): Promise<T[]> {
    return this.session.all<T>(sql, params);
  }

  async transaction<T>(work: (session: Session) => Promise<T>): Promise<T> {
    const client: PoolClient = await this.pool.connect();
    try {
      await client.query('BEGIN');
      try {
        const result = await work(sessionFor((text, values) => client.query(text, values)));
        await client.query('COMMIT');
        return result;
      } catch (error) {
        await client.query('ROLLBACK').catch((rollbackError: unknown) => {
          console.error('Failed to roll back transaction:', rollbackError);
        });
        throw error;
      }
    } finally {
      client.release();
    }
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
