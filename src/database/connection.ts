import { normalizeDatabaseUrl } from '../config/env';
import { PostgresDatabase } from './PostgresDatabase';
import { PgliteDatabase } from './PgliteDatabase';

export type SqlParam = string | number | null;

export type Driver = 'pg' | 'pglite';

/**
 * Query surface shared by a whole database and by a single transaction.
 * SQL is PostgreSQL with `?` placeholders; each driver rewrites them to `$n`.
 */
export interface Session {
  run(sql: string, params?: SqlParam[]): Promise<void>;
  get<T>(sql: string, params?: SqlParam[]): Promise<T | undefined>;
  all<T>(sql: string, params?: SqlParam[]): Promise<T[]>;
}

export interface Database extends Session {
  readonly driver: Driver;
  connect(): Promise<void>;
  /**
   * Runs `work` inside BEGIN/COMMIT on a session nobody else is using. The
   * transaction is rolled back when `work` throws and the session is always released.
   */
  transaction<T>(work: (session: Session) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

const PGLITE_PREFIX = 'pglite:';

/**
 * Picks the driver from the connection string:
 * `postgresql://` (or the legacy `postgres://`) for pg, `pglite:<dir>` or
 * `pglite:memory://` for the embedded PGlite engine.
 */
export function createDatabase(databaseUrl: string): Database {
  const url = normalizeDatabaseUrl(databaseUrl);

  if (url.startsWith('postgresql://')) {
    return new PostgresDatabase(url);
  }

  if (url.startsWith(PGLITE_PREFIX)) {
    const dataDir = url.slice(PGLITE_PREFIX.length);
    if (!dataDir) {
      throw new Error('DATABASE_URL must name a directory after pglite:, or use pglite:memory://');
    }
    return new PgliteDatabase(dataDir);
  }

  throw new Error(`Unsupported DATABASE_URL scheme: ${url.split(':')[0]}`);
}
