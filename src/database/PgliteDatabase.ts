import { PGlite } from '@electric-sql/pglite';
import * as fs from 'fs';
import * as path from 'path';
import type { Database, Session, SqlParam } from './connection';
import { toPositionalParams } from './PostgresDatabase';

const IN_MEMORY = 'memory://';

/**
 * Embedded PostgreSQL (PGlite) for local runs and tests. PGlite is a single
 * connection, so every operation goes through one queue.
 */
export class PgliteDatabase implements Database {
  readonly driver = 'pglite';
  private db: PGlite | null = null;
  private queue: Promise<void> = Promise.resolve();

  /**
   * @param dataDir directory holding the cluster, or `memory://` for a throwaway one
   */
  constructor(readonly dataDir: string = IN_MEMORY) {}

  async connect(): Promise<void> {
    if (this.db) return;

    if (this.dataDir !== IN_MEMORY) {
      fs.mkdirSync(path.resolve(this.dataDir), { recursive: true });
    }

    this.db = await PGlite.create(this.dataDir);
  }

  run(sql: string, params: SqlParam[] = []): Promise<void> {
    return this.exclusive(() => this.rawRun(sql, params));
  }

  get<T>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    return this.exclusive(() => this.rawGet<T>(sql, params));
  }

  all<T>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    return this.exclusive(() => this.rawAll<T>(sql, params));
  }

  transaction<T>(work: (session: Session) => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      const session: Session = {
        run: (sql, params = []) => this.rawRun(sql, params),
        get: <R>(sql: string, params: SqlParam[] = []) => this.rawGet<R>(sql, params),
        all: <R>(sql: string, params: SqlParam[] = []) => this.rawAll<R>(sql, params),
      };

      await this.rawRun('BEGIN');
      try {
        const result = await work(session);
        await this.rawRun('COMMIT');
        return result;
      } catch (error) {
        await this.rawRun('ROLLBACK').catch((rollbackError: unknown) => {
          console.error('Failed to roll back transaction:', rollbackError);
        });
        throw error;
      }
    });
  }

  async ping(): Promise<void> {
    await this.get('SELECT 1');
  }

  close(): Promise<void> {
    return this.exclusive(async () => {
      if (!this.db) return;
      await this.db.close();
      this.db = null;
    });
  }

  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.queue.then(operation);
    // The caller sees the failure through `result`; the queue only needs to settle.
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private connection(): PGlite {
    if (!this.db) {
      throw new Error('Database is not connected');
    }
    return this.db;
  }

  private async rawRun(sql: string, params: SqlParam[] = []): Promise<void> {
    await this.connection().query(toPositionalParams(sql), params);
  }

  private async rawGet<T>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    const result = await this.connection().query<T>(toPositionalParams(sql), params);
    return result.rows[0];
  }

  private async rawAll<T>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const result = await this.connection().query<T>(toPositionalParams(sql), params);
    return result.rows;
  }
}
