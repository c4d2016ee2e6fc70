export { createDatabase } from './connection';
export type { Database, Session, SqlParam, Driver } from './connection';
export { PgliteDatabase } from './PgliteDatabase';
export { PostgresDatabase, toPositionalParams } from './PostgresDatabase';
export { runMigrations } from './migrations';
export { ReplyRepository } from './ReplyRepository';
