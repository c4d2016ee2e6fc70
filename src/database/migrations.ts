import { Database } from './connection';

/**
 * Creates the schema if it is missing. Safe to run on every startup.
 *
 * A table left behind by an earlier deployment is kept as it is, and may lack
 * the `created_at` default; the repository stamps that column itself.
 */
export async function runMigrations(db: Database): Promise<void> {
  await db.run(`
    CREATE TABLE IF NOT EXISTS email_replies (
      id SERIAL PRIMARY KEY,
      email_text TEXT NOT NULL,
      tone VARCHAR(50) NOT NULL CHECK (tone IN ('formal', 'casual')),
      reply_text TEXT NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  // History is read newest-first
  await db.run(`
    CREATE INDEX IF NOT EXISTS idx_email_replies_created_at
    ON email_replies(created_at DESC, id DESC)
  `);
}
