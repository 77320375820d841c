import type { SqlConnection } from './client.js';

/**
 * Creates the `repo_events` table and its indexes if they are missing.
 *
 * drizzle-kit migrations (see drizzle.config.ts) are the production
 * path; this keeps a fresh local database usable on first run.
 */
export async function ensureSchema(sql: SqlConnection): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS repo_events (
      id           UUID PRIMARY KEY,
      request_id   VARCHAR(255) NOT NULL,
      author       VARCHAR(255) NOT NULL,
      action       VARCHAR(32)  NOT NULL,
      from_branch  VARCHAR(255),
      to_branch    VARCHAR(255) NOT NULL,
      timestamp    VARCHAR(64)  NOT NULL,
      created_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_repo_events_timestamp ON repo_events (timestamp)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_repo_events_action ON repo_events (action)`);
}
