import { createClient } from '@libsql/client'
import { drizzle } from 'drizzle-orm/libsql'

export type Db = Awaited<ReturnType<typeof createDb>>

export async function createDb(url: string) {
  const client = createClient({ url })

  if (url !== ':memory:') await client.execute('PRAGMA journal_mode = WAL')
  await client.execute('PRAGMA foreign_keys = ON')
  await client.executeMultiple(`
    CREATE TABLE IF NOT EXISTS sessions (
      id         TEXT PRIMARY KEY,
      seed       TEXT NOT NULL,
      teams      TEXT,
      snapshot   TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );
    CREATE TABLE IF NOT EXISTS turn_reports (
      id         INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
      turn       INTEGER NOT NULL,
      report     TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS turn_reports_session ON turn_reports (session_id, turn);
  `)

  return drizzle(client)
}
