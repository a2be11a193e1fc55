import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core'
import type { EngineSnapshot, Team, TurnReport } from 'shared'

export const sessions = sqliteTable('sessions', {
  id:        text('id').primaryKey(),
  seed:      text('seed').notNull(),
  // null = default roster
  teams:     text('teams', { mode: 'json' }).$type<Team[]>(),
  snapshot:  text('snapshot', { mode: 'json' }).$type<EngineSnapshot>().notNull(),
  createdAt: integer('created_at').notNull(),
  updatedAt: integer('updated_at').notNull(),
})

export const turnReports = sqliteTable('turn_reports', {
  id:        integer('id').primaryKey({ autoIncrement: true }),
  sessionId: text('session_id').notNull().references(() => sessions.id, { onDelete: 'cascade' }),
  turn:      integer('turn').notNull(),
  report:    text('report', { mode: 'json' }).$type<TurnReport>().notNull(),
})
