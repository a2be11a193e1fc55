import { eq, asc } from 'drizzle-orm'
import { v4 as uuidv4 } from 'uuid'
import type { StoreApi } from 'zustand/vanilla'
import type { PhaseInput, SubmitResult, Team, TurnReport, WorldState } from 'shared'
import { createSessionStore, planSnapshot, type Logger, type SessionStore } from 'engine'
import type { Db } from './db'
import { sessions, turnReports } from './db/schema'

export type Session = {
  id: string
  seed: string
  store: StoreApi<SessionStore>
}

export type NewSession = {
  seed?: string
  teams?: Team[]
  world?: Partial<WorldState>
}

export type SessionListing = {
  id: string
  seed: string
  turn: number
  updatedAt: number
}

type Queue = {
  tail: Promise<void>
  pending: number
}

export type RegistryOptions = {
  logger?: Logger
  // Idle sessions beyond this count are dropped from memory, least recently used first
  maxLive?: number
}

/**
 * Live sessions are kept in memory. Every state change is planned, written to
 * the database, and only then committed to the in-memory store, so a failed
 * write leaves both sides at the previous turn. A session missing from memory
 * (after a restart or eviction) is rebuilt from its stored snapshot.
 */
export function createSessionRegistry(db: Db, { logger = console, maxLive = 100 }: RegistryOptions = {}) {
  const live = new Map<string, Session>()
  const queues = new Map<string, Queue>()

  // Changes to one session run one at a time, in arrival order
  function exclusive<T>(id: string, task: () => Promise<T>): Promise<T> {
    const queue = queues.get(id) ?? { tail: Promise.resolve(), pending: 0 }
    queue.pending++
    const run = queue.tail.then(task).finally(() => {
      if (--queue.pending === 0) queues.delete(id)
    })
    queue.tail = run.then(settle, settle)
    queues.set(id, queue)
    return run
  }

  function remember(session: Session) {
    live.delete(session.id)
    live.set(session.id, session)
    for (const id of live.keys()) {
      if (live.size <= maxLive) break
      if (id === session.id || queues.has(id)) continue
      live.delete(id)
      logger.info(`[api] session ${id} evicted from memory`)
    }
  }

  async function create({ seed, teams, world }: NewSession): Promise<Session> {
    const id = uuidv4()
    const sessionSeed = seed ?? id
    const store = createSessionStore({ seed: sessionSeed, teams, world, logger })
    const now = Date.now()

    await db.insert(sessions).values({
      id,
      seed:      sessionSeed,
      teams:     teams ?? null,
      snapshot:  store.getState().snapshot(),
      createdAt: now,
      updatedAt: now,
    })

    const session = { id, seed: sessionSeed, store }
    remember(session)
    logger.info(`[api] session ${id} created`)
    return session
  }

  async function get(id: string): Promise<Session | null> {
    const cached = live.get(id)
    if (cached) {
      remember(cached)
      return cached
    }

    const row = await db.select().from(sessions).where(eq(sessions.id, id)).get()
    if (!row) return null

    // Another request may have loaded it while this one waited on the read
    const loaded = live.get(id)
    if (loaded) return loaded

    const store = createSessionStore({
      seed:     row.seed,
      teams:    row.teams ?? undefined,
      snapshot: row.snapshot,
      logger,
    })
    const session = { id: row.id, seed: row.seed, store }
    remember(session)
    logger.info(`[api] session ${id} restored at turn ${row.snapshot.world.turnNumber}`)
    return session
  }

  async function list(): Promise<SessionListing[]> {
    const rows = await db.select().from(sessions).orderBy(asc(sessions.createdAt))
    return rows.map(row => ({
      id:        row.id,
      seed:      row.seed,
      turn:      row.snapshot.world.turnNumber,
      updatedAt: row.updatedAt,
    }))
  }

  function advance(id: string): Promise<TurnReport | null> {
    return exclusive(id, async () => {
      const session = await get(id)
      if (!session) return null

      const plan = session.store.getState().planTurn()
      await db.batch([
        db.insert(turnReports).values({ sessionId: id, turn: plan.report.turn, report: plan.report }),
        db.update(sessions)
          .set({ snapshot: planSnapshot(plan), updatedAt: Date.now() })
          .where(eq(sessions.id, id)),
      ])
      session.store.getState().commit(plan)
      return plan.report
    })
  }

  function submit(id: string, missionId: string, input: PhaseInput): Promise<SubmitResult | null> {
    return exclusive(id, async () => {
      const session = await get(id)
      if (!session) return null

      const plan = session.store.getState().planAction(missionId, input)
      if (!plan.result.ok) return plan.result

      await db.update(sessions)
        .set({ snapshot: planSnapshot(plan), updatedAt: Date.now() })
        .where(eq(sessions.id, id))
      session.store.getState().commit(plan)
      return plan.result
    })
  }

  async function reports(id: string): Promise<TurnReport[]> {
    const rows = await db.select()
      .from(turnReports)
      .where(eq(turnReports.sessionId, id))
      .orderBy(asc(turnReports.id))
    return rows.map(row => row.report)
  }

  function remove(id: string): Promise<boolean> {
    return exclusive(id, async () => {
      const existing = await db.select({ id: sessions.id }).from(sessions).where(eq(sessions.id, id)).get()
      if (!existing) return false

      await db.batch([
        db.delete(turnReports).where(eq(turnReports.sessionId, id)),
        db.delete(sessions).where(eq(sessions.id, id)),
      ])
      live.delete(id)
      logger.info(`[api] session ${id} deleted`)
      return true
    })
  }

  return { create, get, list, advance, submit, reports, remove }
}

function settle() {
  return undefined
}

export type SessionRegistry = ReturnType<typeof createSessionRegistry>
