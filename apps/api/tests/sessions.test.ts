import { describe, it, expect, beforeEach, vi } from 'vitest'
import { eq, sql } from 'drizzle-orm'
import type { Mission, TurnReport } from 'shared'
import { defaultTeams } from 'engine'
import { createDb, type Db } from '../src/db'
import { sessions } from '../src/db/schema'
import { createSessionRegistry } from '../src/sessions'
import { createApp } from '../src/app'

type Created = { id: string; seed: string; snapshot: { world: { turnNumber: number; timelineStability: number } } }

function quietLogger() {
  return { info: vi.fn(), warn: vi.fn() }
}

describe('sessions API', () => {
  let db: Db
  let app: ReturnType<typeof createApp>

  beforeEach(async () => {
    db = await createDb(':memory:')
    app = createApp({ registry: createSessionRegistry(db, { logger: quietLogger() }), requestLog: false })
  })

  async function create(body: object = { seed: 'test-seed' }): Promise<Created> {
    const res = await app.request('/api/sessions', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    })
    expect(res.status).toBe(201)
    return res.json()
  }

  function post(path: string, body?: object) {
    return app.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    })
  }

  it('answers the health check', async () => {
    const res = await app.request('/')
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: 'ok', service: 'director-sim-api' })
  })

  it('creates a session at turn 0', async () => {
    const session = await create({ seed: 'test-seed', world: { timelineStability: 40 } })

    expect(session.seed).toBe('test-seed')
    expect(session.snapshot.world.turnNumber).toBe(0)
    expect(session.snapshot.world.timelineStability).toBe(40)

    const list = await (await app.request('/api/sessions')).json()
    expect(list).toEqual([{ id: session.id, seed: 'test-seed', turn: 0, updatedAt: expect.any(Number) }])
  })

  it('uses the session id as the seed when none is given', async () => {
    const session = await create({})
    expect(session.seed).toBe(session.id)
  })

  it('rejects invalid bodies', async () => {
    const res = await post('/api/sessions', { seed: 42 })
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: expect.stringContaining('seed') })

    const outOfRange = await post('/api/sessions', { world: { exposureRisk: 140 } })
    expect(outOfRange.status).toBe(400)
  })

  it('returns 404 for unknown sessions', async () => {
    expect((await app.request('/api/sessions/nope')).status).toBe(404)
    expect((await post('/api/sessions/nope/turns')).status).toBe(404)
    expect((await app.request('/api/sessions/nope/stats')).status).toBe(404)
    expect((await app.request('/api/sessions/nope', { method: 'DELETE' })).status).toBe(404)
  })

  it('advances turns and stores every report', async () => {
    const { id } = await create()

    const first: TurnReport = await (await post(`/api/sessions/${id}/turns`)).json()
    const second: TurnReport = await (await post(`/api/sessions/${id}/turns`)).json()
    expect([first.turn, second.turn]).toEqual([1, 2])

    const reports: TurnReport[] = await (await app.request(`/api/sessions/${id}/reports`)).json()
    expect(reports.map(r => r.turn)).toEqual([1, 2])
    expect(reports[1]).toEqual(second)

    const current: Created = await (await app.request(`/api/sessions/${id}`)).json()
    expect(current.snapshot.world.turnNumber).toBe(2)
  })

  it('keeps sessions isolated', async () => {
    const a = await create()
    const b = await create()

    await post(`/api/sessions/${a.id}/turns`)
    await post(`/api/sessions/${a.id}/turns`)

    const other: Created = await (await app.request(`/api/sessions/${b.id}`)).json()
    expect(other.snapshot.world.turnNumber).toBe(0)
  })

  it('restores a session from the database after a restart', async () => {
    const { id } = await create()
    const before: TurnReport = await (await post(`/api/sessions/${id}/turns`)).json()

    const restarted = createApp({ registry: createSessionRegistry(db, { logger: quietLogger() }), requestLog: false })
    const next = await restarted.request(`/api/sessions/${id}/turns`, { method: 'POST' })
    const report: TurnReport = await next.json()
    expect(report.turn).toBe(before.turn + 1)

    // the original process, had it kept running, would have produced the same turn
    const continued: TurnReport = await (await post(`/api/sessions/${id}/turns`)).json()
    expect(continued).toEqual(report)
  })

  it('walks a player mission through its phases', async () => {
    const player = defaultTeams.filter(t => t.actor === 'player')
    const { id } = await create({ seed: 'test-seed', teams: player, world: { timelineStability: 8 } })
    const turn: TurnReport = await (await post(`/api/sessions/${id}/turns`)).json()

    expect(turn.awaitingInput.map(m => [m.id, m.teamId])).toEqual([['M1-1', 'T-3468']])

    const unknown = await post(`/api/sessions/${id}/missions/M9-9/actions`, { tactic: 'balanced' })
    expect(unknown.status).toBe(404)
    expect(await unknown.json()).toEqual({ error: 'Mission M9-9 does not exist', code: 'unknown_mission' })

    const badTactic = await post(`/api/sessions/${id}/missions/M1-1/actions`, { tactic: 'reckless' })
    expect(badTactic.status).toBe(400)

    let mission: Mission | undefined
    for (let i = 0; i < 3; i++) {
      const res = await post(`/api/sessions/${id}/missions/M1-1/actions`, { tactic: 'cautious' })
      expect(res.status).toBe(200)
      const body: { mission: Mission } = await res.json()
      mission = body.mission
      if (['success', 'partial_success', 'failure'].includes(mission.stage)) break
    }
    expect(mission?.resolvedTurn).toBe(1)

    const again = await post(`/api/sessions/${id}/missions/M1-1/actions`, {})
    expect(again.status).toBe(409)
    expect(await again.json()).toMatchObject({ code: 'not_awaiting_input' })

    const stats = await (await app.request(`/api/sessions/${id}/stats`)).json()
    expect(stats).toMatchObject({
      turn: 1,
      activeMissions: 0,
      resolved: 1,
      rolls: { totalRolls: mission?.phaseResults.length },
      emergencies: { status: 'critical', count: 1 },
    })
  })

  it('deletes a session and its reports', async () => {
    const { id } = await create()
    await post(`/api/sessions/${id}/turns`)

    const res = await app.request(`/api/sessions/${id}`, { method: 'DELETE' })
    expect(await res.json()).toEqual({ ok: true })
    expect((await app.request(`/api/sessions/${id}`)).status).toBe(404)
    expect(await (await app.request('/api/sessions')).json()).toEqual([])
  })
})

describe('session registry', () => {
  let db: Db

  beforeEach(async () => {
    db = await createDb(':memory:')
  })

  async function storedTurn(id: string) {
    const row = await db.select().from(sessions).where(eq(sessions.id, id)).get()
    return row?.snapshot.world.turnNumber
  }

  it('leaves memory and the database at the previous turn when the write fails', async () => {
    const registry = createSessionRegistry(db, { logger: quietLogger() })
    const { id, store } = await registry.create({ seed: 'test-seed' })
    await db.run(sql`DROP TABLE turn_reports`)

    await expect(registry.advance(id)).rejects.toThrow()

    expect(store.getState().engine.world.turnNumber).toBe(0)
    expect(await storedTurn(id)).toBe(0)
  })

  it('runs concurrent turns for one session one after the other', async () => {
    const registry = createSessionRegistry(db, { logger: quietLogger() })
    const { id } = await registry.create({ seed: 'test-seed' })

    const reports = await Promise.all([registry.advance(id), registry.advance(id), registry.advance(id)])

    expect(reports.map(r => r?.turn)).toEqual([1, 2, 3])
    expect(await storedTurn(id)).toBe(3)
  })

  it('evicts idle sessions beyond the live limit and reloads them from the database', async () => {
    const logger = quietLogger()
    const registry = createSessionRegistry(db, { logger, maxLive: 1 })
    const first = await registry.create({ seed: 'first-seed' })
    await registry.advance(first.id)
    const before = first.store.getState().snapshot()

    await registry.create({ seed: 'second-seed' })
    expect(logger.info).toHaveBeenCalledWith(`[api] session ${first.id} evicted from memory`)

    const reloaded = await registry.get(first.id)
    expect(reloaded?.store).not.toBe(first.store)
    expect(reloaded?.store.getState().snapshot()).toEqual(before)
  })

  it('returns null for a session that does not exist', async () => {
    const registry = createSessionRegistry(db, { logger: quietLogger() })
    expect(await registry.advance('nope')).toBeNull()
    expect(await registry.submit('nope', 'M1-1', { tactic: 'balanced' })).toBeNull()
  })
})
