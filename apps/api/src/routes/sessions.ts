import { Hono } from 'hono'
import { zValidator } from '@hono/zod-validator'
import { z, type ZodError } from 'zod'
import { TeamSchema, WorldOverridesSchema, rollStatistics, summarizeEmergencies } from 'engine'
import type { SessionRegistry } from '../sessions'

const NewSessionSchema = z.object({
  seed:  z.string().min(1).max(128).optional(),
  teams: z.array(TeamSchema).min(1).optional(),
  world: WorldOverridesSchema.optional(),
})

const PhaseInputSchema = z.object({
  tactic: z.enum(['cautious', 'balanced', 'aggressive']).default('balanced'),
})

export function describeIssues(error: ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ')
}

export function sessionsRouter(registry: SessionRegistry) {
  const router = new Hono()

  // POST /api/sessions: start a new game
  router.post(
    '/',
    zValidator('json', NewSessionSchema, (result, c) => {
      if (!result.success) return c.json({ error: describeIssues(result.error) }, 400)
    }),
    async (c) => {
      const session = await registry.create(c.req.valid('json'))
      return c.json({ id: session.id, seed: session.seed, snapshot: session.store.getState().snapshot() }, 201)
    },
  )

  // GET /api/sessions: list all
  router.get('/', async (c) => c.json(await registry.list()))

  // GET /api/sessions/:id: current snapshot
  router.get('/:id', async (c) => {
    const session = await registry.get(c.req.param('id'))
    if (!session) return c.json({ error: 'Session not found' }, 404)
    return c.json({ id: session.id, seed: session.seed, snapshot: session.store.getState().snapshot() })
  })

  // POST /api/sessions/:id/turns: advance one turn
  router.post('/:id/turns', async (c) => {
    const report = await registry.advance(c.req.param('id'))
    if (!report) return c.json({ error: 'Session not found' }, 404)
    return c.json(report)
  })

  // GET /api/sessions/:id/reports: every stored turn report, oldest first
  router.get('/:id/reports', async (c) => {
    const session = await registry.get(c.req.param('id'))
    if (!session) return c.json({ error: 'Session not found' }, 404)
    return c.json(await registry.reports(session.id))
  })

  // POST /api/sessions/:id/missions/:missionId/actions: resolve the next player phase
  router.post(
    '/:id/missions/:missionId/actions',
    zValidator('json', PhaseInputSchema, (result, c) => {
      if (!result.success) return c.json({ error: describeIssues(result.error) }, 400)
    }),
    async (c) => {
      const outcome = await registry.submit(c.req.param('id'), c.req.param('missionId'), c.req.valid('json'))
      if (!outcome) return c.json({ error: 'Session not found' }, 404)
      if (!outcome.ok) {
        const status = outcome.error.code === 'unknown_mission' ? 404 : 409
        return c.json({ error: outcome.error.message, code: outcome.error.code }, status)
      }
      return c.json({ result: outcome.result, mission: outcome.mission, applied: outcome.applied })
    },
  )

  // GET /api/sessions/:id/stats: dice statistics and the latest emergency status
  router.get('/:id/stats', async (c) => {
    const session = await registry.get(c.req.param('id'))
    if (!session) return c.json({ error: 'Session not found' }, 404)

    const { engine } = session.store.getState()
    const latest = (await registry.reports(session.id)).at(-1)
    return c.json({
      turn:           engine.world.turnNumber,
      rolls:          rollStatistics(engine.history),
      emergencies:    latest?.status ?? summarizeEmergencies([]),
      activeMissions: engine.activeMissions.length,
      resolved:       engine.history.length,
      pending:        engine.queue.length,
    })
  })

  // DELETE /api/sessions/:id
  router.delete('/:id', async (c) => {
    if (!await registry.remove(c.req.param('id'))) return c.json({ error: 'Session not found' }, 404)
    return c.json({ ok: true })
  })

  return router
}
