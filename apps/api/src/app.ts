import { Hono } from 'hono'
import { logger } from 'hono/logger'
import { cors } from 'hono/cors'
import { ZodError } from 'zod'
import { sessionsRouter, describeIssues } from './routes/sessions'
import type { SessionRegistry } from './sessions'

export type AppOptions = {
  registry: SessionRegistry
  corsOrigin?: string
  requestLog?: boolean
}

export function createApp({ registry, corsOrigin = '*', requestLog = true }: AppOptions) {
  const app = new Hono()

  if (requestLog) app.use('*', logger())
  app.use('/api/*', cors({ origin: corsOrigin }))

  app.get('/', (c) => c.json({ status: 'ok', service: 'director-sim-api' }))
  app.route('/api/sessions', sessionsRouter(registry))

  app.notFound((c) => c.json({ error: 'Not found' }, 404))
  app.onError((err, c) => {
    // A stored snapshot that no longer validates
    if (err instanceof ZodError) return c.json({ error: describeIssues(err) }, 422)
    console.error('[api]', err)
    return c.json({ error: 'Internal server error' }, 500)
  })

  return app
}
