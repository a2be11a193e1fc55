import { serve } from '@hono/node-server'
import { loadConfig } from './config'
import { createDb } from './db'
import { createSessionRegistry } from './sessions'
import { createApp } from './app'

const config = loadConfig()
const db = await createDb(config.DATABASE_URL)
console.log(`[db] Opened ${config.DATABASE_URL}`)

const registry = createSessionRegistry(db, { maxLive: config.MAX_LIVE_SESSIONS })
const app = createApp({ registry, corsOrigin: config.CORS_ORIGIN })

serve({ fetch: app.fetch, port: config.PORT }, (info) => {
  console.log(`[api] Listening on http://localhost:${info.port}`)
})
