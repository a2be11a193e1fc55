import { z } from 'zod'

const EnvSchema = z.object({
  PORT:              z.coerce.number().int().positive().default(3000),
  // libsql URL: file:<path>, :memory:, or a remote libsql:// server
  DATABASE_URL:      z.string().min(1).default('file:director-sim.sqlite'),
  CORS_ORIGIN:       z.string().min(1).default('*'),
  MAX_LIVE_SESSIONS: z.coerce.number().int().positive().default(100),
})

export type ApiConfig = z.infer<typeof EnvSchema>

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  return EnvSchema.parse(env)
}
