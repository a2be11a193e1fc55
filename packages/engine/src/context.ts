import type { EngineConfig, EffectTable, MissionTemplate, Team } from 'shared'
import { createRandom, type RandomSource } from './rng'
import { defaultConfig, defaultTemplates, defaultEffects, defaultTeams } from './config'

export type Logger = Pick<Console, 'info' | 'warn'>

export type EngineContext = {
  config: EngineConfig
  templates: MissionTemplate[]
  effects: EffectTable
  teams: Team[]
  rng: RandomSource
  logger: Logger
}

export type ContextOptions = {
  seed?: string
  rng?: RandomSource
  config?: Partial<EngineConfig>
  templates?: MissionTemplate[]
  effects?: EffectTable
  teams?: Team[]
  logger?: Logger
}

export const DEFAULT_SEED = 'director'

export function createContext(options: ContextOptions = {}): EngineContext {
  return {
    config:    { ...defaultConfig, ...options.config },
    templates: options.templates ?? defaultTemplates,
    effects:   options.effects ?? defaultEffects,
    teams:     options.teams ?? defaultTeams,
    rng:       options.rng ?? createRandom(options.seed ?? DEFAULT_SEED),
    logger:    options.logger ?? console,
  }
}
