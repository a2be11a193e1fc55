export * from './rng'
export * from './rollResolver'
export * from './stateManager'
export * from './cooldownManager'
export * from './selectionEngine'
export * from './emergencyDetector'
export * from './missionGenerator'
export * from './missionExecutor'
export * from './consequenceScheduler'
export * from './heatTracker'
export * from './investigationManager'
export * from './eventEngine'
export * from './snapshot'
export * from './store'
export * from './context'
export * from './config'
export * from './errors'
export {
  GENERIC_TEMPLATE_ID,
  GENERIC_EFFECT_KEY,
  SKILLS,
  TeamSchema,
  WorldOverridesSchema,
  parseEngineConfig,
  parseTemplates,
  parseEffectTable,
  parseTeams,
  parseSnapshot,
} from './schema'
