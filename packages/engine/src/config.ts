import type { EngineConfig, EffectTable, MissionTemplate, Team } from 'shared'
import configRaw from './data/config.json'
import missionsRaw from './data/missions.json'
import effectsRaw from './data/effects.json'
import teamsRaw from './data/teams.json'
import { parseEngineConfig, parseTemplates, parseEffectTable, parseTeams } from './schema'

// Tables are validated once at import; a malformed file fails fast here
export const defaultConfig: EngineConfig = parseEngineConfig(configRaw)
export const defaultTemplates: MissionTemplate[] = parseTemplates(missionsRaw)
export const defaultEffects: EffectTable = parseEffectTable(effectsRaw)
export const defaultTeams: Team[] = parseTeams(teamsRaw)
