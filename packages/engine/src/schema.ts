import { z } from 'zod'
import type {
  EngineConfig,
  EffectTable,
  MissionTemplate,
  Team,
  EngineSnapshot,
  Skill,
} from 'shared'
import { METRICS } from './stateManager'

export const GENERIC_TEMPLATE_ID = 'routine-generic'
export const GENERIC_EFFECT_KEY = 'generic'

const MetricSchema = z.enum(METRICS)
const CategorySchema = z.enum([
  'timeline_collapse',
  'faction_takeover',
  'director_control_loss',
  'host_body_rejection',
  'exposure_crisis',
  'security_breakdown',
])
const ActorSchema = z.enum(['player', 'traveler', 'faction', 'government'])
export const SKILLS = [
  'combat', 'stealth', 'intelligence', 'social', 'technical', 'medical', 'leadership',
] as const satisfies readonly Skill[]

const SkillSchema = z.enum(SKILLS)
const PhaseKindSchema = z.enum(['infiltration', 'execution', 'extraction'])
const SeveritySchema = z.enum(['moderate', 'severe', 'critical'])
const TacticSchema = z.enum(['cautious', 'balanced', 'aggressive'])
const OutcomeTierSchema = z.enum(['critical_success', 'success', 'partial', 'failure', 'critical_failure'])
const StageSchema = z.enum([
  'pending', 'infiltration', 'execution', 'extraction', 'success', 'partial_success', 'failure',
])

const EffectSchema = z.object({
  target: MetricSchema,
  delta:  z.number(),
})

const TimedEffectSchema = EffectSchema.extend({
  delay: z.number().int().min(0).default(0),
})

const SkillWeightsSchema = z.record(SkillSchema, z.number().min(0))

export const TeamSchema = z.object({
  id:            z.string().min(1),
  name:          z.string().min(1),
  actor:         ActorSchema,
  members:       z.array(z.object({
    name:   z.string().min(1),
    skills: z.record(SkillSchema, z.number().min(0).max(10)),
  })).min(1),
  cohesion:      z.number().min(0).max(100),
  communication: z.number().min(0).max(100),
  location:      z.string().min(1),
})

const PhaseSchema = z.object({
  kind:   PhaseKindSchema,
  skills: SkillWeightsSchema,
})

const TemplateSchema = z.object({
  id:             z.string().min(1),
  title:          z.string().min(1),
  objectives:     z.array(z.string()),
  trigger:        z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('emergency'), category: CategorySchema }),
    z.object({ kind: z.literal('routine'), actor: ActorSchema }),
    z.object({ kind: z.literal('investigation') }),
  ]),
  phases:         z.array(PhaseSchema).min(1),
  baseDifficulty: z.number().int(),
  baseWeight:     z.number().positive().default(1),
  effectKey:      z.string().min(1),
})

const TemplatesSchema = z.array(TemplateSchema).refine(
  templates => templates.some(t => t.id === GENERIC_TEMPLATE_ID),
  { message: `Template set must include the fallback "${GENERIC_TEMPLATE_ID}"` },
)

const OutcomeEffectsSchema = z.object({
  success:         z.array(TimedEffectSchema),
  partial_success: z.array(TimedEffectSchema),
  failure:         z.array(TimedEffectSchema),
})

const EffectTableSchema = z.record(z.string(), OutcomeEffectsSchema).refine(
  table => GENERIC_EFFECT_KEY in table,
  { message: `Effect table must include the fallback "${GENERIC_EFFECT_KEY}"` },
)

const ConfigSchema = z.object({
  dice: z.object({
    sides:         z.number().int().min(2),
    partialMargin: z.number().min(0),
  }),
  difficulty: z.object({
    min:                z.number().int(),
    max:                z.number().int(),
    severityStep:       z.number(),
    capabilityBaseline: z.number(),
    capabilityScale:    z.number().min(0),
  }),
  phaseDcOffsets: z.object({
    infiltration: z.number().int(),
    execution:    z.number().int(),
    extraction:   z.number().int(),
  }),
  actorBonuses: z.object({
    player:     z.number().int(),
    traveler:   z.number().int(),
    faction:    z.number().int(),
    government: z.number().int(),
  }),
  tactics: z.object({
    cautious:   z.object({ modifier: z.number().int(), margin: z.number().int() }),
    balanced:   z.object({ modifier: z.number().int(), margin: z.number().int() }),
    aggressive: z.object({ modifier: z.number().int(), margin: z.number().int() }),
  }),
  routineChance:        z.number().min(0).max(1),
  playerRoutineChance:  z.number().min(0).max(1),
  worldEventChance:     z.number().min(0).max(1),
  defaultCooldownTurns: z.number().int().min(0),
  emergencyExpiryTurns: z.number().int().min(0),
  severityTiers:        z.array(z.object({
    tier:        SeveritySchema,
    minDistance: z.number().min(0),
  })).min(1),
  emergencies: z.array(z.object({
    category:      CategorySchema,
    condition:     z.object({
      param: MetricSchema,
      op:    z.enum(['>', '<', '>=', '<=']),
      value: z.number(),
    }),
    cooldownTurns: z.number().int().min(0).optional(),
  })),
  worldEvents: z.array(z.object({
    id:         z.string().min(1),
    title:      z.string().min(1),
    baseWeight: z.number().positive(),
    effects:    z.array(TimedEffectSchema),
  })),
  heat: z.object({
    incident:  z.number().min(0),
    failure:   z.number().min(0),
    decay:     z.number().min(0),
    threshold: z.number().min(0),
    max:       z.number().positive(),
  }),
  detection: z.object({
    dc:            z.number().int(),
    minDc:         z.number().int(),
    maxDc:         z.number().int(),
    heatStep:      z.number().positive(),
    durationTurns: z.number().int().min(1),
    effects:       z.array(TimedEffectSchema),
  }),
})

export const rngStateSchema = z.object({
  i: z.number().int(),
  j: z.number().int(),
  S: z.array(z.number().int()),
})

const PhaseResultSchema = z.object({
  kind:      PhaseKindSchema,
  raw:       z.number().int(),
  sides:     z.number().int(),
  modifiers: z.record(z.string(), z.number()),
  modifier:  z.number(),
  total:     z.number(),
  dc:        z.number(),
  margin:    z.number(),
  outcome:   OutcomeTierSchema,
  tactic:    TacticSchema,
})

const MissionSchema = z.object({
  id:              z.string(),
  templateId:      z.string(),
  title:           z.string(),
  objectives:      z.array(z.string()),
  origin:          z.enum(['emergency', 'routine', 'investigation']),
  category:        z.string(),
  emergencyId:     z.string().nullable(),
  investigationId: z.string().nullable(),
  severity:        SeveritySchema.nullable(),
  teamId:          z.string(),
  actor:           ActorSchema,
  location:        z.string(),
  phases:          z.array(PhaseSchema),
  difficulty:      z.number(),
  stage:           StageSchema,
  phaseResults:    z.array(PhaseResultSchema),
  createdTurn:     z.number().int(),
  resolvedTurn:    z.number().int().nullable(),
  fallback:        z.boolean(),
})

const SourceSchema = z.object({
  kind: z.enum(['mission', 'event', 'investigation']),
  id:   z.string(),
})

const metricField = z.number().min(0).max(100)

const EmergencySchema = z.object({
  id:           z.string(),
  category:     CategorySchema,
  metric:       MetricSchema,
  triggerValue: z.number(),
  threshold:    z.number(),
  distance:     z.number(),
  severity:     SeveritySchema,
  detectedTurn: z.number().int(),
})

const InvestigationSchema = z.object({
  id:         z.string(),
  location:   z.string(),
  heat:       z.number(),
  openedTurn: z.number().int(),
  closesTurn: z.number().int(),
})

const SnapshotSchema = z.object({
  version: z.literal(1),
  world: z.object({
    turnNumber:        z.number().int().min(0),
    timelineStability: metricField,
    governmentControl: metricField,
    factionInfluence:  metricField,
    nationalSecurity:  metricField,
    exposureRisk:      metricField,
    directorControl:   metricField,
    hostBodyRejection: metricField,
  }),
  cooldowns: z.record(CategorySchema, z.number().int()),
  history:   z.array(MissionSchema),
  queue:     z.array(z.object({
    id:            z.string(),
    source:        SourceSchema,
    effects:       z.array(EffectSchema),
    scheduledTurn: z.number().int(),
    applyTurn:     z.number().int(),
    oneShot:       z.literal(true),
  })),
  activeMissions:     z.array(MissionSchema),
  pendingEmergencies: z.array(z.object({
    emergency:   EmergencySchema,
    expiresTurn: z.number().int(),
  })),
  heat:               z.record(z.string(), z.number().min(0)),
  investigations:     z.array(InvestigationSchema),
  rngState:           rngStateSchema,
})

export const WorldOverridesSchema = SnapshotSchema.shape.world.partial()

export function parseEngineConfig(raw: unknown): EngineConfig {
  return ConfigSchema.parse(raw)
}

export function parseTemplates(raw: unknown): MissionTemplate[] {
  return TemplatesSchema.parse(raw)
}

export function parseEffectTable(raw: unknown): EffectTable {
  return EffectTableSchema.parse(raw)
}

export function parseTeams(raw: unknown): Team[] {
  return z.array(TeamSchema).parse(raw)
}

export function parseSnapshot(raw: unknown): EngineSnapshot {
  return SnapshotSchema.parse(raw)
}
