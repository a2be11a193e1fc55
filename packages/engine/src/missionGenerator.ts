import type {
  ActorKind,
  EngineConfig,
  Mission,
  MissionTemplate,
  MissionTrigger,
  Skill,
  SkillWeights,
  Team,
} from 'shared'
import type { EngineContext } from './context'
import type { RandomSource } from './rng'
import { SEVERITY_RANK } from './emergencyDetector'
import { weightedRandomPick } from './selectionEngine'
import { GENERIC_TEMPLATE_ID, SKILLS } from './schema'
import { ConfigurationGapError } from './errors'

/** A team fields its best member for each skill. */
export function teamSkill(team: Team, skill: Skill): number {
  return team.members.reduce((best, m) => Math.max(best, m.skills[skill] ?? 0), 0)
}

export function weightedSkill(team: Team, weights: SkillWeights): number {
  let total = 0
  let weightSum = 0
  for (const skill of SKILLS) {
    const weight = weights[skill] ?? 0
    if (weight <= 0) continue
    total += teamSkill(team, skill) * weight
    weightSum += weight
  }
  return weightSum > 0 ? total / weightSum : 0
}

export function combinedSkillWeights(template: Pick<MissionTemplate, 'phases'>): SkillWeights {
  const combined: SkillWeights = {}
  for (const phase of template.phases) {
    for (const skill of SKILLS) {
      const weight = phase.skills[skill]
      if (weight === undefined) continue
      combined[skill] = (combined[skill] ?? 0) + weight
    }
  }
  return combined
}

export function teamCapability(team: Team, template: Pick<MissionTemplate, 'phases'>): number {
  return weightedSkill(team, combinedSkillWeights(template)) + (team.cohesion - 50) / 25
}

/**
 * Severity pushes difficulty up linearly; team capability above the baseline
 * pushes it up further, so a strong team never trivializes a crisis.
 */
export function scaleDifficulty(
  template: MissionTemplate,
  trigger: MissionTrigger,
  team: Team,
  config: Pick<EngineConfig, 'difficulty'>,
): number {
  const { min, max, severityStep, capabilityBaseline, capabilityScale } = config.difficulty
  const tierRank = trigger.kind === 'emergency' ? SEVERITY_RANK[trigger.emergency.severity] : 0
  const capability = teamCapability(team, template)
  const raw =
    template.baseDifficulty +
    severityStep * tierRank +
    Math.round((capability - capabilityBaseline) * capabilityScale)
  return Math.min(max, Math.max(min, raw))
}

export function routineTemplatesFor(
  templates: MissionTemplate[],
  actor: ActorKind,
): MissionTemplate[] {
  return templates.filter(
    t => t.trigger.kind === 'routine' && t.trigger.actor === actor && t.id !== GENERIC_TEMPLATE_ID,
  )
}

export function findTemplate(
  templates: MissionTemplate[],
  trigger: MissionTrigger,
  rng: RandomSource,
): MissionTemplate | null {
  if (trigger.kind === 'emergency') {
    const category = trigger.emergency.category
    return templates.find(t => t.trigger.kind === 'emergency' && t.trigger.category === category) ?? null
  }
  if (trigger.kind === 'investigation') {
    return templates.find(t => t.trigger.kind === 'investigation') ?? null
  }
  const candidates = routineTemplatesFor(templates, trigger.actor)
  return weightedRandomPick(candidates, candidates.map(t => t.baseWeight), rng)
}

export function triggerKey(trigger: MissionTrigger): string {
  switch (trigger.kind) {
    case 'emergency':     return trigger.emergency.category
    case 'investigation': return 'investigation'
    case 'routine':       return `routine:${trigger.actor}`
  }
}

export function generateMission(
  trigger: MissionTrigger,
  team: Team,
  id: string,
  turn: number,
  ctx: Pick<EngineContext, 'templates' | 'config' | 'rng' | 'logger'>,
): Mission {
  let template = findTemplate(ctx.templates, trigger, ctx.rng)
  let fallback = false

  if (template === null) {
    ctx.logger.warn(`[engine] configuration gap: no template for "${triggerKey(trigger)}", using ${GENERIC_TEMPLATE_ID}`)
    template = ctx.templates.find(t => t.id === GENERIC_TEMPLATE_ID) ?? null
    fallback = true
  }
  if (template === null) throw new ConfigurationGapError(triggerKey(trigger))

  return {
    id,
    templateId:      template.id,
    title:           template.title,
    objectives:      [...template.objectives],
    origin:          trigger.kind,
    category:        template.effectKey,
    emergencyId:     trigger.kind === 'emergency' ? trigger.emergency.id : null,
    investigationId: trigger.kind === 'investigation' ? trigger.investigation.id : null,
    severity:        trigger.kind === 'emergency' ? trigger.emergency.severity : null,
    teamId:          team.id,
    actor:           team.actor,
    // investigators work the scene, everyone else their home ground
    location:        trigger.kind === 'investigation' ? trigger.investigation.location : team.location,
    phases:          template.phases.map(p => ({ kind: p.kind, skills: { ...p.skills } })),
    difficulty:      scaleDifficulty(template, trigger, team, ctx.config),
    stage:           'pending',
    phaseResults:    [],
    createdTurn:     turn,
    resolvedTurn:    null,
    fallback,
  }
}
