import type {
  WorldState,
  CooldownTable,
  EmergencyRule,
  EmergencyInstance,
  EmergencyStatus,
  SeverityBand,
  SeverityTier,
  EngineConfig,
} from 'shared'
import { evaluateCondition } from './selectionEngine'
import { isOnCooldown, startCooldown } from './cooldownManager'

export const SEVERITY_RANK: Record<SeverityTier, number> = {
  moderate: 1,
  severe: 2,
  critical: 3,
}

export function breachDistance(state: WorldState, rule: EmergencyRule): number {
  const { param, op, value } = rule.condition
  const current = state[param]
  return op === '<' || op === '<=' ? value - current : current - value
}

export function severityFor(distance: number, bands: SeverityBand[]): SeverityTier {
  let tier: SeverityTier = 'moderate'
  let best = -Infinity
  for (const band of bands) {
    if (distance >= band.minDistance && band.minDistance > best) {
      tier = band.tier
      best = band.minDistance
    }
  }
  return tier
}

/**
 * Emits at most one instance per category. A breached category still inside
 * its cooldown window is skipped, so rescanning the same turn is a no-op.
 */
export function scanEmergencies(
  state: WorldState,
  cooldowns: CooldownTable,
  turn: number,
  config: Pick<EngineConfig, 'emergencies' | 'severityTiers' | 'defaultCooldownTurns'>,
): { emergencies: EmergencyInstance[]; cooldowns: CooldownTable } {
  let nextCooldowns = cooldowns
  const found: EmergencyInstance[] = []

  for (const rule of config.emergencies) {
    if (!evaluateCondition(state, rule.condition)) continue
    const duration = rule.cooldownTurns ?? config.defaultCooldownTurns
    if (isOnCooldown(nextCooldowns, rule.category, turn, duration)) continue
    if (found.some(e => e.category === rule.category)) continue

    const distance = breachDistance(state, rule)
    found.push({
      id: `${rule.category}-${turn}`,
      category: rule.category,
      metric: rule.condition.param,
      triggerValue: state[rule.condition.param],
      threshold: rule.condition.value,
      distance,
      severity: severityFor(distance, config.severityTiers),
      detectedTurn: turn,
    })
    nextCooldowns = startCooldown(nextCooldowns, rule.category, turn)
  }

  return { emergencies: sortBySeverity(found), cooldowns: nextCooldowns }
}

// Array#sort is stable, so equal entries keep configuration order
export function sortBySeverity(emergencies: EmergencyInstance[]): EmergencyInstance[] {
  return [...emergencies].sort(
    (a, b) => SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] || b.distance - a.distance,
  )
}

export function summarizeEmergencies(emergencies: EmergencyInstance[]): EmergencyStatus {
  const critical = emergencies.filter(e => e.severity === 'critical').length
  const severe = emergencies.filter(e => e.severity === 'severe').length
  const count = emergencies.length

  if (count === 0) return { status: 'normal', count, critical, severe }
  if (critical > 0) return { status: 'critical', count, critical, severe }
  if (severe > 0) return { status: 'high', count, critical, severe }
  return { status: 'elevated', count, critical, severe }
}
