import type { WorldState, Effect, Metric, AppliedEffect, ConsequenceSource } from 'shared'

export const METRICS = [
  'timelineStability',
  'governmentControl',
  'factionInfluence',
  'nationalSecurity',
  'exposureRisk',
  'directorControl',
  'hostBodyRejection',
] as const satisfies readonly Metric[]

export const METRIC_MIN = 0
export const METRIC_MAX = 100

export const INITIAL_STATE: WorldState = {
  turnNumber: 0,
  timelineStability: 65,
  governmentControl: 50,
  factionInfluence: 30,
  nationalSecurity: 60,
  exposureRisk: 15,
  directorControl: 70,
  hostBodyRejection: 10,
}

export function initState(overrides?: Partial<WorldState>): WorldState {
  return clampState({ ...INITIAL_STATE, ...overrides })
}

export function clampMetric(value: number): number {
  return Math.min(METRIC_MAX, Math.max(METRIC_MIN, value))
}

export function clampState(state: WorldState): WorldState {
  const next = { ...state }
  for (const metric of METRICS) {
    next[metric] = clampMetric(next[metric])
  }
  return next
}

export function applyEffects(state: WorldState, effects: Effect[]): WorldState {
  const next = { ...state }
  for (const effect of effects) {
    next[effect.target] = next[effect.target] + effect.delta
  }
  return next
}

export function applyAndClamp(state: WorldState, effects: Effect[]): WorldState {
  return clampState(applyEffects(state, effects))
}

/**
 * Applies effects one at a time, clamping after each, and records what each
 * delta actually did to the metric.
 */
export function applyTracked(
  state: WorldState,
  effects: Effect[],
  source: ConsequenceSource,
  entryId: string | null,
  turn: number = state.turnNumber,
): { world: WorldState; applied: AppliedEffect[] } {
  let world = state
  const applied: AppliedEffect[] = []
  for (const effect of effects) {
    const before = world[effect.target]
    world = applyAndClamp(world, [effect])
    applied.push({
      entryId,
      source,
      target: effect.target,
      delta: effect.delta,
      before,
      after: world[effect.target],
      turn,
    })
  }
  return { world, applied }
}

export function startTurn(state: WorldState): WorldState {
  return { ...state, turnNumber: state.turnNumber + 1 }
}
