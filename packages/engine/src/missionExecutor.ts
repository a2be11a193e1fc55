import type {
  EngineConfig,
  Mission,
  MissionPhase,
  MissionStage,
  PhaseKind,
  PhaseResult,
  RollStatistics,
  Tactic,
  Team,
  TerminalOutcome,
} from 'shared'
import type { RandomSource } from './rng'
import { resolveRoll, isSuccessTier } from './rollResolver'
import { weightedSkill } from './missionGenerator'

type ExecutorConfig = Pick<EngineConfig, 'dice' | 'difficulty' | 'phaseDcOffsets' | 'actorBonuses' | 'tactics'>

const TERMINAL_STAGES: readonly MissionStage[] = ['success', 'partial_success', 'failure']

export function isTerminal(stage: MissionStage): stage is TerminalOutcome {
  return TERMINAL_STAGES.includes(stage)
}

export function currentPhase(mission: Mission): MissionPhase | null {
  if (isTerminal(mission.stage)) return null
  return mission.phases[mission.phaseResults.length] ?? null
}

export function phaseDc(difficulty: number, kind: PhaseKind, config: ExecutorConfig): number {
  const dc = difficulty + config.phaseDcOffsets[kind]
  return Math.min(config.difficulty.max, Math.max(config.difficulty.min, dc))
}

/** 50 is neutral; every 10 points either way is worth one, rounded half up. */
export function attributeBonus(value: number): number {
  return Math.floor((value - 50) / 10 + 0.5)
}

export function phaseModifiers(
  team: Team,
  phase: MissionPhase,
  tactic: Tactic,
  config: ExecutorConfig,
): Record<string, number> {
  return {
    skill:         Math.floor(weightedSkill(team, phase.skills)) - config.difficulty.capabilityBaseline,
    cohesion:      attributeBonus(team.cohesion),
    communication: attributeBonus(team.communication),
    actor:         config.actorBonuses[team.actor],
    tactic:        config.tactics[tactic].modifier,
  }
}

/**
 * Strict aggregation with no randomness: a critical failure anywhere fails the
 * mission, all-success is a success, anything else is a partial success.
 */
export function classifyMission(results: PhaseResult[]): TerminalOutcome {
  if (results.some(r => r.outcome === 'critical_failure')) return 'failure'
  if (results.length > 0 && results.every(r => isSuccessTier(r.outcome))) return 'success'
  return 'partial_success'
}

export function resolvePhase(
  mission: Mission,
  phase: MissionPhase,
  team: Team,
  tactic: Tactic,
  rng: RandomSource,
  config: ExecutorConfig,
): PhaseResult {
  const modifiers = phaseModifiers(team, phase, tactic, config)
  const modifier = Object.values(modifiers).reduce((sum, v) => sum + v, 0)
  const dc = phaseDc(mission.difficulty, phase.kind, config)
  const margin = Math.max(0, config.dice.partialMargin + config.tactics[tactic].margin)
  const roll = resolveRoll(rng, { sides: config.dice.sides, modifier, dc, margin })

  return {
    kind: phase.kind,
    raw: roll.raw,
    sides: config.dice.sides,
    modifiers,
    modifier,
    total: roll.total,
    dc,
    margin,
    outcome: roll.outcome,
    tactic,
  }
}

/**
 * Advances the mission by exactly one phase. Returns null when the mission is
 * already terminal.
 */
export function resolveNextPhase(
  mission: Mission,
  team: Team,
  rng: RandomSource,
  config: ExecutorConfig,
  tactic: Tactic = 'balanced',
  turn: number = mission.createdTurn,
): { mission: Mission; result: PhaseResult } | null {
  const phase = currentPhase(mission)
  if (phase === null) return null

  const result = resolvePhase(mission, phase, team, tactic, rng, config)
  const phaseResults = [...mission.phaseResults, result]

  let stage: MissionStage
  if (result.outcome === 'critical_failure') {
    stage = 'failure'
  } else {
    const next = mission.phases[phaseResults.length]
    stage = next ? next.kind : classifyMission(phaseResults)
  }

  return {
    mission: {
      ...mission,
      phaseResults,
      stage,
      resolvedTurn: isTerminal(stage) ? turn : null,
    },
    result,
  }
}

export function startMission(mission: Mission): Mission {
  if (mission.stage !== 'pending') return mission
  const first = mission.phases[0]
  return first ? { ...mission, stage: first.kind } : { ...mission, stage: 'partial_success' }
}

export function runMission(
  mission: Mission,
  team: Team,
  rng: RandomSource,
  config: ExecutorConfig,
  turn: number = mission.createdTurn,
): Mission {
  let current = startMission(mission)
  for (;;) {
    const step = resolveNextPhase(current, team, rng, config, 'balanced', turn)
    if (step === null) return current
    current = step.mission
  }
}

export function archiveMission(history: Mission[], mission: Mission): Mission[] {
  return [...history, mission]
}

export function rollStatistics(history: Mission[]): RollStatistics {
  const results = history.flatMap(m => m.phaseResults)
  const count = (pred: (r: PhaseResult) => boolean) => results.filter(pred).length

  const totalRolls = results.length
  const criticalSuccesses = count(r => r.outcome === 'critical_success')
  const criticalFailures = count(r => r.outcome === 'critical_failure')
  const successes = count(r => isSuccessTier(r.outcome))
  const partials = count(r => r.outcome === 'partial')
  const failures = count(r => r.outcome === 'failure' || r.outcome === 'critical_failure')
  const rate = (n: number) => (totalRolls > 0 ? (n / totalRolls) * 100 : 0)

  return {
    totalRolls,
    criticalSuccesses,
    criticalFailures,
    successes,
    partials,
    failures,
    successRate: rate(successes),
    criticalSuccessRate: rate(criticalSuccesses),
    criticalFailureRate: rate(criticalFailures),
  }
}
