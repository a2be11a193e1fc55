import type {
  AppliedEffect,
  ConsequenceEntry,
  ConsequenceSource,
  Effect,
  EngineState,
  Mission,
  TerminalOutcome,
  TimedEffect,
} from 'shared'
import type { EngineContext } from './context'
import { applyTracked } from './stateManager'
import { isTerminal } from './missionExecutor'
import { GENERIC_EFFECT_KEY } from './schema'

export function effectsFor(
  key: string,
  outcome: TerminalOutcome,
  ctx: Pick<EngineContext, 'effects' | 'logger'>,
): TimedEffect[] {
  const row = ctx.effects[key]
  if (row) return row[outcome]
  ctx.logger.warn(`[engine] configuration gap: no effects for "${key}", using ${GENERIC_EFFECT_KEY}`)
  return ctx.effects[GENERIC_EFFECT_KEY]?.[outcome] ?? []
}

/**
 * Immediate effects (delay 0) land on the world now. The rest are grouped by
 * delay into one queue entry each, due at turn + delay.
 */
export function recordEffects(
  state: EngineState,
  source: ConsequenceSource,
  effects: TimedEffect[],
  turn: number,
): { state: EngineState; applied: AppliedEffect[] } {
  const immediate: Effect[] = []
  const delayed = new Map<number, Effect[]>()

  for (const { target, delta, delay } of effects) {
    if (delay <= 0) {
      immediate.push({ target, delta })
    } else {
      delayed.set(delay, [...(delayed.get(delay) ?? []), { target, delta }])
    }
  }

  const { world, applied } = applyTracked(state.world, immediate, source, null, turn)

  const entries: ConsequenceEntry[] = [...delayed.entries()]
    .sort(([a], [b]) => a - b)
    .map(([delay, deltas]): ConsequenceEntry => ({
      id: `${source.id}+${delay}`,
      source,
      effects: deltas,
      scheduledTurn: turn,
      applyTurn: turn + delay,
      oneShot: true,
    }))

  return {
    state: { ...state, world, queue: [...state.queue, ...entries] },
    applied,
  }
}

export function recordOutcome(
  state: EngineState,
  mission: Mission,
  turn: number,
  ctx: Pick<EngineContext, 'effects' | 'logger'>,
): { state: EngineState; applied: AppliedEffect[] } {
  if (!isTerminal(mission.stage)) {
    throw new Error(`Mission ${mission.id} has not reached a terminal outcome`)
  }
  const effects = effectsFor(mission.category, mission.stage, ctx)
  return recordEffects(state, { kind: 'mission', id: mission.id }, effects, turn)
}

export function dueEntries(queue: ConsequenceEntry[], turn: number): ConsequenceEntry[] {
  return queue
    .filter(e => e.applyTurn <= turn)
    .sort((a, b) => a.applyTurn - b.applyTurn)
}

/**
 * Applies every entry due on or before `turn`, oldest apply-turn first and
 * FIFO within a turn, then drops them from the queue.
 */
export function flushConsequences(
  state: EngineState,
  turn: number,
  ctx: Pick<EngineContext, 'logger'>,
): { state: EngineState; applied: AppliedEffect[] } {
  const due = dueEntries(state.queue, turn)
  if (due.length === 0) return { state, applied: [] }

  const known = new Set([...state.history, ...state.activeMissions].map(m => m.id))
  let world = state.world
  const applied: AppliedEffect[] = []

  for (const entry of due) {
    if (entry.source.kind === 'mission' && !known.has(entry.source.id)) {
      ctx.logger.warn(`[engine] queue entry ${entry.id} references unknown mission ${entry.source.id}; applying anyway`)
    }
    const step = applyTracked(world, entry.effects, entry.source, entry.id, turn)
    world = step.world
    applied.push(...step.applied)
  }

  const flushed = new Set(due)
  return {
    state: { ...state, world, queue: state.queue.filter(e => !flushed.has(e)) },
    applied,
  }
}
