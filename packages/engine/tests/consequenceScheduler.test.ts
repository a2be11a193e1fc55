import { describe, it, expect } from 'vitest'
import type { ConsequenceEntry, EngineState } from 'shared'
import {
  createEngineState,
  defaultEffects,
  effectsFor,
  flushConsequences,
  recordEffects,
  recordOutcome,
} from '../src'
import { silentLogger } from './helpers'

const EVENT = { kind: 'event' as const, id: 'E1-test' }

function entry(id: string, applyTurn: number, delta: number): ConsequenceEntry {
  return {
    id,
    source: { kind: 'event', id },
    effects: [{ target: 'timelineStability', delta }],
    scheduledTurn: 0,
    applyTurn,
    oneShot: true,
  }
}

describe('recordEffects', () => {
  it('applies immediate effects and queues delayed ones by delay', () => {
    const state = createEngineState({ timelineStability: 50 })
    const { state: next, applied } = recordEffects(
      state,
      EVENT,
      [
        { target: 'timelineStability', delta: -10, delay: 0 },
        { target: 'timelineStability', delta: 5, delay: 3 },
        { target: 'exposureRisk', delta: 2, delay: 3 },
        { target: 'factionInfluence', delta: 1, delay: 1 },
      ],
      1,
    )

    expect(next.world.timelineStability).toBe(40)
    expect(applied).toHaveLength(1)
    expect(next.queue).toEqual([
      {
        id: 'E1-test+1',
        source: EVENT,
        effects: [{ target: 'factionInfluence', delta: 1 }],
        scheduledTurn: 1,
        applyTurn: 2,
        oneShot: true,
      },
      {
        id: 'E1-test+3',
        source: EVENT,
        effects: [
          { target: 'timelineStability', delta: 5 },
          { target: 'exposureRisk', delta: 2 },
        ],
        scheduledTurn: 1,
        applyTurn: 4,
        oneShot: true,
      },
    ])
  })
})

describe('flushConsequences', () => {
  it('applies a delayed effect exactly once, on its turn', () => {
    const logger = silentLogger()
    let state: EngineState = recordEffects(
      createEngineState({ timelineStability: 50 }),
      EVENT,
      [
        { target: 'timelineStability', delta: -10, delay: 0 },
        { target: 'timelineStability', delta: 5, delay: 3 },
      ],
      1,
    ).state

    const atTurn = (turn: number) => {
      const flushed = flushConsequences(state, turn, { logger })
      state = flushed.state
      return flushed.applied
    }

    expect(atTurn(2)).toEqual([])
    expect(atTurn(3)).toEqual([])
    expect(state.world.timelineStability).toBe(40)

    expect(atTurn(4)).toEqual([
      { entryId: 'E1-test+3', source: EVENT, target: 'timelineStability', delta: 5, before: 40, after: 45, turn: 4 },
    ])
    expect(state.queue).toEqual([])

    expect(atTurn(5)).toEqual([])
    expect(state.world.timelineStability).toBe(45)
    expect(logger.warn).not.toHaveBeenCalled()
  })

  it('applies entries due on the same turn in the order they were queued', () => {
    const state = { ...createEngineState({ timelineStability: 95 }), queue: [entry('A', 3, 10), entry('B', 3, -10)] }
    const { state: next, applied } = flushConsequences(state, 3, { logger: silentLogger() })

    // +10 clamps at 100 first, so the result depends on the order
    expect(next.world.timelineStability).toBe(90)
    expect(applied.map(a => a.entryId)).toEqual(['A', 'B'])
  })

  it('applies overdue entries oldest apply-turn first', () => {
    const state = { ...createEngineState({ timelineStability: 95 }), queue: [entry('late', 3, -10), entry('early', 2, 10)] }
    const { state: next, applied } = flushConsequences(state, 3, { logger: silentLogger() })

    expect(applied.map(a => a.entryId)).toEqual(['early', 'late'])
    expect(next.world.timelineStability).toBe(90)
  })

  it('keeps entries that are not yet due', () => {
    const state = { ...createEngineState(), queue: [entry('now', 2, 1), entry('later', 5, 1)] }
    const { state: next } = flushConsequences(state, 2, { logger: silentLogger() })
    expect(next.queue.map(e => e.id)).toEqual(['later'])
  })

  it('warns about entries from unknown missions but still applies them', () => {
    const logger = silentLogger()
    const orphan: ConsequenceEntry = {
      id: 'M9-1+2',
      source: { kind: 'mission', id: 'M9-1' },
      effects: [{ target: 'exposureRisk', delta: 4 }],
      scheduledTurn: 1,
      applyTurn: 3,
      oneShot: true,
    }
    const state = { ...createEngineState({ exposureRisk: 10 }), queue: [orphan] }
    const { state: next } = flushConsequences(state, 3, { logger })

    expect(next.world.exposureRisk).toBe(14)
    expect(logger.warn).toHaveBeenCalledWith('[engine] queue entry M9-1+2 references unknown mission M9-1; applying anyway')
  })
})

describe('effectsFor', () => {
  it('falls back to the generic row for an unknown key', () => {
    const logger = silentLogger()
    expect(effectsFor('no_such_key', 'failure', { effects: defaultEffects, logger })).toEqual([
      { target: 'exposureRisk', delta: 2, delay: 0 },
    ])
    expect(logger.warn).toHaveBeenCalledOnce()
  })
})

describe('recordOutcome', () => {
  it('refuses a mission that has not finished', () => {
    const state = createEngineState()
    const mission = {
      id: 'M1-1',
      templateId: 'routine-generic',
      title: 'Routine operation',
      objectives: [],
      origin: 'routine' as const,
      category: 'generic',
      emergencyId: null,
      investigationId: null,
      severity: null,
      teamId: 'AI-01',
      actor: 'traveler' as const,
      location: 'seattle',
      phases: [],
      difficulty: 10,
      stage: 'execution' as const,
      phaseResults: [],
      createdTurn: 1,
      resolvedTurn: null,
      fallback: false,
    }
    expect(() => recordOutcome(state, mission, 1, { effects: defaultEffects, logger: silentLogger() })).toThrow(
      'Mission M1-1 has not reached a terminal outcome',
    )
  })
})
