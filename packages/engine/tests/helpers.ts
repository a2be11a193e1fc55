import { vi } from 'vitest'
import type { EngineConfig, RngState, Team } from 'shared'
import { createContext, defaultTeams, type EngineContext, type RandomSource } from '../src'

/** Value that makes a d20 land on `face`. */
export function d20(face: number): number {
  return (face - 0.5) / 20
}

/** Plays back fixed values and fails loudly once they run out. */
export function scripted(values: number[]): RandomSource & { remaining(): number } {
  let index = 0
  return {
    next() {
      const value = values[index]
      if (value === undefined) throw new Error(`scripted random exhausted after ${index} draws`)
      index++
      return value
    },
    state(): RngState {
      return { i: 0, j: 0, S: [] }
    },
    fork: () => scripted(values.slice(index)),
    remaining: () => values.length - index,
  }
}

export function silentLogger() {
  return { info: vi.fn(), warn: vi.fn() }
}

export function team(id: string): Team {
  const found = defaultTeams.find(t => t.id === id)
  if (!found) throw new Error(`no default team ${id}`)
  return found
}

// Only scripted draws move the engine: every chance roll is pinned to 0 or 1
export const QUIET: Partial<EngineConfig> = {
  routineChance:       0,
  playerRoutineChance: 0,
  worldEventChance:    0,
}

export function quietContext(
  rng: RandomSource,
  teams: Team[],
  config: Partial<EngineConfig> = {},
): EngineContext {
  return createContext({ rng, teams, config: { ...QUIET, ...config }, logger: silentLogger() })
}
