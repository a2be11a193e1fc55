import seedrandom from 'seedrandom'
import type { RngState } from 'shared'
import { rngStateSchema } from './schema'

export interface RandomSource {
  next(): number // [0,1)
  state(): RngState
  // Independent copy at the current position
  fork(): RandomSource
}

export function createRandom(seed: string, state?: RngState): RandomSource {
  const prng = state
    ? seedrandom('', { state: copyState(state) })
    : seedrandom(seed, { state: true })

  const current = () => rngStateSchema.parse(prng.state())
  return {
    next: () => prng(),
    state: current,
    fork: () => createRandom(seed, current()),
  }
}

export function chance(rng: RandomSource, probability: number): boolean {
  if (probability <= 0) return false
  if (probability >= 1) return true
  return rng.next() < probability
}

function copyState(state: RngState): RngState {
  return { i: state.i, j: state.j, S: [...state.S] }
}
