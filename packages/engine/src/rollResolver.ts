import type { OutcomeTier } from 'shared'
import type { RandomSource } from './rng'

export type Roll = {
  raw: number
  total: number
}

export type RollCheck = {
  sides: number
  modifier: number
  dc: number
  margin: number
}

export function rollDie(rng: RandomSource, sides: number, modifier: number): Roll {
  if (!Number.isInteger(sides) || sides < 2) {
    throw new RangeError(`A die needs at least two sides, got ${sides}`)
  }
  const raw = Math.floor(rng.next() * sides) + 1
  return { raw, total: raw + modifier }
}

/**
 * Natural extremes win over the comparison against the DC: a natural max is
 * always a critical success and a natural 1 always a critical failure.
 */
export function classifyRoll(
  roll: Roll,
  check: Pick<RollCheck, 'sides' | 'dc' | 'margin'>,
): OutcomeTier {
  if (roll.raw === check.sides) return 'critical_success'
  if (roll.raw === 1) return 'critical_failure'
  if (roll.total >= check.dc) return 'success'
  if (roll.total >= check.dc - check.margin) return 'partial'
  return 'failure'
}

export function resolveRoll(
  rng: RandomSource,
  check: RollCheck,
): Roll & { outcome: OutcomeTier } {
  const roll = rollDie(rng, check.sides, check.modifier)
  return { ...roll, outcome: classifyRoll(roll, check) }
}

export function isSuccessTier(outcome: OutcomeTier): boolean {
  return outcome === 'success' || outcome === 'critical_success'
}
