import type { WorldState, Condition } from 'shared'
import type { RandomSource } from './rng'

export function evaluateCondition(state: WorldState, condition: Condition): boolean {
  const val = state[condition.param]
  switch (condition.op) {
    case '>':  return val >  condition.value
    case '<':  return val <  condition.value
    case '>=': return val >= condition.value
    case '<=': return val <= condition.value
  }
}

export function weightedRandomPick<T>(
  items: readonly T[],
  weights: readonly number[],
  rng: RandomSource,
): T | null {
  if (items.length === 0) return null

  const total = weights.reduce((sum, w) => sum + Math.max(0, w), 0)
  if (total <= 0) return null

  let roll = rng.next() * total
  for (let i = 0; i < items.length; i++) {
    const w = Math.max(0, weights[i] ?? 0)
    roll -= w
    if (roll < 0) return items[i] ?? null
  }

  // Float drift: fall back to the last item with positive weight
  for (let i = items.length - 1; i >= 0; i--) {
    if ((weights[i] ?? 0) > 0) return items[i] ?? null
  }
  return null
}
