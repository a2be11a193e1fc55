import { describe, it, expect } from 'vitest'
import { chance, classifyRoll, createRandom, resolveRoll, rollDie } from '../src'
import { d20, scripted } from './helpers'

describe('rollDie', () => {
  it('maps the random draw onto 1..sides and adds the modifier', () => {
    expect(rollDie(scripted([d20(1)]), 20, 3)).toEqual({ raw: 1, total: 4 })
    expect(rollDie(scripted([d20(20)]), 20, -2)).toEqual({ raw: 20, total: 18 })
    expect(rollDie(scripted([0.999999]), 20, 0)).toEqual({ raw: 20, total: 20 })
    expect(rollDie(scripted([0]), 20, 0)).toEqual({ raw: 1, total: 1 })
  })

  it('rejects dice with fewer than two sides', () => {
    expect(() => rollDie(scripted([0.5]), 1, 0)).toThrow(RangeError)
    expect(() => rollDie(scripted([0.5]), 2.5, 0)).toThrow(RangeError)
  })
})

describe('classifyRoll', () => {
  const check = { sides: 20, dc: 15, margin: 5 }

  it('treats a natural maximum as a critical success regardless of the DC', () => {
    expect(classifyRoll({ raw: 20, total: 12 }, { ...check, dc: 40 })).toBe('critical_success')
  })

  it('treats a natural 1 as a critical failure regardless of modifiers', () => {
    expect(classifyRoll({ raw: 1, total: 30 }, check)).toBe('critical_failure')
  })

  it('grades non-natural rolls against the DC and the partial margin', () => {
    expect(classifyRoll({ raw: 10, total: 15 }, check)).toBe('success')
    expect(classifyRoll({ raw: 10, total: 10 }, check)).toBe('partial')
    expect(classifyRoll({ raw: 9, total: 9 }, check)).toBe('failure')
    expect(classifyRoll({ raw: 14, total: 14 }, { ...check, margin: 0 })).toBe('failure')
  })
})

describe('resolveRoll', () => {
  it('combines the roll and its tier', () => {
    const roll = resolveRoll(scripted([d20(12)]), { sides: 20, modifier: 2, dc: 15, margin: 5 })
    expect(roll).toEqual({ raw: 12, total: 14, outcome: 'partial' })
  })
})

describe('createRandom', () => {
  it('produces the same sequence for the same seed', () => {
    const a = createRandom('test-seed')
    const b = createRandom('test-seed')
    const draws = (r: { next(): number }) => Array.from({ length: 5 }, () => r.next())
    expect(draws(a)).toEqual(draws(b))
  })

  it('continues exactly where a saved state left off', () => {
    const original = createRandom('test-seed')
    original.next()
    original.next()
    const resumed = createRandom('unused', original.state())
    expect(resumed.next()).toBe(original.next())
    expect(resumed.next()).toBe(original.next())
  })
})

describe('chance', () => {
  it('does not draw for certain or impossible probabilities', () => {
    const rng = scripted([])
    expect(chance(rng, 0)).toBe(false)
    expect(chance(rng, 1)).toBe(true)
  })

  it('draws once otherwise', () => {
    const rng = scripted([0.3, 0.7])
    expect(chance(rng, 0.5)).toBe(true)
    expect(chance(rng, 0.5)).toBe(false)
    expect(rng.remaining()).toBe(0)
  })
})
