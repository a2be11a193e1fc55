import type { CooldownTable, EmergencyCategory } from 'shared'

export function emptyCooldowns(): CooldownTable {
  return {}
}

export function startCooldown(
  table: CooldownTable,
  category: EmergencyCategory,
  turn: number,
): CooldownTable {
  return { ...table, [category]: turn }
}

export function isOnCooldown(
  table: CooldownTable,
  category: EmergencyCategory,
  turn: number,
  durationTurns: number,
): boolean {
  const last = table[category]
  return last !== undefined && turn - last < durationTurns
}

export function getCooldownRemaining(
  table: CooldownTable,
  category: EmergencyCategory,
  turn: number,
  durationTurns: number,
): number {
  const last = table[category]
  if (last === undefined) return 0
  return Math.max(0, durationTurns - (turn - last))
}
