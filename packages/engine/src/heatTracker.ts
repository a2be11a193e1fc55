import type { EngineConfig, HeatMap, Mission, TerminalOutcome } from 'shared'

type HeatConfig = EngineConfig['heat']

export function emptyHeat(): HeatMap {
  return {}
}

export function heatAt(heat: HeatMap, location: string): number {
  return heat[location] ?? 0
}

/** Any finished traveler operation leaves a trace; a failed one leaves a much bigger one. */
export function incidentHeat(outcome: TerminalOutcome, config: HeatConfig): number {
  return outcome === 'failure' ? config.incident + config.failure : config.incident
}

export function raiseHeat(heat: HeatMap, location: string, amount: number, config: HeatConfig): HeatMap {
  if (amount <= 0) return heat
  return { ...heat, [location]: Math.min(config.max, heatAt(heat, location) + amount) }
}

// Government teams make no noise of their own
export function recordIncident(heat: HeatMap, mission: Mission, outcome: TerminalOutcome, config: HeatConfig): HeatMap {
  if (mission.actor !== 'player' && mission.actor !== 'traveler') return heat
  return raiseHeat(heat, mission.location, incidentHeat(outcome, config), config)
}

export function coolHeat(heat: HeatMap, config: HeatConfig): HeatMap {
  const next: HeatMap = {}
  for (const [location, value] of Object.entries(heat)) {
    const cooled = value - config.decay
    if (cooled > 0) next[location] = cooled
  }
  return next
}

/** Locations at or above the threshold, hottest first, ties by name. */
export function hotLocations(heat: HeatMap, config: HeatConfig): { location: string; heat: number }[] {
  return Object.entries(heat)
    .filter(([, value]) => value >= config.threshold)
    .map(([location, value]) => ({ location, heat: value }))
    .sort((a, b) => b.heat - a.heat || a.location.localeCompare(b.location))
}
