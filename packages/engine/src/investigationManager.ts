import type { AppliedEffect, DetectionRoll, EngineConfig, EngineState, Investigation } from 'shared'
import type { EngineContext } from './context'
import { isSuccessTier, resolveRoll } from './rollResolver'
import { recordEffects } from './consequenceScheduler'
import { hotLocations } from './heatTracker'

type DetectionConfig = EngineConfig['detection']

/** Hotter locations are easier to notice. */
export function detectionDc(heat: number, config: DetectionConfig): number {
  const dc = config.dc - Math.floor(heat / config.heatStep)
  return Math.min(config.maxDc, Math.max(config.minDc, dc))
}

export function openInvestigation(
  location: string,
  heat: number,
  turn: number,
  config: DetectionConfig,
): Investigation {
  return {
    id: `I${turn}-${location}`,
    location,
    heat,
    openedTurn: turn,
    closesTurn: turn + config.durationTurns,
  }
}

export function closeInvestigations(
  state: EngineState,
  turn: number,
): { state: EngineState; closed: Investigation[] } {
  const closed = state.investigations.filter(i => i.closesTurn <= turn)
  if (closed.length === 0) return { state, closed }
  return {
    state: { ...state, investigations: state.investigations.filter(i => i.closesTurn > turn) },
    closed,
  }
}

/**
 * With a government team on the board, each hot location not already under
 * investigation gets one d20 detection roll. A hit opens an investigation and
 * books its consequences through the queue.
 */
export function runDetection(
  state: EngineState,
  turn: number,
  ctx: Pick<EngineContext, 'config' | 'teams' | 'rng' | 'logger'>,
): { state: EngineState; detections: DetectionRoll[]; opened: Investigation[]; applied: AppliedEffect[] } {
  const detections: DetectionRoll[] = []
  const opened: Investigation[] = []
  const applied: AppliedEffect[] = []
  if (!ctx.teams.some(t => t.actor === 'government')) return { state, detections, opened, applied }

  const { dice, detection } = ctx.config
  const watched = new Set(state.investigations.map(i => i.location))
  let next = state

  for (const spot of hotLocations(state.heat, ctx.config.heat)) {
    if (watched.has(spot.location)) continue

    const dc = detectionDc(spot.heat, detection)
    const roll = resolveRoll(ctx.rng, { sides: dice.sides, modifier: 0, dc, margin: 0 })
    if (!isSuccessTier(roll.outcome)) {
      detections.push({ location: spot.location, heat: spot.heat, raw: roll.raw, dc, outcome: roll.outcome, investigationId: null })
      continue
    }

    const investigation = openInvestigation(spot.location, spot.heat, turn, detection)
    const recorded = recordEffects(next, { kind: 'investigation', id: investigation.id }, detection.effects, turn)
    next = { ...recorded.state, investigations: [...recorded.state.investigations, investigation] }
    applied.push(...recorded.applied)
    opened.push(investigation)
    detections.push({
      location: spot.location,
      heat: spot.heat,
      raw: roll.raw,
      dc,
      outcome: roll.outcome,
      investigationId: investigation.id,
    })
    ctx.logger.info(`[engine] turn ${turn}: investigation ${investigation.id} opened, closes turn ${investigation.closesTurn}`)
  }

  return { state: next, detections, opened, applied }
}
