import type {
  ActorKind,
  AppliedEffect,
  EmergencyInstance,
  EngineState,
  Mission,
  MissionSummary,
  PendingEmergency,
  PhaseInput,
  PhaseRejection,
  SubmitResult,
  Team,
  TurnReport,
  WorldState,
} from 'shared'
import type { EngineContext } from './context'
import { initState, startTurn } from './stateManager'
import { emptyCooldowns } from './cooldownManager'
import { scanEmergencies, sortBySeverity, summarizeEmergencies } from './emergencyDetector'
import { generateMission } from './missionGenerator'
import { archiveMission, isTerminal, resolveNextPhase, runMission, startMission } from './missionExecutor'
import { flushConsequences, recordEffects, recordOutcome } from './consequenceScheduler'
import { coolHeat, emptyHeat, recordIncident } from './heatTracker'
import { closeInvestigations, runDetection } from './investigationManager'
import { weightedRandomPick } from './selectionEngine'
import { chance } from './rng'

// Independent actors take their routine turn in this fixed order
export const ROUTINE_ORDER: readonly ActorKind[] = ['government', 'traveler', 'faction']

export function createEngineState(world?: Partial<WorldState>): EngineState {
  return {
    world: initState(world),
    cooldowns: emptyCooldowns(),
    history: [],
    queue: [],
    activeMissions: [],
    pendingEmergencies: [],
    heat: emptyHeat(),
    investigations: [],
  }
}

export function summarizeMission(mission: Mission): MissionSummary {
  const { id, title, origin, teamId, actor, severity, difficulty } = mission
  return { id, title, origin, teamId, actor, severity, difficulty }
}

function completeMission(
  state: EngineState,
  mission: Mission,
  turn: number,
  ctx: EngineContext,
): { state: EngineState; applied: AppliedEffect[] } {
  const { stage } = mission
  const heat = isTerminal(stage) ? recordIncident(state.heat, mission, stage, ctx.config.heat) : state.heat
  const archived = { ...state, heat, history: archiveMission(state.history, mission) }
  return recordOutcome(archived, mission, turn, ctx)
}

export function emergencyResponders(teams: Team[]): Team[] {
  return [
    ...teams.filter(t => t.actor === 'player'),
    ...teams.filter(t => t.actor === 'traveler'),
  ]
}

/**
 * One discrete turn: flush due consequences, cool heat and run government
 * detection, scan thresholds, dispatch emergency missions (carried-over ones
 * included), then routine activity and world events. AI missions resolve in
 * place; player missions wait for submitMissionAction.
 */
export function advanceTurn(
  state: EngineState,
  ctx: EngineContext,
): { state: EngineState; report: TurnReport } {
  let next: EngineState = { ...state, world: startTurn(state.world) }
  const turn = next.world.turnNumber
  const applied: AppliedEffect[] = []

  const flushed = flushConsequences(next, turn, ctx)
  next = flushed.state
  applied.push(...flushed.applied)

  next = { ...next, heat: coolHeat(next.heat, ctx.config.heat) }
  const closing = closeInvestigations(next, turn)
  next = closing.state
  const detection = runDetection(next, turn, ctx)
  next = detection.state
  applied.push(...detection.applied)

  const scan = scanEmergencies(next.world, next.cooldowns, turn, ctx.config)
  next = { ...next, cooldowns: scan.cooldowns }

  // A fresh breach of the same category supersedes the one still waiting
  const rescanned = new Set(scan.emergencies.map(e => e.category))
  const expired: EmergencyInstance[] = []
  const carried: PendingEmergency[] = []
  for (const pending of next.pendingEmergencies) {
    if (rescanned.has(pending.emergency.category)) continue
    if (pending.expiresTurn < turn) {
      expired.push(pending.emergency)
      ctx.logger.info(`[engine] turn ${turn}: ${pending.emergency.id} expired without a team`)
      continue
    }
    carried.push(pending)
  }
  const expiresTurn = new Map(carried.map(p => [p.emergency.id, p.expiresTurn]))
  const outstanding = sortBySeverity([...carried.map(p => p.emergency), ...scan.emergencies])

  let seq = 0
  const nextId = () => `M${turn}-${++seq}`
  const busy = new Set(next.activeMissions.map(m => m.teamId))
  const generated: Mission[] = []
  const resolved: Mission[] = []
  const awaitingInput: Mission[] = []
  const waiting: PendingEmergency[] = []
  const events: TurnReport['events'] = []

  const dispatch = (mission: Mission, team: Team) => {
    busy.add(team.id)
    generated.push(mission)
    if (team.actor === 'player') {
      const started = startMission(mission)
      awaitingInput.push(started)
      next = { ...next, activeMissions: [...next.activeMissions, started] }
      return
    }
    const done = runMission(mission, team, ctx.rng, ctx.config, turn)
    const completed = completeMission(next, done, turn, ctx)
    next = completed.state
    applied.push(...completed.applied)
    resolved.push(done)
  }

  const responders = emergencyResponders(ctx.teams)
  for (const emergency of outstanding) {
    const team = responders.find(t => !busy.has(t.id))
    if (!team) {
      const until = expiresTurn.get(emergency.id) ?? turn + ctx.config.emergencyExpiryTurns
      waiting.push({ emergency, expiresTurn: until })
      ctx.logger.info(`[engine] turn ${turn}: no free team for ${emergency.category}, waiting until turn ${until}`)
      continue
    }
    dispatch(generateMission({ kind: 'emergency', emergency }, team, nextId(), turn, ctx), team)
  }
  next = { ...next, pendingEmergencies: waiting }

  const leads = [...next.investigations]
  for (const actor of ROUTINE_ORDER) {
    for (const team of ctx.teams.filter(t => t.actor === actor)) {
      if (busy.has(team.id)) continue
      // Open investigations take precedence over a government team's routine
      const lead = actor === 'government' ? leads.shift() : undefined
      if (lead) {
        dispatch(generateMission({ kind: 'investigation', investigation: lead }, team, nextId(), turn, ctx), team)
        continue
      }
      if (!chance(ctx.rng, ctx.config.routineChance)) continue
      dispatch(generateMission({ kind: 'routine', actor }, team, nextId(), turn, ctx), team)
    }
  }

  const { worldEvents, worldEventChance, playerRoutineChance } = ctx.config
  if (worldEvents.length > 0 && chance(ctx.rng, worldEventChance)) {
    const event = weightedRandomPick(worldEvents, worldEvents.map(e => e.baseWeight), ctx.rng)
    if (event) {
      const recorded = recordEffects(next, { kind: 'event', id: `E${turn}-${event.id}` }, event.effects, turn)
      next = recorded.state
      applied.push(...recorded.applied)
      events.push({ id: event.id, title: event.title })
    }
  }

  const player = ctx.teams.find(t => t.actor === 'player')
  if (player && !busy.has(player.id) && chance(ctx.rng, playerRoutineChance)) {
    dispatch(generateMission({ kind: 'routine', actor: 'player' }, player, nextId(), turn, ctx), player)
  }

  const report: TurnReport = {
    turn,
    applied,
    emergencies: scan.emergencies,
    unassigned: waiting.map(p => p.emergency),
    expired,
    generated: generated.map(summarizeMission),
    resolved,
    awaitingInput,
    events,
    detections: detection.detections,
    investigations: { opened: detection.opened, closed: closing.closed },
    status: summarizeEmergencies(outstanding),
    heat: next.heat,
    world: next.world,
  }
  // The report leaves the engine; nothing in it may alias engine state
  return { state: next, report: structuredClone(report) }
}

function reject(code: PhaseRejection['code'], message: string): SubmitResult {
  return { ok: false, error: { code, message } }
}

/**
 * Resolves the next phase of a player mission. Rejections leave the state
 * untouched.
 */
export function submitMissionAction(
  state: EngineState,
  missionId: string,
  input: PhaseInput,
  ctx: EngineContext,
): SubmitResult {
  const mission = state.activeMissions.find(m => m.id === missionId)
  if (!mission) {
    return state.history.some(m => m.id === missionId)
      ? reject('not_awaiting_input', `Mission ${missionId} is already resolved`)
      : reject('unknown_mission', `Mission ${missionId} does not exist`)
  }

  const team = ctx.teams.find(t => t.id === mission.teamId)
  if (!team || team.actor !== 'player') {
    return reject('not_awaiting_input', `Mission ${missionId} is not assigned to the player team`)
  }

  const turn = state.world.turnNumber
  const step = resolveNextPhase(mission, team, ctx.rng, ctx.config, input.tactic, turn)
  if (step === null) {
    return reject('not_awaiting_input', `Mission ${missionId} has no phase left to resolve`)
  }

  if (!isTerminal(step.mission.stage)) {
    return {
      ok: true,
      state: { ...state, activeMissions: state.activeMissions.map(m => (m.id === missionId ? step.mission : m)) },
      result: step.result,
      mission: structuredClone(step.mission),
      applied: [],
    }
  }

  const remaining = state.activeMissions.filter(m => m.id !== missionId)
  const completed = completeMission({ ...state, activeMissions: remaining }, step.mission, turn, ctx)
  return {
    ok: true,
    state: completed.state,
    result: step.result,
    mission: structuredClone(step.mission),
    applied: completed.applied,
  }
}
