import { createStore, type StoreApi } from 'zustand/vanilla'
import type {
  EngineSnapshot,
  EngineState,
  PhaseInput,
  SubmitResult,
  TurnReport,
  WorldState,
} from 'shared'
import { createContext, type ContextOptions, type EngineContext } from './context'
import { createRandom, type RandomSource } from './rng'
import { advanceTurn, createEngineState, submitMissionAction } from './eventEngine'
import { restoreSnapshot, toSnapshot } from './snapshot'
import { StalePlanError } from './errors'

const REPORT_LIMIT = 12

/**
 * A computed but not yet applied step. Plans run on a fork of the session's
 * random source, so a host can persist the outcome first and commit after.
 */
export type TurnPlan = {
  kind: 'turn'
  base: EngineState
  state: EngineState
  rng: RandomSource
  report: TurnReport
}

export type ActionPlan = {
  kind: 'action'
  base: EngineState
  state: EngineState
  rng: RandomSource
  result: SubmitResult
}

export type SessionPlan = TurnPlan | ActionPlan

export type SessionStore = {
  seed: string
  context: EngineContext
  engine: EngineState
  reports: TurnReport[]

  planTurn(): TurnPlan
  planAction(missionId: string, input: PhaseInput): ActionPlan
  commit(plan: SessionPlan): void
  advanceTurn(): TurnReport
  submitMissionAction(missionId: string, input: PhaseInput): SubmitResult
  snapshot(): EngineSnapshot
}

export type SessionOptions = Omit<ContextOptions, 'seed' | 'rng'> & {
  seed: string
  world?: Partial<WorldState>
  snapshot?: unknown
}

export function planSnapshot(plan: SessionPlan): EngineSnapshot {
  return toSnapshot(plan.state, plan.rng)
}

/**
 * One store per game session. Nothing in here is shared between stores, so
 * a host can run any number of sessions side by side.
 */
export function createSessionStore(options: SessionOptions): StoreApi<SessionStore> {
  const { seed, world, snapshot, ...contextOptions } = options
  let engine: EngineState
  let context: EngineContext

  if (snapshot !== undefined) {
    const restored = restoreSnapshot(snapshot)
    engine = restored.state
    context = createContext({ ...contextOptions, rng: createRandom(seed, restored.rngState) })
  } else {
    engine = createEngineState(world)
    context = createContext({ ...contextOptions, rng: createRandom(seed) })
  }

  return createStore<SessionStore>((set, get) => ({
    seed,
    context,
    engine,
    reports: [],

    planTurn() {
      const { engine, context } = get()
      const rng = context.rng.fork()
      const { state, report } = advanceTurn(engine, { ...context, rng })
      return { kind: 'turn', base: engine, state, rng, report }
    },

    planAction(missionId, input) {
      const { engine, context } = get()
      const rng = context.rng.fork()
      const result = submitMissionAction(engine, missionId, input, { ...context, rng })
      return { kind: 'action', base: engine, state: result.ok ? result.state : engine, rng, result }
    },

    commit(plan) {
      if (get().engine !== plan.base) throw new StalePlanError()
      set(s => ({
        engine: plan.state,
        context: { ...s.context, rng: plan.rng },
        reports: plan.kind === 'turn' ? [...s.reports, plan.report].slice(-REPORT_LIMIT) : s.reports,
      }))
    },

    advanceTurn() {
      const plan = get().planTurn()
      get().commit(plan)
      return plan.report
    },

    submitMissionAction(missionId, input) {
      const plan = get().planAction(missionId, input)
      if (plan.result.ok) get().commit(plan)
      return plan.result
    },

    snapshot() {
      const { engine, context } = get()
      return toSnapshot(engine, context.rng)
    },
  }))
}
