import type { EngineSnapshot, EngineState, RngState } from 'shared'
import type { RandomSource } from './rng'
import { parseSnapshot } from './schema'

export const SNAPSHOT_VERSION = 1

export function toSnapshot(state: EngineState, rng: RandomSource): EngineSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    world: { ...state.world },
    cooldowns: { ...state.cooldowns },
    history: structuredClone(state.history),
    queue: structuredClone(state.queue),
    activeMissions: structuredClone(state.activeMissions),
    pendingEmergencies: structuredClone(state.pendingEmergencies),
    heat: { ...state.heat },
    investigations: structuredClone(state.investigations),
    rngState: rng.state(),
  }
}

/** Validates an untrusted snapshot (e.g. parsed JSON) and splits it back apart. */
export function restoreSnapshot(raw: unknown): { state: EngineState; rngState: RngState } {
  const { version: _version, rngState, ...state } = parseSnapshot(raw)
  return { state, rngState }
}

export function serializeSnapshot(snapshot: EngineSnapshot): string {
  return JSON.stringify(snapshot)
}

export function deserializeSnapshot(json: string): { state: EngineState; rngState: RngState } {
  return restoreSnapshot(JSON.parse(json))
}
