export type WorldState = {
  turnNumber: number
  timelineStability: number
  governmentControl: number
  factionInfluence: number
  nationalSecurity: number
  exposureRisk: number
  directorControl: number
  hostBodyRejection: number
}

export type Metric = Exclude<keyof WorldState, 'turnNumber'>

export type Effect = {
  target: Metric
  delta: number
}

// delay 0 = applied immediately
export type TimedEffect = Effect & {
  delay: number
}

export type BreachOp = '>' | '<' | '>=' | '<='

export type Condition = {
  param: Metric
  op: BreachOp
  value: number
}

export type EmergencyCategory =
  | 'timeline_collapse'
  | 'faction_takeover'
  | 'director_control_loss'
  | 'host_body_rejection'
  | 'exposure_crisis'
  | 'security_breakdown'

export type EmergencyRule = {
  category: EmergencyCategory
  condition: Condition
  cooldownTurns?: number
}

export type SeverityTier = 'moderate' | 'severe' | 'critical'

export type SeverityBand = {
  tier: SeverityTier
  minDistance: number
}

export type EmergencyInstance = {
  id: string
  category: EmergencyCategory
  metric: Metric
  triggerValue: number
  threshold: number
  distance: number
  severity: SeverityTier
  detectedTurn: number
}

// Waits for a free team until expiresTurn (inclusive)
export type PendingEmergency = {
  emergency: EmergencyInstance
  expiresTurn: number
}

export type EmergencyStatus = {
  status: 'normal' | 'elevated' | 'high' | 'critical'
  count: number
  critical: number
  severe: number
}

export type CooldownTable = Partial<Record<EmergencyCategory, number>>

export type ActorKind = 'player' | 'traveler' | 'faction' | 'government'

export type Skill =
  | 'combat'
  | 'stealth'
  | 'intelligence'
  | 'social'
  | 'technical'
  | 'medical'
  | 'leadership'

export type SkillWeights = Partial<Record<Skill, number>>

export type TeamMember = {
  name: string
  skills: SkillWeights
}

export type Team = {
  id: string
  name: string
  actor: ActorKind
  members: TeamMember[]
  cohesion: number
  communication: number
  location: string
}

export type PhaseKind = 'infiltration' | 'execution' | 'extraction'

export type MissionPhase = {
  kind: PhaseKind
  skills: SkillWeights
}

export type TemplateTrigger =
  | { kind: 'emergency'; category: EmergencyCategory }
  | { kind: 'routine'; actor: ActorKind }
  | { kind: 'investigation' }

export type MissionTemplate = {
  id: string
  title: string
  objectives: string[]
  trigger: TemplateTrigger
  phases: MissionPhase[]
  baseDifficulty: number
  baseWeight: number
  effectKey: string
}

export type MissionTrigger =
  | { kind: 'emergency'; emergency: EmergencyInstance }
  | { kind: 'routine'; actor: ActorKind }
  | { kind: 'investigation'; investigation: Investigation }

export type OutcomeTier =
  | 'critical_success'
  | 'success'
  | 'partial'
  | 'failure'
  | 'critical_failure'

export type TerminalOutcome = 'success' | 'partial_success' | 'failure'

export type MissionStage = 'pending' | PhaseKind | TerminalOutcome

export type Tactic = 'cautious' | 'balanced' | 'aggressive'

export type PhaseInput = {
  tactic: Tactic
}

export type PhaseResult = {
  kind: PhaseKind
  raw: number
  sides: number
  modifiers: Record<string, number>
  modifier: number
  total: number
  dc: number
  margin: number
  outcome: OutcomeTier
  tactic: Tactic
}

export type Mission = {
  id: string
  templateId: string
  title: string
  objectives: string[]
  origin: 'emergency' | 'routine' | 'investigation'
  category: string
  emergencyId: string | null
  investigationId: string | null
  severity: SeverityTier | null
  teamId: string
  actor: ActorKind
  location: string
  phases: MissionPhase[]
  difficulty: number
  stage: MissionStage
  phaseResults: PhaseResult[]
  createdTurn: number
  resolvedTurn: number | null
  fallback: boolean
}

export type MissionSummary = Pick<
  Mission,
  'id' | 'title' | 'origin' | 'teamId' | 'actor' | 'severity' | 'difficulty'
>

export type EffectTable = Record<string, Record<TerminalOutcome, TimedEffect[]>>

export type WorldEvent = {
  id: string
  title: string
  baseWeight: number
  effects: TimedEffect[]
}

export type ConsequenceSource = {
  kind: 'mission' | 'event' | 'investigation'
  id: string
}

export type ConsequenceEntry = {
  id: string
  source: ConsequenceSource
  effects: Effect[]
  scheduledTurn: number
  applyTurn: number
  oneShot: true
}

export type AppliedEffect = {
  entryId: string | null
  source: ConsequenceSource
  target: Metric
  delta: number
  before: number
  after: number
  turn: number
}

// Location -> heat, 0..max. Locations at 0 are dropped.
export type HeatMap = Record<string, number>

export type Investigation = {
  id: string
  location: string
  heat: number
  openedTurn: number
  closesTurn: number
}

export type DetectionRoll = {
  location: string
  heat: number
  raw: number
  dc: number
  outcome: OutcomeTier
  investigationId: string | null
}

export type EngineState = {
  world: WorldState
  cooldowns: CooldownTable
  history: Mission[]
  queue: ConsequenceEntry[]
  activeMissions: Mission[]
  pendingEmergencies: PendingEmergency[]
  heat: HeatMap
  investigations: Investigation[]
}

export type RngState = {
  i: number
  j: number
  S: number[]
}

export type EngineSnapshot = EngineState & {
  version: 1
  rngState: RngState
}

export type TurnReport = {
  turn: number
  applied: AppliedEffect[]
  emergencies: EmergencyInstance[]
  unassigned: EmergencyInstance[]
  expired: EmergencyInstance[]
  generated: MissionSummary[]
  resolved: Mission[]
  awaitingInput: Mission[]
  events: { id: string; title: string }[]
  detections: DetectionRoll[]
  investigations: { opened: Investigation[]; closed: Investigation[] }
  status: EmergencyStatus
  heat: HeatMap
  world: WorldState
}

export type EngineConfig = {
  dice: { sides: number; partialMargin: number }
  difficulty: {
    min: number
    max: number
    severityStep: number
    capabilityBaseline: number
    capabilityScale: number
  }
  phaseDcOffsets: Record<PhaseKind, number>
  actorBonuses: Record<ActorKind, number>
  tactics: Record<Tactic, { modifier: number; margin: number }>
  routineChance: number
  playerRoutineChance: number
  worldEventChance: number
  defaultCooldownTurns: number
  emergencyExpiryTurns: number
  severityTiers: SeverityBand[]
  emergencies: EmergencyRule[]
  worldEvents: WorldEvent[]
  heat: {
    incident: number
    failure: number
    decay: number
    threshold: number
    max: number
  }
  detection: {
    dc: number
    minDc: number
    maxDc: number
    heatStep: number
    durationTurns: number
    effects: TimedEffect[]
  }
}

export type PhaseRejection = {
  code: 'unknown_mission' | 'not_awaiting_input'
  message: string
}

export type SubmitResult =
  | { ok: true; state: EngineState; result: PhaseResult; mission: Mission; applied: AppliedEffect[] }
  | { ok: false; error: PhaseRejection }

export type RollStatistics = {
  totalRolls: number
  criticalSuccesses: number
  criticalFailures: number
  successes: number
  partials: number
  failures: number
  successRate: number
  criticalSuccessRate: number
  criticalFailureRate: number
}
