export class ConfigurationGapError extends Error {
  constructor(readonly key: string) {
    super(`No mission template or fallback available for "${key}"`)
    this.name = 'ConfigurationGapError'
  }
}

export class StalePlanError extends Error {
  constructor() {
    super('Session state changed after the plan was made')
    this.name = 'StalePlanError'
  }
}
