export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export class FeedbackError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'FeedbackError'
  }
}

/** Raised when feedback reduction or rejection correction leaves no candidate */
export class NoCandidatesError extends Error {
  readonly turn: number

  constructor(turn: number) {
    super(`no candidates remain at turn ${turn}`)
    this.name = 'NoCandidatesError'
    this.turn = turn
  }
}
