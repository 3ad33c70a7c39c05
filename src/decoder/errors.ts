export class MalformedHypothesisError extends Error {
  constructor(message: string) {
    super(`malformed hypothesis: ${message}`)
    this.name = 'MalformedHypothesisError'
  }
}

/** Raised when the sentence-start weights of a hypothesis sum to zero. */
export class DegenerateScoringError extends Error {
  constructor(message: string) {
    super(`degenerate scoring input: ${message}`)
    this.name = 'DegenerateScoringError'
  }
}

export class DecodeStepContractError extends Error {
  constructor(message: string) {
    super(`decode step contract: ${message}`)
    this.name = 'DecodeStepContractError'
  }
}

export class ConfigError extends Error {
  readonly field: string
  constructor(field: string, message: string) {
    super(`${field}: ${message}`)
    this.name = 'ConfigError'
    this.field = field
  }
}

export class EmptyBeamError extends Error {
  constructor() {
    super('search ended with no results and no live hypotheses')
    this.name = 'EmptyBeamError'
  }
}
