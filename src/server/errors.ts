export class UnknownRouteModeError extends Error {
  constructor(readonly mode: string) {
    super(`Route mode ${mode} unknown`)
    this.name = 'UnknownRouteModeError'
  }
}

export class InvalidGoalError extends Error {
  constructor(message = 'Goal position cannot be NULL') {
    super(message)
    this.name = 'InvalidGoalError'
  }
}

export class PlanTimeoutError extends Error {
  constructor(
    readonly goalId: string,
    readonly timeoutMs: number,
  ) {
    super(`No global plan for goal ${goalId} within ${timeoutMs}ms`)
    this.name = 'PlanTimeoutError'
  }
}
