/**
 * A store call that kept failing after its retries. Handlers turn this into
 * an `error` frame for the originating connection and publish nothing.
 */
export class StoreError extends Error {
  readonly operation: string

  constructor(operation: string, cause: unknown) {
    super(`Store operation ${operation} failed`, { cause })
    this.name = 'StoreError'
    this.operation = operation
  }
}

/**
 * A call status change the state machine does not allow.
 */
export class CallTransitionError extends Error {
  readonly from: string
  readonly to: string

  constructor(from: string, to: string) {
    super(`Cannot move call from ${from} to ${to}`)
    this.name = 'CallTransitionError'
    this.from = from
    this.to = to
  }
}
