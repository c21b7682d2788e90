/**
 * Harness Errors
 */

import { TimeoutError } from "@todo-probe/promises"

/**
 * Error thrown when race actors do not all settle within the join timeout.
 * Fatal for the test: a hung actor is never reported as a rejected outcome.
 */
export class JoinTimeoutError extends TimeoutError {
  readonly actors: number

  /**
   * Actors that had settled when the timeout fired.
   */
  readonly settled: number

  constructor(timeout: number, actors: number, settled: number) {
    super(
      timeout,
      `Race did not finish within ${timeout}ms: ${settled} of ${actors} actor(s) settled`
    )
    this.name = `JoinTimeoutError`
    this.actors = actors
    this.settled = settled
  }
}

/**
 * Error thrown when a load run exceeds its overall timeout.
 */
export class LoadTimeoutError extends TimeoutError {
  readonly operation: string

  constructor(operation: string, timeout: number) {
    super(timeout, `${operation} load test did not finish within ${timeout}ms`)
    this.name = `LoadTimeoutError`
    this.operation = operation
  }
}
