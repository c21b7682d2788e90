/**
 * @todo-probe/promises
 *
 * Waiting primitives for asynchronous test assertions: a countdown latch,
 * bounded waits and condition polling.
 *
 * @packageDocumentation
 */

export { CountdownLatch } from "./latch"

export {
  abortReason,
  createTimeoutSignal,
  sleep,
  until,
  withTimeout,
} from "./waiters"

export type { UntilOptions, WaitOptions, WithTimeoutOptions } from "./waiters"

export { AbortedError, TimeoutError } from "./error"
