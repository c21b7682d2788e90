/**
 * Concurrent load runner.
 */

import fastq from "fastq"
import { withTimeout } from "@todo-probe/promises"
import { LoadTimeoutError } from "./error"
import { calculateStats } from "./stats"
import type { queueAsPromised } from "fastq"
import type { Logger } from "@todo-probe/client"
import type { Stats } from "./stats"

export interface LoadOptions {
  /**
   * Name used in reports and errors, e.g. "CREATE".
   */
  operation: string

  /**
   * Concurrent virtual users.
   */
  users: number

  /**
   * Sequential requests issued by each user.
   */
  requestsPerUser: number

  /**
   * Upper bound for the whole run. Default: 30000.
   */
  timeoutMs?: number

  /**
   * Issue one request. Resolve `true` for a success; `false` or a thrown
   * error counts as a failure and the user moves on to its next request.
   * `signal` aborts once the run has timed out.
   */
  request: (
    user: number,
    iteration: number,
    signal: AbortSignal
  ) => Promise<boolean>

  /**
   * Defaults to console.
   */
  logger?: Logger
}

export interface LoadReport {
  operation: string
  totalRequests: number
  successfulRequests: number
  failedRequests: number

  /**
   * Percentage of successful requests, 0 to 100.
   */
  successRate: number

  /**
   * Response times of successful requests, in milliseconds.
   */
  responseTimes: Stats

  totalDurationMs: number

  /**
   * Successful requests per second.
   */
  throughput: number
}

export const DEFAULT_LOAD_TIMEOUT_MS = 30_000

/**
 * Run `users` workers side by side, each issuing `requestsPerUser`
 * requests one after another. On timeout no worker starts another request.
 *
 * @throws {RangeError} if users or requestsPerUser is not a positive integer
 * @throws {LoadTimeoutError} if the run exceeds timeoutMs
 */
export async function runLoad(opts: LoadOptions): Promise<LoadReport> {
  const { operation, users, requestsPerUser, request } = opts
  assertPositiveInteger(`users`, users)
  assertPositiveInteger(`requestsPerUser`, requestsPerUser)

  const timeoutMs = opts.timeoutMs ?? DEFAULT_LOAD_TIMEOUT_MS
  const logger = opts.logger ?? console

  const responseTimes: Array<number> = []
  let failedRequests = 0
  const controller = new AbortController()
  const { signal } = controller

  const worker = async (user: number): Promise<void> => {
    for (let iteration = 0; iteration < requestsPerUser; iteration++) {
      // No new requests once the run has timed out
      if (signal.aborted) return

      const start = performance.now()
      try {
        if (await request(user, iteration, signal)) {
          responseTimes.push(performance.now() - start)
        } else {
          failedRequests++
        }
      } catch (error) {
        failedRequests++
        logger.warn(
          `[LoadRunner] ${operation} request ${iteration} of user ${user} failed: ${
            error instanceof Error ? error.message : String(error)
          }`
        )
      }
    }
  }

  const queue: queueAsPromised<number, void> = fastq.promise(worker, users)
  const started = performance.now()

  const runs = Array.from({ length: users }, (_, user) => queue.push(user))
  try {
    await withTimeout(Promise.all(runs), timeoutMs, {
      createError: (ms) => new LoadTimeoutError(operation, ms),
    })
  } catch (error) {
    controller.abort(error)
    queue.kill()
    throw error
  }

  const totalDurationMs = performance.now() - started
  const totalRequests = users * requestsPerUser
  const successfulRequests = responseTimes.length

  const report: LoadReport = {
    operation,
    totalRequests,
    successfulRequests,
    failedRequests,
    successRate: (successfulRequests / totalRequests) * 100,
    responseTimes: calculateStats(responseTimes),
    totalDurationMs,
    throughput:
      totalDurationMs > 0 ? successfulRequests / (totalDurationMs / 1_000) : 0,
  }

  logger.debug(
    `[LoadRunner] ${operation}: ${successfulRequests}/${totalRequests} succeeded in ${totalDurationMs.toFixed(1)}ms`
  )
  return report
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`)
  }
}
