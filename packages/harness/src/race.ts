/**
 * Race Harness - N concurrent actors against one conflict key.
 */

import { withTimeout } from "@todo-probe/promises"
import { JoinTimeoutError } from "./error"
import type { Logger } from "@todo-probe/client"

interface OutcomeBase {
  /**
   * Index of the actor, from 0.
   */
  actor: number

  durationMs: number
}

export interface AcceptedOutcome<T> extends OutcomeBase {
  status: `accepted`
  value: T
}

/**
 * A rejected attempt either resolved with a value the caller did not
 * accept, or failed with `reason`.
 */
export interface RejectedOutcome<T> extends OutcomeBase {
  status: `rejected`
  value?: T
  reason?: unknown
}

export type ActorOutcome<T> = AcceptedOutcome<T> | RejectedOutcome<T>

export interface RaceResult<T> {
  /**
   * One outcome per actor, ordered by actor index.
   */
  outcomes: Array<ActorOutcome<T>>
  accepted: number
  rejected: number
  durationMs: number
}

export interface RaceOptions<T> {
  /**
   * Number of concurrent actors. Must be a positive integer.
   */
  actors: number

  /**
   * The mutating operation. Runs exactly once per actor.
   */
  attempt: (actor: number) => Promise<T>

  /**
   * Decides whether a resolved attempt counts as accepted.
   * Every resolved attempt is accepted when omitted.
   */
  isAccepted?: (value: T) => boolean

  /**
   * Upper bound on joining all actors. Default: 30000.
   */
  joinTimeoutMs?: number

  /**
   * Defaults to console.
   */
  logger?: Logger
}

export const DEFAULT_JOIN_TIMEOUT_MS = 30_000

/**
 * Release `actors` attempts together from one start barrier and join them.
 *
 * A failed attempt becomes a rejected outcome; the harness itself only
 * fails when the join exceeds its timeout. Callers assert on the state they
 * re-read afterwards, not on the outcomes alone.
 *
 * @throws {RangeError} if actors is not a positive integer
 * @throws {JoinTimeoutError} if the actors do not all settle in time
 *
 * @example
 * ```typescript
 * const result = await race({
 *   actors: 5,
 *   attempt: () => client.createTodo({ id, text: `x`, completed: false }),
 *   isAccepted: (response) => response.status === 201,
 * })
 * ```
 */
export async function race<T>(opts: RaceOptions<T>): Promise<RaceResult<T>> {
  const { actors, attempt } = opts
  if (!Number.isInteger(actors) || actors <= 0) {
    throw new RangeError(`actors must be a positive integer, got ${actors}`)
  }

  const isAccepted = opts.isAccepted ?? (() => true)
  const joinTimeoutMs = opts.joinTimeoutMs ?? DEFAULT_JOIN_TIMEOUT_MS
  const logger = opts.logger ?? console

  let release: () => void = () => {}
  const barrier = new Promise<void>((resolve) => {
    release = resolve
  })
  let settled = 0

  const runActor = async (actor: number): Promise<ActorOutcome<T>> => {
    await barrier
    const start = performance.now()
    try {
      const value = await attempt(actor)
      const durationMs = performance.now() - start
      return isAccepted(value)
        ? { status: `accepted`, actor, value, durationMs }
        : { status: `rejected`, actor, value, durationMs }
    } catch (reason) {
      logger.debug(`[Race] Actor ${actor} failed: ${describeReason(reason)}`)
      return {
        status: `rejected`,
        actor,
        reason,
        durationMs: performance.now() - start,
      }
    } finally {
      settled++
    }
  }

  const runs = Array.from({ length: actors }, (_, actor) => runActor(actor))
  const started = performance.now()
  release()

  const outcomes = await withTimeout(Promise.all(runs), joinTimeoutMs, {
    createError: (ms) => new JoinTimeoutError(ms, actors, settled),
  })

  const accepted = outcomes.filter((o) => o.status === `accepted`).length
  const result: RaceResult<T> = {
    outcomes,
    accepted,
    rejected: outcomes.length - accepted,
    durationMs: performance.now() - started,
  }

  logger.debug(
    `[Race] ${actors} actor(s): ${result.accepted} accepted, ${result.rejected} rejected in ${result.durationMs.toFixed(1)}ms`
  )
  return result
}

function describeReason(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason)
}
