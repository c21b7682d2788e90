/**
 * Waiting helpers for asynchronous assertions.
 *
 * Bridges "something will eventually happen" into a promise that settles
 * within a bounded time, so tests never hang on a missing event.
 */

import { AbortedError, TimeoutError } from "./error"

/**
 * Common options for waiting helpers.
 */
export interface WaitOptions {
  /**
   * AbortSignal for cancellation.
   */
  signal?: AbortSignal

  /**
   * Timeout in milliseconds. Rejects with TimeoutError if exceeded.
   */
  timeout?: number
}

/**
 * Options for until().
 */
export interface UntilOptions extends WaitOptions {
  timeout: number

  /**
   * Delay between two evaluations of the condition. Defaults to 50ms.
   */
  interval?: number

  /**
   * Message for the TimeoutError raised when the condition never holds.
   */
  message?: string
}

/**
 * Options for withTimeout().
 */
export interface WithTimeoutOptions {
  signal?: AbortSignal

  /**
   * Builds the error used to reject on timeout. Defaults to TimeoutError.
   */
  createError?: (timeout: number) => TimeoutError
}

/**
 * Create an abort signal that combines an optional user signal with a timeout.
 * Returns the signal and a cleanup function.
 */
export function createTimeoutSignal(
  timeout?: number,
  userSignal?: AbortSignal,
  createError: (timeout: number) => TimeoutError = (ms) => new TimeoutError(ms)
): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController()
  let timeoutId: ReturnType<typeof setTimeout> | undefined

  if (timeout !== undefined) {
    timeoutId = setTimeout(() => {
      controller.abort(createError(timeout))
    }, timeout)
  }

  // Link to user signal
  const abortHandler = (): void => {
    if (timeoutId) clearTimeout(timeoutId)
    controller.abort(userSignal?.reason)
  }

  if (userSignal) {
    if (userSignal.aborted) {
      if (timeoutId) clearTimeout(timeoutId)
      controller.abort(userSignal.reason)
    } else {
      userSignal.addEventListener(`abort`, abortHandler, { once: true })
    }
  }

  const cleanup = (): void => {
    if (timeoutId) clearTimeout(timeoutId)
    if (userSignal) {
      userSignal.removeEventListener(`abort`, abortHandler)
    }
  }

  return { signal: controller.signal, cleanup }
}

/**
 * Map an aborted signal to the error a waiter should reject with.
 * Timeouts keep their TimeoutError, anything else becomes an AbortedError.
 */
export function abortReason(signal: AbortSignal): Error {
  if (signal.reason instanceof TimeoutError) {
    return signal.reason
  }
  return new AbortedError(undefined, { cause: signal.reason })
}

/**
 * Sleep for a specified number of milliseconds.
 * Rejects early if the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal))
      return
    }

    const onAbort = (): void => {
      clearTimeout(timeoutId)
      if (signal) reject(abortReason(signal))
    }

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener(`abort`, onAbort)
      resolve()
    }, ms)

    signal?.addEventListener(`abort`, onAbort, { once: true })
  })
}

/**
 * Settle with the given promise, or reject once the timeout elapses.
 *
 * The underlying operation is not cancelled; its eventual result is dropped.
 *
 * @throws {TimeoutError} if the timeout is exceeded
 *
 * @example
 * ```typescript
 * const todos = await withTimeout(client.fetchTodos(), 1_000)
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeout: number,
  opts?: WithTimeoutOptions
): Promise<T> {
  const { signal, cleanup } = createTimeoutSignal(
    timeout,
    opts?.signal,
    opts?.createError
  )

  try {
    return await new Promise<T>((resolve, reject) => {
      const onAbort = (): void => reject(abortReason(signal))

      if (signal.aborted) {
        onAbort()
        return
      }
      signal.addEventListener(`abort`, onAbort, { once: true })

      void promise.then(
        (value) => {
          signal.removeEventListener(`abort`, onAbort)
          resolve(value)
        },
        (error: unknown) => {
          signal.removeEventListener(`abort`, onAbort)
          reject(error)
        }
      )
    })
  } finally {
    cleanup()
  }
}

/**
 * Poll a condition until it holds.
 * Errors thrown by the condition propagate unchanged.
 *
 * @throws {TimeoutError} if the condition does not hold within the timeout
 *
 * @example
 * ```typescript
 * await until(() => ws.getReceivedMessages().length >= 3, { timeout: 5_000 })
 * ```
 */
export async function until(
  condition: () => boolean | Promise<boolean>,
  opts: UntilOptions
): Promise<void> {
  const interval = opts.interval ?? 50
  const { signal, cleanup } = createTimeoutSignal(
    opts.timeout,
    opts.signal,
    (ms) =>
      new TimeoutError(ms, opts.message ?? `Condition not met within ${ms}ms`)
  )

  try {
    for (;;) {
      if (await condition()) {
        return
      }
      if (signal.aborted) {
        throw abortReason(signal)
      }
      await sleep(interval, signal)
    }
  } finally {
    cleanup()
  }
}
