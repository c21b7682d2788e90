/**
 * One-shot countdown latch.
 *
 * Waiters are released once the count reaches zero. The latch cannot be
 * re-armed; create a new one for the next wait.
 */
export class CountdownLatch {
  #count: number
  readonly #waiters = new Set<() => void>()

  constructor(count: number) {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(
        `Latch count must be a non-negative integer, got ${count}`
      )
    }
    this.#count = count
  }

  /**
   * Remaining count before waiters are released.
   */
  get count(): number {
    return this.#count
  }

  /**
   * Decrement the count, releasing every waiter when it reaches zero.
   * Extra calls after zero are ignored.
   */
  countDown(): void {
    if (this.#count === 0) return

    this.#count--
    if (this.#count === 0) {
      for (const release of this.#waiters) {
        release()
      }
      this.#waiters.clear()
    }
  }

  /**
   * Wait for the count to reach zero.
   *
   * Resolves `true` when released and `false` when the timeout elapses
   * first. Without a timeout the wait is unbounded. A released or timed-out
   * wait is final: later count-downs do not change its result.
   */
  wait(timeoutMs?: number): Promise<boolean> {
    if (this.#count === 0) {
      return Promise.resolve(true)
    }

    return new Promise((resolve) => {
      let timeoutId: ReturnType<typeof setTimeout> | undefined

      const release = (): void => {
        if (timeoutId) clearTimeout(timeoutId)
        resolve(true)
      }
      this.#waiters.add(release)

      if (timeoutMs !== undefined) {
        timeoutId = setTimeout(
          () => {
            this.#waiters.delete(release)
            resolve(false)
          },
          Math.max(0, timeoutMs)
        )
      }
    })
  }
}
