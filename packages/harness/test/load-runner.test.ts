/**
 * Tests for the load runner.
 */

import { describe, expect, it, vi } from "vitest"
import { silentLogger } from "@todo-probe/client"
import { TimeoutError, sleep } from "@todo-probe/promises"
import { LoadTimeoutError, runLoad } from "../src"

describe(`runLoad`, () => {
  it(`should issue users x requestsPerUser requests`, async () => {
    const request = vi.fn(() => Promise.resolve(true))

    const report = await runLoad({
      operation: `READ`,
      users: 3,
      requestsPerUser: 4,
      request,
      logger: silentLogger,
    })

    expect(request).toHaveBeenCalledTimes(12)
    expect(report).toMatchObject({
      operation: `READ`,
      totalRequests: 12,
      successfulRequests: 12,
      failedRequests: 0,
      successRate: 100,
    })
  })

  it(`should hand each user its own sequential iterations`, async () => {
    const seen: Array<string> = []

    await runLoad({
      operation: `READ`,
      users: 2,
      requestsPerUser: 3,
      request: async (user, iteration) => {
        seen.push(`${user}:${iteration}`)
        return true
      },
      logger: silentLogger,
    })

    expect(seen.filter((entry) => entry.startsWith(`0:`))).toEqual([
      `0:0`,
      `0:1`,
      `0:2`,
    ])
    expect(seen.filter((entry) => entry.startsWith(`1:`))).toEqual([
      `1:0`,
      `1:1`,
      `1:2`,
    ])
  })

  it(`should count false results as failures`, async () => {
    const report = await runLoad({
      operation: `UPDATE`,
      users: 2,
      requestsPerUser: 4,
      request: (_user, iteration) => Promise.resolve(iteration % 2 === 0),
      logger: silentLogger,
    })

    expect(report.successfulRequests).toBe(4)
    expect(report.failedRequests).toBe(4)
    expect(report.successRate).toBe(50)
  })

  it(`should count errors as failures and keep going`, async () => {
    const logger = { ...silentLogger, warn: vi.fn() }
    const request = vi.fn((user: number, iteration: number) =>
      user === 0 && iteration === 0
        ? Promise.reject(new Error(`socket hang up`))
        : Promise.resolve(true)
    )

    const report = await runLoad({
      operation: `DELETE`,
      users: 2,
      requestsPerUser: 2,
      request,
      logger,
    })

    expect(request).toHaveBeenCalledTimes(4)
    expect(report.failedRequests).toBe(1)
    expect(report.successfulRequests).toBe(3)
    expect(logger.warn).toHaveBeenCalledWith(
      `[LoadRunner] DELETE request 0 of user 0 failed: socket hang up`
    )
  })

  it(`should run users concurrently`, async () => {
    let active = 0
    let peak = 0

    await runLoad({
      operation: `CREATE`,
      users: 4,
      requestsPerUser: 2,
      request: async () => {
        active++
        peak = Math.max(peak, active)
        await sleep(10)
        active--
        return true
      },
      logger: silentLogger,
    })

    expect(peak).toBe(4)
  })

  it(`should report throughput and response times of successes`, async () => {
    const report = await runLoad({
      operation: `READ`,
      users: 1,
      requestsPerUser: 2,
      request: async () => {
        await sleep(10)
        return true
      },
      logger: silentLogger,
    })

    expect(report.responseTimes.min).toBeGreaterThanOrEqual(5)
    expect(report.responseTimes.max).toBeGreaterThanOrEqual(
      report.responseTimes.min
    )
    expect(report.totalDurationMs).toBeGreaterThan(0)
    expect(report.throughput).toBeCloseTo(
      2 / (report.totalDurationMs / 1_000),
      6
    )
  })

  it(`should fail with LoadTimeoutError when the run is too slow`, async () => {
    const error = await runLoad({
      operation: `CREATE`,
      users: 1,
      requestsPerUser: 1,
      timeoutMs: 20,
      request: () => new Promise<boolean>(() => {}),
      logger: silentLogger,
    }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(LoadTimeoutError)
    expect(error).toBeInstanceOf(TimeoutError)
    expect(error).toMatchObject({
      message: `CREATE load test did not finish within 20ms`,
      operation: `CREATE`,
    })
  })

  it(`should stop issuing requests once the run has timed out`, async () => {
    const signals: Array<AbortSignal> = []
    const request = vi.fn(
      async (_user: number, _iteration: number, signal: AbortSignal) => {
        signals.push(signal)
        await sleep(10)
        return true
      }
    )

    const error = await runLoad({
      operation: `CREATE`,
      users: 2,
      requestsPerUser: 20,
      timeoutMs: 50,
      request,
      logger: silentLogger,
    }).catch((e: unknown) => e)
    const callsAtTimeout = request.mock.calls.length

    await sleep(100)

    expect(error).toBeInstanceOf(LoadTimeoutError)
    expect(callsAtTimeout).toBeLessThan(40)
    expect(request).toHaveBeenCalledTimes(callsAtTimeout)
    expect(signals.every((signal) => signal.aborted)).toBe(true)
  })

  it.each([
    [`users`, 0, 1],
    [`requestsPerUser`, 1, -2],
  ])(`should reject a non-positive %s`, async (_name, users, requestsPerUser) => {
    await expect(
      runLoad({
        operation: `READ`,
        users,
        requestsPerUser,
        request: () => Promise.resolve(true),
        logger: silentLogger,
      })
    ).rejects.toThrow(RangeError)
  })
})
