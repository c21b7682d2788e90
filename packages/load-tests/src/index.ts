/**
 * Load tests for Todo service implementations
 * Drives CREATE, READ, UPDATE and DELETE from concurrent virtual users
 *
 * Success Criteria:
 * - Success rate at or above minSuccessRate for every operation
 * - The listing reflects every successful write afterwards
 */

import { writeFileSync } from "node:fs"
import { afterAll, beforeAll, describe, expect, test } from "vitest"
import { TodoApiClient, nextTodoId } from "@todo-probe/client"
import { printLoadSummary, runLoad } from "@todo-probe/harness"
import type { Logger, Todo } from "@todo-probe/client"
import type { LoadReport } from "@todo-probe/harness"

export interface LoadTestOptions {
  /** Base URL of the service under load */
  baseUrl: string
  adminUsername?: string
  adminPassword?: string
  /** Concurrent virtual users. Default: 10 */
  users?: number
  /** Sequential requests per user. Default: 10 */
  requestsPerUser?: number
  /** Percentage of requests that must succeed. Default: 100 */
  minSuccessRate?: number
  /** Upper bound per operation. Default: 30000 */
  timeoutMs?: number
  /** Where to write the reports as JSON; nothing is written when omitted */
  resultsFile?: string
  /** Environment name (e.g., "production", "local") */
  environment?: string
  logger?: Logger
}

/**
 * Run the load suite against a service
 */
export function runLoadTests(options: LoadTestOptions): void {
  const users = options.users ?? 10
  const requestsPerUser = options.requestsPerUser ?? 10
  const minSuccessRate = options.minSuccessRate ?? 100
  const timeoutMs = options.timeoutMs ?? 30_000
  const logger = options.logger ?? console
  const totalRequests = users * requestsPerUser

  const reports: Array<LoadReport> = []
  // Todos created under load, keyed by `${user}:${iteration}`
  const created = new Map<string, Todo>()
  const key = (user: number, iteration: number) => `${user}:${iteration}`

  describe(`Load - ${users} users x ${requestsPerUser} requests`, () => {
    let client: TodoApiClient

    const load = async (
      operation: string,
      request: (user: number, iteration: number) => Promise<boolean>
    ): Promise<LoadReport> => {
      const report = await runLoad({
        operation,
        users,
        requestsPerUser,
        timeoutMs,
        request,
        logger,
      })
      reports.push(report)
      expect(
        report.successRate,
        `${operation} success rate`
      ).toBeGreaterThanOrEqual(minSuccessRate)
      return report
    }

    beforeAll(async () => {
      client = new TodoApiClient({
        baseUrl: options.baseUrl,
        credentials: {
          username: options.adminUsername ?? `admin`,
          password: options.adminPassword ?? `admin`,
        },
        logger,
      })
      await client.cleanUpAllTodos()
    })

    afterAll(async () => {
      await client.cleanUpAllTodos()
      if (reports.length === 0) return

      printLoadSummary(reports, logger)

      if (options.resultsFile) {
        const output = {
          environment: options.environment ?? `unknown`,
          baseUrl: options.baseUrl,
          timestamp: new Date().toISOString(),
          results: reports,
        }
        writeFileSync(
          options.resultsFile,
          JSON.stringify(output, null, 2),
          `utf-8`
        )
        logger.info(`[LoadTests] Results saved to ${options.resultsFile}`)
      }
    })

    test(
      `CREATE`,
      async () => {
        const report = await load(`CREATE`, async (user, iteration) => {
          const todo: Todo = {
            id: nextTodoId(),
            text: `Load ${user}-${iteration}`,
            completed: false,
          }
          const response = await client.createTodo(todo)
          if (response.status !== 201) return false
          created.set(key(user, iteration), todo)
          return true
        })

        expect(report.totalRequests).toBe(totalRequests)
        expect(await client.fetchTodos()).toHaveLength(
          report.successfulRequests
        )
      },
      timeoutMs + 5_000
    )

    test(
      `READ`,
      async () => {
        await load(`READ`, async (user, iteration) => {
          const todo = created.get(key(user, iteration))
          if (!todo) return false
          const response = await client.getTodo(todo.id)
          return response.status === 200 && response.todo().id === todo.id
        })
      },
      timeoutMs + 5_000
    )

    test(
      `UPDATE`,
      async () => {
        await load(`UPDATE`, async (user, iteration) => {
          const todo = created.get(key(user, iteration))
          if (!todo) return false
          const response = await client.updateTodo(todo.id, {
            ...todo,
            completed: true,
          })
          return response.status === 200
        })

        const todos = await client.fetchTodos()
        expect(todos.filter((todo) => !todo.completed)).toEqual([])
      },
      timeoutMs + 5_000
    )

    test(
      `DELETE`,
      async () => {
        await load(`DELETE`, async (user, iteration) => {
          const todo = created.get(key(user, iteration))
          if (!todo) return false
          const response = await client.deleteTodo(todo.id)
          return response.status === 204
        })

        expect(await client.fetchTodos()).toEqual([])
      },
      timeoutMs + 5_000
    )
  })
}
