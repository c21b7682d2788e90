/**
 * Contract test suite for Todo service implementations
 *
 * This package provides a standardized test suite that can be run against
 * any Todo service to verify the HTTP contract, the push-notification
 * channel and behaviour under concurrent writes.
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest"
import {
  TodoApiClient,
  basicAuthHeader,
  createCustomTodo,
  createDefaultTodo,
  createTodoWithText,
  nextTodoId,
  silentLogger,
  uniqueText,
} from "@todo-probe/client"
import { race, raceCreateDistinctIds, raceCreateSameId } from "@todo-probe/harness"
import { NotificationClient } from "@todo-probe/notifications"
import {
  MISSING_TODO_ID,
  notificationsFor,
  verifyMultipleTodosExist,
  verifyNegativeScenario,
  verifySingleTodo,
  verifyTodoExists,
  verifyTodoExistsById,
  verifyTodoMissing,
} from "./support"
import type { Logger, Todo } from "@todo-probe/client"

export interface TodoContractTestOptions {
  /** Base URL of the service to test */
  baseUrl: string
  /** URL of its push-notification channel */
  wsUrl: string
  adminUsername?: string
  adminPassword?: string
  /** Actors per race. Default: 5 */
  raceActors?: number
  /** How long to wait for an expected push. Default: 1000 */
  notificationTimeoutMs?: number
  /** How long to watch for an unexpected push. Default: 2000 */
  quietPeriodMs?: number
  /** Defaults to a silent logger */
  logger?: Logger
}

export {
  MISSING_TODO_ID,
  notificationsFor,
  verifyMultipleTodosExist,
  verifyNegativeScenario,
  verifySingleTodo,
  verifyTodoExists,
  verifyTodoExistsById,
  verifyTodoMissing,
} from "./support"

/**
 * Run the full contract test suite against a service
 */
export function runTodoContractTests(options: TodoContractTestOptions): void {
  // Access options directly instead of destructuring to support
  // mutable config objects (needed for dynamic port assignment)
  const getBaseUrl = () => options.baseUrl
  const logger = options.logger ?? silentLogger
  const actors = options.raceActors ?? 5
  const notificationTimeoutMs = options.notificationTimeoutMs ?? 1_000
  const quietPeriodMs = options.quietPeriodMs ?? 2_000
  const notificationSeconds = notificationTimeoutMs / 1_000
  const quietSeconds = quietPeriodMs / 1_000
  const notificationTestTimeout = notificationTimeoutMs + quietPeriodMs + 5_000

  const createClient = (): TodoApiClient =>
    new TodoApiClient({
      baseUrl: getBaseUrl(),
      credentials: {
        username: options.adminUsername ?? `admin`,
        password: options.adminPassword ?? `admin`,
      },
      logger,
    })

  describe(`Todo API contract`, () => {
    let client: TodoApiClient

    beforeEach(async () => {
      client = createClient()
      await client.cleanUpAllTodos()
    })

    afterEach(async () => {
      await client.cleanUpAllTodos()
    })

    // ============================================================================
    // Listing
    // ============================================================================

    describe(`GET /todos`, () => {
      test(`should return an empty JSON list`, async () => {
        const response = await client.listTodos()

        expect(response.status).toBe(200)
        expect(response.contentType).toBe(`application/json`)
        expect(response.header(`date`)).toBeDefined()
        expect(response.todos()).toEqual([])
      })

      test(`should list created todos`, async () => {
        const texts = [uniqueText(`First`), uniqueText(`Second`), uniqueText(`Third`)]
        for (const text of texts) {
          await client.createTestTodo(text)
        }

        await verifyMultipleTodosExist(client, texts)
        expect(await client.fetchTodos()).toHaveLength(3)
      })

      test(`should paginate with offset and limit`, async () => {
        for (let i = 0; i < 3; i++) {
          await client.createTestTodo(uniqueText(`Page`))
        }
        const all = await client.fetchTodos()

        expect(await client.fetchTodos({ limit: 2 })).toEqual(all.slice(0, 2))
        expect(await client.fetchTodos({ offset: 1, limit: 1 })).toEqual(
          all.slice(1, 2)
        )
        expect(await client.fetchTodos({ offset: 10 })).toEqual([])
      })

      test(`should reject a non-numeric offset`, async () => {
        const response = await client.listTodosWithParams({ offset: `abc` })
        expect(response.status).toBe(400)
      })

      test(`should reject a negative limit`, async () => {
        const response = await client.listTodosWithParams({ limit: `-1` })
        expect(response.status).toBe(400)
      })
    })

    // ============================================================================
    // Single todo
    // ============================================================================

    describe(`GET /todos/{id}`, () => {
      test(`should return an existing todo`, async () => {
        const todo = await client.createTestTodo(uniqueText(`Read`), true)

        const response = await client.getTodo(todo.id)

        expect(response.status).toBe(200)
        expect(response.contentType).toBe(`application/json`)
        expect(response.todo()).toEqual(todo)
      })

      test(`should return 404 for an unknown id`, async () => {
        const response = await client.getTodo(MISSING_TODO_ID)
        expect(response.status).toBe(404)
      })
    })

    // ============================================================================
    // Creation
    // ============================================================================

    describe(`POST /todos`, () => {
      test(`should create a todo with 201`, async () => {
        const todo = createDefaultTodo()

        const response = await client.createTodo(todo)

        expect(response.status).toBe(201)
        await verifyTodoExistsById(client, todo)
      })

      test(`should create a completed todo`, async () => {
        const text = uniqueText(`Done`)
        const response = await client.createTodo(createCustomTodo(text, true))

        expect(response.status).toBe(201)
        await verifyTodoExists(client, text, true)
      })

      test(`should reject a duplicate id and keep the original`, async () => {
        const original = createTodoWithText(uniqueText(`Original`))
        expect((await client.createTodo(original)).status).toBe(201)

        const response = await client.createTodo({
          ...original,
          text: `Duplicate`,
        })

        await verifyNegativeScenario(client, response, 400, [original])
      })

      test(`should reject a todo without text`, async () => {
        const response = await client.createTodo({
          id: nextTodoId(),
          completed: false,
        })
        await verifyNegativeScenario(client, response, 400, [])
      })

      test(`should reject a todo without completed`, async () => {
        const response = await client.createTodo({
          id: nextTodoId(),
          text: uniqueText(`Incomplete`),
        })
        await verifyNegativeScenario(client, response, 400, [])
      })

      test(`should reject a todo without id`, async () => {
        const response = await client.createTodo({
          text: uniqueText(`Anonymous`),
          completed: false,
        })
        await verifyNegativeScenario(client, response, 400, [])
      })

      test(`should reject a mistyped field`, async () => {
        const response = await client.createTodoRaw({
          id: `not-a-number`,
          text: uniqueText(`Mistyped`),
          completed: `no`,
        })
        await verifyNegativeScenario(client, response, 400, [])
      })

      test(`should reject malformed JSON`, async () => {
        const response = await fetch(`${getBaseUrl()}/todos`, {
          method: `POST`,
          headers: { "content-type": `application/json` },
          body: `{"id": 1, "text": `,
        })

        expect(response.status).toBe(400)
        expect(await client.fetchTodos()).toEqual([])
      })
    })

    // ============================================================================
    // Update
    // ============================================================================

    describe(`PUT /todos/{id}`, () => {
      test(`should update text and completion`, async () => {
        const todo = await client.createTestTodo(uniqueText(`Before`))
        const updated: Todo = { ...todo, text: uniqueText(`After`), completed: true }

        const response = await client.updateTodo(todo.id, updated)

        expect(response.status).toBe(200)
        await verifyTodoExistsById(client, updated)
      })

      test(`should toggle completion only`, async () => {
        const todo = await client.createTestTodo(uniqueText(`Toggle`), true)

        const response = await client.updateTodo(todo.id, {
          ...todo,
          completed: false,
        })

        expect(response.status).toBe(200)
        await verifyTodoExists(client, todo.text, false)
      })

      test(`should reject a body without id`, async () => {
        const todo = await client.createTestTodo(uniqueText(`Keep`))

        const response = await client.updateTodoRaw(todo.id, {
          text: `Changed`,
          completed: true,
        })

        await verifyNegativeScenario(client, response, 400, [todo])
      })

      test(`should validate the body before looking the todo up`, async () => {
        const response = await client.updateTodoRaw(0, {
          text: `Changed`,
          completed: true,
        })
        expect(response.status).toBe(400)
      })

      test(`should reject a body id that differs from the path id`, async () => {
        const todo = await client.createTestTodo(uniqueText(`Mismatch`))

        const response = await client.updateTodo(todo.id, {
          ...todo,
          id: nextTodoId(),
          text: `Changed`,
        })

        await verifyNegativeScenario(client, response, 400, [todo])
      })

      test(`should return 404 for an unknown todo`, async () => {
        const todo = createTodoWithText(uniqueText(`Ghost`))

        const response = await client.updateTodo(todo.id, todo)

        await verifyNegativeScenario(client, response, 404, [])
      })
    })

    // ============================================================================
    // Deletion
    // ============================================================================

    describe(`DELETE /todos/{id}`, () => {
      test(`should delete with admin credentials`, async () => {
        const todo = await client.createTestTodo(uniqueText(`Delete`))

        const response = await client.deleteTodo(todo.id)

        expect(response.status).toBe(204)
        await verifyTodoMissing(client, todo.id)
      })

      test(`should return 401 without credentials`, async () => {
        const todo = await client.createTestTodo(uniqueText(`Protected`))

        const response = await client.deleteTodoWithoutAuth(todo.id)

        await verifyNegativeScenario(client, response, 401, [todo])
      })

      test(`should return 401 with wrong credentials`, async () => {
        const todo = await client.createTestTodo(uniqueText(`Protected`))

        const response = await client.deleteTodoWithAuthorization(
          todo.id,
          basicAuthHeader(`invalid`, `invalid`)
        )

        await verifyNegativeScenario(client, response, 401, [todo])
      })

      test(`should return 404 for an unknown id`, async () => {
        const response = await client.deleteTodo(MISSING_TODO_ID)
        expect(response.status).toBe(404)
      })

      test(`should return 404 for a negative id`, async () => {
        const response = await client.deleteTodo(-1)
        expect(response.status).toBe(404)
      })
    })

    // ============================================================================
    // Notifications
    // ============================================================================

    describe(`Notifications`, () => {
      let notifications: NotificationClient

      beforeEach(async () => {
        notifications = new NotificationClient({ url: options.wsUrl, logger })
        await notifications.connect()
      })

      afterEach(async () => {
        await notifications.close()
      })

      test(
        `should push one new_todo message per creation`,
        async () => {
          const todo = createTodoWithText(uniqueText(`Notify`))
          const arrived = notifications.waitForMessages(1, notificationSeconds)

          expect((await client.createTodo(todo)).status).toBe(201)

          expect(await arrived).toBe(true)
          expect(
            notificationsFor(notifications.getReceivedMessages(), todo.id)
          ).toEqual([{ type: `new_todo`, ...todo }])
        },
        notificationTestTimeout
      )

      test(
        `should push a message for each of several creations`,
        async () => {
          const todos = [1, 2, 3].map(() => createTodoWithText(uniqueText(`Batch`)))
          const arrived = notifications.waitForMessages(todos.length, 5)

          for (const todo of todos) {
            await client.createTodo(todo)
          }

          expect(await arrived).toBe(true)
          const messages = notifications.getReceivedMessages()
          expect(messages.length).toBeGreaterThanOrEqual(3)
          for (const todo of todos) {
            expect(notificationsFor(messages, todo.id)).toHaveLength(1)
          }
        },
        notificationTestTimeout + 5_000
      )

      test(
        `should push nothing on update`,
        async () => {
          const todo = createTodoWithText(uniqueText(`Quiet`))
          const created = notifications.waitForMessages(1, notificationSeconds)
          await client.createTodo(todo)
          expect(await created).toBe(true)
          notifications.clearMessages()

          const pushed = notifications.waitForMessages(1, quietSeconds)
          const response = await client.updateTodo(todo.id, {
            ...todo,
            completed: true,
          })

          expect(response.status).toBe(200)
          expect(await pushed).toBe(false)
          expect(notifications.getReceivedMessages()).toEqual([])
        },
        notificationTestTimeout
      )

      test(
        `should push nothing on delete`,
        async () => {
          const todo = createTodoWithText(uniqueText(`Quiet`))
          const created = notifications.waitForMessages(1, notificationSeconds)
          await client.createTodo(todo)
          expect(await created).toBe(true)
          notifications.clearMessages()

          const pushed = notifications.waitForMessages(1, quietSeconds)
          const response = await client.deleteTodo(todo.id)

          expect(response.status).toBe(204)
          expect(await pushed).toBe(false)
          expect(notifications.getReceivedMessages()).toEqual([])
        },
        notificationTestTimeout
      )

      test(
        `should resume receiving after reconnect and connect`,
        async () => {
          const first = notifications.waitForMessages(1, notificationSeconds)
          await client.createTodo(createTodoWithText(uniqueText(`Before`)))
          expect(await first).toBe(true)

          await notifications.reconnect()

          expect(notifications.isConnected()).toBe(false)
          expect(notifications.getReceivedMessages()).toEqual([])

          await notifications.connect()
          const todo = createTodoWithText(uniqueText(`After`))
          const second = notifications.waitForMessages(1, notificationSeconds)
          await client.createTodo(todo)

          expect(await second).toBe(true)
          expect(
            notificationsFor(notifications.getReceivedMessages(), todo.id)
          ).toHaveLength(1)
        },
        notificationTestTimeout
      )
    })

    // ============================================================================
    // Concurrency
    // ============================================================================

    describe(`Concurrency`, () => {
      test(`should keep exactly one todo when actors create the same id`, async () => {
        const result = await raceCreateSameId(client, { actors, logger })

        expect(result.outcomes).toHaveLength(actors)
        await verifySingleTodo(client, result.id)
      })

      test(`should keep every todo when actors create distinct ids`, async () => {
        const result = await raceCreateDistinctIds(client, { actors, logger })

        expect(result.outcomes).toHaveLength(actors)
        for (const todo of result.todos) {
          await verifyTodoExistsById(client, todo)
        }
        expect(await client.fetchTodos()).toHaveLength(actors)
      })

      test(`should leave one of the concurrent updates in place`, async () => {
        const todo = await client.createTestTodo(uniqueText(`Contested`))
        const variants: Array<Todo> = Array.from({ length: actors }, (_, i) => ({
          id: todo.id,
          text: `${todo.text} v${i}`,
          completed: i % 2 === 0,
        }))

        const result = await race({
          actors,
          attempt: (actor) =>
            client.updateTodo(todo.id, variants[actor] ?? todo),
          isAccepted: (response) => response.status === 200,
          logger,
        })

        expect(result.outcomes).toHaveLength(actors)
        const stored = await verifySingleTodo(client, todo.id)
        expect(variants).toContainEqual(stored)
      })

      test(`should leave a contested todo deleted`, async () => {
        const todo = await client.createTestTodo(uniqueText(`Doomed`))

        const result = await race({
          actors,
          attempt: () => client.deleteTodo(todo.id),
          isAccepted: (response) => response.status === 204,
          logger,
        })

        expect(result.outcomes).toHaveLength(actors)
        await verifyTodoMissing(client, todo.id)
      })
    })
  })
}

