/**
 * Test fixtures for integration tests.
 * Each test gets a fresh in-process Todo service via test.extend().
 */

import { test } from "vitest"
import { TodoTestServer } from "@todo-probe/server"
import { TodoApiClient, silentLogger } from "../../src"
import type { TodoStore, FileBackedTodoStore } from "@todo-probe/server"

/**
 * Base test fixture with server, store and a client pointed at it.
 */
export const testWithServer = test.extend<{
  server: TodoTestServer
  store: TodoStore | FileBackedTodoStore
  baseUrl: string
  client: TodoApiClient
}>({
  // Server fixture - creates a new server for each test
  // eslint-disable-next-line no-empty-pattern
  server: async ({}, use) => {
    const server = new TodoTestServer({ port: 0, logger: silentLogger }) // Random port
    await server.start()
    await use(server)
    await server.stop()
  },

  // Store fixture - direct access to the store
  store: async ({ server }, use) => {
    await use(server.store)
  },

  baseUrl: async ({ server }, use) => {
    await use(server.url)
  },

  client: async ({ baseUrl }, use) => {
    await use(
      new TodoApiClient({
        baseUrl,
        credentials: { username: `admin`, password: `admin` },
        logger: silentLogger,
      })
    )
  },
})
