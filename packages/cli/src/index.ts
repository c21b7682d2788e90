#!/usr/bin/env tsx

import { stderr, stdout } from "node:process"
import {
  TodoApiClient,
  loadConfig,
  nextTodoId,
  silentLogger,
} from "@todo-probe/client"
import { printLoadSummary, runLoad } from "@todo-probe/harness"
import { NotificationClient } from "@todo-probe/notifications"
import { TodoTestServer } from "@todo-probe/server"
import type { Logger, SuiteConfig, TodoId } from "@todo-probe/client"
import type { LoadReport } from "@todo-probe/harness"

// Request-level debug output stays quiet on the command line
const cliLogger: Logger = {
  ...silentLogger,
  warn: console.warn,
  error: console.error,
}

function printUsage() {
  console.error(`
Usage:
  todo-probe serve [--data-dir <dir>]           Run the in-process Todo service
  todo-probe list [offset] [limit]              Print todos as JSON
  todo-probe get <id>                           Print one todo as JSON
  todo-probe create <text> [--completed]        Create a todo
  todo-probe delete <id>                        Delete a todo
  todo-probe purge                              Delete every todo
  todo-probe watch                              Print pushed notifications
  todo-probe load [users] [requestsPerUser]     Run a CREATE/READ/DELETE load

Environment Variables:
  TODO_API_URL              Base URL of the service (default: http://localhost:8080)
  TODO_WS_URL               Notification channel (default: ws://localhost:4242/ws)
  TODO_ADMIN_USERNAME       Admin user for DELETE (default: admin)
  TODO_ADMIN_PASSWORD       Admin password for DELETE (default: admin)
  TODO_REQUEST_TIMEOUT_MS   Per-request timeout (default: 10000)
  TODO_SERVER_PORT          Port for serve (default: 8080)
`)
}

function fail(message: string): never {
  stderr.write(`Error: ${message}\n`)
  process.exit(1)
}

function parseNumber(value: string | undefined, name: string): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    fail(`${name} must be a non-negative integer, got '${value ?? ``}'`)
  }
  return Number(value)
}

function parseOptionalNumber(
  value: string | undefined,
  name: string
): number | undefined {
  return value === undefined ? undefined : parseNumber(value, name)
}

function printJson(value: unknown) {
  stdout.write(`${JSON.stringify(value, null, 2)}\n`)
}

async function serve(args: Array<string>) {
  const flag = args.indexOf(`--data-dir`)
  const dataDir = flag === -1 ? undefined : args[flag + 1]
  if (flag !== -1 && !dataDir) {
    fail(`--data-dir requires a directory`)
  }

  const port = parseNumber(process.env.TODO_SERVER_PORT ?? `8080`, `TODO_SERVER_PORT`)
  const server = new TodoTestServer({ port, dataDir })

  const url = await server.start()
  console.log(`✓ Todo service running at ${url}`)
  console.log(`  Notifications: ${server.wsUrl}`)
  console.log(`\nPoint the probe at it:`)
  console.log(`  export TODO_API_URL=${url}`)
  console.log(`  export TODO_WS_URL=${server.wsUrl}`)
  console.log(`\nPress Ctrl+C to stop the server`)

  const shutdown = () => {
    console.log(`\nShutting down server...`)
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        stderr.write(`Error stopping server: ${String(error)}\n`)
        process.exit(1)
      }
    )
  }
  process.on(`SIGINT`, shutdown)
  process.on(`SIGTERM`, shutdown)
}

async function listTodos(client: TodoApiClient, args: Array<string>) {
  const offset = parseOptionalNumber(args[0], `offset`)
  const limit = parseOptionalNumber(args[1], `limit`)
  printJson(await client.fetchTodos({ offset, limit }))
}

async function getTodo(client: TodoApiClient, id: TodoId) {
  const response = await client.getTodo(id)
  if (response.status === 404) {
    fail(`todo ${id} not found`)
  }
  if (!response.ok) {
    fail(`${response.toString()}: ${response.body}`)
  }
  printJson(response.todo())
}

async function createTodo(client: TodoApiClient, args: Array<string>) {
  const completed = args.includes(`--completed`)
  const text = args.filter((arg) => arg !== `--completed`).join(` `)
  if (!text) {
    fail(`text required`)
  }
  printJson(await client.createTestTodo(text, completed))
}

async function deleteTodo(client: TodoApiClient, id: TodoId) {
  const response = await client.deleteTodo(id)
  if (response.status !== 204) {
    fail(`${response.toString()}: ${response.body}`)
  }
  console.log(`Deleted todo: ${id}`)
}

async function watch(config: SuiteConfig) {
  const notifications = NotificationClient.fromConfig(config, {
    logger: cliLogger,
    handlers: {
      onMessage: (message) => {
        stdout.write(`${message}\n`)
      },
      onClose: (code, reason) => {
        stderr.write(`Connection closed (${code}${reason ? `: ${reason}` : ``})\n`)
        process.exit(code === 1000 ? 0 : 1)
      },
    },
  })

  await notifications.connect()
  stderr.write(`Watching ${config.wsUrl}, press Ctrl+C to stop\n`)

  process.on(`SIGINT`, () => {
    notifications.close().then(
      () => process.exit(0),
      () => process.exit(1)
    )
  })
}

async function load(client: TodoApiClient, args: Array<string>) {
  const users = parseOptionalNumber(args[0], `users`) ?? 10
  const requestsPerUser = parseOptionalNumber(args[1], `requestsPerUser`) ?? 10
  const ids = new Map<string, TodoId>()
  const key = (user: number, iteration: number) => `${user}:${iteration}`
  const reports: Array<LoadReport> = []

  reports.push(
    await runLoad({
      operation: `CREATE`,
      users,
      requestsPerUser,
      logger: cliLogger,
      request: async (user, iteration) => {
        const id = nextTodoId()
        const response = await client.createTodo({
          id,
          text: `Load ${user}-${iteration}`,
          completed: false,
        })
        if (response.status !== 201) return false
        ids.set(key(user, iteration), id)
        return true
      },
    })
  )

  reports.push(
    await runLoad({
      operation: `READ`,
      users,
      requestsPerUser,
      logger: cliLogger,
      request: async (user, iteration) => {
        const id = ids.get(key(user, iteration))
        return id !== undefined && (await client.getTodo(id)).status === 200
      },
    })
  )

  reports.push(
    await runLoad({
      operation: `DELETE`,
      users,
      requestsPerUser,
      logger: cliLogger,
      request: async (user, iteration) => {
        const id = ids.get(key(user, iteration))
        return id !== undefined && (await client.deleteTodo(id)).status === 204
      },
    })
  )

  printLoadSummary(reports)
}

async function main() {
  const args = process.argv.slice(2)

  if (args.length < 1) {
    printUsage()
    process.exit(1)
  }

  const command = args[0]
  const rest = args.slice(1)

  if (command === `serve`) {
    await serve(rest)
    return
  }

  const config = loadConfig()
  const client = TodoApiClient.fromConfig(config, { logger: cliLogger })

  switch (command) {
    case `list`:
      await listTodos(client, rest)
      break

    case `get`:
      await getTodo(client, parseNumber(rest[0], `id`))
      break

    case `create`:
      await createTodo(client, rest)
      break

    case `delete`:
      await deleteTodo(client, parseNumber(rest[0], `id`))
      break

    case `purge`: {
      const deleted = await client.cleanUpAllTodos()
      console.log(`Deleted ${deleted} todo(s)`)
      break
    }

    case `watch`:
      await watch(config)
      break

    case `load`:
      await load(client, rest)
      break

    default:
      stderr.write(`Error: unknown command '${command}'\n`)
      printUsage()
      process.exit(1)
  }
}

main().catch((error: unknown) => {
  stderr.write(
    `Fatal error: ${error instanceof Error ? error.message : String(error)}\n`
  )
  process.exit(1)
})
