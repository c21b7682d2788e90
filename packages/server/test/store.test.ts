/**
 * Tests for the in-memory and file-backed todo stores.
 */

import * as fs from "node:fs"
import * as path from "node:path"
import { tmpdir } from "node:os"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import {
  FileBackedTodoStore,
  TodoConflictError,
  TodoNotFoundError,
  TodoStore,
  paginate,
} from "../src"
import type { TodoRepository } from "../src"
import { silentLogger } from "@todo-probe/client"

describe(`paginate`, () => {
  const items = [1, 2, 3, 4, 5]

  it(`should return everything without options`, () => {
    expect(paginate(items)).toEqual([1, 2, 3, 4, 5])
  })

  it(`should apply offset and limit`, () => {
    expect(paginate(items, { offset: 1, limit: 2 })).toEqual([2, 3])
  })

  it(`should return nothing past the end`, () => {
    expect(paginate(items, { offset: 10 })).toEqual([])
  })

  it(`should allow a zero limit`, () => {
    expect(paginate(items, { limit: 0 })).toEqual([])
  })
})

// ============================================================================
// Shared behaviour
// ============================================================================

function storeContract(name: string, createStore: () => TodoRepository) {
  describe(name, () => {
    let store: TodoRepository

    beforeEach(() => {
      store = createStore()
    })

    afterEach(async () => {
      await store.close()
    })

    it(`should create and read a todo`, () => {
      store.create({ id: 1, text: `a`, completed: false })

      expect(store.get(1)).toEqual({ id: 1, text: `a`, completed: false })
      expect(store.has(1)).toBe(true)
      expect(store.size).toBe(1)
    })

    it(`should reject a duplicate id`, () => {
      store.create({ id: 1, text: `a`, completed: false })

      expect(() => store.create({ id: 1, text: `b`, completed: true })).toThrow(
        TodoConflictError
      )
      expect(store.get(1)?.text).toBe(`a`)
    })

    it(`should update an existing todo`, () => {
      store.create({ id: 1, text: `a`, completed: false })
      store.update({ id: 1, text: `b`, completed: true })

      expect(store.get(1)).toEqual({ id: 1, text: `b`, completed: true })
    })

    it(`should reject an update of an unknown todo`, () => {
      expect(() => store.update({ id: 9, text: `x`, completed: false })).toThrow(
        TodoNotFoundError
      )
    })

    it(`should delete a todo once`, () => {
      store.create({ id: 1, text: `a`, completed: false })

      expect(store.delete(1)).toBe(true)
      expect(store.delete(1)).toBe(false)
      expect(store.get(1)).toBeUndefined()
    })

    it(`should paginate the listing`, () => {
      store.create({ id: 1, text: `a`, completed: false })
      store.create({ id: 2, text: `b`, completed: false })
      store.create({ id: 3, text: `c`, completed: false })

      expect(store.list({ offset: 1, limit: 1 })).toEqual([
        { id: 2, text: `b`, completed: false },
      ])
    })

    it(`should clear everything`, () => {
      store.create({ id: 1, text: `a`, completed: false })
      store.create({ id: 2, text: `b`, completed: false })
      store.clear()

      expect(store.size).toBe(0)
      expect(store.list()).toEqual([])
    })

    it(`should not expose stored objects`, () => {
      const todo = { id: 1, text: `a`, completed: false }
      store.create(todo)
      todo.text = `changed`

      const read = store.get(1)
      if (read) read.completed = true

      expect(store.get(1)).toEqual({ id: 1, text: `a`, completed: false })
    })
  })
}

storeContract(`TodoStore`, () => new TodoStore())

const dataDirs: Array<string> = []

afterEach(() => {
  for (const dir of dataDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true })
  }
})

function makeDataDir(): string {
  const dir = fs.mkdtempSync(path.join(tmpdir(), `todo-store-test-`))
  dataDirs.push(dir)
  return dir
}

storeContract(
  `FileBackedTodoStore`,
  () =>
    new FileBackedTodoStore({ dataDir: makeDataDir(), logger: silentLogger })
)

// ============================================================================
// Ordering
// ============================================================================

describe(`ordering`, () => {
  it(`should list the in-memory store in insertion order`, () => {
    const store = new TodoStore()
    store.create({ id: 3, text: `c`, completed: false })
    store.create({ id: 1, text: `a`, completed: false })
    store.update({ id: 3, text: `c2`, completed: true })

    expect(store.list().map((todo) => todo.id)).toEqual([3, 1])
  })

  it(`should list the file-backed store in id order`, async () => {
    const store = new FileBackedTodoStore({
      dataDir: makeDataDir(),
      logger: silentLogger,
    })
    store.create({ id: 30, text: `c`, completed: false })
    store.create({ id: 4, text: `a`, completed: false })
    store.create({ id: 200, text: `b`, completed: false })

    expect(store.list().map((todo) => todo.id)).toEqual([4, 30, 200])
    await store.close()
  })
})

describe(`FileBackedTodoStore persistence`, () => {
  it(`should keep todos across a reopen`, async () => {
    const dataDir = makeDataDir()

    const first = new FileBackedTodoStore({ dataDir, logger: silentLogger })
    first.create({ id: 1, text: `persisted`, completed: true })
    await first.close()

    const second = new FileBackedTodoStore({ dataDir, logger: silentLogger })
    expect(second.list()).toEqual([
      { id: 1, text: `persisted`, completed: true },
    ])
    await second.close()
  })
})
