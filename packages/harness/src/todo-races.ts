/**
 * Ready-made races against the Todo API.
 */

import { STATUS_CREATED, nextTodoId } from "@todo-probe/client"
import { race } from "./race"
import type {
  ApiResponse,
  Logger,
  Todo,
  TodoApiClient,
  TodoId,
} from "@todo-probe/client"
import type { RaceResult } from "./race"

export interface TodoRaceOptions {
  /**
   * Number of concurrent actors. Default: 5.
   */
  actors?: number

  /**
   * Text prefix; actor `i` sends `${textPrefix} ${i}`.
   */
  textPrefix?: string

  joinTimeoutMs?: number
  logger?: Logger
}

export interface SameIdRaceOptions extends TodoRaceOptions {
  /**
   * Contested id. A fresh one is issued when omitted.
   */
  id?: TodoId
}

export interface SameIdRace extends RaceResult<ApiResponse> {
  id: TodoId
}

export interface DistinctIdRace extends RaceResult<ApiResponse> {
  /**
   * What each actor submitted, indexed by actor.
   */
  todos: Array<Todo>
}

export const DEFAULT_RACE_ACTORS = 5

const isCreated = (response: ApiResponse): boolean =>
  response.status === STATUS_CREATED

/**
 * Every actor POSTs a todo with the same id.
 * Afterwards the service must hold exactly one todo with that id.
 */
export async function raceCreateSameId(
  client: TodoApiClient,
  opts: SameIdRaceOptions = {}
): Promise<SameIdRace> {
  const id = opts.id ?? nextTodoId()
  const textPrefix = opts.textPrefix ?? `Concurrent Todo`

  const result = await race({
    actors: opts.actors ?? DEFAULT_RACE_ACTORS,
    attempt: (actor) =>
      client.createTodo({ id, text: `${textPrefix} ${actor}`, completed: false }),
    isAccepted: isCreated,
    joinTimeoutMs: opts.joinTimeoutMs,
    logger: opts.logger,
  })

  return { ...result, id }
}

/**
 * Every actor POSTs its own todo with a distinct id and text.
 * Afterwards every submitted todo must exist with its actor's text.
 */
export async function raceCreateDistinctIds(
  client: TodoApiClient,
  opts: TodoRaceOptions = {}
): Promise<DistinctIdRace> {
  const actors = opts.actors ?? DEFAULT_RACE_ACTORS
  const textPrefix = opts.textPrefix ?? `Todo`

  const todos: Array<Todo> = []
  for (let actor = 0; actor < actors; actor++) {
    todos.push({ id: nextTodoId(), text: `${textPrefix} ${actor}`, completed: false })
  }

  const result = await race({
    actors,
    attempt: (actor) => {
      const todo = todos[actor]
      if (!todo) {
        return Promise.reject(new RangeError(`No todo for actor ${actor}`))
      }
      return client.createTodo(todo)
    },
    isAccepted: isCreated,
    joinTimeoutMs: opts.joinTimeoutMs,
    logger: opts.logger,
  })

  return { ...result, todos }
}
