import { describe, expect, it } from "vitest"
import {
  isNewTodoNotification,
  newTodoNotifications,
  parseNotification,
} from "../src"

describe(`parseNotification`, () => {
  it(`should decode a new_todo message`, () => {
    expect(
      parseNotification(
        `{"type":"new_todo","id":12,"text":"Buy milk","completed":false}`
      )
    ).toEqual({ type: `new_todo`, id: 12, text: `Buy milk`, completed: false })
  })

  it.each([
    [`malformed JSON`, `{"type":`],
    [`another type`, `{"type":"deleted","id":1,"text":"a","completed":false}`],
    [`a missing field`, `{"type":"new_todo","id":1,"completed":false}`],
    [`a plain string`, `"new_todo"`],
  ])(`should return null for %s`, (_label, message) => {
    expect(parseNotification(message)).toBeNull()
  })
})

describe(`isNewTodoNotification`, () => {
  it(`should require the type discriminator`, () => {
    expect(isNewTodoNotification({ id: 1, text: `a`, completed: false })).toBe(
      false
    )
  })
})

describe(`newTodoNotifications`, () => {
  it(`should keep notifications and skip everything else`, () => {
    expect(
      newTodoNotifications([
        `hello`,
        `{"type":"new_todo","id":1,"text":"a","completed":true}`,
      ])
    ).toEqual([{ type: `new_todo`, id: 1, text: `a`, completed: true }])
  })
})
