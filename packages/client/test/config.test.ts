import { describe, expect, it } from "vitest"
import {
  DEFAULT_CONFIG,
  InvalidConfigError,
  defineConfig,
  loadConfig,
} from "../src"

describe(`defineConfig`, () => {
  it(`should fall back to the defaults`, () => {
    expect(defineConfig()).toEqual({
      baseUrl: `http://localhost:8080`,
      wsUrl: `ws://localhost:4242/ws`,
      adminUsername: `admin`,
      adminPassword: `admin`,
      requestTimeoutMs: 10_000,
    })
  })

  it(`should return a frozen value`, () => {
    expect(Object.isFrozen(defineConfig())).toBe(true)
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true)
  })

  it(`should strip trailing slashes from URLs`, () => {
    const config = defineConfig({
      baseUrl: `http://127.0.0.1:3000/`,
      wsUrl: `ws://127.0.0.1:3000/ws/`,
    })
    expect(config.baseUrl).toBe(`http://127.0.0.1:3000`)
    expect(config.wsUrl).toBe(`ws://127.0.0.1:3000/ws`)
  })

  it(`should ignore undefined overrides`, () => {
    expect(defineConfig({ baseUrl: undefined }).baseUrl).toBe(
      `http://localhost:8080`
    )
  })

  it(`should reject an invalid URL`, () => {
    expect(() => defineConfig({ baseUrl: `not a url` })).toThrow(
      `Invalid configuration for baseUrl: "not a url" is not a valid URL`
    )
  })

  it(`should reject a URL with the wrong scheme`, () => {
    expect(() => defineConfig({ wsUrl: `http://localhost/ws` })).toThrow(
      `Invalid configuration for wsUrl: expected ws: or wss: URL, got "http://localhost/ws"`
    )
  })

  it(`should reject a non-positive timeout`, () => {
    expect(() => defineConfig({ requestTimeoutMs: 0 })).toThrow(
      InvalidConfigError
    )
  })
})

describe(`loadConfig`, () => {
  it(`should read the environment`, () => {
    const config = loadConfig({
      TODO_API_URL: `http://todo.test:9000`,
      TODO_WS_URL: `ws://todo.test:9001/ws`,
      TODO_ADMIN_USERNAME: `root`,
      TODO_ADMIN_PASSWORD: `test-secret`,
      TODO_REQUEST_TIMEOUT_MS: `2500`,
    })

    expect(config).toEqual({
      baseUrl: `http://todo.test:9000`,
      wsUrl: `ws://todo.test:9001/ws`,
      adminUsername: `root`,
      adminPassword: `test-secret`,
      requestTimeoutMs: 2500,
    })
  })

  it(`should treat empty variables as unset`, () => {
    expect(loadConfig({ TODO_API_URL: `  ` }).baseUrl).toBe(
      `http://localhost:8080`
    )
  })

  it(`should prefer overrides over the environment`, () => {
    const config = loadConfig(
      { TODO_API_URL: `http://todo.test:9000` },
      { baseUrl: `http://127.0.0.1:1234` }
    )
    expect(config.baseUrl).toBe(`http://127.0.0.1:1234`)
  })

  it(`should reject a non-numeric timeout`, () => {
    const error = (() => {
      try {
        loadConfig({ TODO_REQUEST_TIMEOUT_MS: `soon` })
        return undefined
      } catch (e) {
        return e
      }
    })()

    expect(error).toBeInstanceOf(InvalidConfigError)
    expect(error).toMatchObject({ key: `TODO_REQUEST_TIMEOUT_MS` })
  })
})
