/**
 * Test fixtures for notification client tests.
 */

import { createServer } from "node:net"
import { test } from "vitest"
import { WebSocket, WebSocketServer } from "ws"
import { until } from "@todo-probe/promises"
import type { Server, Socket } from "node:net"

/**
 * Bare push channel: a WebSocket server the test drives by hand.
 */
export class PushChannel {
  readonly wss: WebSocketServer
  readonly url: string
  connections = 0

  private constructor(wss: WebSocketServer, url: string) {
    this.wss = wss
    this.url = url
    wss.on(`connection`, () => {
      this.connections++
    })
  }

  static start(): Promise<PushChannel> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port: 0, host: `127.0.0.1` })
      wss.once(`error`, reject)
      wss.once(`listening`, () => {
        const address = wss.address()
        if (typeof address === `string`) {
          reject(new Error(`Unexpected pipe address ${address}`))
          return
        }
        resolve(new PushChannel(wss, `ws://127.0.0.1:${address.port}`))
      })
    })
  }

  get openClients(): Array<WebSocket> {
    return Array.from(this.wss.clients).filter(
      (client) => client.readyState === WebSocket.OPEN
    )
  }

  broadcast(...messages: Array<string>): void {
    for (const client of this.openClients) {
      for (const message of messages) {
        client.send(message)
      }
    }
  }

  /**
   * Close every server-side socket with the given code.
   */
  disconnectAll(code: number, reason: string): void {
    for (const client of this.openClients) {
      client.close(code, reason)
    }
  }

  async stop(): Promise<void> {
    for (const client of this.wss.clients) {
      client.terminate()
    }
    await new Promise<void>((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()))
    })
  }
}

/**
 * TCP server that accepts connections and never answers the handshake.
 */
export class SilentServer {
  readonly url: string
  private server: Server
  private sockets = new Set<Socket>()

  private constructor(server: Server, url: string) {
    this.server = server
    this.url = url
    server.on(`connection`, (socket) => {
      this.sockets.add(socket)
      socket.on(`close`, () => this.sockets.delete(socket))
    })
  }

  static start(): Promise<SilentServer> {
    return new Promise((resolve, reject) => {
      const server = createServer()
      server.once(`error`, reject)
      server.listen(0, `127.0.0.1`, () => {
        const address = server.address()
        if (address === null || typeof address === `string`) {
          reject(new Error(`Unexpected server address`))
          return
        }
        resolve(new SilentServer(server, `ws://127.0.0.1:${address.port}`))
      })
    })
  }

  async stop(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy()
    }
    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()))
    })
  }
}

/**
 * Find a port nobody listens on by opening and closing a server.
 */
export async function unusedWsUrl(): Promise<string> {
  const server = await SilentServer.start()
  await server.stop()
  return server.url
}

export const testWithChannel = test.extend<{ channel: PushChannel }>({
  // eslint-disable-next-line no-empty-pattern
  channel: async ({}, use) => {
    const channel = await PushChannel.start()
    await use(channel)
    await channel.stop()
  },
})

/**
 * Wait until the channel has accepted `count` subscribers.
 */
export function waitForSubscribers(
  channel: PushChannel,
  count: number
): Promise<void> {
  return until(() => channel.openClients.length >= count, {
    timeout: 1_000,
    message: `Expected ${count} subscriber(s)`,
  })
}
