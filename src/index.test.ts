import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import WebSocket from 'ws'

import { parseServerConfig } from './config.js'
import { encodeSamplesBase64 } from './core/decoder.js'
import { ConfigurationError } from './core/errors.js'
import { DetectionServer } from './index.js'
import { FakeClassifier, createSilentLogger, ramp } from './testing.js'

type ServerMessage = Record<string, unknown>

/**
 * WebSocket client that queues every incoming message
 */
class TestClient {
  ws: WebSocket
  readonly closed: Promise<number>
  private messageQueue: ServerMessage[] = []
  private waiters: Array<(message: ServerMessage) => void> = []

  constructor(url: string) {
    this.ws = new WebSocket(url)
    this.closed = new Promise((resolve) => {
      this.ws.on('close', (code: number) => resolve(code))
    })
    this.ws.on('message', (data: WebSocket.RawData) => {
      const parsed: unknown = JSON.parse(data.toString())
      const message: ServerMessage = typeof parsed === 'object' && parsed !== null ? Object.fromEntries(Object.entries(parsed)) : {}
      const waiter = this.waiters.shift()
      if (waiter) {
        waiter(message)
      } else {
        this.messageQueue.push(message)
      }
    })
  }

  async waitForOpen(): Promise<void> {
    if (this.ws.readyState === WebSocket.OPEN) return
    return new Promise((resolve, reject) => {
      this.ws.once('open', () => resolve())
      this.ws.once('error', reject)
    })
  }

  nextMessage(timeoutMs = 3000): Promise<ServerMessage> {
    const queued = this.messageQueue.shift()
    if (queued) {
      return Promise.resolve(queued)
    }

    return new Promise((resolve, reject) => {
      const waiter = (message: ServerMessage): void => {
        clearTimeout(timer)
        resolve(message)
      }
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter)
        if (index >= 0) this.waiters.splice(index, 1)
        reject(new Error(`nextMessage timed out after ${timeoutMs}ms`))
      }, timeoutMs)
      this.waiters.push(waiter)
    })
  }

  sendJson(message: unknown): void {
    this.ws.send(JSON.stringify(message))
  }

  close(): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close()
    }
  }
}

describe('DetectionServer', () => {
  let server: DetectionServer
  let classifier: FakeClassifier
  let clients: TestClient[]

  const connectClient = async (clientId: string): Promise<TestClient> => {
    const client = new TestClient(`ws://127.0.0.1:${server.port}/ws/detect`)
    clients.push(client)
    await client.waitForOpen()
    client.sendJson({ type: 'connect', client_id: clientId })
    return client
  }

  beforeEach(async () => {
    classifier = new FakeClassifier()
    clients = []
    server = new DetectionServer({
      config: parseServerConfig({
        server: { host: '127.0.0.1', port: 0, heartbeatIntervalMs: 0 },
        windowing: { chunkDuration: 0.25, overlapDuration: 0, minDuration: 0 }
      }),
      classifier,
      logger: createSilentLogger()
    })
    await server.start()
  })

  afterEach(async () => {
    for (const client of clients) {
      client.close()
    }
    await server.stop()
  })

  it('streams audio and returns one verdict per window', async () => {
    const client = await connectClient('alice')
    expect(await client.nextMessage()).toMatchObject({ type: 'connected', client_id: 'alice' })

    client.sendJson({
      type: 'audio_chunk',
      audio_data: encodeSamplesBase64(ramp(8000)),
      sample_rate: 16000,
      encoding: 'base64'
    })
    client.sendJson({ type: 'stats' })

    expect(await client.nextMessage()).toMatchObject({ type: 'detection_result', client_id: 'alice' })
    expect(await client.nextMessage()).toMatchObject({ type: 'detection_result', client_id: 'alice' })
    expect(await client.nextMessage()).toMatchObject({
      type: 'stats',
      stats: { total_messages: 2, total_detections: 2, buffer_size: 0 }
    })
  })

  it('keeps the connection open after a malformed message', async () => {
    const client = await connectClient('alice')
    await client.nextMessage()

    client.sendJson({ type: 'audio_chunk', audio_data: 'not base64!!', sample_rate: 16000, encoding: 'base64' })
    client.sendJson({ type: 'ping' })

    expect(await client.nextMessage()).toMatchObject({ type: 'error', code: 'MALFORMED_PAYLOAD' })
    expect(await client.nextMessage()).toMatchObject({ type: 'pong' })
  })

  it('rejects a second connection claiming a live identity', async () => {
    const first = await connectClient('alice')
    await first.nextMessage()

    const second = await connectClient('alice')

    expect(await second.nextMessage()).toMatchObject({ type: 'error', code: 'DUPLICATE_CONNECTION' })
    expect(await second.closed).toBe(4409)

    first.sendJson({ type: 'ping' })
    expect(await first.nextMessage()).toMatchObject({ type: 'pong' })
    expect(server.snapshot().active_connections).toBe(1)
  })

  it('removes the session when the client disconnects', async () => {
    const client = await connectClient('alice')
    await client.nextMessage()
    expect(server.getRegistry().has('alice')).toBe(true)

    client.close()
    await client.closed

    await vi.waitFor(() => {
      expect(server.getRegistry().has('alice')).toBe(false)
    })
  })

  it('serves health and stats over HTTP', async () => {
    const client = await connectClient('alice')
    await client.nextMessage()

    const health = await fetch(`http://127.0.0.1:${server.port}/health`)
    expect(health.status).toBe(200)
    expect(await health.json()).toMatchObject({ status: 'healthy', model_ready: true, active_connections: 1 })

    const stats = await fetch(`http://127.0.0.1:${server.port}/stats`)
    expect(await stats.json()).toMatchObject({
      active_connections: 1,
      total_connections: 1,
      connections: { alice: { total_messages: 0 } }
    })

    const missing = await fetch(`http://127.0.0.1:${server.port}/nope`)
    expect(missing.status).toBe(404)
  })

  it('reports an unready classifier as initializing', async () => {
    classifier.ready = false

    const health = await fetch(`http://127.0.0.1:${server.port}/health`)

    expect(await health.json()).toMatchObject({ status: 'initializing', model_ready: false })
  })
})

describe('DetectionServer construction', () => {
  it('rejects windowing durations that round to an empty window', () => {
    const config = parseServerConfig({
      server: { port: 0 },
      windowing: { chunkDuration: 0.00001, overlapDuration: 0, minDuration: 0 }
    })

    expect(() => new DetectionServer({ config, classifier: new FakeClassifier(), logger: createSilentLogger() })).toThrow(
      ConfigurationError
    )
  })
})
