import { vi } from 'vitest'

import type { Logger } from './core/logger.js'
import type { OutboundMessage } from './core/protocol.js'
import type { SessionTransport } from './core/session.js'
import type { ClassifierPlugin, RawClassification } from './plugins/classifier.js'

export function createSilentLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}

export interface ClassifyCall {
  length: number
  sampleRate: number
  first: number
}

type Responder = (samples: Float32Array, sampleRate: number, signal?: AbortSignal) => Promise<RawClassification>

/**
 * In-process classifier; answers 'bonafide' at 0.8 unless told otherwise
 */
export class FakeClassifier implements ClassifierPlugin {
  readonly name = 'fake'
  ready = true
  calls: ClassifyCall[] = []
  respond: Responder = async () => ({ label: 'bonafide', score: 0.8 })

  isReady(): boolean {
    return this.ready
  }

  async classify(samples: Float32Array, sampleRate: number, signal?: AbortSignal): Promise<RawClassification> {
    this.calls.push({ length: samples.length, sampleRate, first: samples[0] ?? Number.NaN })
    return this.respond(samples, sampleRate, signal)
  }
}

/**
 * Transport that records what a session sends
 */
export class FakeTransport implements SessionTransport {
  sent: OutboundMessage[] = []
  closed: { code: number; reason: string } | null = null
  failSends = false

  send(message: OutboundMessage): void {
    if (this.failSends) {
      throw new Error('socket gone')
    }
    this.sent.push(message)
  }

  close(code: number, reason: string): void {
    if (!this.closed) {
      this.closed = { code, reason }
    }
  }

  types(): string[] {
    return this.sent.map((message) => message.type)
  }
}

export interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (error: unknown) => void
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined
  let reject: (error: unknown) => void = () => undefined
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

/**
 * Samples whose values equal their index offset by `start`
 */
export function ramp(length: number, start = 0): Float32Array {
  const samples = new Float32Array(length)
  for (let i = 0; i < length; i++) {
    samples[i] = start + i
  }
  return samples
}

export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}
