import { randomUUID } from 'node:crypto'

import type { CloseReason, SessionPhase, SessionStats, WindowingDurations } from '../types/index.js'
import { assertSampleRate, decodeSamples, validateSampleRate } from './decoder.js'
import type { DetectionInvoker } from './detection.js'
import {
  DetectionCancelledError,
  DetectionServerError,
  ProtocolViolationError,
  errorMessage
} from './errors.js'
import type { Logger } from './logger.js'
import {
  makeConnected,
  makeDetectionResult,
  makeError,
  makePong,
  makeStats,
  parseInboundMessage,
  unixSeconds,
  type AudioChunkMessage,
  type ConfigMessage,
  type InboundMessage,
  type OutboundMessage
} from './protocol.js'
import type { ConnectionRegistry, RegisteredSession } from './registry.js'
import { WindowingBuffer, windowingLengths } from './windowing.js'

/**
 * WebSocket close codes sent for each close reason
 */
export const CLOSE_CODES: Record<CloseReason, number> = {
  client_closed: 1000,
  shutdown: 1001,
  transport_error: 1011,
  replaced: 4000,
  idle: 4008,
  rejected: 4409
}

/**
 * Outbound side of one connection
 */
export interface SessionTransport {
  /** Deliver one message; throws when the connection can no longer be written */
  send(message: OutboundMessage): void
  /** Close the underlying connection (no-op if already closed) */
  close(code: number, reason: string): void
}

export interface ConnectionSessionOptions {
  transport: SessionTransport
  registry: ConnectionRegistry
  invoker: DetectionInvoker
  logger: Logger
  /** Windowing durations the connection starts with */
  windowing: WindowingDurations
  /** Sample rate assumed until the first audio chunk commits one */
  sampleRate: number
  /** Identity generator for connect messages without client_id */
  generateId?: () => string
}

/**
 * Connection Session
 * Runs the per-connection protocol state machine
 * (connecting -> active -> closing -> closed) and owns the connection's
 * windowing buffer. Inbound messages are processed strictly one at a time.
 */
export class ConnectionSession implements RegisteredSession {
  readonly connectedAt: number = Date.now()
  private state: SessionPhase = 'connecting'
  private id: string | null = null
  private lastActivity: number = this.connectedAt

  private totalMessages = 0
  private totalDetections = 0
  private totalErrors = 0
  private protocolViolations = 0

  private buffer: WindowingBuffer
  private durations: WindowingDurations
  private sampleRate: number
  private committedSampleRate: number | null = null

  private queue: Promise<void> = Promise.resolve()
  private abortController = new AbortController()

  private transport: SessionTransport
  private registry: ConnectionRegistry
  private invoker: DetectionInvoker
  private logger: Logger
  private generateId: () => string

  constructor(options: ConnectionSessionOptions) {
    this.transport = options.transport
    this.registry = options.registry
    this.invoker = options.invoker
    this.logger = options.logger
    this.generateId = options.generateId ?? randomUUID
    this.durations = { ...options.windowing }
    this.sampleRate = options.sampleRate
    this.buffer = new WindowingBuffer(windowingLengths(this.durations, this.sampleRate))
  }

  get phase(): SessionPhase {
    return this.state
  }

  get clientId(): string | null {
    return this.id
  }

  get lastActivityAt(): number {
    return this.lastActivity
  }

  /**
   * Queue one inbound text frame. The returned promise settles once this
   * frame (and every frame before it) has been handled; it never rejects.
   */
  receive(raw: string): Promise<void> {
    const task = this.queue.then(() => this.process(raw))
    this.queue = task
    return task
  }

  /**
   * Current counters
   */
  stats(): SessionStats {
    const rate = this.committedSampleRate ?? this.sampleRate
    return {
      connected_at: unixSeconds(this.connectedAt),
      total_messages: this.totalMessages,
      total_detections: this.totalDetections,
      total_errors: this.totalErrors,
      protocol_violations: this.protocolViolations,
      buffer_size: this.buffer.size,
      buffer_duration: this.buffer.size / rate,
      sample_rate: rate
    }
  }

  /**
   * Tear the session down. Cancels any in-flight detection, discards
   * buffered audio and removes the registry entry. Idempotent.
   */
  close(reason: CloseReason): void {
    if (this.state === 'closing' || this.state === 'closed') {
      return
    }

    const wasActive = this.state === 'active'
    this.state = 'closing'

    if (reason === 'replaced') {
      this.trySend(makeError('DUPLICATE_CONNECTION', 'Connection replaced by a newer session'))
    }

    this.abortController.abort()
    this.buffer.clear()

    if (this.id !== null) {
      this.registry.remove(this.id, this)
    }

    this.state = 'closed'
    this.transport.close(CLOSE_CODES[reason], reason)

    if (wasActive) {
      this.logger.info(`session ${this.id ?? '(unidentified)'} closed: ${reason}`)
    }
  }

  private async process(raw: string): Promise<void> {
    if (this.state === 'closing' || this.state === 'closed') {
      return
    }

    this.lastActivity = Date.now()

    try {
      if (this.state === 'connecting') {
        this.handshake(raw)
        return
      }

      this.totalMessages++
      await this.dispatch(parseInboundMessage(raw))
    } catch (error) {
      this.reportError(error)
    }
  }

  private handshake(raw: string): void {
    const message = parseInboundMessage(raw)
    if (message.type !== 'connect') {
      throw new ProtocolViolationError(`Expected connect message, got ${message.type}`)
    }

    const requested = message.client_id?.trim()
    const clientId = requested ? requested : this.generateId()

    try {
      this.registry.register(clientId, this)
    } catch (error) {
      // Duplicate identities and registrations during shutdown end the attempt
      this.reportError(error)
      this.close('rejected')
      return
    }

    this.id = clientId
    this.state = 'active'

    if (!requested) {
      this.logger.warn(`no client_id provided, generated ${clientId}`)
    }
    this.logger.info(`client ${clientId} connected`)

    this.send(makeConnected(clientId))
  }

  private async dispatch(message: InboundMessage): Promise<void> {
    switch (message.type) {
      case 'connect':
        throw new ProtocolViolationError('Connection is already established')
      case 'audio_chunk':
        await this.handleAudioChunk(message)
        return
      case 'config':
        this.handleConfig(message)
        return
      case 'ping':
        this.send(makePong())
        return
      case 'stats':
        this.send(makeStats(this.stats()))
        return
    }
  }

  private async handleAudioChunk(message: AudioChunkMessage): Promise<void> {
    if (message.client_id !== undefined && message.client_id !== null && message.client_id !== this.id) {
      throw new ProtocolViolationError(`client_id ${message.client_id} does not match this connection`)
    }

    const samples = decodeSamples(message.audio_data, message.encoding, message.sample_rate)
    assertSampleRate(message.sample_rate, this.committedSampleRate)

    if (this.committedSampleRate === null) {
      this.commitSampleRate(message.sample_rate)
    }

    const windows = this.buffer.feed(samples)

    for (const window of windows) {
      await this.detectWindow(window)
      if (this.state !== 'active') {
        return
      }
    }
  }

  private async detectWindow(window: Float32Array): Promise<void> {
    const clientId = this.id ?? ''
    const sampleRate = this.committedSampleRate ?? this.sampleRate
    const dispatchedAt = unixSeconds()

    try {
      const result = await this.invoker.detect(window, sampleRate, {
        clientId,
        signal: this.abortController.signal
      })

      if (this.state !== 'active') {
        return
      }

      this.totalDetections++
      this.send(makeDetectionResult(clientId, result, dispatchedAt))
    } catch (error) {
      if (error instanceof DetectionCancelledError) {
        this.logger.debug(`detection for ${clientId} cancelled`)
        return
      }
      // The window is dropped; later windows of the same chunk still run
      this.reportError(error)
    }
  }

  private handleConfig(message: ConfigMessage): void {
    if (message.sample_rate !== undefined) {
      validateSampleRate(message.sample_rate)
      assertSampleRate(message.sample_rate, this.committedSampleRate)
    }

    const durations: WindowingDurations = {
      chunkDuration: message.chunk_duration ?? this.durations.chunkDuration,
      overlapDuration: message.overlap_duration ?? this.durations.overlapDuration,
      minDuration: message.min_duration ?? this.durations.minDuration,
      maxWindowDuration: this.durations.maxWindowDuration
    }
    const sampleRate = message.sample_rate ?? this.sampleRate

    this.buffer.configure(windowingLengths(durations, sampleRate))
    this.durations = durations
    this.sampleRate = sampleRate
  }

  private commitSampleRate(sampleRate: number): void {
    if (sampleRate !== this.sampleRate) {
      this.buffer.configure(windowingLengths(this.durations, sampleRate))
      this.sampleRate = sampleRate
    }
    this.committedSampleRate = sampleRate
  }

  private reportError(error: unknown): void {
    this.totalErrors++

    if (error instanceof DetectionServerError) {
      if (error.code === 'PROTOCOL_VIOLATION') {
        this.protocolViolations++
      }
      this.logger.debug(`error for ${this.id ?? '(connecting)'}: ${error.code} ${error.message}`)
      this.send(makeError(error.code, error.message))
      return
    }

    this.logger.error(`unexpected error for ${this.id ?? '(connecting)'}: ${errorMessage(error)}`, error)
    this.send(makeError('INTERNAL_ERROR', 'Failed to process message'))
  }

  private send(message: OutboundMessage): void {
    if (!this.trySend(message)) {
      this.close('transport_error')
    }
  }

  private trySend(message: OutboundMessage): boolean {
    try {
      this.transport.send(message)
      return true
    } catch (error) {
      this.logger.warn(`send to ${this.id ?? '(connecting)'} failed: ${errorMessage(error)}`)
      return false
    }
  }
}
