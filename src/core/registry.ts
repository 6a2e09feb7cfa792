import type { CloseReason, RegistrySnapshot, SessionStats } from '../types/index.js'
import { DetectionServerError, DuplicateConnectionError } from './errors.js'
import type { Logger } from './logger.js'

/**
 * What happens when a second live connection claims an identity:
 * 'reject' keeps the first session, 'replace' evicts it
 */
export type DuplicatePolicy = 'reject' | 'replace'

/**
 * The registry's view of a session; buffers never leave the session
 */
export interface RegisteredSession {
  readonly clientId: string | null
  readonly lastActivityAt: number
  stats(): SessionStats
  close(reason: CloseReason): void
}

/**
 * Registry configuration
 */
export interface RegistryConfig {
  /** Duplicate identity policy (default: 'reject') */
  duplicatePolicy?: DuplicatePolicy
}

/**
 * Registry event callbacks
 */
export interface RegistryCallbacks {
  /** Called after a session is inserted */
  onRegister?: (clientId: string) => void
  /** Called after a session is removed */
  onRemove?: (clientId: string) => void
}

/**
 * Connection Registry
 * Process-wide table of live sessions keyed by client identity. Every
 * mutation is synchronous, so inserts, removals and snapshots never
 * interleave on the event loop.
 */
export class ConnectionRegistry {
  private sessions: Map<string, RegisteredSession> = new Map()
  private config: Required<RegistryConfig>
  private callbacks: RegistryCallbacks
  private logger: Logger
  private totalConnections = 0
  private retiredDetections = 0
  private draining = false

  constructor(logger: Logger, config: RegistryConfig = {}, callbacks: RegistryCallbacks = {}) {
    this.config = {
      duplicatePolicy: 'reject',
      ...config
    }
    this.callbacks = callbacks
    this.logger = logger
  }

  /**
   * Insert a session under its identity.
   * Throws DuplicateConnectionError under the 'reject' policy when the
   * identity is taken; under 'replace' the previous session is evicted.
   */
  register(clientId: string, session: RegisteredSession): void {
    if (this.draining) {
      throw new DetectionServerError('TRANSPORT_FAILURE', 'Server is shutting down')
    }

    const existing = this.sessions.get(clientId)

    if (existing && existing !== session) {
      if (this.config.duplicatePolicy === 'reject') {
        this.logger.warn(`rejected duplicate connection for ${clientId}`)
        throw new DuplicateConnectionError(clientId)
      }

      this.sessions.delete(clientId)
      this.retiredDetections += existing.stats().total_detections
      this.logger.info(`replacing session for ${clientId}`)
      existing.close('replaced')
    }

    this.sessions.set(clientId, session)
    this.totalConnections++

    if (this.callbacks.onRegister) {
      this.callbacks.onRegister(clientId)
    }
  }

  /**
   * Get a session by identity
   */
  get(clientId: string): RegisteredSession | undefined {
    return this.sessions.get(clientId)
  }

  /**
   * Check if an identity is registered
   */
  has(clientId: string): boolean {
    return this.sessions.has(clientId)
  }

  /**
   * Number of live sessions
   */
  get size(): number {
    return this.sessions.size
  }

  /**
   * Remove a session. A no-op unless the identity still maps to this exact
   * session, so a replaced session cannot remove its successor.
   */
  remove(clientId: string, session: RegisteredSession): boolean {
    if (this.sessions.get(clientId) !== session) {
      return false
    }

    this.sessions.delete(clientId)
    this.retiredDetections += session.stats().total_detections

    if (this.callbacks.onRemove) {
      this.callbacks.onRemove(clientId)
    }

    return true
  }

  /**
   * Aggregate statistics over all sessions
   */
  snapshot(): RegistrySnapshot {
    const connections: Record<string, SessionStats> = {}
    let liveDetections = 0

    for (const [clientId, session] of this.sessions) {
      const stats = session.stats()
      connections[clientId] = stats
      liveDetections += stats.total_detections
    }

    return {
      active_connections: this.sessions.size,
      total_connections: this.totalConnections,
      total_detections: this.retiredDetections + liveDetections,
      connections
    }
  }

  /**
   * Close sessions that have been silent for longer than idleTimeoutMs
   * @returns Identities that were closed
   */
  closeIdleSessions(idleTimeoutMs: number, now: number = Date.now()): string[] {
    const idle: Array<[string, RegisteredSession]> = []

    for (const [clientId, session] of this.sessions) {
      if (now - session.lastActivityAt > idleTimeoutMs) {
        idle.push([clientId, session])
      }
    }

    for (const [clientId, session] of idle) {
      this.logger.info(`closing idle session ${clientId}`)
      session.close('idle')
    }

    return idle.map(([clientId]) => clientId)
  }

  /**
   * Close every session and refuse new registrations
   */
  drain(): void {
    this.draining = true
    const sessions = Array.from(this.sessions.values())

    for (const session of sessions) {
      session.close('shutdown')
    }

    this.sessions.clear()
  }
}
