/**
 * stream-spoof-detector: streaming audio deepfake detection over WebSocket
 *
 * @packageDocumentation
 */

// Core exports
export * from './core/index.js'
export * from './types/index.js'
export * from './plugins/index.js'
export * from './config.js'

// Re-export WebSocket type from ws
export { WebSocket } from 'ws'

import { createServer, type Server } from 'node:http'
import { WebSocket } from 'ws'

import type { ServerConfig } from './config.js'
import { DetectionInvoker } from './core/detection.js'
import { TransportFailureError, errorMessage } from './core/errors.js'
import { createHttpRoutes } from './core/http.js'
import { createConsoleLogger, type Logger } from './core/logger.js'
import { ConnectionRegistry } from './core/registry.js'
import { ConnectionSession, type SessionTransport } from './core/session.js'
import { DetectionWebSocketServer } from './core/websocket.js'
import { validateWindowingLengths, windowingLengths } from './core/windowing.js'
import type { ClassifierPlugin } from './plugins/classifier.js'
import type { RegistrySnapshot } from './types/index.js'

/**
 * Detection Server options
 */
export interface DetectionServerOptions {
  /** Resolved configuration, see parseServerConfig / loadServerConfig */
  config: ServerConfig
  /** Model backend */
  classifier: ClassifierPlugin
  /** Logger (default: console logger at config.logging.level) */
  logger?: Logger
  /** Identity generator for clients that connect without client_id */
  generateId?: () => string
}

/**
 * High-level Detection Server
 * Orchestrates the HTTP listener, WebSocket transport, connection registry
 * and detection invoker
 */
export class DetectionServer {
  private config: ServerConfig
  private classifier: ClassifierPlugin
  private logger: Logger
  private generateId?: () => string

  private httpServer: Server
  private wsServer: DetectionWebSocketServer
  private registry: ConnectionRegistry
  private invoker: DetectionInvoker
  private idleTimer: NodeJS.Timeout | null = null
  private startedAt = Date.now()

  // Track WebSocket to session mapping
  private sessions: Map<WebSocket, ConnectionSession> = new Map()

  constructor(options: DetectionServerOptions) {
    // Durations that round to unusable sample counts fail here rather than per connection
    validateWindowingLengths(windowingLengths(options.config.windowing, options.config.windowing.sampleRate))

    this.config = options.config
    this.classifier = options.classifier
    this.logger = options.logger ?? createConsoleLogger('detector', options.config.logging.level)
    this.generateId = options.generateId

    this.registry = new ConnectionRegistry(this.logger, options.config.sessions, {
      onRegister: (clientId) => this.logger.debug(`registered ${clientId} (${this.registry.size} active)`),
      onRemove: (clientId) => this.logger.debug(`removed ${clientId} (${this.registry.size} active)`)
    })

    this.invoker = new DetectionInvoker({ classifier: this.classifier, logger: this.logger })

    this.httpServer = createServer(
      createHttpRoutes({
        isModelReady: () => this.invoker.isReady(),
        snapshot: () => this.registry.snapshot(),
        startedAt: () => this.startedAt
      })
    )

    const { path, heartbeatIntervalMs, maxPayloadBytes } = options.config.server
    this.wsServer = new DetectionWebSocketServer(
      { path, heartbeatIntervalMs, maxPayloadBytes },
      {
        onConnection: (ws) => this.onConnection(ws),
        onMessage: (ws, _connectionId, text) => this.onMessage(ws, text),
        onClose: (ws) => this.onClose(ws),
        onError: (ws, connectionId, error) => this.onError(ws, connectionId, error)
      },
      this.logger
    )
  }

  /**
   * Start listening, then warm the classifier up.
   * A failed warmup is logged; the server keeps running and reports the
   * model as not ready.
   */
  async start(): Promise<void> {
    const { host, port, path, idleTimeoutMs } = this.config.server

    this.wsServer.attach(this.httpServer)

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(error)
      }
      this.httpServer.once('error', onError)
      this.httpServer.listen(port, host, () => {
        this.httpServer.off('error', onError)
        resolve()
      })
    })

    this.startedAt = Date.now()
    this.logger.info(`listening on ws://${host}:${this.port}${path}`)

    if (idleTimeoutMs > 0) {
      this.idleTimer = setInterval(() => {
        this.registry.closeIdleSessions(idleTimeoutMs)
      }, Math.min(idleTimeoutMs, 5_000))
      this.idleTimer.unref()
    }

    if (this.classifier.warmup) {
      try {
        await this.classifier.warmup()
        this.logger.info(`classifier ${this.classifier.name} ready`)
      } catch (error) {
        this.logger.error(`classifier warmup failed: ${errorMessage(error)}`)
      }
    }
  }

  /**
   * Close every session, stop accepting connections and release the classifier
   */
  async stop(): Promise<void> {
    if (this.idleTimer) {
      clearInterval(this.idleTimer)
      this.idleTimer = null
    }

    this.registry.drain()
    for (const session of this.sessions.values()) {
      session.close('shutdown')
    }
    this.sessions.clear()

    await this.wsServer.stop()

    if (this.httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        this.httpServer.close((error) => {
          if (error) {
            reject(error)
            return
          }
          resolve()
        })
        this.httpServer.closeAllConnections()
      })
    }

    if (this.classifier.close) {
      await this.classifier.close()
    }

    this.logger.info('detection server stopped')
  }

  /**
   * Port the HTTP listener is bound to (useful with port 0)
   */
  get port(): number {
    const address = this.httpServer.address()
    return address !== null && typeof address === 'object' ? address.port : this.config.server.port
  }

  /**
   * Aggregate statistics over live sessions
   */
  snapshot(): RegistrySnapshot {
    return this.registry.snapshot()
  }

  /**
   * Get connection registry
   */
  getRegistry(): ConnectionRegistry {
    return this.registry
  }

  /**
   * Handle new WebSocket connection
   */
  private onConnection(ws: WebSocket): void {
    const session = new ConnectionSession({
      transport: this.createTransport(ws),
      registry: this.registry,
      invoker: this.invoker,
      logger: this.logger,
      windowing: this.config.windowing,
      sampleRate: this.config.windowing.sampleRate,
      generateId: this.generateId
    })
    this.sessions.set(ws, session)
  }

  /**
   * Handle WebSocket message
   */
  private async onMessage(ws: WebSocket, text: string): Promise<void> {
    const session = this.sessions.get(ws)
    if (!session) {
      return
    }
    await session.receive(text)
  }

  /**
   * Handle WebSocket close
   */
  private onClose(ws: WebSocket): void {
    const session = this.sessions.get(ws)
    if (session) {
      session.close('client_closed')
      this.sessions.delete(ws)
    }
  }

  /**
   * Handle WebSocket error
   */
  private onError(ws: WebSocket, connectionId: string, error: Error): void {
    this.logger.debug(`transport failure on ${connectionId}: ${error.message}`)
    const session = this.sessions.get(ws)
    if (session) {
      session.close('transport_error')
    }
  }

  private createTransport(ws: WebSocket): SessionTransport {
    return {
      send: (message) => {
        if (ws.readyState !== WebSocket.OPEN) {
          throw new TransportFailureError('WebSocket is not open')
        }

        ws.send(JSON.stringify(message), (error) => {
          if (error) {
            this.logger.warn(`async send failed: ${error.message}`)
            this.sessions.get(ws)?.close('transport_error')
          }
        })
      },
      close: (code, reason) => {
        if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
          ws.close(code, reason)
        }
      }
    }
  }
}

/**
 * Default export
 */
export default DetectionServer
