import type { Server } from 'node:http'
import { WebSocketServer, WebSocket, type RawData } from 'ws'

import type { Logger } from './logger.js'

/**
 * WebSocket server configuration
 */
export interface WebSocketConfig {
  /** WebSocket path (default: '/ws/detect') */
  path?: string
  /** Heartbeat ping interval in ms; 0 disables it (default: 15000) */
  heartbeatIntervalMs?: number
  /** Maximum inbound frame size in bytes (default: 10MB) */
  maxPayloadBytes?: number
  /** Enable per-message deflate compression (default: false) */
  perMessageDeflate?: boolean
}

/**
 * Event handlers for WebSocket connections
 */
export interface WebSocketHandlers {
  /** Called when a new connection is established */
  onConnection?: (ws: WebSocket, connectionId: string) => void
  /** Called with every inbound frame decoded as UTF-8 text */
  onMessage?: (ws: WebSocket, connectionId: string, text: string) => void | Promise<void>
  /** Called once when the connection closes for any reason */
  onClose?: (ws: WebSocket, connectionId: string, code: number) => void
  /** Called when a socket error occurs */
  onError?: (ws: WebSocket, connectionId: string, error: Error) => void
}

/**
 * WebSocket connection tracking
 */
interface ConnectionInfo {
  connectionId: string
  isAlive: boolean
}

export function decodeRawData(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8')
  }

  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8')
  }

  return Buffer.from(data).toString('utf8')
}

/**
 * Detection WebSocket Server
 * Accepts client sockets on an existing HTTP server, decodes frames to text
 * and terminates sockets that stop answering transport-level pings.
 */
export class DetectionWebSocketServer {
  private wss: WebSocketServer | null = null
  private connections: Map<WebSocket, ConnectionInfo> = new Map()
  private heartbeatTimer: NodeJS.Timeout | null = null
  private config: Required<WebSocketConfig>
  private handlers: WebSocketHandlers
  private logger: Logger

  constructor(config: WebSocketConfig, handlers: WebSocketHandlers, logger: Logger) {
    this.config = {
      path: '/ws/detect',
      heartbeatIntervalMs: 15_000,
      maxPayloadBytes: 10 * 1024 * 1024,
      perMessageDeflate: false,
      ...config
    }
    this.handlers = handlers
    this.logger = logger
  }

  /**
   * Start accepting WebSocket upgrades on the given HTTP server
   */
  attach(server: Server): void {
    if (this.wss) {
      this.logger.warn('WebSocket server already running')
      return
    }

    const wss = new WebSocketServer({
      server,
      path: this.config.path,
      perMessageDeflate: this.config.perMessageDeflate,
      maxPayload: this.config.maxPayloadBytes
    })
    this.wss = wss

    if (this.config.heartbeatIntervalMs > 0) {
      this.heartbeatTimer = setInterval(() => {
        this.heartbeat()
      }, this.config.heartbeatIntervalMs)
      this.heartbeatTimer.unref()
    }

    wss.on('connection', (ws: WebSocket) => {
      this.handleConnection(ws)
    })

    wss.on('error', (error) => {
      this.logger.error('WebSocket server error:', error)
    })
  }

  /**
   * Stop the WebSocket server and close remaining sockets
   */
  async stop(): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer)
      this.heartbeatTimer = null
    }

    for (const [ws] of this.connections) {
      ws.terminate()
    }
    this.connections.clear()

    const wss = this.wss
    if (wss) {
      await new Promise<void>((resolve, reject) => {
        wss.close((error) => {
          if (error) {
            reject(error)
            return
          }
          resolve()
        })
      })
      this.wss = null
    }
  }

  /**
   * Heartbeat to detect dead connections
   */
  private heartbeat(): void {
    for (const [ws, connection] of this.connections) {
      if (!connection.isAlive) {
        this.logger.info(`terminating dead connection: ${connection.connectionId}`)
        ws.terminate()
        continue
      }

      connection.isAlive = false
      ws.ping()
    }
  }

  /**
   * Handle new WebSocket connection
   */
  private handleConnection(ws: WebSocket): void {
    const connectionId = `conn_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`
    const connection: ConnectionInfo = { connectionId, isAlive: true }
    this.connections.set(ws, connection)

    this.logger.debug(`WebSocket connection established: ${connectionId}`)

    ws.on('pong', () => {
      connection.isAlive = true
    })

    if (this.handlers.onConnection) {
      this.handlers.onConnection(ws, connectionId)
    }

    ws.on('message', (data: RawData) => {
      connection.isAlive = true
      if (this.handlers.onMessage) {
        Promise.resolve(this.handlers.onMessage(ws, connectionId, decodeRawData(data))).catch((error) => {
          this.logger.error('Error in onMessage handler:', error)
        })
      }
    })

    ws.on('error', (error) => {
      this.logger.warn(`WebSocket error for ${connectionId}: ${error.message}`)
      if (this.handlers.onError) {
        this.handlers.onError(ws, connectionId, error)
      }
    })

    ws.on('close', (code: number) => {
      this.logger.debug(`WebSocket connection closed: ${connectionId} (${code})`)
      this.connections.delete(ws)

      if (this.handlers.onClose) {
        this.handlers.onClose(ws, connectionId, code)
      }
    })
  }
}
