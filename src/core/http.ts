import type { IncomingMessage, ServerResponse } from 'node:http'

import type { RegistrySnapshot } from '../types/index.js'
import { unixSeconds } from './protocol.js'

/**
 * Body of GET /health
 */
export interface HealthResponse {
  status: 'healthy' | 'initializing'
  model_ready: boolean
  active_connections: number
  timestamp: number
}

/**
 * Body of GET /stats
 */
export interface StatsResponse extends RegistrySnapshot {
  uptime_s: number
  timestamp: number
}

export interface HttpRoutesContext {
  /** Whether the classifier can take work */
  isModelReady: () => boolean
  /** Current registry snapshot */
  snapshot: () => RegistrySnapshot
  /** Epoch milliseconds the server started at */
  startedAt: () => number
}

function sendJson(res: ServerResponse, statusCode: number, payload: unknown): void {
  if (res.writableEnded) {
    return
  }

  res.statusCode = statusCode
  res.setHeader('content-type', 'application/json')
  res.end(JSON.stringify(payload))
}

export function buildHealth(context: HttpRoutesContext, nowMs: number = Date.now()): HealthResponse {
  const ready = context.isModelReady()
  return {
    status: ready ? 'healthy' : 'initializing',
    model_ready: ready,
    active_connections: context.snapshot().active_connections,
    timestamp: unixSeconds(nowMs)
  }
}

export function buildStats(context: HttpRoutesContext, nowMs: number = Date.now()): StatsResponse {
  return {
    ...context.snapshot(),
    uptime_s: (nowMs - context.startedAt()) / 1000,
    timestamp: unixSeconds(nowMs)
  }
}

/**
 * Request listener for the operational endpoints served next to the
 * WebSocket path
 */
export function createHttpRoutes(context: HttpRoutesContext): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    const requestUrl = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`)

    if (requestUrl.pathname !== '/health' && requestUrl.pathname !== '/stats') {
      sendJson(res, 404, { error: { code: 'NOT_FOUND', message: 'Not found.' } })
      return
    }

    if (req.method !== 'GET' && req.method !== 'HEAD') {
      res.setHeader('allow', 'GET, HEAD')
      sendJson(res, 405, { error: { code: 'METHOD_NOT_ALLOWED', message: 'Method not allowed.' } })
      return
    }

    if (requestUrl.pathname === '/health') {
      sendJson(res, 200, buildHealth(context))
      return
    }

    sendJson(res, 200, buildStats(context))
  }
}
