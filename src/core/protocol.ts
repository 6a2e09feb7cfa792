import { z } from 'zod'

import type { DetectionResult, SessionStats } from '../types/index.js'
import { MalformedPayloadError, ProtocolViolationError, type ErrorCode } from './errors.js'

const TimestampSchema = z.number().finite().optional()

export const ConnectMessageSchema = z.object({
  type: z.literal('connect'),
  client_id: z.string().nullish(),
  timestamp: TimestampSchema
})

export const AudioChunkMessageSchema = z.object({
  type: z.literal('audio_chunk'),
  client_id: z.string().nullish(),
  // Element types are checked by the decoder so the failure is reported as a payload error
  audio_data: z.union([z.string(), z.array(z.unknown())]),
  sample_rate: z.number(),
  encoding: z.string(),
  timestamp: TimestampSchema
})

export const ConfigMessageSchema = z.object({
  type: z.literal('config'),
  sample_rate: z.number().int().positive().optional(),
  chunk_duration: z.number().positive().optional(),
  overlap_duration: z.number().nonnegative().optional(),
  min_duration: z.number().nonnegative().optional(),
  timestamp: TimestampSchema
})

export const PingMessageSchema = z.object({
  type: z.literal('ping'),
  timestamp: TimestampSchema
})

export const StatsRequestMessageSchema = z.object({
  type: z.literal('stats'),
  timestamp: TimestampSchema
})

export const InboundMessageSchema = z.discriminatedUnion('type', [
  ConnectMessageSchema,
  AudioChunkMessageSchema,
  ConfigMessageSchema,
  PingMessageSchema,
  StatsRequestMessageSchema
])

export type ConnectMessage = z.infer<typeof ConnectMessageSchema>
export type AudioChunkMessage = z.infer<typeof AudioChunkMessageSchema>
export type ConfigMessage = z.infer<typeof ConfigMessageSchema>
export type PingMessage = z.infer<typeof PingMessageSchema>
export type StatsRequestMessage = z.infer<typeof StatsRequestMessageSchema>
export type InboundMessage = z.infer<typeof InboundMessageSchema>

export const INBOUND_MESSAGE_TYPES: ReadonlySet<string> = new Set([
  'connect',
  'audio_chunk',
  'config',
  'ping',
  'stats'
])

export interface ConnectedMessage {
  type: 'connected'
  client_id: string
  timestamp: number
}

export interface WireDetectionResult {
  label: DetectionResult['label']
  score: number
  is_spoof: boolean
  all_scores: DetectionResult['allScores']
  logits?: number[][]
}

export interface DetectionResultMessage {
  type: 'detection_result'
  client_id: string
  result: WireDetectionResult
  timestamp: number
  processing_time_ms: number
}

export interface ErrorMessage {
  type: 'error'
  code: ErrorCode
  message: string
  timestamp: number
}

export interface PongMessage {
  type: 'pong'
  timestamp: number
}

export interface StatsMessage {
  type: 'stats'
  stats: SessionStats
  timestamp: number
}

export type OutboundMessage =
  | ConnectedMessage
  | DetectionResultMessage
  | ErrorMessage
  | PongMessage
  | StatsMessage

/**
 * Current time as Unix seconds
 */
export function unixSeconds(nowMs: number = Date.now()): number {
  return nowMs / 1000
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse one text frame into a typed inbound message.
 * Unknown `type` values raise ProtocolViolationError; anything else that
 * fails to parse raises MalformedPayloadError.
 */
export function parseInboundMessage(raw: string): InboundMessage {
  let value: unknown
  try {
    value = JSON.parse(raw)
  } catch {
    throw new MalformedPayloadError('Expected a JSON message')
  }

  if (!isRecord(value)) {
    throw new MalformedPayloadError('Expected a JSON object message')
  }

  const type = value.type
  if (typeof type !== 'string' || !INBOUND_MESSAGE_TYPES.has(type)) {
    throw new ProtocolViolationError(`Unknown message type: ${typeof type === 'string' ? type : String(type)}`)
  }

  const parsed = InboundMessageSchema.safeParse(value)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new MalformedPayloadError(`Invalid ${type} message: ${details}`)
  }

  return parsed.data
}

export function makeConnected(clientId: string): ConnectedMessage {
  return {
    type: 'connected',
    client_id: clientId,
    timestamp: unixSeconds()
  }
}

/**
 * @param dispatchedAt Unix seconds at which the window was handed to the classifier
 */
export function makeDetectionResult(
  clientId: string,
  result: DetectionResult,
  dispatchedAt: number = unixSeconds()
): DetectionResultMessage {
  return {
    type: 'detection_result',
    client_id: clientId,
    result: {
      label: result.label,
      score: result.score,
      is_spoof: result.isSpoof,
      all_scores: { ...result.allScores },
      ...(result.logits ? { logits: result.logits } : {})
    },
    timestamp: dispatchedAt,
    processing_time_ms: result.processingTimeMs
  }
}

export function makeError(code: ErrorCode, message: string): ErrorMessage {
  return {
    type: 'error',
    code,
    message,
    timestamp: unixSeconds()
  }
}

export function makePong(): PongMessage {
  return {
    type: 'pong',
    timestamp: unixSeconds()
  }
}

export function makeStats(stats: SessionStats): StatsMessage {
  return {
    type: 'stats',
    stats,
    timestamp: unixSeconds()
  }
}
