/**
 * Labels the classifier can return
 */
export type DetectionLabel = 'bonafide' | 'spoof'

/**
 * Score distribution over labels
 */
export interface LabelScores {
  bonafide: number
  spoof: number
}

/**
 * Normalized classifier verdict for one analysis window
 */
export interface DetectionResult {
  /** Winning label */
  label: DetectionLabel
  /** Confidence of the winning label in [0, 1] */
  score: number
  /** True when label is 'spoof' */
  isSpoof: boolean
  /** Full score distribution */
  allScores: LabelScores
  /** Raw model logits, when the backend exposes them */
  logits?: number[][]
  /** Wall-clock classifier latency in milliseconds */
  processingTimeMs: number
}

/**
 * Windowing durations in seconds
 */
export interface WindowingDurations {
  /** Length of each analysis window (default: 1.0s) */
  chunkDuration: number
  /** Samples shared between consecutive windows (default: 0.5s) */
  overlapDuration: number
  /** Audio required before the first window (default: 0.5s) */
  minDuration: number
  /** Upper bound on chunkDuration and minDuration (default: 10s) */
  maxWindowDuration?: number
}

/**
 * Windowing lengths in samples
 */
export interface WindowingLengths {
  chunkLength: number
  overlapLength: number
  minLength: number
  /** Largest chunkLength or minLength accepted; unbounded when absent */
  maxLength?: number
}

/**
 * Session lifecycle phase
 */
export type SessionPhase = 'connecting' | 'active' | 'closing' | 'closed'

/**
 * Per-connection counters, serialized as the `stats` reply
 */
export interface SessionStats {
  /** Unix seconds at which the connection was accepted */
  connected_at: number
  total_messages: number
  total_detections: number
  total_errors: number
  protocol_violations: number
  /** Samples currently held by the windowing buffer */
  buffer_size: number
  /** buffer_size expressed in seconds */
  buffer_duration: number
  /** Sample rate the connection is running at */
  sample_rate: number
}

/**
 * Aggregate view over every live session
 */
export interface RegistrySnapshot {
  active_connections: number
  /** Connections accepted since the registry was created */
  total_connections: number
  /** Detections produced by live and retired sessions */
  total_detections: number
  connections: Record<string, SessionStats>
}

/**
 * Why a session was closed
 */
export type CloseReason =
  | 'client_closed'
  | 'transport_error'
  | 'rejected'
  | 'replaced'
  | 'idle'
  | 'shutdown'
