import { performance } from 'node:perf_hooks'

import {
  RawClassificationSchema,
  type ClassifierPlugin,
  type RawClassification
} from '../plugins/classifier.js'
import type { DetectionLabel, DetectionResult, LabelScores } from '../types/index.js'
import {
  DetectionCancelledError,
  InferenceError,
  ModelUnavailableError,
  errorMessage
} from './errors.js'
import type { Logger } from './logger.js'

export interface DetectionContext {
  /** Connection the window belongs to, for diagnostics */
  clientId: string
  /** Aborted when the connection closes */
  signal?: AbortSignal
}

export interface DetectionInvokerOptions {
  classifier: ClassifierPlugin
  logger: Logger
}

/**
 * Detection Invoker
 * Stateless adapter that runs the classifier on a completed window and
 * normalizes its output. Failures are surfaced, never retried here.
 */
export class DetectionInvoker {
  private classifier: ClassifierPlugin
  private logger: Logger

  constructor(options: DetectionInvokerOptions) {
    this.classifier = options.classifier
    this.logger = options.logger
  }

  /**
   * Whether the underlying classifier can take work
   */
  isReady(): boolean {
    return this.classifier.isReady()
  }

  /**
   * Classify one window
   */
  async detect(window: Float32Array, sampleRate: number, context: DetectionContext): Promise<DetectionResult> {
    const { clientId, signal } = context

    if (signal?.aborted) {
      throw new DetectionCancelledError()
    }

    if (!this.classifier.isReady()) {
      throw new ModelUnavailableError(`Detection model ${this.classifier.name} is not ready`)
    }

    const startedAt = performance.now()
    let raw: RawClassification

    try {
      raw = await this.classifier.classify(window, sampleRate, signal)
    } catch (error) {
      if (signal?.aborted) {
        throw new DetectionCancelledError()
      }
      this.logger.error(
        `inference failed for ${clientId} (window=${window.length} samples @ ${sampleRate}Hz): ${errorMessage(error)}`
      )
      throw new InferenceError(`Detection failed: ${errorMessage(error)}`, error)
    }

    if (signal?.aborted) {
      throw new DetectionCancelledError()
    }

    const processingTimeMs = performance.now() - startedAt

    try {
      return normalizeClassification(raw, processingTimeMs)
    } catch (error) {
      this.logger.error(
        `inference failed for ${clientId} (window=${window.length} samples @ ${sampleRate}Hz): ${errorMessage(error)}`
      )
      throw error
    }
  }
}

/**
 * Map raw classifier output onto a DetectionResult.
 * Missing score entries are filled from the winning score.
 */
export function normalizeClassification(raw: unknown, processingTimeMs: number): DetectionResult {
  const parsed = RawClassificationSchema.safeParse(raw)
  if (!parsed.success) {
    throw new InferenceError('Classifier returned an invalid result')
  }

  const label = toLabel(parsed.data.label)
  const score = clamp01(parsed.data.score)
  const given = parsed.data.all_scores ?? {}

  const allScores: LabelScores = {
    bonafide: clamp01(given.bonafide ?? (label === 'bonafide' ? score : 1 - score)),
    spoof: clamp01(given.spoof ?? (label === 'spoof' ? score : 1 - score))
  }

  const logits = parsed.data.logits
  const result: DetectionResult = {
    label,
    score,
    isSpoof: label === 'spoof',
    allScores,
    processingTimeMs,
    ...(logits && logits.length > 0 ? { logits: toMatrix(logits) } : {})
  }

  return Object.freeze(result)
}

function toLabel(label: string): DetectionLabel {
  const normalized = label.trim().toLowerCase()
  if (normalized === 'spoof' || normalized === 'bonafide') {
    return normalized
  }
  throw new InferenceError(`Classifier returned unknown label: ${label}`)
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value))
}

function toMatrix(logits: number[] | number[][]): number[][] {
  const rows: number[][] = []
  const flat: number[] = []
  for (const entry of logits) {
    if (Array.isArray(entry)) {
      rows.push(entry)
    } else {
      flat.push(entry)
    }
  }
  return flat.length > 0 ? [flat, ...rows] : rows
}
