import { encodeSamplesBase64 } from '../core/decoder.js'
import { errorMessage } from '../core/errors.js'
import type { Logger } from '../core/logger.js'
import { RawClassificationSchema, type ClassifierPlugin, type RawClassification } from './classifier.js'

/**
 * HTTP classifier configuration
 */
export interface HttpClassifierConfig {
  /** Base URL of the inference service, e.g. http://127.0.0.1:8000 */
  baseUrl: string
  /** Per-request timeout in milliseconds (default: 10000) */
  timeoutMs?: number
  /** Run one second of silence through the model during warmup (default: true) */
  warmupInference?: boolean
  /** Sample rate used for the warmup request (default: 16000) */
  warmupSampleRate?: number
  /** Plugin name (default: 'http-classifier') */
  name?: string
}

export class ClassifierRequestError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ClassifierRequestError'
  }
}

export class ClassifierTimeoutError extends ClassifierRequestError {
  constructor(timeoutMs: number) {
    super(`Classifier request timed out after ${timeoutMs}ms.`)
    this.name = 'ClassifierTimeoutError'
  }
}

/**
 * Classifier backed by a remote inference service.
 *
 * `POST {baseUrl}/classify` takes `{ audio_data, encoding: 'base64', sample_rate }`
 * and answers with `{ label, score, all_scores?, logits? }`;
 * `GET {baseUrl}/health` answers 2xx once the model is loaded.
 */
export class HttpClassifier implements ClassifierPlugin {
  readonly name: string
  private config: Required<Omit<HttpClassifierConfig, 'name'>>
  private logger: Logger
  private ready = false

  constructor(config: HttpClassifierConfig, logger: Logger) {
    this.name = config.name ?? 'http-classifier'
    this.config = {
      timeoutMs: 10_000,
      warmupInference: true,
      warmupSampleRate: 16000,
      ...config,
      baseUrl: config.baseUrl.replace(/\/+$/, '')
    }
    this.logger = logger
  }

  isReady(): boolean {
    return this.ready
  }

  /**
   * Probe the service and optionally run a dummy inference.
   * The classifier only reports ready once this succeeds.
   */
  async warmup(): Promise<void> {
    this.ready = false

    const response = await this.request('/health', { method: 'GET' })
    if (!response.ok) {
      throw new ClassifierRequestError(`Classifier health check failed with status ${response.status}`)
    }

    if (this.config.warmupInference) {
      const silence = new Float32Array(this.config.warmupSampleRate)
      const startedAt = Date.now()
      await this.post(silence, this.config.warmupSampleRate)
      this.logger.info(`warmup completed in ${Date.now() - startedAt}ms`)
    }

    this.ready = true
  }

  async classify(samples: Float32Array, sampleRate: number, signal?: AbortSignal): Promise<RawClassification> {
    return this.post(samples, sampleRate, signal)
  }

  async close(): Promise<void> {
    this.ready = false
  }

  private async post(samples: Float32Array, sampleRate: number, signal?: AbortSignal): Promise<RawClassification> {
    const response = await this.request(
      '/classify',
      {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({
          audio_data: encodeSamplesBase64(samples),
          encoding: 'base64',
          sample_rate: sampleRate
        })
      },
      signal
    )

    if (!response.ok) {
      throw new ClassifierRequestError(`Classifier responded with status ${response.status}`)
    }

    let body: unknown
    try {
      body = await response.json()
    } catch {
      throw new ClassifierRequestError('Classifier returned a non-JSON body')
    }

    const parsed = RawClassificationSchema.safeParse(body)
    if (!parsed.success) {
      throw new ClassifierRequestError('Classifier returned an unexpected payload')
    }

    return parsed.data
  }

  private async request(path: string, init: RequestInit, signal?: AbortSignal): Promise<Response> {
    const controller = new AbortController()
    const { timeoutMs } = this.config
    let timedOut = false

    const timer = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)
    timer.unref?.()

    const onAbort = (): void => controller.abort()
    if (signal?.aborted) {
      controller.abort()
    } else {
      signal?.addEventListener('abort', onAbort, { once: true })
    }

    try {
      return await fetch(`${this.config.baseUrl}${path}`, { ...init, signal: controller.signal })
    } catch (error) {
      if (timedOut) {
        throw new ClassifierTimeoutError(timeoutMs)
      }
      throw new ClassifierRequestError(`Classifier request failed: ${errorMessage(error)}`)
    } finally {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    }
  }
}
