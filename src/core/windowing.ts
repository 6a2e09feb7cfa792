import type { WindowingDurations, WindowingLengths } from '../types/index.js'
import { ConfigurationError } from './errors.js'

/**
 * Convert windowing durations (seconds) to sample counts at a given rate
 */
export function windowingLengths(durations: WindowingDurations, sampleRate: number): WindowingLengths {
  return {
    chunkLength: Math.round(durations.chunkDuration * sampleRate),
    overlapLength: Math.round(durations.overlapDuration * sampleRate),
    minLength: Math.round(durations.minDuration * sampleRate),
    ...(durations.maxWindowDuration !== undefined
      ? { maxLength: Math.round(durations.maxWindowDuration * sampleRate) }
      : {})
  }
}

/**
 * Reject lengths under which windows would never advance
 */
export function validateWindowingLengths(lengths: WindowingLengths): WindowingLengths {
  const { chunkLength, overlapLength, minLength, maxLength } = lengths

  if (!Number.isInteger(chunkLength) || chunkLength <= 0) {
    throw new ConfigurationError(`chunk length must be a positive number of samples, got ${chunkLength}`)
  }
  if (!Number.isInteger(overlapLength) || overlapLength < 0) {
    throw new ConfigurationError(`overlap length must be a non-negative number of samples, got ${overlapLength}`)
  }
  if (overlapLength >= chunkLength) {
    throw new ConfigurationError(
      `overlap length (${overlapLength}) must be smaller than chunk length (${chunkLength})`
    )
  }
  if (!Number.isInteger(minLength) || minLength < 0) {
    throw new ConfigurationError(`min length must be a non-negative number of samples, got ${minLength}`)
  }
  if (maxLength !== undefined) {
    if (chunkLength > maxLength) {
      throw new ConfigurationError(`chunk length (${chunkLength}) exceeds the maximum window of ${maxLength} samples`)
    }
    if (minLength > maxLength) {
      throw new ConfigurationError(`min length (${minLength}) exceeds the maximum window of ${maxLength} samples`)
    }
    return { chunkLength, overlapLength, minLength, maxLength }
  }

  return { chunkLength, overlapLength, minLength }
}

/**
 * Windowing Buffer
 * Accumulates one connection's samples and cuts them into overlapping
 * fixed-length analysis windows. Owned by a single session; not shared.
 */
export class WindowingBuffer {
  private pending: Float32Array = new Float32Array(0)
  private config: WindowingLengths
  /** Set once the first window's worth of audio (or minLength) has arrived */
  private primed = false

  constructor(lengths: WindowingLengths) {
    this.config = validateWindowingLengths(lengths)
  }

  /**
   * Current window configuration
   */
  get lengths(): Readonly<WindowingLengths> {
    return { ...this.config }
  }

  /**
   * Number of buffered samples not yet released
   */
  get size(): number {
    return this.pending.length
  }

  /**
   * Append samples and return every window they complete, oldest first.
   * Each window is a copy; the last overlapLength samples of a window stay
   * buffered as the head of the next one.
   */
  feed(samples: Float32Array): Float32Array[] {
    if (samples.length > 0) {
      const next = new Float32Array(this.pending.length + samples.length)
      next.set(this.pending, 0)
      next.set(samples, this.pending.length)
      this.pending = next
    }

    const windows: Float32Array[] = []
    const { chunkLength, overlapLength, minLength } = this.config

    if (!this.primed) {
      if (this.pending.length < Math.max(chunkLength, minLength)) {
        return windows
      }
      this.primed = true
    }

    const hop = chunkLength - overlapLength
    let offset = 0

    while (this.pending.length - offset >= chunkLength) {
      windows.push(this.pending.slice(offset, offset + chunkLength))
      offset += hop
    }

    if (offset > 0) {
      this.pending = this.pending.slice(offset)
    }

    return windows
  }

  /**
   * Replace some or all lengths. Buffered samples are kept and reinterpreted
   * under the new lengths on the next feed; nothing is emitted here.
   */
  configure(update: Partial<WindowingLengths>): void {
    this.config = validateWindowingLengths({ ...this.config, ...update })
  }

  /**
   * Discard buffered samples
   */
  clear(): void {
    this.pending = new Float32Array(0)
    this.primed = false
  }
}
