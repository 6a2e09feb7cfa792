import {
  MalformedPayloadError,
  SampleRateMismatchError,
  UnsupportedEncodingError
} from './errors.js'

/** Bytes per float32 sample */
const FLOAT32_BYTES = 4

/** Accepted sample rate range in Hz */
export const MIN_SAMPLE_RATE = 8000
export const MAX_SAMPLE_RATE = 48000

export type AudioEncoding = 'base64' | 'json'

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/

/**
 * Decode a wire audio payload into mono float32 samples
 * @param payload `audio_data` field as received
 * @param encoding Declared encoding ('base64' for little-endian float32 bytes, 'json' for a numeric array)
 * @param sampleRate Declared sample rate, validated but not applied
 * @returns Samples in arrival order
 */
export function decodeSamples(payload: unknown, encoding: string, sampleRate: number): Float32Array {
  if (encoding !== 'base64' && encoding !== 'json') {
    throw new UnsupportedEncodingError(encoding)
  }

  validateSampleRate(sampleRate)

  return encoding === 'base64' ? decodeBase64(payload) : decodeJsonArray(payload)
}

/**
 * Check a declared rate against the rate a connection committed to
 */
export function assertSampleRate(declared: number, committed: number | null): void {
  if (committed !== null && declared !== committed) {
    throw new SampleRateMismatchError(declared, committed)
  }
}

export function validateSampleRate(sampleRate: number): void {
  if (!Number.isInteger(sampleRate) || sampleRate < MIN_SAMPLE_RATE || sampleRate > MAX_SAMPLE_RATE) {
    throw new MalformedPayloadError(
      `Sample rate ${sampleRate} Hz is out of range [${MIN_SAMPLE_RATE}, ${MAX_SAMPLE_RATE}]`
    )
  }
}

/**
 * Encode float32 samples as base64 little-endian bytes (the inverse of the 'base64' encoding)
 */
export function encodeSamplesBase64(samples: Float32Array): string {
  const bytes = Buffer.alloc(samples.length * FLOAT32_BYTES)
  for (let i = 0; i < samples.length; i++) {
    bytes.writeFloatLE(samples[i] ?? 0, i * FLOAT32_BYTES)
  }
  return bytes.toString('base64')
}

function decodeBase64(payload: unknown): Float32Array {
  if (typeof payload !== 'string') {
    throw new MalformedPayloadError('base64 audio_data must be a string')
  }

  const text = payload.trim()
  if (text.length === 0) {
    throw new MalformedPayloadError('Missing audio_data')
  }

  if (!BASE64_PATTERN.test(text)) {
    throw new MalformedPayloadError('audio_data is not valid base64')
  }

  const bytes = Buffer.from(text, 'base64')
  if (bytes.length % FLOAT32_BYTES !== 0) {
    throw new MalformedPayloadError(
      `Decoded audio length ${bytes.length} is not a multiple of ${FLOAT32_BYTES} bytes`
    )
  }

  const samples = new Float32Array(bytes.length / FLOAT32_BYTES)
  for (let i = 0; i < samples.length; i++) {
    samples[i] = bytes.readFloatLE(i * FLOAT32_BYTES)
  }

  return assertFinite(samples)
}

function decodeJsonArray(payload: unknown): Float32Array {
  let values: unknown = payload

  if (typeof payload === 'string') {
    if (payload.trim().length === 0) {
      throw new MalformedPayloadError('Missing audio_data')
    }

    try {
      values = JSON.parse(payload)
    } catch {
      throw new MalformedPayloadError('audio_data is not valid JSON')
    }
  }

  if (!Array.isArray(values)) {
    throw new MalformedPayloadError('json audio_data must be an array of numbers')
  }

  if (values.length === 0) {
    throw new MalformedPayloadError('Missing audio_data')
  }

  const samples = new Float32Array(values.length)
  for (let i = 0; i < values.length; i++) {
    const value: unknown = values[i]
    if (typeof value !== 'number') {
      throw new MalformedPayloadError(`audio_data[${i}] is not a number`)
    }
    samples[i] = value
  }

  return assertFinite(samples)
}

function assertFinite(samples: Float32Array): Float32Array {
  for (let i = 0; i < samples.length; i++) {
    if (!Number.isFinite(samples[i])) {
      throw new MalformedPayloadError('Audio contains NaN or Inf values')
    }
  }
  return samples
}
