/**
 * Stable error codes sent to clients in `error` messages
 */
export type ErrorCode =
  | 'MALFORMED_PAYLOAD'
  | 'UNSUPPORTED_ENCODING'
  | 'SAMPLE_RATE_MISMATCH'
  | 'DUPLICATE_CONNECTION'
  | 'MODEL_UNAVAILABLE'
  | 'INFERENCE_ERROR'
  | 'PROTOCOL_VIOLATION'
  | 'TRANSPORT_FAILURE'
  | 'CONFIGURATION_ERROR'
  | 'DETECTION_CANCELLED'
  | 'INTERNAL_ERROR'

/**
 * Base class for every failure the server reports
 */
export class DetectionServerError extends Error {
  public readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'DetectionServerError'
    this.code = code
  }
}

export class MalformedPayloadError extends DetectionServerError {
  constructor(message: string) {
    super('MALFORMED_PAYLOAD', message)
    this.name = 'MalformedPayloadError'
  }
}

export class UnsupportedEncodingError extends DetectionServerError {
  public readonly encoding: string

  constructor(encoding: string) {
    super('UNSUPPORTED_ENCODING', `Unsupported encoding: ${encoding}`)
    this.name = 'UnsupportedEncodingError'
    this.encoding = encoding
  }
}

export class SampleRateMismatchError extends DetectionServerError {
  constructor(declared: number, committed: number) {
    super(
      'SAMPLE_RATE_MISMATCH',
      `Sample rate ${declared} Hz does not match the connection rate of ${committed} Hz`
    )
    this.name = 'SampleRateMismatchError'
  }
}

export class DuplicateConnectionError extends DetectionServerError {
  public readonly clientId: string

  constructor(clientId: string) {
    super('DUPLICATE_CONNECTION', `Client ${clientId} is already connected`)
    this.name = 'DuplicateConnectionError'
    this.clientId = clientId
  }
}

export class ModelUnavailableError extends DetectionServerError {
  constructor(message: string = 'Detection model is not ready') {
    super('MODEL_UNAVAILABLE', message)
    this.name = 'ModelUnavailableError'
  }
}

export class InferenceError extends DetectionServerError {
  constructor(message: string, cause?: unknown) {
    super('INFERENCE_ERROR', message, { cause })
    this.name = 'InferenceError'
  }
}

export class ProtocolViolationError extends DetectionServerError {
  constructor(message: string) {
    super('PROTOCOL_VIOLATION', message)
    this.name = 'ProtocolViolationError'
  }
}

export class TransportFailureError extends DetectionServerError {
  constructor(message: string, cause?: unknown) {
    super('TRANSPORT_FAILURE', message, { cause })
    this.name = 'TransportFailureError'
  }
}

export class ConfigurationError extends DetectionServerError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message)
    this.name = 'ConfigurationError'
  }
}

/**
 * Raised when a detection is aborted because its session is closing.
 * Never sent to the client.
 */
export class DetectionCancelledError extends DetectionServerError {
  constructor() {
    super('DETECTION_CANCELLED', 'Detection cancelled')
    this.name = 'DetectionCancelledError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
