export * from './decoder.js'
export * from './detection.js'
export * from './errors.js'
export * from './http.js'
export * from './logger.js'
export * from './protocol.js'
export * from './registry.js'
export * from './session.js'
export * from './websocket.js'
export * from './windowing.js'
