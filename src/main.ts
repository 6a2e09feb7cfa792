import { loadServerConfig } from './config.js'
import { errorMessage } from './core/errors.js'
import { createConsoleLogger } from './core/logger.js'
import { DetectionServer } from './index.js'
import { HttpClassifier } from './plugins/http-classifier.js'

const config = loadServerConfig()
const logger = createConsoleLogger('detector', config.logging.level)

const classifier = new HttpClassifier(
  {
    baseUrl: config.classifier.baseUrl,
    timeoutMs: config.classifier.timeoutMs,
    warmupInference: config.classifier.warmup,
    warmupSampleRate: config.windowing.sampleRate
  },
  createConsoleLogger('classifier', config.logging.level)
)

const server = new DetectionServer({ config, classifier, logger })

let stopping = false
const shutdown = (signal: string): void => {
  if (stopping) {
    return
  }
  stopping = true
  logger.info(`received ${signal}, shutting down`)

  server
    .stop()
    .then(() => process.exit(0))
    .catch((error) => {
      logger.error(`shutdown failed: ${errorMessage(error)}`)
      process.exit(1)
    })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))

server.start().catch((error) => {
  logger.error(`failed to start: ${errorMessage(error)}`)
  process.exit(1)
})
