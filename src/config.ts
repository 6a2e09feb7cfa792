import { cosmiconfigSync } from 'cosmiconfig'
import { z } from 'zod'

import { ConfigurationError } from './core/errors.js'

const HttpUrlSchema = z.string().min(1).refine((value) => {
  try {
    const parsed = new URL(value)
    return parsed.protocol === 'http:' || parsed.protocol === 'https:'
  } catch {
    return false
  }
}, 'must be a valid http:// or https:// URL')

const ServerSectionSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(0).max(65_535).default(8765),
  path: z
    .string()
    .min(1)
    .default('/ws/detect')
    .refine((value) => value.startsWith('/'), 'server.path must start with "/"'),
  heartbeatIntervalMs: z.number().int().nonnegative().default(15_000),
  maxPayloadBytes: z.number().int().positive().default(10 * 1024 * 1024),
  idleTimeoutMs: z.number().int().nonnegative().default(0)
})

const WindowingSectionSchema = z
  .object({
    sampleRate: z.number().int().min(8000).max(48_000).default(16_000),
    chunkDuration: z.number().positive().default(1.0),
    overlapDuration: z.number().nonnegative().default(0.5),
    minDuration: z.number().nonnegative().default(0.5),
    maxWindowDuration: z.number().positive().default(10)
  })
  .refine((value) => value.overlapDuration < value.chunkDuration, {
    message: 'overlapDuration must be smaller than chunkDuration',
    path: ['overlapDuration']
  })
  .refine((value) => value.chunkDuration <= value.maxWindowDuration, {
    message: 'chunkDuration must not exceed maxWindowDuration',
    path: ['chunkDuration']
  })
  .refine((value) => value.minDuration <= value.maxWindowDuration, {
    message: 'minDuration must not exceed maxWindowDuration',
    path: ['minDuration']
  })

const SessionsSectionSchema = z.object({
  duplicatePolicy: z.enum(['reject', 'replace']).default('reject')
})

const ClassifierSectionSchema = z.object({
  baseUrl: HttpUrlSchema.default('http://127.0.0.1:8000'),
  timeoutMs: z.number().int().positive().default(10_000),
  warmup: z.boolean().default(true)
})

const LoggingSectionSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')
})

const ServerConfigSchema = z.object({
  server: ServerSectionSchema.default({}),
  windowing: WindowingSectionSchema.default({}),
  sessions: SessionsSectionSchema.default({}),
  classifier: ClassifierSectionSchema.default({}),
  logging: LoggingSectionSchema.default({})
})

export type ServerConfig = z.infer<typeof ServerConfigSchema>

/**
 * Validate an in-memory configuration object and fill in defaults
 */
export function parseServerConfig(raw: unknown, source = 'configuration'): ServerConfig {
  const parsed = ServerConfigSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`invalid config in ${source}: ${details}`)
  }

  return parsed.data
}

/**
 * Load detector.config.local.json or detector.config.json from the working
 * directory. Missing files mean defaults.
 */
export function loadServerConfig(searchFrom: string = process.cwd()): ServerConfig {
  const explorer = cosmiconfigSync('detector', {
    searchPlaces: ['detector.config.local.json', 'detector.config.json'],
    stopDir: searchFrom
  })

  const result = explorer.search(searchFrom)

  if (!result || result.isEmpty) {
    return parseServerConfig({})
  }

  return parseServerConfig(result.config, result.filepath)
}
