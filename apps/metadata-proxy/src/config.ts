import {LogLevelSchema, type LogLevel} from '@metadata-guard/logging'
import {z} from 'zod'

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().positive())

const portFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().gte(0).lte(65_535))

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value
  }

  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1') {
    return true
  }
  if (normalized === 'false' || normalized === '0') {
    return false
  }

  return value
}, z.boolean())

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const isHttpUrl = (value: string) => {
  try {
    const {protocol} = new URL(value)
    return protocol === 'http:' || protocol === 'https:'
  } catch {
    return false
  }
}

const httpUrl = z.string().trim().refine(isHttpUrl, 'must be an http or https URL')

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    METADATA_GUARD_HOST: z.string().trim().min(1).default('0.0.0.0'),
    METADATA_GUARD_PORT: portFromEnv.default(8181),
    METADATA_GUARD_METADATA_ENDPOINT: httpUrl.default('http://169.254.169.254'),
    METADATA_GUARD_ALLOW_IP_QUERY: booleanFromEnv.default(false),
    METADATA_GUARD_MAX_HANDLER_DURATION_MS: numberFromEnv.default(5_000),
    METADATA_GUARD_FORWARDER_TIMEOUT_MS: numberFromEnv.default(10_000),
    METADATA_GUARD_LOG_LEVEL: LogLevelSchema.optional(),
    METADATA_GUARD_ROLE_MAP_PATH: optionalString,
    METADATA_GUARD_CREDENTIALS_URL: optionalString.pipe(httpUrl.optional()),
    METADATA_GUARD_CREDENTIALS_TIMEOUT_MS: numberFromEnv.default(5_000)
  })
  .strict()

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  metadataEndpoint: string
  allowIpQuery: boolean
  maxHandlerDurationMs: number
  forwarder: {
    total_timeout_ms: number
  }
  logging: {
    level: LogLevel
  }
  roleMapPath?: string
  credentials?: {
    baseUrl: string
    timeoutMs: number
  }
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  METADATA_GUARD_HOST: env.METADATA_GUARD_HOST,
  METADATA_GUARD_PORT: env.METADATA_GUARD_PORT,
  METADATA_GUARD_METADATA_ENDPOINT: env.METADATA_GUARD_METADATA_ENDPOINT,
  METADATA_GUARD_ALLOW_IP_QUERY: env.METADATA_GUARD_ALLOW_IP_QUERY,
  METADATA_GUARD_MAX_HANDLER_DURATION_MS: env.METADATA_GUARD_MAX_HANDLER_DURATION_MS,
  METADATA_GUARD_FORWARDER_TIMEOUT_MS: env.METADATA_GUARD_FORWARDER_TIMEOUT_MS,
  METADATA_GUARD_LOG_LEVEL: env.METADATA_GUARD_LOG_LEVEL,
  METADATA_GUARD_ROLE_MAP_PATH: env.METADATA_GUARD_ROLE_MAP_PATH,
  METADATA_GUARD_CREDENTIALS_URL: env.METADATA_GUARD_CREDENTIALS_URL,
  METADATA_GUARD_CREDENTIALS_TIMEOUT_MS: env.METADATA_GUARD_CREDENTIALS_TIMEOUT_MS
})

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env))

  if (parsed.NODE_ENV === 'production' && parsed.METADATA_GUARD_ALLOW_IP_QUERY) {
    throw new Error('METADATA_GUARD_ALLOW_IP_QUERY must not be enabled in production')
  }

  const credentialsUrl = parsed.METADATA_GUARD_CREDENTIALS_URL

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.METADATA_GUARD_HOST,
    port: parsed.METADATA_GUARD_PORT,
    metadataEndpoint: parsed.METADATA_GUARD_METADATA_ENDPOINT,
    allowIpQuery: parsed.METADATA_GUARD_ALLOW_IP_QUERY,
    maxHandlerDurationMs: parsed.METADATA_GUARD_MAX_HANDLER_DURATION_MS,
    forwarder: {
      total_timeout_ms: parsed.METADATA_GUARD_FORWARDER_TIMEOUT_MS
    },
    logging: {
      level: parsed.METADATA_GUARD_LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info')
    },
    ...(parsed.METADATA_GUARD_ROLE_MAP_PATH ? {roleMapPath: parsed.METADATA_GUARD_ROLE_MAP_PATH} : {}),
    ...(credentialsUrl
      ? {
          credentials: {
            baseUrl: credentialsUrl,
            timeoutMs: parsed.METADATA_GUARD_CREDENTIALS_TIMEOUT_MS
          }
        }
      : {})
  }
}
