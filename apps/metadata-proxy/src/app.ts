import {createUpstreamForwarder} from '@metadata-guard/forwarder'
import {createStructuredLogger, type StructuredLogger} from '@metadata-guard/logging'
import {MetricsRegistry} from '@metadata-guard/metrics'

import type {CredentialsProvider, FetchLike, RoleFinder} from './collaborators/contracts'
import {createHttpCredentialsProvider} from './collaborators/httpCredentialsProvider'
import {createStaticRoleFinder, loadRoleMapFile} from './collaborators/staticRoleFinder'
import type {ServiceConfig} from './config'
import {serviceUnavailable} from './errors'
import {createMetadataProxyRequestHandler} from './http/requestHandler'
import {MetadataProxyServer} from './server'

export const METRICS_PREFIX = 'metadata_guard'

const unconfiguredCredentialsProvider: CredentialsProvider = {
  credentialsForRole: async () => {
    throw serviceUnavailable('credentials_unconfigured', 'No credentials service is configured')
  }
}

const buildRoleFinder = async (config: ServiceConfig): Promise<RoleFinder> =>
  createStaticRoleFinder(config.roleMapPath ? await loadRoleMapFile(config.roleMapPath) : {})

const buildCredentialsProvider = (config: ServiceConfig, fetchImpl: FetchLike | undefined): CredentialsProvider =>
  config.credentials
    ? createHttpCredentialsProvider({
        baseUrl: config.credentials.baseUrl,
        timeoutMs: config.credentials.timeoutMs,
        ...(fetchImpl ? {fetchImpl} : {})
      })
    : unconfiguredCredentialsProvider

export const createMetadataProxyApp = async ({
  config,
  logger,
  registry,
  roleFinder,
  credentialsProvider,
  fetchImpl,
  now
}: {
  config: ServiceConfig
  logger?: StructuredLogger
  registry?: MetricsRegistry
  roleFinder?: RoleFinder
  credentialsProvider?: CredentialsProvider
  fetchImpl?: FetchLike
  now?: () => Date
}) => {
  const appLogger =
    logger ??
    createStructuredLogger({
      service: 'metadata-proxy',
      env: config.nodeEnv,
      level: config.logging.level
    })
  const appRegistry = registry ?? new MetricsRegistry({prefix: METRICS_PREFIX})

  const handler = createMetadataProxyRequestHandler({
    config,
    logger: appLogger,
    registry: appRegistry,
    roleFinder: roleFinder ?? (await buildRoleFinder(config)),
    credentialsProvider: credentialsProvider ?? buildCredentialsProvider(config, fetchImpl),
    forwarder: createUpstreamForwarder({
      base_url: config.metadataEndpoint,
      timeouts: config.forwarder
    }),
    ...(fetchImpl ? {fetchImpl} : {}),
    ...(now ? {now} : {})
  })

  const server = new MetadataProxyServer({
    host: config.host,
    port: config.port,
    handler,
    logger: appLogger
  })

  return {
    server,
    registry: appRegistry,
    logger: appLogger,
    start: () => server.start(),
    serve: () => server.serve(),
    stop: (options?: {signal?: AbortSignal}) => server.stop(options)
  }
}

export type MetadataProxyApp = Awaited<ReturnType<typeof createMetadataProxyApp>>
