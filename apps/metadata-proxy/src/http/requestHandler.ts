import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import type {UpstreamForwarder} from '@metadata-guard/forwarder'
import {runWithLogContext, setLogContextFields, type StructuredLogger} from '@metadata-guard/logging'
import type {MetricsRegistry} from '@metadata-guard/metrics'

import {createClientIdentityResolver} from '../clientIdentity'
import type {CredentialsProvider, FetchLike, RoleFinder} from '../collaborators/contracts'
import type {ServiceConfig} from '../config'
import {extractCorrelationId, sendError} from '../http'
import {createHandlerResponseMetrics} from '../metrics'
import {withRequestLifecycle, type GuardedRouteHandler} from './lifecycleGuard'
import {resolveRoute, type RouteKind} from './router'
import {createCredentialsHandler} from './routes/credentialsRoute'
import {createHealthHandler} from './routes/healthRoute'
import {createMetricsRoute} from './routes/metricsRoute'
import {createPassthroughRoute} from './routes/passthroughRoute'
import {handlePingRoute} from './routes/pingRoute'
import {createRoleListingHandler} from './routes/roleRoute'

export type MetadataProxyRequestHandlerDependencies = {
  config: Pick<ServiceConfig, 'allowIpQuery' | 'maxHandlerDurationMs' | 'metadataEndpoint'>
  logger: StructuredLogger
  registry: MetricsRegistry
  roleFinder: RoleFinder
  credentialsProvider: CredentialsProvider
  forwarder: UpstreamForwarder
  fetchImpl?: FetchLike
  now?: () => Date
}

export type MetadataProxyRequestHandler = (request: IncomingMessage, response: ServerResponse) => Promise<void>

const sanitizeRouteForLog = (rawUrl: string | undefined) => {
  if (!rawUrl) {
    return '/'
  }

  const routeWithoutQuery = rawUrl.split('?', 1)[0] ?? ''
  return routeWithoutQuery.length > 0 ? routeWithoutQuery : '/'
}

export const createMetadataProxyRequestHandler = ({
  config,
  logger,
  registry,
  roleFinder,
  credentialsProvider,
  forwarder,
  fetchImpl,
  now = () => new Date()
}: MetadataProxyRequestHandlerDependencies): MetadataProxyRequestHandler => {
  const guardOptions = {
    metrics: createHandlerResponseMetrics(registry),
    logger,
    resolveIdentity: createClientIdentityResolver({allowIpQuery: config.allowIpQuery}),
    maxHandlerDurationMs: config.maxHandlerDurationMs
  }

  const routes: Record<RouteKind, GuardedRouteHandler> = {
    metrics: createMetricsRoute({registry}),
    ping: handlePingRoute,
    health: withRequestLifecycle(
      'health',
      createHealthHandler({metadataEndpoint: config.metadataEndpoint, ...(fetchImpl ? {fetchImpl} : {})}),
      guardOptions
    ),
    roleName: withRequestLifecycle('roleName', createRoleListingHandler({roleFinder}), guardOptions),
    credentials: withRequestLifecycle(
      'credentials',
      createCredentialsHandler({roleFinder, credentialsProvider}),
      guardOptions
    ),
    passthrough: createPassthroughRoute({forwarder, logger})
  }

  return (request, response) => {
    const correlationId = extractCorrelationId(request)
    const startedAtMs = now().getTime()
    const method = request.method ?? 'GET'
    const route = sanitizeRouteForLog(request.url)

    return runWithLogContext(
      {
        correlation_id: correlationId,
        request_id: randomUUID(),
        route,
        method
      },
      async () => {
        let reasonCode: string | undefined

        logger.info({
          event: 'request.received',
          component: 'http.server',
          message: 'Request received'
        })

        try {
          const resolution = resolveRoute(request.url)
          switch (resolution.kind) {
            case 'route':
              setLogContextFields({route: resolution.pathname})
              await routes[resolution.route]({request, response, params: resolution.params})
              break
            case 'redirect':
              response.writeHead(301, {location: resolution.location, 'content-length': '0'})
              response.end()
              break
            case 'invalid':
              reasonCode = resolution.reason
              sendError({response, status: 400, message: 'Bad Request'})
              break
            case 'not_found':
              reasonCode = 'route_not_found'
              sendError({response, status: 404, message: 'Not Found'})
              break
          }
        } catch (error) {
          reasonCode = 'internal_error'
          logger.error({
            event: 'request.failed',
            component: 'http.server',
            message: 'Unexpected internal error',
            reason_code: 'internal_error',
            metadata: {error}
          })

          sendError({response, status: 500, message: 'Unexpected internal error'})
        } finally {
          const statusCode = response.statusCode
          const completion = {
            event: 'request.completed',
            component: 'http.server',
            message: 'Request completed',
            status_code: statusCode,
            duration_ms: Math.max(0, now().getTime() - startedAtMs),
            ...(reasonCode ? {reason_code: reasonCode} : {})
          }

          if (statusCode >= 500) {
            logger.error(completion)
          } else if (statusCode >= 400) {
            logger.warn(completion)
          } else {
            logger.info(completion)
          }
        }
      }
    )
  }
}
