import type {IncomingMessage, ServerResponse} from 'node:http'

import {setLogContextFields, type StructuredLogger} from '@metadata-guard/logging'

import type {ClientIdentityResolver} from '../clientIdentity'
import {gatewayTimeout, toClientError} from '../errors'
import {sendError} from '../http'
import type {GuardedHandlerName, HandlerResponseMetrics} from '../metrics'
import {failed, isHandlerFailure, type GuardedHandler, type HandlerOutcome} from './routes/types'

export const HANDLER_MAX_DURATION_MS = 5_000

export type RequestLifecycleGuardOptions = {
  metrics: HandlerResponseMetrics
  logger: StructuredLogger
  resolveIdentity: ClientIdentityResolver
  maxHandlerDurationMs: number
}

export type GuardedRouteHandler = (input: {
  request: IncomingMessage
  response: ServerResponse
  params: Record<string, string>
}) => Promise<void>

const describeCause = (cause: unknown) => {
  if (cause instanceof Error) {
    return {name: cause.name, message: cause.message}
  }

  return cause === undefined ? undefined : {message: String(cause)}
}

const handlerTimeout = () => failed(gatewayTimeout('handler_timeout', 'Handler did not complete in time'))

/**
 * Runs a security-sensitive handler under a bounded deadline. The handler is raced
 * against the deadline, its outcome is counted exactly once per request, and any
 * failure is logged and written here. Handlers never write error responses.
 */
export const withRequestLifecycle = (
  name: GuardedHandlerName,
  handler: GuardedHandler,
  {metrics, logger, resolveIdentity, maxHandlerDurationMs}: RequestLifecycleGuardOptions
): GuardedRouteHandler => {
  const deadlineMs = Math.min(maxHandlerDurationMs, HANDLER_MAX_DURATION_MS)

  return async ({request, response, params}) => {
    const controller = new AbortController()
    const abortOnClientClose = () => {
      if (!response.writableEnded) {
        controller.abort()
      }
    }
    response.once('close', abortOnClientClose)

    let deadlineTimer: NodeJS.Timeout | undefined
    const deadline = new Promise<HandlerOutcome>(resolve => {
      deadlineTimer = setTimeout(() => {
        controller.abort()
        resolve(handlerTimeout())
      }, deadlineMs)
    })

    const identify = () => {
      const identity = resolveIdentity(request)
      setLogContextFields({workload_ip: identity})
      return identity
    }

    const invocation = (async (): Promise<HandlerOutcome> => {
      try {
        return await handler({request, response, signal: controller.signal, params, identify})
      } catch (error) {
        return failed(toClientError(error), error)
      }
    })()

    let outcome: HandlerOutcome
    try {
      outcome = await Promise.race([invocation, deadline])
    } finally {
      clearTimeout(deadlineTimer)
      response.off('close', abortOnClientClose)
    }

    metrics.record({handler: name, status: outcome.status})

    if (!isHandlerFailure(outcome)) {
      return
    }

    logger.error({
      event: 'request.failed',
      component: 'http.guard',
      message: outcome.error.message,
      reason_code: outcome.error.code,
      status_code: outcome.error.status,
      metadata: {
        handler: name,
        ...(outcome.cause === undefined ? {} : {cause: describeCause(outcome.cause)})
      }
    })

    sendError({response, status: outcome.error.status, message: outcome.error.message})
  }
}
