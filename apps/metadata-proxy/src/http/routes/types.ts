import type {IncomingMessage, ServerResponse} from 'node:http'

import type {AppError} from '../../errors'

export type HandlerSuccess = {
  status: number
}

export type HandlerFailure = {
  status: number
  error: AppError
  cause?: unknown
}

export type HandlerOutcome = HandlerSuccess | HandlerFailure

export type GuardedHandlerContext = {
  request: IncomingMessage
  response: ServerResponse
  signal: AbortSignal
  params: Record<string, string>
  identify: () => string
}

/**
 * Security-sensitive handler logic. Writes its own success body and reports failures
 * through the returned outcome; it never writes an error response itself.
 */
export type GuardedHandler = (context: GuardedHandlerContext) => Promise<HandlerOutcome>

export type PlainRouteHandler = (input: {request: IncomingMessage; response: ServerResponse}) => Promise<void>

export const succeeded = (status: number): HandlerSuccess => ({status})

export const failed = (error: AppError, cause?: unknown): HandlerFailure => ({
  status: error.status,
  error,
  ...(cause === undefined ? {} : {cause})
})

export const isHandlerFailure = (outcome: HandlerOutcome): outcome is HandlerFailure => 'error' in outcome
