import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

const DEFAULT_SECURITY_HEADERS: Record<string, string> = {
  'x-content-type-options': 'nosniff',
  'cache-control': 'no-store'
}

export const extractCorrelationId = (request: IncomingMessage) => {
  const header = request.headers['x-correlation-id']
  const value = Array.isArray(header) ? header[0] : header
  if (typeof value !== 'string') {
    return randomUUID()
  }

  const trimmed = value.trim()
  if (trimmed.length === 0 || trimmed.length > 128) {
    return randomUUID()
  }

  return trimmed
}

export const readQueryParam = ({request, name}: {request: {url?: string}; name: string}) => {
  const rawUrl = request.url ?? ''
  const queryIndex = rawUrl.indexOf('?')
  if (queryIndex === -1) {
    return undefined
  }

  const value = new URLSearchParams(rawUrl.slice(queryIndex + 1)).get(name)
  return value === null ? undefined : value
}

const send = ({
  response,
  status,
  contentType,
  body,
  headers
}: {
  response: ServerResponse
  status: number
  contentType: string
  body: Buffer
  headers?: Record<string, string>
}) => {
  // A response the lifecycle guard already completed is left alone.
  if (response.writableEnded) {
    return
  }

  response.writeHead(status, {
    ...DEFAULT_SECURITY_HEADERS,
    'content-type': contentType,
    'content-length': String(body.length),
    ...(headers ?? {})
  })

  response.end(body)
}

export const sendText = ({
  response,
  status,
  body,
  contentType = 'text/plain; charset=utf-8'
}: {
  response: ServerResponse
  status: number
  body: string
  contentType?: string
}) => {
  send({response, status, contentType, body: Buffer.from(body, 'utf8')})
}

export const sendJson = ({
  response,
  status,
  payload,
  headers
}: {
  response: ServerResponse
  status: number
  payload: unknown
  headers?: Record<string, string>
}) => {
  send({
    response,
    status,
    contentType: 'application/json',
    body: Buffer.from(JSON.stringify(payload), 'utf8'),
    ...(headers ? {headers} : {})
  })
}

export const sendError = ({
  response,
  status,
  message,
  headers
}: {
  response: ServerResponse
  status: number
  message: string
  headers?: Record<string, string>
}) => {
  if (response.writableEnded) {
    return
  }

  if (response.headersSent || response.destroyed) {
    response.destroy()
    return
  }

  send({
    response,
    status,
    contentType: 'text/plain; charset=utf-8',
    body: Buffer.from(`${message}\n`, 'utf8'),
    ...(headers ? {headers} : {})
  })
}
