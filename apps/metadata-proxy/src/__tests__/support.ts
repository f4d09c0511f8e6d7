import {createServer, type IncomingMessage, type Server, type ServerResponse} from 'node:http'
import type {AddressInfo} from 'node:net'

import {createStructuredLogger, LogEventSchema, type LogEvent} from '@metadata-guard/logging'

export type TestRequestListener = (request: IncomingMessage, response: ServerResponse) => void

const servers: Server[] = []

export const listen = async (listener: TestRequestListener) => {
  const server = createServer(listener)
  servers.push(server)
  await new Promise<void>(resolve => {
    server.listen(0, '127.0.0.1', () => resolve())
  })

  const address = server.address() as AddressInfo
  return `http://127.0.0.1:${String(address.port)}`
}

export const closeServers = async () => {
  await Promise.all(
    servers.splice(0).map(
      server =>
        new Promise<void>(resolve => {
          server.closeAllConnections()
          server.close(() => resolve())
        })
    )
  )
}

export const createBufferedLogger = () => {
  const lines: string[] = []
  const stream = {
    write: (chunk: unknown) => {
      lines.push(String(chunk).trim())
      return true
    }
  }

  const logger = createStructuredLogger({
    service: 'metadata-proxy',
    env: 'test',
    level: 'debug',
    writer: {stdout: stream, stderr: stream}
  })

  const events = (): LogEvent[] => lines.map(line => LogEventSchema.parse(JSON.parse(line)))

  return {logger, events}
}

/** URL of a port that was just released, so connections to it are refused. */
export const closedUrl = async () => {
  const server = createServer()
  await new Promise<void>(resolve => {
    server.listen(0, '127.0.0.1', () => resolve())
  })

  const address = server.address() as AddressInfo
  await new Promise<void>(resolve => {
    server.close(() => resolve())
  })

  return `http://127.0.0.1:${String(address.port)}`
}

export const readBody = async (request: IncomingMessage) => {
  const chunks: Buffer[] = []
  for await (const chunk of request) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }

  return Buffer.concat(chunks).toString('utf8')
}
