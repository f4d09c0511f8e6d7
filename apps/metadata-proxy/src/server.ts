import {createServer, type Server} from 'node:http'
import type {AddressInfo} from 'node:net'

import type {StructuredLogger} from '@metadata-guard/logging'

import type {MetadataProxyRequestHandler} from './http/requestHandler'

export const SHUTDOWN_DRAIN_CEILING_MS = 5_000

export type MetadataProxyServerState = 'idle' | 'running' | 'draining' | 'stopped'

export type MetadataProxyServerOptions = {
  host: string
  port: number
  handler: MetadataProxyRequestHandler
  logger: StructuredLogger
  drainCeilingMs?: number
}

const formatListenAddress = (address: AddressInfo) =>
  address.family === 'IPv6' ? `[${address.address}]:${String(address.port)}` : `${address.address}:${String(address.port)}`

/** Raised by start() when stop() wins the race against the listen call. */
export class ServerStoppedError extends Error {
  public constructor() {
    super('Server stopped before listening')
    this.name = 'ServerStoppedError'
  }
}

/**
 * Owns the listening socket. State transitions happen synchronously, so concurrent
 * start/stop calls on the event loop always observe a consistent state.
 */
export class MetadataProxyServer {
  private state: MetadataProxyServerState = 'idle'
  private server: Server | undefined
  private closed: Promise<void> | undefined
  private drain: Promise<void> | undefined

  public constructor(private readonly options: MetadataProxyServerOptions) {}

  public get currentState(): MetadataProxyServerState {
    return this.state
  }

  public address(): AddressInfo | undefined {
    const address = this.server?.address()
    return address !== null && typeof address === 'object' ? address : undefined
  }

  public async start(): Promise<AddressInfo> {
    if (this.state !== 'idle') {
      throw new Error(`Server cannot start from state ${this.state}`)
    }

    const {host, port, handler, logger} = this.options
    const server = createServer((request, response) => {
      // Keep-alive sockets freed during a drain are closed instead of lingering.
      response.once('finish', () => {
        if (this.state === 'draining') {
          setImmediate(() => server.closeIdleConnections())
        }
      })

      handler(request, response).catch((error: unknown) => {
        logger.error({
          event: 'request.unhandled',
          component: 'http.server',
          message: 'Request handler rejected',
          metadata: {error}
        })
        response.destroy()
      })
    })

    this.state = 'running'
    this.server = server
    this.closed = new Promise<void>(resolve => {
      server.once('close', () => resolve())
    })

    let listening: boolean
    try {
      listening = await new Promise<boolean>((resolve, reject) => {
        const settle = () => {
          server.off('error', onError)
          server.off('close', onClose)
        }
        const onError = (error: Error) => {
          settle()
          reject(error)
        }
        const onClose = () => {
          settle()
          resolve(false)
        }

        server.once('error', onError)
        server.once('close', onClose)
        server.listen(port, host, () => {
          settle()
          // A bind that completes after stop() must not outlive the drain.
          if (this.state !== 'running') {
            server.close()
          }
          resolve(true)
        })
      })
    } catch (error) {
      this.state = 'stopped'
      this.server = undefined
      throw error
    }

    if (!listening || this.state !== 'running') {
      throw new ServerStoppedError()
    }

    const address = this.address()
    if (!address) {
      throw new Error('Server is listening without a network address')
    }

    logger.info({
      event: 'server.listening',
      component: 'server.lifecycle',
      message: `Listening on ${formatListenAddress(address)}`,
      metadata: {host: address.address, port: address.port}
    })

    return address
  }

  /** Starts the server and settles once it has fully closed, or when stopped before it listened. */
  public async serve(): Promise<void> {
    try {
      await this.start()
    } catch (error) {
      if (error instanceof ServerStoppedError) {
        return
      }
      throw error
    }
    await this.closed
  }

  /**
   * Stops accepting connections and drains in-flight requests. Connections still open
   * after the drain ceiling, or once the caller's signal aborts, are closed forcibly.
   * Stopping an idle server does nothing, and repeated calls share one drain.
   */
  public async stop({signal}: {signal?: AbortSignal} = {}): Promise<void> {
    const server = this.server
    if (this.state === 'idle' || !server) {
      return
    }

    if (!this.drain) {
      this.state = 'draining'
      this.drain = this.drainServer(server, signal)
    }

    return this.drain
  }

  private async drainServer(server: Server, signal: AbortSignal | undefined): Promise<void> {
    const {logger, drainCeilingMs = SHUTDOWN_DRAIN_CEILING_MS} = this.options

    logger.info({
      event: 'server.shutdown.started',
      component: 'server.lifecycle',
      message: 'Draining in-flight requests'
    })

    const closed = new Promise<void>(resolve => {
      server.close(error => {
        if (error) {
          logger.warn({
            event: 'server.shutdown.close_failed',
            component: 'server.lifecycle',
            message: error.message
          })
        }
        resolve()
      })
    })
    server.closeIdleConnections()

    let ceilingTimer: NodeJS.Timeout | undefined
    let onAbort: (() => void) | undefined
    const forced = new Promise<'forced'>(resolve => {
      ceilingTimer = setTimeout(() => resolve('forced'), drainCeilingMs)
      onAbort = () => resolve('forced')
      if (signal?.aborted) {
        resolve('forced')
      } else {
        signal?.addEventListener('abort', onAbort, {once: true})
      }
    })

    const result = await Promise.race([closed.then(() => 'drained' as const), forced])
    clearTimeout(ceilingTimer)
    if (onAbort) {
      signal?.removeEventListener('abort', onAbort)
    }

    if (result === 'forced') {
      server.closeAllConnections()
      await closed
    }

    this.state = 'stopped'
    logger.info({
      event: 'server.shutdown.completed',
      component: 'server.lifecycle',
      message: result === 'forced' ? 'Server stopped after forcing open connections closed' : 'Server drained',
      metadata: {forced: result === 'forced'}
    })
  }
}
