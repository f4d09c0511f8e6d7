import {fileURLToPath} from 'node:url'

import {createStructuredLogger} from '@metadata-guard/logging'

import {createMetadataProxyApp} from './app'
import {loadConfig} from './config'

export const appName = 'metadata-proxy'

export * from './app'
export * from './clientIdentity'
export * from './collaborators/contracts'
export * from './collaborators/httpCredentialsProvider'
export * from './collaborators/staticRoleFinder'
export * from './config'
export * from './errors'
export * from './http/lifecycleGuard'
export * from './http/requestHandler'
export * from './http/router'
export * from './server'

const main = async () => {
  const config = loadConfig(process.env)
  const app = await createMetadataProxyApp({config})

  const shutdown = async () => {
    try {
      await app.stop()
      process.exit(0)
    } catch (error) {
      app.logger.fatal({
        event: 'process.shutdown.failed',
        component: 'process.entrypoint',
        message: 'Metadata proxy shutdown failed',
        metadata: {error}
      })
      process.exit(1)
    }
  }

  process.on('SIGINT', () => {
    void shutdown()
  })
  process.on('SIGTERM', () => {
    void shutdown()
  })

  await app.serve()
}

const isMainModule = (() => {
  const currentFile = fileURLToPath(import.meta.url)
  const entryFile = process.argv[1]
  if (!entryFile) {
    return false
  }

  return currentFile === entryFile
})()

if (isMainModule) {
  void main().catch(error => {
    const env = process.env.NODE_ENV === 'production' ? 'production' : process.env.NODE_ENV === 'test' ? 'test' : 'development'
    const startupLogger = createStructuredLogger({
      service: appName,
      env,
      level: 'error'
    })
    startupLogger.fatal({
      event: 'process.startup.failed',
      component: 'process.entrypoint',
      message: 'Metadata proxy startup failed',
      reason_code: 'startup_failed',
      metadata: {
        error
      }
    })
    process.exit(1)
  })
}
