import {mkdtemp, rm, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'

import {afterEach, describe, expect, it, vi} from 'vitest'

import {createMetadataProxyApp, type MetadataProxyApp} from '../app'
import type {FetchLike} from '../collaborators/contracts'
import type {ServiceConfig} from '../config'
import {closeServers, listen, readBody} from './support'

const makeConfig = (overrides: Partial<ServiceConfig> = {}): ServiceConfig => ({
  nodeEnv: 'test',
  host: '127.0.0.1',
  port: 0,
  metadataEndpoint: 'http://127.0.0.1:1',
  allowIpQuery: true,
  maxHandlerDurationMs: 5_000,
  forwarder: {total_timeout_ms: 2_000},
  logging: {level: 'silent'},
  ...overrides
})

let activeApp: MetadataProxyApp | null = null
const directories: string[] = []

afterEach(async () => {
  if (activeApp) {
    await activeApp.stop()
    activeApp = null
  }
  await closeServers()
  await Promise.all(directories.splice(0).map(directory => rm(directory, {recursive: true, force: true})))
})

const startApp = async (input: Parameters<typeof createMetadataProxyApp>[0]) => {
  const app = await createMetadataProxyApp(input)
  activeApp = app
  const {port} = await app.start()
  return `http://127.0.0.1:${String(port)}`
}

describe('metadata proxy app', () => {
  it('serves roles from the role map file and credentials from the credentials service', async () => {
    const directory = await mkdtemp(join(tmpdir(), 'metadata-guard-app-'))
    directories.push(directory)
    const roleMapPath = join(directory, 'roles.json')
    await writeFile(roleMapPath, JSON.stringify({'10.0.0.5': 'app-role'}), 'utf8')

    const issued = {
      Code: 'Success',
      LastUpdated: '2026-03-01T12:00:00Z',
      Type: 'AWS-HMAC',
      AccessKeyId: 'test-access-key',
      SecretAccessKey: 'test-secret',
      Token: 'test-token',
      Expiration: '2026-03-01T13:00:00Z'
    }
    const fetchImpl = vi.fn<FetchLike>(async () => Response.json(issued))

    const url = await startApp({
      config: makeConfig({
        roleMapPath,
        credentials: {baseUrl: 'http://credentials.internal:9000', timeoutMs: 1_000}
      }),
      fetchImpl
    })

    const role = await fetch(`${url}/latest/meta-data/iam/security-credentials/?ip=10.0.0.5`)
    expect(await role.text()).toBe('app-role')

    const credentials = await fetch(`${url}/latest/meta-data/iam/security-credentials/app-role?ip=10.0.0.5`)
    expect(credentials.status).toBe(200)
    expect(await credentials.json()).toEqual(issued)
    expect(String(fetchImpl.mock.calls[0]?.[0])).toBe('http://credentials.internal:9000/v1/roles/app-role/credentials')
  })

  it('answers 404 for every workload without a role map', async () => {
    const url = await startApp({config: makeConfig()})

    const response = await fetch(`${url}/latest/meta-data/iam/security-credentials/?ip=10.0.0.5`)

    expect(response.status).toBe(404)
  })

  it('answers 503 for credentials when no credentials service is configured', async () => {
    const url = await startApp({
      config: makeConfig(),
      roleFinder: {findRoleForIdentity: async () => 'app-role'}
    })

    const response = await fetch(`${url}/latest/meta-data/iam/security-credentials/app-role?ip=10.0.0.5`)

    expect(response.status).toBe(503)
    expect(await response.text()).toBe('No credentials service is configured\n')
  })

  it('forwards unmatched paths to the configured metadata endpoint', async () => {
    const upstream = await listen((request, response) => {
      void readBody(request).then(() => {
        response.writeHead(200, {'content-type': 'text/plain'})
        response.end(`ami-id for ${request.url ?? ''}`)
      })
    })
    const url = await startApp({config: makeConfig({metadataEndpoint: upstream})})

    const response = await fetch(`${url}/latest/meta-data/ami-id`)

    expect(response.status).toBe(200)
    expect(await response.text()).toBe('ami-id for /latest/meta-data/ami-id')
  })

  it('fails to build when the role map cannot be read', async () => {
    await expect(
      createMetadataProxyApp({config: makeConfig({roleMapPath: join(tmpdir(), 'metadata-guard-missing', 'roles.json')})})
    ).rejects.toMatchObject({code: 'ENOENT'})
  })
})
