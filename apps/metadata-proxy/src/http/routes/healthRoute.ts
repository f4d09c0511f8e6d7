import {serviceUnavailable} from '../../errors'
import {sendText} from '../../http'
import type {FetchLike} from '../../collaborators/contracts'
import {failed, succeeded, type GuardedHandler} from './types'

export const HEALTH_PROBE_PATH = '/latest/meta-data/instance-id'

export const createHealthHandler = ({
  metadataEndpoint,
  fetchImpl = fetch
}: {
  metadataEndpoint: string
  fetchImpl?: FetchLike
}): GuardedHandler => {
  const probeUrl = `${metadataEndpoint.replace(/\/+$/u, '')}${HEALTH_PROBE_PATH}`

  return async ({response, signal}) => {
    let upstream: Response
    try {
      upstream = await fetchImpl(probeUrl, {method: 'GET', signal})
    } catch (error) {
      return failed(serviceUnavailable('metadata_unreachable', 'Metadata endpoint is unreachable'), error)
    }

    if (!upstream.ok) {
      return failed(
        serviceUnavailable('metadata_unhealthy', `Metadata endpoint responded with ${String(upstream.status)}`)
      )
    }

    const body = await upstream.text()
    sendText({response, status: 200, body})
    return succeeded(200)
  }
}
