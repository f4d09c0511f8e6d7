import {badGateway, gatewayTimeout} from '../errors'
import {CredentialsSchema, type CredentialsProvider, type FetchLike} from './contracts'

export type HttpCredentialsProviderOptions = {
  baseUrl: string
  timeoutMs: number
  fetchImpl?: FetchLike
}

const buildCredentialsUrl = ({baseUrl, role}: {baseUrl: string; role: string}) => {
  const url = new URL(baseUrl)
  const basePath = url.pathname.endsWith('/') ? url.pathname.slice(0, -1) : url.pathname
  url.pathname = `${basePath}/v1/roles/${encodeURIComponent(role)}/credentials`
  return url
}

/**
 * Fetches role credentials from a credentials service. The request is cancelled when
 * the caller's signal aborts or the client timeout elapses, whichever happens first.
 */
export const createHttpCredentialsProvider = ({
  baseUrl,
  timeoutMs,
  fetchImpl = fetch
}: HttpCredentialsProviderOptions): CredentialsProvider => ({
  credentialsForRole: async (role, {signal}) => {
    const controller = new AbortController()
    let timedOut = false
    const timer = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)
    const abortFromCaller = () => controller.abort()

    if (signal.aborted) {
      controller.abort()
    } else {
      signal.addEventListener('abort', abortFromCaller, {once: true})
    }

    try {
      let response: Response
      try {
        response = await fetchImpl(buildCredentialsUrl({baseUrl, role}), {
          method: 'GET',
          headers: {accept: 'application/json'},
          signal: controller.signal
        })
      } catch {
        if (timedOut || signal.aborted) {
          throw gatewayTimeout('credentials_upstream_timeout', 'Credentials service timed out')
        }

        throw badGateway('credentials_upstream_unreachable', 'Credentials service is unreachable')
      }

      if (!response.ok) {
        throw badGateway('credentials_upstream_failed', `Credentials service responded with ${String(response.status)}`)
      }

      let body: unknown
      try {
        body = await response.json()
      } catch {
        throw badGateway('credentials_upstream_invalid', 'Credentials service returned an invalid document')
      }

      const parsed = CredentialsSchema.safeParse(body)
      if (!parsed.success) {
        throw badGateway('credentials_upstream_invalid', 'Credentials service returned an invalid document')
      }

      return parsed.data
    } finally {
      clearTimeout(timer)
      signal.removeEventListener('abort', abortFromCaller)
    }
  }
})
