import {isIP} from 'node:net'

import {badRequest} from './errors'
import {readQueryParam} from './http'

export const IDENTITY_OVERRIDE_PARAM = 'ip'

const IPV4_MAPPED_PREFIX = '::ffff:'
const PORT_PATTERN = /^\d{1,5}$/u

export type ClientAddressSource = {
  url?: string
  socket: {
    remoteAddress?: string
    remotePort?: number
  }
}

export type ClientIdentityResolver = (request: ClientAddressSource) => string

const clientAddressInvalid = () =>
  badRequest('client_address_invalid', 'Client address is not in host:port form')

export const normalizeClientIp = (value: string) => {
  if (value.toLowerCase().startsWith(IPV4_MAPPED_PREFIX)) {
    const mapped = value.slice(IPV4_MAPPED_PREFIX.length)
    if (isIP(mapped) === 4) {
      return mapped
    }
  }

  return value
}

/**
 * Splits a transport address into host and port and returns the host.
 *
 * Bracketed literals (`[::1]:8080`) are split at the closing bracket. Anything else
 * is split at the last colon, so an unbracketed `::1:8080` yields `::1`. IPv4-mapped
 * IPv6 hosts are reduced to their IPv4 form.
 */
export const parseClientIp = (remoteAddress: string): string => {
  let host: string
  let port: string

  if (remoteAddress.startsWith('[')) {
    const closingIndex = remoteAddress.indexOf(']:')
    if (closingIndex === -1) {
      throw clientAddressInvalid()
    }

    host = remoteAddress.slice(1, closingIndex)
    port = remoteAddress.slice(closingIndex + 2)
  } else {
    const portSeparatorIndex = remoteAddress.lastIndexOf(':')
    if (portSeparatorIndex === -1) {
      throw clientAddressInvalid()
    }

    host = remoteAddress.slice(0, portSeparatorIndex)
    port = remoteAddress.slice(portSeparatorIndex + 1)
  }

  if (host.length === 0 || !PORT_PATTERN.test(port)) {
    throw clientAddressInvalid()
  }

  return normalizeClientIp(host)
}

export const formatRemoteAddress = ({address, port}: {address?: string; port?: number}) => {
  if (address === undefined || port === undefined) {
    return undefined
  }

  return isIP(address) === 6 ? `[${address}]:${String(port)}` : `${address}:${String(port)}`
}

export const createClientIdentityResolver = ({allowIpQuery}: {allowIpQuery: boolean}): ClientIdentityResolver =>
  request => {
    if (allowIpQuery) {
      const override = readQueryParam({request, name: IDENTITY_OVERRIDE_PARAM})
      if (override) {
        return override
      }
    }

    const remoteAddress = formatRemoteAddress({
      address: request.socket.remoteAddress,
      port: request.socket.remotePort
    })
    if (!remoteAddress) {
      throw clientAddressInvalid()
    }

    return parseClientIp(remoteAddress)
  }
