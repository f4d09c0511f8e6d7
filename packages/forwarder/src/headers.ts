import type {IncomingHttpHeaders, OutgoingHttpHeaders} from 'node:http';

import {err, ok, type ForwarderResult} from './errors';

const HTTP_HEADER_NAME_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const CONNECTION_TOKEN_SPLIT_REGEX = /\s*,\s*/u;

export const HOP_BY_HOP_HEADER_NAMES = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade'
]);

const parseConnectionHeaderTokens = (connectionHeaderValue: string): ForwarderResult<Set<string>> => {
  const tokenSet = new Set<string>();
  const tokens = connectionHeaderValue.split(CONNECTION_TOKEN_SPLIT_REGEX);

  for (const rawToken of tokens) {
    const token = rawToken.trim().toLowerCase();
    if (token.length === 0) {
      continue;
    }

    if (!HTTP_HEADER_NAME_REGEX.test(token)) {
      return err('invalid_connection_header', `Connection header contains an invalid token: ${rawToken}`);
    }

    tokenSet.add(token);
  }

  return ok(tokenSet);
};

const toHeaderValues = (value: string | string[] | undefined) => {
  if (value === undefined) {
    return [];
  }

  return Array.isArray(value) ? value : [value];
};

/**
 * Copies a parsed Node header map, dropping hop-by-hop headers and every header the
 * Connection header nominates. Everything else is kept untouched.
 */
export const stripHopByHopHeaders = (headers: IncomingHttpHeaders): ForwarderResult<OutgoingHttpHeaders> => {
  const headersToStrip = new Set<string>(HOP_BY_HOP_HEADER_NAMES);

  for (const connectionValue of toHeaderValues(headers.connection)) {
    const parsedConnectionTokens = parseConnectionHeaderTokens(connectionValue);
    if (!parsedConnectionTokens.ok) {
      return parsedConnectionTokens;
    }

    for (const token of parsedConnectionTokens.value) {
      headersToStrip.add(token);
    }
  }

  const forwardedHeaders: OutgoingHttpHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    const normalizedName = name.toLowerCase();
    if (value === undefined || headersToStrip.has(normalizedName)) {
      continue;
    }

    forwardedHeaders[normalizedName] = value;
  }

  return ok(forwardedHeaders);
};
