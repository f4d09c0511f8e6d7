import {request as sendHttpRequest, type ClientRequest, type IncomingMessage, type ServerResponse} from 'node:http';
import {request as sendHttpsRequest} from 'node:https';
import {pipeline} from 'node:stream/promises';

import {
  DEFAULT_FORWARDER_TIMEOUTS,
  UpstreamForwarderOptionsSchema,
  type ForwardOutcome,
  type UpstreamForwarder,
  type UpstreamForwarderOptions
} from './contracts';
import {err, ok, type ForwarderFailure, type ForwarderResult} from './errors';
import {stripHopByHopHeaders} from './headers';

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

const joinPaths = (basePath: string, requestPath: string) => {
  const baseHasSlash = basePath.endsWith('/');
  const requestHasSlash = requestPath.startsWith('/');
  if (baseHasSlash && requestHasSlash) {
    return `${basePath}${requestPath.slice(1)}`;
  }
  if (!baseHasSlash && !requestHasSlash) {
    return `${basePath}/${requestPath}`;
  }

  return `${basePath}${requestPath}`;
};

/**
 * Joins the upstream base path and the raw inbound request target without
 * re-encoding or resolving dot segments, so the upstream sees the bytes the client sent.
 */
export const resolveUpstreamPath = ({
  baseUrl,
  requestTarget
}: {
  baseUrl: URL;
  requestTarget: string | undefined;
}): ForwarderResult<string> => {
  if (!requestTarget || !requestTarget.startsWith('/')) {
    return err('request_target_invalid', 'Request target must be an origin-form path');
  }

  const queryIndex = requestTarget.indexOf('?');
  const requestPath = queryIndex === -1 ? requestTarget : requestTarget.slice(0, queryIndex);
  const requestQuery = queryIndex === -1 ? '' : requestTarget.slice(queryIndex + 1);
  const baseQuery = baseUrl.search.replace(/^\?/u, '');
  const query = baseQuery.length > 0 && requestQuery.length > 0 ? `${baseQuery}&${requestQuery}` : baseQuery || requestQuery;

  const path = joinPaths(baseUrl.pathname, requestPath);
  return ok(query.length > 0 ? `${path}?${query}` : path);
};

const writeProxyError = ({
  response,
  status,
  message
}: {
  response: ServerResponse;
  status: number;
  message: string;
}) => {
  if (response.headersSent || response.destroyed) {
    response.destroy();
    return;
  }

  const body = Buffer.from(`${message}\n`, 'utf8');
  response.writeHead(status, {
    'content-type': 'text/plain; charset=utf-8',
    'content-length': String(body.length),
    'x-content-type-options': 'nosniff'
  });
  response.end(body);
};

export const createUpstreamForwarder = (rawOptions: UpstreamForwarderOptions): UpstreamForwarder => {
  const options = UpstreamForwarderOptionsSchema.parse(rawOptions);
  const baseUrl = new URL(options.base_url);
  const timeouts = options.timeouts ?? DEFAULT_FORWARDER_TIMEOUTS;
  const sendRequest = baseUrl.protocol === 'https:' ? sendHttpsRequest : sendHttpRequest;
  const upstreamHost = baseUrl.hostname.replace(/^\[(.*)\]$/u, '$1');

  const forward = (request: IncomingMessage, response: ServerResponse) =>
    new Promise<ForwarderResult<ForwardOutcome>>(resolve => {
      const target = resolveUpstreamPath({baseUrl, requestTarget: request.url});
      if (!target.ok) {
        writeProxyError({response, status: 400, message: 'Bad Request'});
        resolve(target);
        return;
      }

      const requestHeaders = stripHopByHopHeaders(request.headers);
      if (!requestHeaders.ok) {
        writeProxyError({response, status: 400, message: 'Bad Request'});
        resolve(requestHeaders);
        return;
      }

      const upstreamUrl = `${baseUrl.origin}${target.value}`;
      let settled = false;
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (result: ForwarderResult<ForwardOutcome>) => {
        if (settled) {
          return;
        }

        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      const fail = ({failure, status, message}: {failure: ForwarderFailure; status: number; message: string}) => {
        if (settled) {
          return;
        }

        writeProxyError({response, status, message});
        settle(failure);
      };

      let upstreamRequest: ClientRequest;
      try {
        upstreamRequest = sendRequest({
          protocol: baseUrl.protocol,
          hostname: upstreamHost,
          port: baseUrl.port.length > 0 ? Number.parseInt(baseUrl.port, 10) : undefined,
          method: request.method,
          path: target.value,
          headers: {
            ...requestHeaders.value,
            host: baseUrl.host
          }
        });
      } catch (error) {
        fail({
          failure: err('request_target_invalid', describeError(error)),
          status: 400,
          message: 'Bad Request'
        });
        return;
      }

      timer = setTimeout(() => {
        timedOut = true;
        upstreamRequest.destroy(new Error(`Upstream did not complete within ${timeouts.total_timeout_ms}ms`));
      }, timeouts.total_timeout_ms);

      upstreamRequest.on('error', error => {
        if (timedOut) {
          fail({
            failure: err('upstream_timeout', error.message),
            status: 504,
            message: 'Gateway Timeout'
          });
          return;
        }

        fail({
          failure: err('upstream_network_error', error.message),
          status: 502,
          message: 'Bad Gateway'
        });
      });

      upstreamRequest.on('response', upstreamResponse => {
        const responseHeaders = stripHopByHopHeaders(upstreamResponse.headers);
        if (!responseHeaders.ok) {
          upstreamResponse.resume();
          fail({failure: responseHeaders, status: 502, message: 'Bad Gateway'});
          return;
        }

        const upstreamStatus = upstreamResponse.statusCode ?? 502;
        response.writeHead(upstreamStatus, responseHeaders.value);
        pipeline(upstreamResponse, response).then(
          () => settle(ok({upstream_url: upstreamUrl, upstream_status: upstreamStatus})),
          (error: unknown) => {
            response.destroy();
            settle(err(timedOut ? 'upstream_timeout' : 'upstream_response_aborted', describeError(error)));
          }
        );
      });

      response.on('close', () => {
        if (settled || response.writableFinished) {
          return;
        }

        settle(err('client_aborted', 'Client closed the connection before the upstream response completed'));
        upstreamRequest.destroy();
      });

      pipeline(request, upstreamRequest).catch((error: unknown) => {
        // Once upstream headers are relayed the response pipeline owns the outcome.
        if (response.headersSent) {
          return;
        }

        upstreamRequest.destroy();
        fail({
          failure: err('client_aborted', describeError(error)),
          status: 400,
          message: 'Bad Request'
        });
      });
    });

  return {forward};
};
