import {createServer, type IncomingMessage, type Server, type ServerResponse} from 'node:http';
import type {AddressInfo} from 'node:net';

import {afterEach, describe, expect, it, vi} from 'vitest';

import {createUpstreamForwarder, resolveUpstreamPath, type ForwarderResult, type ForwardOutcome} from '../index';

type UpstreamHandler = (request: IncomingMessage, response: ServerResponse) => void;

const servers: Server[] = [];

const listen = async (handler: UpstreamHandler) => {
  const server = createServer(handler);
  servers.push(server);
  await new Promise<void>(resolve => {
    server.listen(0, '127.0.0.1', () => resolve());
  });

  const address = server.address() as AddressInfo;
  return `http://127.0.0.1:${String(address.port)}`;
};

const readBody = async (request: IncomingMessage) => {
  const chunks: Buffer[] = [];
  for await (const chunk of request) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }

  return Buffer.concat(chunks).toString('utf8');
};

const startProxy = async ({baseUrl, totalTimeoutMs}: {baseUrl: string; totalTimeoutMs?: number}) => {
  const forwarder = createUpstreamForwarder({
    base_url: baseUrl,
    ...(totalTimeoutMs ? {timeouts: {total_timeout_ms: totalTimeoutMs}} : {})
  });
  const results: ForwarderResult<ForwardOutcome>[] = [];
  const proxyUrl = await listen((request, response) => {
    void forwarder.forward(request, response).then(result => {
      results.push(result);
    });
  });

  return {proxyUrl, results};
};

afterEach(async () => {
  await Promise.all(
    servers.splice(0).map(
      server =>
        new Promise<void>(resolve => {
          server.closeAllConnections();
          server.close(() => resolve());
        })
    )
  );
});

describe('resolveUpstreamPath', () => {
  it('joins the base path and keeps the raw request target', () => {
    expect(
      resolveUpstreamPath({
        baseUrl: new URL('http://169.254.169.254'),
        requestTarget: '/latest/meta-data/local-ipv4'
      })
    ).toEqual({ok: true, value: '/latest/meta-data/local-ipv4'});

    expect(
      resolveUpstreamPath({
        baseUrl: new URL('http://metadata.internal/prefix?zone=a'),
        requestTarget: '/latest/../dynamic/%41?x=1'
      })
    ).toEqual({ok: true, value: '/prefix/latest/../dynamic/%41?zone=a&x=1'});
  });

  it('rejects targets that are not origin-form', () => {
    expect(
      resolveUpstreamPath({baseUrl: new URL('http://169.254.169.254'), requestTarget: 'http://other.example/'})
    ).toEqual({
      ok: false,
      error: {code: 'request_target_invalid', message: 'Request target must be an origin-form path'}
    });
  });
});

describe('createUpstreamForwarder', () => {
  it('relays method, path, headers and body, and returns the upstream response unchanged', async () => {
    let seen: {method?: string; url?: string; headers: IncomingMessage['headers']; body: string} | undefined;
    const upstreamUrl = await listen((request, response) => {
      void readBody(request).then(body => {
        seen = {method: request.method, url: request.url, headers: request.headers, body};
        response.writeHead(201, {
          'content-type': 'application/octet-stream',
          'x-upstream': 'yes',
          'set-cookie': ['a=1', 'b=2']
        });
        response.end('upstream-body');
      });
    });
    const {proxyUrl, results} = await startProxy({baseUrl: upstreamUrl});

    const response = await fetch(`${proxyUrl}/latest/api/token?ttl=60`, {
      method: 'PUT',
      headers: {
        'x-aws-ec2-metadata-token-ttl-seconds': '21600',
        'content-type': 'text/plain'
      },
      body: 'request-body'
    });

    expect(response.status).toBe(201);
    expect(response.headers.get('x-upstream')).toBe('yes');
    expect(response.headers.getSetCookie()).toEqual(['a=1', 'b=2']);
    expect(await response.text()).toBe('upstream-body');

    expect(seen?.method).toBe('PUT');
    expect(seen?.url).toBe('/latest/api/token?ttl=60');
    expect(seen?.body).toBe('request-body');
    expect(seen?.headers['x-aws-ec2-metadata-token-ttl-seconds']).toBe('21600');
    expect(seen?.headers['content-type']).toBe('text/plain');
    expect(seen?.headers.host).toBe(new URL(upstreamUrl).host);

    await vi.waitFor(() => expect(results).toHaveLength(1));
    expect(results).toEqual([
      {
        ok: true,
        value: {upstream_url: `${upstreamUrl}/latest/api/token?ttl=60`, upstream_status: 201}
      }
    ]);
  });

  it('relays upstream error statuses as-is', async () => {
    const upstreamUrl = await listen((_request, response) => {
      response.writeHead(404, {'content-type': 'text/html'});
      response.end('not here');
    });
    const {proxyUrl} = await startProxy({baseUrl: upstreamUrl});

    const response = await fetch(`${proxyUrl}/latest/meta-data/missing`);

    expect(response.status).toBe(404);
    expect(await response.text()).toBe('not here');
  });

  it('answers 502 when the upstream cannot be reached', async () => {
    const closedUrl = await listen(() => undefined);
    const closing = servers.pop();
    await new Promise<void>(resolve => {
      closing?.close(() => resolve());
    });
    const {proxyUrl, results} = await startProxy({baseUrl: closedUrl});

    const response = await fetch(`${proxyUrl}/latest/meta-data/instance-id`);

    expect(response.status).toBe(502);
    expect(await response.text()).toBe('Bad Gateway\n');
    await vi.waitFor(() => expect(results).toHaveLength(1));
    expect(results[0]).toMatchObject({ok: false, error: {code: 'upstream_network_error'}});
  });

  it('answers 504 when the upstream exceeds the total timeout', async () => {
    const upstreamUrl = await listen(() => undefined);
    const {proxyUrl, results} = await startProxy({baseUrl: upstreamUrl, totalTimeoutMs: 100});

    const response = await fetch(`${proxyUrl}/latest/meta-data/instance-id`);

    expect(response.status).toBe(504);
    expect(await response.text()).toBe('Gateway Timeout\n');
    await vi.waitFor(() => expect(results).toHaveLength(1));
    expect(results[0]).toMatchObject({ok: false, error: {code: 'upstream_timeout'}});
  });

  it('rejects non-http base urls', () => {
    expect(() => createUpstreamForwarder({base_url: 'ftp://169.254.169.254'})).toThrow();
  });
});
