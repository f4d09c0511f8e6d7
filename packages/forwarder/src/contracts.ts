import type {IncomingMessage, ServerResponse} from 'node:http';

import {z} from 'zod';

import type {ForwarderResult} from './errors';

const isHttpUrl = (value: string) => {
  try {
    const {protocol} = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
};

export const ForwarderTimeoutsSchema = z
  .object({
    total_timeout_ms: z.number().int().min(100).max(120_000).default(10_000)
  })
  .strict();

export const UpstreamForwarderOptionsSchema = z
  .object({
    base_url: z.string().refine(isHttpUrl, 'base_url must be an http or https URL'),
    timeouts: ForwarderTimeoutsSchema.optional()
  })
  .strict();

export type ForwarderTimeouts = z.infer<typeof ForwarderTimeoutsSchema>;
export type UpstreamForwarderOptions = z.input<typeof UpstreamForwarderOptionsSchema>;

export const DEFAULT_FORWARDER_TIMEOUTS = ForwarderTimeoutsSchema.parse({});

export type ForwardOutcome = {
  upstream_url: string;
  upstream_status: number;
};

/**
 * Relays one inbound request to a fixed upstream and the upstream response back.
 * Implementations own the response: on failure they have already written an error
 * status or torn down the connection.
 */
export type UpstreamForwarder = {
  forward: (request: IncomingMessage, response: ServerResponse) => Promise<ForwarderResult<ForwardOutcome>>;
};
