export {
  DEFAULT_FORWARDER_TIMEOUTS,
  ForwarderTimeoutsSchema,
  UpstreamForwarderOptionsSchema,
  type ForwardOutcome,
  type ForwarderTimeouts,
  type UpstreamForwarder,
  type UpstreamForwarderOptions
} from './contracts';
export {
  err,
  ok,
  type ForwarderError,
  type ForwarderErrorCode,
  type ForwarderFailure,
  type ForwarderResult,
  type ForwarderSuccess
} from './errors';
export {createUpstreamForwarder, resolveUpstreamPath} from './forward';
export {HOP_BY_HOP_HEADER_NAMES, stripHopByHopHeaders} from './headers';
