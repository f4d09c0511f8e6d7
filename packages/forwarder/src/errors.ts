/**
 * Why a forward did not complete. By the time a failure is returned the forwarder
 * has already answered the client (400, 502 or 504) or torn the connection down.
 */
export type ForwarderErrorCode =
  | 'invalid_connection_header'
  | 'request_target_invalid'
  | 'upstream_timeout'
  | 'upstream_network_error'
  | 'upstream_response_aborted'
  | 'client_aborted';

export type ForwarderError = {
  code: ForwarderErrorCode;
  message: string;
};

export type ForwarderResult<T> = {ok: true; value: T} | {ok: false; error: ForwarderError};
export type ForwarderSuccess<T> = Extract<ForwarderResult<T>, {ok: true}>;
export type ForwarderFailure = Extract<ForwarderResult<never>, {ok: false}>;

export const ok = <T>(value: T): ForwarderSuccess<T> => ({ok: true, value});

export const err = (code: ForwarderErrorCode, message: string): ForwarderFailure => ({ok: false, error: {code, message}});
