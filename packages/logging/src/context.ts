import {AsyncLocalStorage} from 'node:async_hooks';

import type {z} from 'zod';

import {LogEventSchema} from './schema';

/** Request-scoped fields every log line inherits. */
export const LogContextSchema = LogEventSchema.pick({
  correlation_id: true,
  request_id: true,
  workload_ip: true,
  role: true,
  route: true,
  method: true
})
  .partial()
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const requestScope = new AsyncLocalStorage<LogContext>();

export const runWithLogContext = <T>(context: LogContext, operation: () => T): T =>
  requestScope.run(LogContextSchema.parse(context), operation);

export const getLogContext = (): LogContext | undefined => requestScope.getStore();

/**
 * Adds fields to the current request scope as they become known, such as the
 * workload address once it is resolved. Outside a scope this does nothing.
 */
export const setLogContextFields = (fields: LogContext): LogContext | undefined => {
  const scope = requestScope.getStore();
  if (scope) {
    Object.assign(scope, LogContextSchema.parse(fields));
  }

  return scope;
};
