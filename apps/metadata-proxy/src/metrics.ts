import {statusBucket, type MetricsRegistry} from '@metadata-guard/metrics'

export type GuardedHandlerName = 'health' | 'roleName' | 'credentials'

export type HandlerResponseMetrics = {
  record: (input: {handler: GuardedHandlerName; status: number}) => void
}

export const createHandlerResponseMetrics = (registry: MetricsRegistry): HandlerResponseMetrics => {
  const responses = registry.counter({
    name: 'handler_responses_total',
    help: 'Responses written by guarded handlers, by handler and status class'
  })

  return {
    record: ({handler, status}) => {
      responses.inc({handler, status_class: statusBucket(status)})
    }
  }
}
