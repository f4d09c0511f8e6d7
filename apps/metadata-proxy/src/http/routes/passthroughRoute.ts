import type {StructuredLogger} from '@metadata-guard/logging'
import type {UpstreamForwarder} from '@metadata-guard/forwarder'

import type {PlainRouteHandler} from './types'

export const createPassthroughRoute =
  ({forwarder, logger}: {forwarder: UpstreamForwarder; logger: StructuredLogger}): PlainRouteHandler =>
  async ({request, response}) => {
    const result = await forwarder.forward(request, response)
    if (result.ok) {
      logger.debug({
        event: 'passthrough.forwarded',
        component: 'http.passthrough',
        status_code: result.value.upstream_status,
        metadata: {upstream_url: result.value.upstream_url}
      })
      return
    }

    logger.warn({
      event: 'passthrough.failed',
      component: 'http.passthrough',
      message: result.error.message,
      reason_code: result.error.code
    })
  }
