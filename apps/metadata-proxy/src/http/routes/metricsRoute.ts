import type {MetricsRegistry} from '@metadata-guard/metrics'

import {sendText} from '../../http'
import type {PlainRouteHandler} from './types'

export const createMetricsRoute =
  ({registry}: {registry: MetricsRegistry}): PlainRouteHandler =>
  async ({response}) => {
    sendText({response, status: 200, body: registry.render(), contentType: registry.contentType})
  }
