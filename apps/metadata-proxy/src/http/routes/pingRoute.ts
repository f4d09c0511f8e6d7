import {sendText} from '../../http'
import type {PlainRouteHandler} from './types'

export const handlePingRoute: PlainRouteHandler = async ({response}) => {
  sendText({response, status: 200, body: 'pong'})
}
