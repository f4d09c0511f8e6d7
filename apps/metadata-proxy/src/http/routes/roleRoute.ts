import {setLogContextFields} from '@metadata-guard/logging'

import type {RoleFinder} from '../../collaborators/contracts'
import {notFound} from '../../errors'
import {sendText} from '../../http'
import {failed, succeeded, type GuardedHandler} from './types'

export const createRoleListingHandler =
  ({roleFinder}: {roleFinder: RoleFinder}): GuardedHandler =>
  async ({response, signal, identify}) => {
    const identity = identify()
    const role = await roleFinder.findRoleForIdentity(identity, {signal})
    if (!role) {
      return failed(notFound('role_not_found', 'No role is assigned to this workload'))
    }

    setLogContextFields({role})
    sendText({response, status: 200, body: role})
    return succeeded(200)
  }
