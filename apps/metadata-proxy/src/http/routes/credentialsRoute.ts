import {setLogContextFields} from '@metadata-guard/logging'

import type {CredentialsProvider, RoleFinder} from '../../collaborators/contracts'
import {forbidden, notFound} from '../../errors'
import {sendJson} from '../../http'
import {failed, succeeded, type GuardedHandler} from './types'

export const createCredentialsHandler =
  ({
    roleFinder,
    credentialsProvider
  }: {
    roleFinder: RoleFinder
    credentialsProvider: CredentialsProvider
  }): GuardedHandler =>
  async ({response, signal, params, identify}) => {
    const identity = identify()
    const requestedRole = params.role ?? ''

    const authorizedRole = await roleFinder.findRoleForIdentity(identity, {signal})
    if (!authorizedRole) {
      return failed(notFound('role_not_found', 'No role is assigned to this workload'))
    }

    setLogContextFields({role: authorizedRole})

    // Exact, case-sensitive comparison. Any other role is refused before issuance.
    if (requestedRole !== authorizedRole) {
      return failed(forbidden('role_forbidden', 'Workload is not permitted to assume the requested role'))
    }

    const credentials = await credentialsProvider.credentialsForRole(authorizedRole, {signal})
    sendJson({response, status: 200, payload: credentials})
    return succeeded(200)
  }
