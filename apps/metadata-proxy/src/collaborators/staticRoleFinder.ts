import {readFile} from 'node:fs/promises'

import {z} from 'zod'

import type {RoleFinder} from './contracts'

export const RoleMapSchema = z.record(z.string().min(1), z.string().min(1))

export type RoleMap = z.infer<typeof RoleMapSchema>

export const createStaticRoleFinder = (roleMap: RoleMap): RoleFinder => {
  const roles = new Map(Object.entries(roleMap))

  return {
    findRoleForIdentity: async identity => roles.get(identity)
  }
}

export const loadRoleMapFile = async (path: string): Promise<RoleMap> => {
  const raw = await readFile(path, 'utf8')

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new Error(`Role map ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`)
  }

  const result = RoleMapSchema.safeParse(parsed)
  if (!result.success) {
    throw new Error(`Role map ${path} must map identities to role names: ${result.error.message}`)
  }

  return result.data
}
