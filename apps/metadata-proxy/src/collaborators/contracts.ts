import {z} from 'zod'

export type FetchLike = (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>

export const CredentialsSchema = z
  .object({
    Code: z.string().min(1),
    LastUpdated: z.string().min(1),
    Type: z.string().min(1),
    AccessKeyId: z.string().min(1),
    SecretAccessKey: z.string().min(1),
    Token: z.string().min(1),
    Expiration: z.string().min(1)
  })
  .strict()

export type Credentials = z.infer<typeof CredentialsSchema>

export type CollaboratorCallOptions = {
  signal: AbortSignal
}

/** Decides which role, if any, a workload identity may assume. */
export type RoleFinder = {
  findRoleForIdentity: (identity: string, options: CollaboratorCallOptions) => Promise<string | undefined>
}

/**
 * Issues credentials for a role. An AppError thrown here keeps its status and
 * message on the way to the client.
 */
export type CredentialsProvider = {
  credentialsForRole: (role: string, options: CollaboratorCallOptions) => Promise<Credentials>
}
