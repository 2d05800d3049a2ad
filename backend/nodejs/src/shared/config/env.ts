import { z } from 'zod'

const envSchema = z.object({
  AWS_REGION: z.string().min(1).default('us-east-1'),
  SENDER_EMAIL: z.string().email().optional(),
  SENDER_EMAIL_PARAM: z.string().min(1).optional()
})

export type Env = z.infer<typeof envSchema>

/**
 * Reads the mailer's settings from the environment. Empty variables are
 * treated as unset.
 */
export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const defined = Object.fromEntries(
    Object.entries(source).filter(
      ([, value]) => value !== undefined && value !== ''
    )
  )
  return envSchema.parse(defined)
}
