import { getParameter } from '@aws-lambda-powertools/parameters/ssm'
import { getEnv, type Env } from '../config/env.js'
import { IntegrationError } from '../errors/integration-error.js'
import { getLogger } from '../logger/get-logger.js'

const logger = getLogger()

/**
 * Picks the sender address: an explicit value wins, then `SENDER_EMAIL`,
 * then the SSM parameter named by `SENDER_EMAIL_PARAM`.
 */
export async function resolveSenderEmail(
  explicit?: string,
  env: Env = getEnv()
): Promise<string> {
  if (explicit) {
    return explicit
  }

  if (env.SENDER_EMAIL) {
    return env.SENDER_EMAIL
  }

  if (!env.SENDER_EMAIL_PARAM) {
    throw new IntegrationError('No sender email configured', {
      service: 'config',
      details: 'Set SENDER_EMAIL or SENDER_EMAIL_PARAM, or pass the sender'
    })
  }

  let senderEmail: string | undefined
  try {
    senderEmail = await getParameter(env.SENDER_EMAIL_PARAM, {
      maxAge: 15 * 60 // 15 minutes cache
    })
  } catch (error) {
    logger.error('Error fetching sender email from SSM', {
      error,
      parameterName: env.SENDER_EMAIL_PARAM
    })
    throw new IntegrationError('Failed to fetch sender email from SSM', {
      service: 'ssm',
      details: error instanceof Error ? error.message : 'Unknown error'
    })
  }

  if (!senderEmail) {
    const errorMessage = 'Sender email not found in SSM Parameter Store'
    logger.error(errorMessage, { parameterName: env.SENDER_EMAIL_PARAM })
    throw new IntegrationError(errorMessage, {
      service: 'ssm',
      details: env.SENDER_EMAIL_PARAM
    })
  }

  return senderEmail
}
