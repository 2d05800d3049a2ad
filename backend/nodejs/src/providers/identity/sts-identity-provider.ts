import { GetCallerIdentityCommand, type STSClient } from '@aws-sdk/client-sts'
import { IntegrationError } from '@/shared/errors/integration-error.js'
import { getLogger } from '@/shared/logger/get-logger.js'
import type { CallerIdentity, IdentityProvider } from './identity-provider.js'

const logger = getLogger()

export class STSIdentityProvider implements IdentityProvider {
  constructor(private readonly client: STSClient) {}

  async getCallerIdentity(): Promise<CallerIdentity> {
    try {
      const result = await this.client.send(new GetCallerIdentityCommand({}))

      if (!result.Account || !result.Arn) {
        throw new IntegrationError('Incomplete caller identity from STS', {
          service: 'sts',
          details: 'Response missing Account or Arn'
        })
      }

      return {
        account: result.Account,
        arn: result.Arn,
        userId: result.UserId ?? ''
      }
    } catch (error) {
      logger.error('Error resolving caller identity', { error })

      if (error instanceof IntegrationError) {
        throw error
      }

      const message = error instanceof Error ? error.message : 'Unknown error'
      throw new IntegrationError('AWS credentials not configured or invalid', {
        service: 'sts',
        details: message
      })
    }
  }
}
