import { STSClient } from '@aws-sdk/client-sts'
import { getEnv } from '@/shared/config/env.js'

export const createStsClient = (region: string = getEnv().AWS_REGION) =>
  new STSClient({ region })
