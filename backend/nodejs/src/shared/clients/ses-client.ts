import { SESClient } from '@aws-sdk/client-ses'
import { getEnv } from '@/shared/config/env.js'

export const createSesClient = (region: string = getEnv().AWS_REGION) =>
  new SESClient({ region })
