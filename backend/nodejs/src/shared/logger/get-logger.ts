import { Logger } from '@aws-lambda-powertools/logger'

let logger: Logger | null = null

export const getLogger = (): Logger => {
  if (logger) {
    return logger
  }
  logger = new Logger({
    serviceName: process.env.POWERTOOLS_SERVICE_NAME || 'ses-mailer'
  })
  return logger
}
