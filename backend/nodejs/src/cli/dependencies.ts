import type { EmailProvider } from '@/providers/email/email-provider.js'
import { SESEmailProvider } from '@/providers/email/ses-provider.js'
import type { IdentityProvider } from '@/providers/identity/identity-provider.js'
import { STSIdentityProvider } from '@/providers/identity/sts-identity-provider.js'
import { createSesClient } from '@/shared/clients/ses-client.js'
import { createStsClient } from '@/shared/clients/sts-client.js'
import { getEnv } from '@/shared/config/env.js'
import { makeSendTemplatedEmail } from '@/use-cases/factories/make-send-templated-email.js'
import type { SendTemplatedEmailUseCase } from '@/use-cases/send-templated-email.js'

export interface CliDependencies {
  region: string
  identityProvider: IdentityProvider
  emailProvider: EmailProvider
  sendTemplatedEmail: SendTemplatedEmailUseCase
}

export function makeCliDependencies(
  region: string = getEnv().AWS_REGION
): CliDependencies {
  const emailProvider = new SESEmailProvider(createSesClient(region))

  return {
    region,
    identityProvider: new STSIdentityProvider(createStsClient(region)),
    emailProvider,
    sendTemplatedEmail: makeSendTemplatedEmail({ emailProvider })
  }
}
