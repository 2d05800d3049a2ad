import type { EmailProvider } from '@/providers/email/email-provider.js'
import { SESEmailProvider } from '@/providers/email/ses-provider.js'
import { FileTemplateProvider } from '@/providers/template/file-template-provider.js'
import { createSesClient } from '@/shared/clients/ses-client.js'
import { SendTemplatedEmailUseCase } from '../send-templated-email.js'

export function makeSendTemplatedEmail(
  params: { region?: string; emailProvider?: EmailProvider } = {}
) {
  const emailProvider =
    params.emailProvider ??
    new SESEmailProvider(createSesClient(params.region))
  const templateProvider = new FileTemplateProvider()

  return new SendTemplatedEmailUseCase(emailProvider, templateProvider)
}
