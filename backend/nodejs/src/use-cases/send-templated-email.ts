import type { EmailProvider } from '@/providers/email/email-provider.js'
import type {
  DeliveryReceipt,
  SendQuota
} from '@/providers/email/email-provider-dto.js'
import type { TemplateProvider } from '@/providers/template/template-provider.js'
import {
  fail,
  succeed,
  type EmailResult
} from '@/shared/errors/email-failure.js'
import { getLogger } from '@/shared/logger/get-logger.js'

const logger = getLogger()

export type DeliveryMode = 'raw' | 'structured'

export interface SendTemplatedEmailRequest {
  sender: string
  recipients: string[]
  subject: string
  templatePath: string
  /** Plain-text alternative given inline. */
  textBody?: string
  /** Plain-text alternative read from a file. */
  textTemplatePath?: string
  /** Defaults to `raw`. */
  delivery?: DeliveryMode
  /** Structured delivery only. */
  cc?: string[]
  /** Structured delivery only. */
  bcc?: string[]
}

export interface SendTemplatedEmailResponse {
  receipt: DeliveryReceipt
  /** Absent when the quota lookup failed after a successful send. */
  quota?: SendQuota
}

/**
 * Send Templated Email Use Case
 *
 * 1. Load the HTML body (and optional text alternative) from the template source
 * 2. Send it, as a raw MIME document by default or as structured fields
 * 3. Report the sending quota left after the send
 */
export class SendTemplatedEmailUseCase {
  constructor(
    private readonly emailProvider: EmailProvider,
    private readonly templateProvider: TemplateProvider
  ) {}

  async execute(
    request: SendTemplatedEmailRequest
  ): Promise<EmailResult<SendTemplatedEmailResponse>> {
    const delivery = request.delivery ?? 'raw'
    const cc = request.cc ?? []
    const bcc = request.bcc ?? []

    if (delivery === 'raw' && (cc.length > 0 || bcc.length > 0)) {
      return fail({
        kind: 'invalid-request',
        message: 'Raw sends do not support cc or bcc recipients',
        service: 'mailer'
      })
    }

    if (request.textBody !== undefined && request.textTemplatePath) {
      return fail({
        kind: 'invalid-request',
        message: 'Give the text alternative inline or as a file, not both',
        service: 'mailer'
      })
    }

    logger.info('Loading HTML template', { path: request.templatePath })

    const template = await this.templateProvider.loadTemplate(
      request.templatePath
    )
    if (!template.ok) {
      return fail(template.error)
    }

    let textBody = request.textBody
    if (request.textTemplatePath) {
      const text = await this.templateProvider.loadTemplate(
        request.textTemplatePath
      )
      if (!text.ok) {
        return fail(text.error)
      }
      textBody = text.value
    }

    logger.info('Sending email via SES', {
      delivery,
      recipients: request.recipients.length,
      subject: request.subject
    })

    const sent =
      delivery === 'raw'
        ? await this.emailProvider.sendRawEmail({
            sender: request.sender,
            recipients: request.recipients,
            subject: request.subject,
            htmlBody: template.value,
            textBody
          })
        : await this.emailProvider.sendEmail({
            sender: request.sender,
            recipients: request.recipients,
            cc,
            bcc,
            subject: request.subject,
            htmlBody: template.value,
            textBody
          })
    if (!sent.ok) {
      return fail(sent.error)
    }

    const quota = await this.emailProvider.getSendQuota()
    if (!quota.ok) {
      logger.warn('Email sent but the send quota could not be read', {
        messageId: sent.value.messageId,
        failure: quota.error
      })
      return succeed({ receipt: sent.value })
    }

    return succeed({ receipt: sent.value, quota: quota.value })
  }
}
