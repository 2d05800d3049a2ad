import {
  GetSendQuotaCommand,
  SendEmailCommand,
  SendRawEmailCommand,
  VerifyEmailIdentityCommand,
  type Destination,
  type Message,
  type SESClient
} from '@aws-sdk/client-ses'
import { z } from 'zod'
import {
  fail,
  succeed,
  toEmailFailure,
  type EmailResult
} from '@/shared/errors/email-failure.js'
import { getLogger } from '@/shared/logger/get-logger.js'
import type { EmailProvider } from './email-provider.js'
import type {
  DeliveryReceipt,
  EmailRequest,
  RawEmailRequest,
  SendQuota,
  VerificationRequest
} from './email-provider-dto.js'
import { buildMimeMessage } from './mime-message.js'

const logger = getLogger()

const SERVICE = 'ses'
const CHARSET = 'UTF-8'

const addressSchema = z.string().trim().min(1, 'Address must not be empty')

const baseRequestSchema = z.object({
  sender: addressSchema,
  recipients: z
    .array(addressSchema)
    .min(1, 'At least one recipient is required'),
  subject: z.string(),
  htmlBody: z.string(),
  textBody: z.string().optional()
})

const emailRequestSchema = baseRequestSchema.extend({
  cc: z.array(addressSchema).optional(),
  bcc: z.array(addressSchema).optional()
})

// Destinations carry only the recipients, so cc/bcc would be lost silently.
const rawEmailRequestSchema = baseRequestSchema.strict()

export class SESEmailProvider implements EmailProvider {
  constructor(private readonly client: SESClient) {}

  async sendEmail(
    request: EmailRequest
  ): Promise<EmailResult<DeliveryReceipt>> {
    const validation = emailRequestSchema.safeParse(request)
    if (!validation.success) {
      return this.invalidRequest(validation.error)
    }

    const destination: Destination = {
      ToAddresses: [...request.recipients]
    }
    if (request.cc && request.cc.length > 0) {
      destination.CcAddresses = [...request.cc]
    }
    if (request.bcc && request.bcc.length > 0) {
      destination.BccAddresses = [...request.bcc]
    }

    const message: Message = {
      Subject: {
        Charset: CHARSET,
        Data: request.subject
      },
      Body: {
        Html: {
          Charset: CHARSET,
          Data: request.htmlBody
        },
        ...(request.textBody
          ? {
              Text: {
                Charset: CHARSET,
                Data: request.textBody
              }
            }
          : {})
      }
    }

    const recipientCount =
      request.recipients.length +
      (request.cc?.length ?? 0) +
      (request.bcc?.length ?? 0)

    try {
      const result = await this.client.send(
        new SendEmailCommand({
          Source: request.sender,
          Destination: destination,
          Message: message
        })
      )

      return this.toReceipt(result.MessageId, recipientCount, request.subject)
    } catch (error) {
      logger.error('Error sending email via SES', {
        error,
        recipientCount,
        subject: request.subject
      })
      return fail(toEmailFailure(error, SERVICE))
    }
  }

  async sendRawEmail(
    request: RawEmailRequest
  ): Promise<EmailResult<DeliveryReceipt>> {
    const validation = rawEmailRequestSchema.safeParse(request)
    if (!validation.success) {
      return this.invalidRequest(validation.error)
    }

    try {
      const rawMessage = await buildMimeMessage({
        from: request.sender,
        to: request.recipients,
        subject: request.subject,
        htmlBody: request.htmlBody,
        textBody: request.textBody
      })

      logger.debug('Composed raw MIME message', {
        bytes: rawMessage.length,
        hasTextPart: Boolean(request.textBody)
      })

      const result = await this.client.send(
        new SendRawEmailCommand({
          Source: request.sender,
          Destinations: [...request.recipients],
          RawMessage: {
            Data: rawMessage
          }
        })
      )

      return this.toReceipt(
        result.MessageId,
        request.recipients.length,
        request.subject
      )
    } catch (error) {
      logger.error('Error sending raw email via SES', {
        error,
        recipientCount: request.recipients.length,
        subject: request.subject
      })
      return fail(toEmailFailure(error, SERVICE))
    }
  }

  async verifyEmailAddress(
    address: string
  ): Promise<EmailResult<VerificationRequest>> {
    const validation = addressSchema.safeParse(address)
    if (!validation.success) {
      return this.invalidRequest(validation.error)
    }

    try {
      await this.client.send(
        new VerifyEmailIdentityCommand({ EmailAddress: address })
      )
      logger.info('Verification email sent', { address })
      return succeed({ address })
    } catch (error) {
      logger.error('Error verifying email address', { error, address })
      return fail(toEmailFailure(error, SERVICE))
    }
  }

  async getSendQuota(): Promise<EmailResult<SendQuota>> {
    try {
      const result = await this.client.send(new GetSendQuotaCommand({}))
      return succeed({
        max24HourSend: result.Max24HourSend ?? 0,
        maxSendRate: result.MaxSendRate ?? 0,
        sentLast24Hours: result.SentLast24Hours ?? 0
      })
    } catch (error) {
      logger.error('Error getting send quota', { error })
      return fail(toEmailFailure(error, SERVICE))
    }
  }

  private toReceipt(
    messageId: string | undefined,
    recipientCount: number,
    subject: string
  ): EmailResult<DeliveryReceipt> {
    if (!messageId) {
      logger.error('SES response did not include a message id', { subject })
      return fail({
        kind: 'provider-error',
        message: 'SES response did not include a message id',
        service: SERVICE
      })
    }

    logger.info('Email sent successfully', {
      messageId,
      recipientCount,
      subject
    })

    return succeed({ messageId, recipientCount })
  }

  private invalidRequest<T>(error: z.ZodError): EmailResult<T> {
    const message = error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message
      )
      .join('; ')

    logger.warn('Rejected invalid email request', { issues: error.issues })

    return fail({ kind: 'invalid-request', message, service: SERVICE })
  }
}
