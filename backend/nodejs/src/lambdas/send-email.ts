import type { Context } from 'aws-lambda'
import { z } from 'zod'
import { SESEmailProvider } from '@/providers/email/ses-provider.js'
import { createSesClient } from '@/shared/clients/ses-client.js'
import type {
  EmailFailureKind,
  EmailResult
} from '@/shared/errors/email-failure.js'
import { IntegrationError } from '@/shared/errors/integration-error.js'
import { getLogger } from '@/shared/logger/get-logger.js'
import { resolveSenderEmail } from '@/shared/parameters/resolve-sender-email.js'
import type { DeliveryReceipt } from '@/providers/email/email-provider-dto.js'

const logger = getLogger()

let emailProvider: SESEmailProvider | null = null

function getEmailProvider(): SESEmailProvider {
  if (!emailProvider) {
    emailProvider = new SESEmailProvider(createSesClient())
  }
  return emailProvider
}

const eventSchema = z
  .object({
    mode: z.enum(['structured', 'raw']).default('structured'),
    sender: z.string().email().optional(),
    recipients: z.array(z.string().email()).min(1),
    cc: z.array(z.string().email()).default([]),
    bcc: z.array(z.string().email()).default([]),
    subject: z.string().min(1, 'Subject is required'),
    htmlBody: z.string().min(1, 'Email body is required'),
    textBody: z.string().optional()
  })
  .superRefine((event, ctx) => {
    if (event.mode === 'raw' && (event.cc.length || event.bcc.length)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['mode'],
        message: 'Raw sends do not support cc or bcc recipients'
      })
    }
  })

export type SendEmailResponse =
  | { success: true; messageId: string; recipientCount: number }
  | { success: false; error: { kind: EmailFailureKind; message: string } }

function senderFailure(error: unknown): SendEmailResponse {
  if (error instanceof IntegrationError) {
    return {
      success: false,
      error: {
        kind: error.service === 'config' ? 'invalid-request' : 'provider-error',
        message: error.message
      }
    }
  }
  return {
    success: false,
    error: {
      kind: 'provider-error',
      message: error instanceof Error ? error.message : 'Unknown error'
    }
  }
}

// The event is whatever the invoker sent, so it is typed only after parsing.
export const sendEmailHandler = async (
  event: unknown,
  context: Context
): Promise<SendEmailResponse> => {
  logger.addContext(context)

  const parsed = eventSchema.safeParse(event)
  if (!parsed.success) {
    logger.warn('Invalid send email event', { issues: parsed.error.issues })
    return {
      success: false,
      error: {
        kind: 'invalid-request',
        message: parsed.error.issues
          .map((issue) =>
            issue.path.length > 0
              ? `${issue.path.join('.')}: ${issue.message}`
              : issue.message
          )
          .join('; ')
      }
    }
  }

  const request = parsed.data
  logger.info('Send email event received', {
    mode: request.mode,
    recipients: request.recipients.length
  })

  let sender: string
  try {
    sender = await resolveSenderEmail(request.sender)
  } catch (error) {
    logger.error('Error resolving sender email', { error })
    return senderFailure(error)
  }
  const provider = getEmailProvider()

  const result: EmailResult<DeliveryReceipt> =
    request.mode === 'raw'
      ? await provider.sendRawEmail({
          sender,
          recipients: request.recipients,
          subject: request.subject,
          htmlBody: request.htmlBody,
          textBody: request.textBody
        })
      : await provider.sendEmail({
          sender,
          recipients: request.recipients,
          cc: request.cc,
          bcc: request.bcc,
          subject: request.subject,
          htmlBody: request.htmlBody,
          textBody: request.textBody
        })

  if (!result.ok) {
    return {
      success: false,
      error: { kind: result.error.kind, message: result.error.message }
    }
  }

  return {
    success: true,
    messageId: result.value.messageId,
    recipientCount: result.value.recipientCount
  }
}
