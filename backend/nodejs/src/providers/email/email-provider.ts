import type { EmailResult } from '@/shared/errors/email-failure.js'
import type {
  DeliveryReceipt,
  EmailRequest,
  RawEmailRequest,
  SendQuota,
  VerificationRequest
} from './email-provider-dto.js'

export interface EmailProvider {
  /**
   * Sends an email as discrete fields (subject, HTML/text bodies and
   * destination lists).
   */
  sendEmail(request: EmailRequest): Promise<EmailResult<DeliveryReceipt>>

  /**
   * Sends an email as a serialized multipart/alternative MIME document.
   * Delivery targets are the request's recipients, not the `To` header.
   */
  sendRawEmail(request: RawEmailRequest): Promise<EmailResult<DeliveryReceipt>>

  /**
   * Asks the provider to send a confirmation email to the address. Success
   * means the request was accepted, not that the owner confirmed it.
   */
  verifyEmailAddress(address: string): Promise<EmailResult<VerificationRequest>>

  getSendQuota(): Promise<EmailResult<SendQuota>>
}
