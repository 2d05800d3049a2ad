export interface EmailRequest {
  readonly sender: string
  readonly recipients: readonly string[]
  readonly subject: string
  readonly htmlBody: string
  readonly textBody?: string
  readonly cc?: readonly string[]
  readonly bcc?: readonly string[]
}

/** The raw path carries no cc/bcc. */
export type RawEmailRequest = Omit<EmailRequest, 'cc' | 'bcc'>

export interface DeliveryReceipt {
  messageId: string
  recipientCount: number
}

export interface VerificationRequest {
  address: string
}

export interface SendQuota {
  /** Messages allowed in the rolling 24 hour window. */
  max24HourSend: number
  /** Messages per second. */
  maxSendRate: number
  sentLast24Hours: number
}
