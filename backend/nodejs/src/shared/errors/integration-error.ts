export interface IntegrationErrorContext {
  service: string
  details?: string
}

/**
 * Raised when a call into an AWS service (or another external collaborator)
 * fails in a way the caller is not expected to recover from locally.
 */
export class IntegrationError extends Error {
  readonly service: string
  readonly details?: string

  constructor(
    message: string,
    context: IntegrationErrorContext = { service: 'unknown' }
  ) {
    super(message)
    this.name = 'IntegrationError'
    this.service = context.service
    this.details = context.details
  }
}
