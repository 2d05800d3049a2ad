import type { EmailResult } from '@/shared/errors/email-failure.js'

export interface TemplateProvider {
  /**
   * Loads an HTML body. Missing or unreadable templates come back as a
   * failure result rather than an exception.
   */
  loadTemplate(path: string): Promise<EmailResult<string>>
}
