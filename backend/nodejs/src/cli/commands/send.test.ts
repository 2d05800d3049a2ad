import type { MockInstance } from 'vitest'
import type { EmailProvider } from '@/providers/email/email-provider.js'
import type { IdentityProvider } from '@/providers/identity/identity-provider.js'
import type { TemplateProvider } from '@/providers/template/template-provider.js'
import { fail, succeed } from '@/shared/errors/email-failure.js'
import { IntegrationError } from '@/shared/errors/integration-error.js'
import { SendTemplatedEmailUseCase } from '@/use-cases/send-templated-email.js'
import type { CliDependencies } from '../dependencies.js'
import { quotaCommand } from './quota.js'
import { sendCommand } from './send.js'
import { verifyCommand } from './verify.js'

const identityProvider: IdentityProvider = {
  getCallerIdentity: async () => ({
    account: '123456789012',
    arn: 'arn:aws:iam::123456789012:user/mailer',
    userId: 'AIDAEXAMPLE'
  })
}

const templateProvider: TemplateProvider = {
  loadTemplate: async () => succeed('<p>Hello there</p>')
}

function makeDependencies(overrides: Partial<CliDependencies> = {}) {
  const sendRawEmail = vi.fn(async () =>
    succeed({ messageId: 'msg-1', recipientCount: 1 })
  )
  const getSendQuota = vi.fn(async () =>
    succeed({ max24HourSend: 200, maxSendRate: 1, sentLast24Hours: 4 })
  )
  const verifyEmailAddress = vi.fn(async (address: string) =>
    succeed({ address })
  )
  const emailProvider: EmailProvider = {
    sendEmail: async () => succeed({ messageId: 'msg-2', recipientCount: 1 }),
    sendRawEmail,
    getSendQuota,
    verifyEmailAddress
  }
  const deps: CliDependencies = {
    region: 'us-east-1',
    identityProvider,
    emailProvider,
    sendTemplatedEmail: new SendTemplatedEmailUseCase(
      emailProvider,
      templateProvider
    ),
    ...overrides
  }
  return { deps, sendRawEmail, getSendQuota, verifyEmailAddress }
}

describe('cli commands', () => {
  let log: MockInstance<typeof console.log>
  let error: MockInstance<typeof console.error>

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => {})
    error = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('sendCommand', () => {
    const options = {
      to: ['b@x.com'],
      from: 'a@x.com',
      subject: 'Weekly update',
      template: 'template.html'
    }

    it('prints the identity, message id and quota', async () => {
      const { deps, sendRawEmail } = makeDependencies()

      await expect(sendCommand(options, deps)).resolves.toBe(0)

      expect(log).toHaveBeenCalledWith('AWS Account: 123456789012')
      expect(log).toHaveBeenCalledWith(
        'AWS User/Role: arn:aws:iam::123456789012:user/mailer'
      )
      expect(log).toHaveBeenCalledWith('AWS Region: us-east-1')
      expect(log).toHaveBeenCalledWith('Message ID: msg-1')
      expect(log).toHaveBeenCalledWith('Max 24 Hour Send: 200')
      expect(log).toHaveBeenCalledWith('Max Send Rate: 1 emails/second')
      expect(log).toHaveBeenCalledWith('Sent Last 24 Hours: 4')
      expect(sendRawEmail).toHaveBeenCalledWith({
        sender: 'a@x.com',
        recipients: ['b@x.com'],
        subject: 'Weekly update',
        htmlBody: '<p>Hello there</p>',
        textBody: undefined
      })
    })

    it('prints remediation steps when credentials are missing', async () => {
      const { deps, sendRawEmail } = makeDependencies({
        identityProvider: {
          getCallerIdentity: async () => {
            throw new IntegrationError(
              'AWS credentials not configured or invalid',
              { service: 'sts', details: 'Could not load credentials' }
            )
          }
        }
      })

      await expect(sendCommand(options, deps)).resolves.toBe(1)

      expect(error).toHaveBeenCalledWith(
        '✗ AWS credentials not configured or invalid'
      )
      expect(error).toHaveBeenCalledWith('\nTo configure AWS credentials:')
      expect(sendRawEmail).not.toHaveBeenCalled()
    })

    it('reports a failed send', async () => {
      const { deps, sendRawEmail, getSendQuota } = makeDependencies()
      sendRawEmail.mockResolvedValueOnce(
        fail({
          kind: 'sender-not-verified',
          message: 'Mail from domain is not verified',
          service: 'ses',
          code: 'MailFromDomainNotVerifiedException'
        })
      )

      await expect(sendCommand(options, deps)).resolves.toBe(1)

      expect(error).toHaveBeenCalledWith('✗ Failed to send email')
      expect(error).toHaveBeenCalledWith(
        '  sender-not-verified: Mail from domain is not verified'
      )
      expect(getSendQuota).not.toHaveBeenCalled()
    })
  })

  describe('verifyCommand', () => {
    it('requests verification of the address', async () => {
      const { deps, verifyEmailAddress } = makeDependencies()

      await expect(verifyCommand('new@x.com', deps)).resolves.toBe(0)

      expect(verifyEmailAddress).toHaveBeenCalledWith('new@x.com')
      expect(log).toHaveBeenCalledWith('✓ Verification email sent to new@x.com')
    })
  })

  describe('quotaCommand', () => {
    it('exits non-zero when the quota cannot be read', async () => {
      const { deps, getSendQuota } = makeDependencies()
      getSendQuota.mockResolvedValueOnce(
        fail({ kind: 'credentials', message: 'Access denied', service: 'ses' })
      )

      await expect(quotaCommand(deps)).resolves.toBe(1)

      expect(error).toHaveBeenCalledWith('  credentials: Access denied')
      expect(error).toHaveBeenCalledWith('\nTo configure AWS credentials:')
    })
  })
})
