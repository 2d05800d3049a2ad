import { toEmailFailure } from './email-failure.js'

const awsError = (name: string, message: string) =>
  Object.assign(new Error(message), { name })

describe('toEmailFailure', () => {
  it.each([
    ['MessageRejected', 'message-rejected'],
    ['MailFromDomainNotVerifiedException', 'sender-not-verified'],
    ['Throttling', 'throttled'],
    ['ExpiredToken', 'credentials'],
    ['CredentialsProviderError', 'credentials'],
    ['ServiceUnavailable', 'provider-error']
  ])('classifies %s as %s', (name, kind) => {
    expect(toEmailFailure(awsError(name, 'failed'), 'ses')).toEqual({
      kind,
      message: 'failed',
      service: 'ses',
      code: name
    })
  })

  it('does not match names inherited from Object.prototype', () => {
    expect(toEmailFailure(awsError('constructor', 'odd'), 'ses').kind).toBe(
      'provider-error'
    )
  })

  it('handles values that are not errors', () => {
    expect(toEmailFailure('socket hang up', 'sts')).toEqual({
      kind: 'provider-error',
      message: 'socket hang up',
      service: 'sts'
    })
    expect(toEmailFailure(42, 'sts').message).toBe('Unknown error')
  })
})
