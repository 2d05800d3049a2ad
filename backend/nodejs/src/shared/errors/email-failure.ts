export type EmailFailureKind =
  | 'invalid-request'
  | 'message-rejected'
  | 'sender-not-verified'
  | 'throttled'
  | 'credentials'
  | 'provider-error'
  | 'template-not-found'
  | 'template-unreadable'

export interface EmailFailure {
  kind: EmailFailureKind
  message: string
  service: string
  /** Error name reported by the SDK, when there was one. */
  code?: string
}

export type EmailResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: EmailFailure }

export const succeed = <T>(value: T): EmailResult<T> => ({ ok: true, value })

export const fail = <T = never>(error: EmailFailure): EmailResult<T> => ({
  ok: false,
  error
})

const FAILURE_KINDS_BY_CODE = new Map<string, EmailFailureKind>([
  ['MessageRejected', 'message-rejected'],
  ['MailFromDomainNotVerifiedException', 'sender-not-verified'],
  ['Throttling', 'throttled'],
  ['ThrottlingException', 'throttled'],
  ['TooManyRequestsException', 'throttled'],
  ['InvalidClientTokenId', 'credentials'],
  ['UnrecognizedClientException', 'credentials'],
  ['ExpiredToken', 'credentials'],
  ['ExpiredTokenException', 'credentials'],
  ['SignatureDoesNotMatch', 'credentials'],
  ['CredentialsProviderError', 'credentials'],
  ['AccessDenied', 'credentials'],
  ['AccessDeniedException', 'credentials']
])

/**
 * Maps an error thrown by an AWS SDK call onto an {@link EmailFailure}.
 * SDK service exceptions carry the API error code as their `name`.
 */
export function toEmailFailure(error: unknown, service: string): EmailFailure {
  if (!(error instanceof Error)) {
    return {
      kind: 'provider-error',
      message: typeof error === 'string' ? error : 'Unknown error',
      service
    }
  }

  return {
    kind: FAILURE_KINDS_BY_CODE.get(error.name) ?? 'provider-error',
    message: error.message,
    service,
    code: error.name
  }
}
