import { getEnv } from './env.js'

describe('getEnv', () => {
  it('defaults the region to us-east-1', () => {
    expect(getEnv({})).toEqual({ AWS_REGION: 'us-east-1' })
  })

  it('treats empty variables as unset', () => {
    expect(getEnv({ AWS_REGION: '', SENDER_EMAIL: '' })).toEqual({
      AWS_REGION: 'us-east-1'
    })
  })

  it('reads the sender settings', () => {
    expect(
      getEnv({
        AWS_REGION: 'eu-west-1',
        SENDER_EMAIL: 'sender@example.com',
        SENDER_EMAIL_PARAM: '/ses-mailer/sender-email'
      })
    ).toEqual({
      AWS_REGION: 'eu-west-1',
      SENDER_EMAIL: 'sender@example.com',
      SENDER_EMAIL_PARAM: '/ses-mailer/sender-email'
    })
  })

  it('rejects a malformed sender address', () => {
    expect(() => getEnv({ SENDER_EMAIL: 'not-an-address' })).toThrow()
  })
})
