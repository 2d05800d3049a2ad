import pc from 'picocolors'
import type { SendQuota } from '@/providers/email/email-provider-dto.js'
import type { CallerIdentity } from '@/providers/identity/identity-provider.js'
import type { EmailFailure } from '@/shared/errors/email-failure.js'
import { IntegrationError } from '@/shared/errors/integration-error.js'

export function printIdentity(identity: CallerIdentity, region: string) {
  console.log(`AWS Account: ${identity.account}`)
  console.log(`AWS User/Role: ${identity.arn}`)
  console.log(`AWS Region: ${region}`)
}

export function printQuota(quota: SendQuota) {
  console.log(pc.bold('\nSending Quota Information:'))
  console.log(`Max 24 Hour Send: ${quota.max24HourSend}`)
  console.log(`Max Send Rate: ${quota.maxSendRate} emails/second`)
  console.log(`Sent Last 24 Hours: ${quota.sentLast24Hours}`)
}

export function printFailure(headline: string, failure: EmailFailure) {
  console.error(pc.red(`✗ ${headline}`))
  console.error(pc.red(`  ${failure.kind}: ${failure.message}`))

  if (failure.kind === 'sender-not-verified') {
    console.error(
      pc.yellow('  Verify the sender first: ses-mailer verify <address>')
    )
  }
  if (failure.kind === 'credentials') {
    printCredentialsHelp()
  }
}

export function printCredentialsHelp() {
  console.error('\nTo configure AWS credentials:')
  console.error('1. Install the AWS CLI')
  console.error('2. Configure credentials: aws configure')
  console.error('3. Or set environment variables:')
  console.error('   export AWS_ACCESS_KEY_ID=<access key id>')
  console.error('   export AWS_SECRET_ACCESS_KEY=<secret access key>')
  console.error('   export AWS_REGION=us-east-1')
  console.error(
    pc.dim('\nMake sure your sender email is verified in the SES console.')
  )
}

export function printError(error: unknown) {
  const message = error instanceof Error ? error.message : String(error)
  console.error(pc.red(`✗ ${message}`))

  if (error instanceof IntegrationError && error.details) {
    console.error(pc.dim(`  ${error.service}: ${error.details}`))
  }
}
