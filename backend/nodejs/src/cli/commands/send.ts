import pc from 'picocolors'
import { resolveSenderEmail } from '@/shared/parameters/resolve-sender-email.js'
import type { CliDependencies } from '../dependencies.js'
import {
  printCredentialsHelp,
  printError,
  printFailure,
  printIdentity,
  printQuota
} from '../output.js'

export interface SendOptions {
  to: string[]
  from?: string
  subject: string
  template: string
  text?: string
  textFile?: string
  structured?: boolean
  cc?: string[]
  bcc?: string[]
}

/**
 * Checks the ambient credentials, then sends the template and reports the
 * message id and remaining quota. Resolves to the process exit code.
 */
export async function sendCommand(
  options: SendOptions,
  deps: CliDependencies
): Promise<number> {
  try {
    const identity = await deps.identityProvider.getCallerIdentity()
    printIdentity(identity, deps.region)
  } catch (error) {
    printError(error)
    printCredentialsHelp()
    return 1
  }

  let sender: string
  try {
    sender = await resolveSenderEmail(options.from)
  } catch (error) {
    printError(error)
    return 1
  }

  console.log(pc.dim(`Loading HTML template ${options.template}...`))
  console.log(pc.dim('Sending email via AWS SES...'))

  const result = await deps.sendTemplatedEmail.execute({
    sender,
    recipients: options.to,
    subject: options.subject,
    templatePath: options.template,
    textBody: options.text,
    textTemplatePath: options.textFile,
    delivery: options.structured ? 'structured' : 'raw',
    cc: options.cc,
    bcc: options.bcc
  })

  if (!result.ok) {
    printFailure('Failed to send email', result.error)
    return 1
  }

  console.log(pc.green('✓ Email sent successfully!'))
  console.log(`Message ID: ${result.value.receipt.messageId}`)

  if (result.value.quota) {
    printQuota(result.value.quota)
  }

  return 0
}
