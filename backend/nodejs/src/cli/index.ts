import { Command } from 'commander'
import { quotaCommand } from './commands/quota.js'
import { sendCommand, type SendOptions } from './commands/send.js'
import { verifyCommand } from './commands/verify.js'
import { makeCliDependencies } from './dependencies.js'
import { printError } from './output.js'
import { collectAddresses } from './utils.js'

const program = new Command()

program
  .name('ses-mailer')
  .description('Compose and send transactional email through Amazon SES')
  .version('0.1.0')
  .option('-r, --region <region>', 'AWS region (defaults to AWS_REGION)')

const dependencies = () =>
  makeCliDependencies(program.opts<{ region?: string }>().region)

program
  .command('send')
  .description('Send an HTML template to one or more recipients')
  .requiredOption(
    '-t, --to <addresses>',
    'recipient address (repeatable, or comma separated)',
    collectAddresses
  )
  .requiredOption('-s, --subject <subject>', 'email subject')
  .option('-f, --from <address>', 'verified sender address')
  .option('--template <path>', 'HTML template file', 'template.html')
  .option('--text <text>', 'plain-text alternative')
  .option('--text-file <path>', 'file holding the plain-text alternative')
  .option('--structured', 'send as structured fields instead of raw MIME')
  .option(
    '--cc <addresses>',
    'cc address (structured only)',
    collectAddresses
  )
  .option(
    '--bcc <addresses>',
    'bcc address (structured only)',
    collectAddresses
  )
  .action(async (options: SendOptions) => {
    process.exitCode = await sendCommand(options, dependencies())
  })

program
  .command('verify')
  .description('Ask SES to send a verification email to an address')
  .argument('<address>', 'address to verify')
  .action(async (address: string) => {
    process.exitCode = await verifyCommand(address, dependencies())
  })

program
  .command('quota')
  .description('Show the current SES sending quota')
  .action(async () => {
    process.exitCode = await quotaCommand(dependencies())
  })

try {
  await program.parseAsync()
} catch (error) {
  printError(error)
  process.exitCode = 1
}
