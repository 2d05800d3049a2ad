import pc from 'picocolors'
import type { CliDependencies } from '../dependencies.js'
import { printFailure } from '../output.js'

export async function verifyCommand(
  address: string,
  deps: CliDependencies
): Promise<number> {
  const result = await deps.emailProvider.verifyEmailAddress(address)

  if (!result.ok) {
    printFailure(`Failed to request verification of ${address}`, result.error)
    return 1
  }

  console.log(pc.green(`✓ Verification email sent to ${result.value.address}`))
  console.log(
    pc.dim('The address is usable once its owner follows the emailed link.')
  )
  return 0
}
