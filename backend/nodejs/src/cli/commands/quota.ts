import type { CliDependencies } from '../dependencies.js'
import { printFailure, printQuota } from '../output.js'

export async function quotaCommand(deps: CliDependencies): Promise<number> {
  const result = await deps.emailProvider.getSendQuota()

  if (!result.ok) {
    printFailure('Failed to read the send quota', result.error)
    return 1
  }

  printQuota(result.value)
  return 0
}
