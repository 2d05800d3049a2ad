import { readFile } from 'fs/promises'
import {
  fail,
  succeed,
  type EmailResult
} from '@/shared/errors/email-failure.js'
import { getLogger } from '@/shared/logger/get-logger.js'
import type { TemplateProvider } from './template-provider.js'

const logger = getLogger()

const SERVICE = 'filesystem'

export class FileTemplateProvider implements TemplateProvider {
  async loadTemplate(path: string): Promise<EmailResult<string>> {
    try {
      const content = await readFile(path, { encoding: 'utf-8' })
      logger.debug('Template loaded', { path, length: content.length })
      return succeed(content)
    } catch (error) {
      if (isNotFound(error)) {
        logger.error('Template file not found', { path })
        return fail({
          kind: 'template-not-found',
          message: `Template file not found: ${path}`,
          service: SERVICE,
          code: 'ENOENT'
        })
      }

      logger.error('Error reading template file', { error, path })
      return fail({
        kind: 'template-unreadable',
        message: error instanceof Error ? error.message : 'Unknown error',
        service: SERVICE,
        code: errorCode(error)
      })
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    return String(error.code)
  }
  return undefined
}

function isNotFound(error: unknown): boolean {
  return errorCode(error) === 'ENOENT'
}
