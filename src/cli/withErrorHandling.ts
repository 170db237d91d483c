import { ensureError } from '../shared/assertError.js'
import { printError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'

const logger = createLogger('cli')

/**
 * 包装命令 action：失败时输出错误并设置退出码 1
 */
export function withErrorHandling<A extends unknown[]>(
  command: string,
  fn: (...args: A) => Promise<void>
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args)
    } catch (e) {
      logger.debug(`${command} failed`, ensureError(e).stack)
      printError(e)
      process.exitCode = 1
    }
  }
}
