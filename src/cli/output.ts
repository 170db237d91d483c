/**
 * CLI 用户输出工具
 * 面向用户的终端输出，无时间戳
 *
 * 诊断日志请使用 shared/logger.ts
 */

import chalk from 'chalk'

export function success(message: string): void {
  console.log(chalk.green('✓'), message)
}

export function error(message: string): void {
  console.error(chalk.red('✗'), message)
}
