/**
 * 统一错误处理
 * 错误带有错误码、分类和可选的修复建议
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

// ============ 错误分类 ============

export type ErrorCategory =
  | 'ARITHMETIC' // 分数无定义（分母为零）
  | 'CONFIG' // 配置文件错误
  | 'RESOURCE' // 文件或目录不存在
  | 'PERMISSION'
  | 'VALIDATION' // 输入格式或参数错误
  | 'UNKNOWN'

export type ErrorCode =
  | 'ERR_DIVISION_BY_ZERO'
  | 'ERR_PATH_NOT_FOUND'
  | 'ERR_MIN_FILES'
  | 'ERR_UNSUPPORTED_FILE'
  | 'ERR_INVALID_TOKENS'
  | 'ERR_VALIDATION'
  | 'ERR_FILE_NOT_FOUND'
  | 'ERR_PERMISSION'
  | 'CONFIG_INVALID'
  | 'ERR_UNKNOWN'

// ============ AppError ============

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /**
   * 格式化为终端输出
   */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(chalk.red('✗') + ' ' + chalk.bold('Error') + ` [${colorFn(categoryLabels[this.category])}]`)
    lines.push('')
    lines.push(chalk.dim(`  code: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  Suggested fix:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ 工厂方法 ============

  static divisionByZero(operation: string): AppError {
    return new AppError(
      'ERR_DIVISION_BY_ZERO',
      `${operation} is undefined for empty input`,
      'ARITHMETIC',
      undefined,
      'Pass at least one token'
    )
  }

  static pathNotFound(path: string): AppError {
    return new AppError(
      'ERR_PATH_NOT_FOUND',
      `The specified path does not exist: ${path}`,
      'RESOURCE',
      undefined,
      'Check the directory path or set compare.input_dir'
    )
  }

  static minimumFiles(found: number, required: number): AppError {
    return new AppError(
      'ERR_MIN_FILES',
      `Found ${found} document(s), at least ${required} required for comparison`,
      'RESOURCE',
      undefined,
      'Add more .txt or .json documents to the directory'
    )
  }

  static unsupportedFile(path: string): AppError {
    return new AppError(
      'ERR_UNSUPPORTED_FILE',
      `Unsupported file type: ${path}`,
      'VALIDATION',
      undefined,
      'Convert the document to .txt or a .json token list'
    )
  }

  static invalidTokens(path: string, reason: string): AppError {
    return new AppError(
      'ERR_INVALID_TOKENS',
      `Invalid token document ${path}: ${reason}`,
      'VALIDATION',
      undefined,
      'Expected a JSON string array or { "text": string, "tokens"?: string[] }'
    )
  }

  static invalidArgument(reason: string): AppError {
    return new AppError('ERR_VALIDATION', reason, 'VALIDATION')
  }

  static configInvalid(reason: string): AppError {
    return new AppError(
      'CONFIG_INVALID',
      `Invalid config: ${reason}`,
      'CONFIG',
      undefined,
      'Check .plagiscore.yaml against the documented keys'
    )
  }

  static unknown(cause: unknown): AppError {
    return new AppError('ERR_UNKNOWN', getErrorMessage(cause), 'UNKNOWN', cause)
  }

  /**
   * 按已知模式匹配，从原始 Error 或消息构造 AppError
   */
  static fromError(error: Error | string): AppError {
    const errorMessage = typeof error === 'string' ? error : error.message
    const errorStack = typeof error === 'string' ? undefined : error.stack

    for (const pattern of errorPatterns) {
      const match = errorMessage.match(pattern.pattern)
      if (match) {
        return new AppError(
          pattern.code,
          errorMessage,
          pattern.category,
          errorStack ? { stack: errorStack } : undefined,
          pattern.getSuggestion(match)
        )
      }
    }

    return new AppError(
      'ERR_UNKNOWN',
      errorMessage,
      'UNKNOWN',
      errorStack ? { stack: errorStack } : undefined,
      'Re-run with --verbose for debug output'
    )
  }
}

// ============ 模式匹配 ============

interface ErrorPattern {
  pattern: RegExp
  category: ErrorCategory
  code: ErrorCode
  getSuggestion: (match: RegExpMatchArray) => string
}

function quotedPath(message: string, fallback: string): string {
  return message.match(/['"]([^'"]+)['"]/)?.[1] ?? fallback
}

const errorPatterns: ErrorPattern[] = [
  {
    pattern: /ENOENT|no such file|file not found/i,
    category: 'RESOURCE',
    code: 'ERR_FILE_NOT_FOUND',
    getSuggestion: match => `Make sure the file exists: ls -la ${quotedPath(match.input ?? '', '<path>')}`,
  },
  {
    pattern: /EACCES|EPERM|permission denied/i,
    category: 'PERMISSION',
    code: 'ERR_PERMISSION',
    getSuggestion: match => `Check file permissions: ls -la ${quotedPath(match.input ?? '', '<path>')}`,
  },
]

// ============ 终端输出 ============

const categoryLabels: Record<ErrorCategory, string> = {
  ARITHMETIC: 'arithmetic',
  CONFIG: 'config',
  RESOURCE: 'resource',
  PERMISSION: 'permission',
  VALIDATION: 'validation',
  UNKNOWN: 'unknown',
}

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  ARITHMETIC: chalk.magenta,
  CONFIG: chalk.yellow,
  RESOURCE: chalk.yellow,
  PERMISSION: chalk.red,
  VALIDATION: chalk.yellow,
  UNKNOWN: chalk.gray,
}

/**
 * 输出错误到 stderr
 */
export function printError(error: unknown): void {
  if (error instanceof AppError) {
    console.error(error.format())
    return
  }
  const appError = error instanceof Error ? AppError.fromError(error) : AppError.unknown(error)
  console.error(appError.format())
}

/**
 * 输出警告到 stderr
 */
export function printWarning(message: string, suggestion?: string): void {
  console.warn('')
  console.warn(chalk.yellow('!') + ' ' + chalk.bold('Warning'))
  console.warn(`  ${message}`)
  if (suggestion) {
    console.warn('')
    console.warn(chalk.cyan('  Suggestion:'))
    console.warn(chalk.dim('    →') + ` ${suggestion}`)
  }
  console.warn('')
}

export function isAppError(value: unknown, code?: ErrorCode): value is AppError {
  return value instanceof AppError && (code === undefined || value.code === code)
}
