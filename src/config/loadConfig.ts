import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import YAML from 'yaml'
import { createLogger, isLogLevel } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.plagiscore.yaml'

let cachedConfig: Config | null = null

/**
 * 从工作目录加载 .plagiscore.yaml
 *
 * 文件不存在：使用默认值。无法读取或校验失败：警告并使用默认值。
 * 环境变量覆盖始终生效。结果缓存到 clearConfigCache() 为止
 */
export async function loadConfig(options: { cwd?: string } = {}): Promise<Config> {
  if (cachedConfig) return cachedConfig

  const configPath = join(options.cwd ?? process.cwd(), CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  let raw: Record<string, unknown>
  try {
    raw = await parseYamlFile(configPath)
  } catch (error) {
    logger.warn(`Failed to read ${configPath}, using defaults: ${getErrorMessage(error)}`)
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  const result = configSchema.safeParse(raw)
  if (!result.success) {
    logger.warn('Config file format error, using defaults', result.error.issues)
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  logger.debug(`Loaded config from ${configPath}`)
  cachedConfig = applyEnvOverrides(result.data)
  return cachedConfig
}

/**
 * 解析 YAML 文件；空文件或只有注释时返回 {}
 */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readFile(filePath, 'utf-8')
  const parsed: unknown = YAML.parse(content)
  if (parsed === null || parsed === undefined) return {}
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw AppError.configInvalid('top level must be a mapping')
  }
  return { ...parsed }
}

/**
 * PLAGISCORE_INPUT_DIR、PLAGISCORE_BLOCK_SIZE、PLAGISCORE_LOG_LEVEL
 * 校验失败的值忽略并警告
 */
export function applyEnvOverrides(config: Config): Config {
  const env = process.env

  if (env.PLAGISCORE_INPUT_DIR) {
    config = { ...config, compare: { ...config.compare, input_dir: env.PLAGISCORE_INPUT_DIR } }
  }

  if (env.PLAGISCORE_BLOCK_SIZE) {
    const blockSize = Number(env.PLAGISCORE_BLOCK_SIZE)
    if (Number.isInteger(blockSize) && blockSize >= 1) {
      config = { ...config, diff: { ...config.diff, block_size: blockSize } }
    } else {
      logger.warn(`Ignoring PLAGISCORE_BLOCK_SIZE=${env.PLAGISCORE_BLOCK_SIZE}: not a positive integer`)
    }
  }

  if (env.PLAGISCORE_LOG_LEVEL) {
    const level = env.PLAGISCORE_LOG_LEVEL
    if (isLogLevel(level)) {
      config = { ...config, log: { level } }
    } else {
      logger.warn(`Ignoring PLAGISCORE_LOG_LEVEL=${level}`)
    }
  }

  return config
}

export function getDefaultConfig(): Config {
  return {
    compare: {
      input_dir: 'input_files',
      extensions: ['txt', 'json'],
      min_files: 2,
    },
    diff: {
      block_size: 2,
    },
    log: {
      level: 'info',
    },
  }
}

export function clearConfigCache(): void {
  cachedConfig = null
}
