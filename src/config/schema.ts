import { z } from 'zod'
import { SUPPORTED_EXTENSIONS } from '../corpus/loadDocuments.js'
import { LOG_LEVELS } from '../shared/logger.js'

export const compareConfigSchema = z.object({
  /** `compare` 与 `check` 扫描的目录 */
  input_dir: z.string().min(1).default('input_files'),
  /** 读取的文件扩展名，不带点 */
  extensions: z.array(z.enum(SUPPORTED_EXTENSIONS)).min(1).default(['txt', 'json']),
  min_files: z.number().int().min(1).default(2),
})

export const diffConfigSchema = z.object({
  /** `diff` 高亮的最小匹配块，以词元计 */
  block_size: z.number().int().min(1).default(2),
})

export const logConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
})

export const configSchema = z.object({
  compare: compareConfigSchema.default({}),
  diff: diffConfigSchema.default({}),
  log: logConfigSchema.default({}),
})

export type CompareConfig = z.infer<typeof compareConfigSchema>
export type DiffConfig = z.infer<typeof diffConfigSchema>
export type LogConfig = z.infer<typeof logConfigSchema>
export type Config = z.infer<typeof configSchema>
