/**
 * loadConfig 测试
 * 配置加载、缓存、回退与环境变量覆盖
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdirSync, writeFileSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import {
  loadConfig,
  getDefaultConfig,
  clearConfigCache,
  applyEnvOverrides,
  CONFIG_FILENAME,
} from '../loadConfig.js'

const TEST_DIR = join(tmpdir(), `plagiscore-config-test-${Date.now()}`)
const CONFIG_PATH = join(TEST_DIR, CONFIG_FILENAME)

beforeEach(() => {
  clearConfigCache()
  mkdirSync(TEST_DIR, { recursive: true })
})

afterEach(() => {
  clearConfigCache()
  vi.unstubAllEnvs()
  rmSync(TEST_DIR, { recursive: true, force: true })
})

describe('getDefaultConfig', () => {
  it('should return the documented defaults', () => {
    const config = getDefaultConfig()
    expect(config.compare.input_dir).toBe('input_files')
    expect(config.compare.extensions).toEqual(['txt', 'json'])
    expect(config.compare.min_files).toBe(2)
    expect(config.diff.block_size).toBe(2)
    expect(config.log.level).toBe('info')
  })
})

describe('loadConfig', () => {
  it('should return defaults when no config file exists', async () => {
    expect(await loadConfig({ cwd: TEST_DIR })).toEqual(getDefaultConfig())
  })

  it('should merge the YAML file over the defaults', async () => {
    writeFileSync(CONFIG_PATH, 'compare:\n  input_dir: essays\ndiff:\n  block_size: 3\n')
    const config = await loadConfig({ cwd: TEST_DIR })
    expect(config.compare).toEqual({ input_dir: 'essays', extensions: ['txt', 'json'], min_files: 2 })
    expect(config.diff.block_size).toBe(3)
  })

  it('should treat an empty file as defaults', async () => {
    writeFileSync(CONFIG_PATH, '# nothing here\n')
    expect(await loadConfig({ cwd: TEST_DIR })).toEqual(getDefaultConfig())
  })

  it('should fall back to defaults on schema errors', async () => {
    writeFileSync(CONFIG_PATH, 'diff:\n  block_size: 0\n')
    expect(await loadConfig({ cwd: TEST_DIR })).toEqual(getDefaultConfig())
  })

  it('should fall back to defaults when the top level is not a mapping', async () => {
    writeFileSync(CONFIG_PATH, '- txt\n- json\n')
    expect(await loadConfig({ cwd: TEST_DIR })).toEqual(getDefaultConfig())
  })

  it('should cache until cleared', async () => {
    const first = await loadConfig({ cwd: TEST_DIR })
    writeFileSync(CONFIG_PATH, 'diff:\n  block_size: 5\n')
    expect(await loadConfig({ cwd: TEST_DIR })).toBe(first)

    clearConfigCache()
    expect((await loadConfig({ cwd: TEST_DIR })).diff.block_size).toBe(5)
  })

  it('should apply env overrides on top of the file', async () => {
    writeFileSync(CONFIG_PATH, 'compare:\n  input_dir: essays\n')
    vi.stubEnv('PLAGISCORE_INPUT_DIR', 'submissions')
    const config = await loadConfig({ cwd: TEST_DIR })
    expect(config.compare.input_dir).toBe('submissions')
  })
})

describe('applyEnvOverrides', () => {
  it('should override block size and log level', () => {
    vi.stubEnv('PLAGISCORE_BLOCK_SIZE', '4')
    vi.stubEnv('PLAGISCORE_LOG_LEVEL', 'debug')
    const config = applyEnvOverrides(getDefaultConfig())
    expect(config.diff.block_size).toBe(4)
    expect(config.log.level).toBe('debug')
  })

  it('should ignore invalid values', () => {
    vi.stubEnv('PLAGISCORE_BLOCK_SIZE', 'two')
    vi.stubEnv('PLAGISCORE_LOG_LEVEL', 'loud')
    expect(applyEnvOverrides(getDefaultConfig())).toEqual(getDefaultConfig())
  })

  it('should not mutate its input', () => {
    vi.stubEnv('PLAGISCORE_INPUT_DIR', 'elsewhere')
    const defaults = getDefaultConfig()
    applyEnvOverrides(defaults)
    expect(defaults.compare.input_dir).toBe('input_files')
  })
})
