/**
 * plagiscore 命令树
 *
 *   plagiscore ratio <a> <b>         字符匹配块比率
 *   plagiscore overlap <a> <b>       词元重叠百分比
 *   plagiscore jaccard <a> <b>       词元集合 Jaccard 指数
 *   plagiscore compare [dir]         目录内两两比对矩阵
 *   plagiscore check <file> [dir]    单个文档对目录比对
 *   plagiscore diff <a> <b>          高亮匹配词块
 */

import { Command } from 'commander'
import chalk from 'chalk'
import { loadConfig } from '../config/loadConfig.js'
import { findClosestMatch } from '../shared/levenshtein.js'
import { getLogLevel, setLogLevel } from '../shared/logger.js'
import { registerCompareCommands } from './commands/compare.js'
import { registerDiffCommand } from './commands/diff.js'
import { registerScoreCommands } from './commands/score.js'
import { error } from './output.js'

export const VERSION = '0.1.0'

export function createProgram(): Command {
  const program = new Command()

  program
    .name('plagiscore')
    .description('Pairwise text similarity scores for plagiarism detection')
    .version(VERSION)
    .option('-v, --verbose', 'debug logging')
    .argument('[command...]')
    .hook('preAction', async () => {
      if (program.opts<{ verbose?: boolean }>().verbose) {
        setLogLevel('debug')
        return
      }
      // SILENT=1（及测试环境）优先于配置文件
      if (getLogLevel() !== 'silent') {
        setLogLevel((await loadConfig()).log.level)
      }
    })
    .action((words: string[]) => {
      const [input] = words
      if (input === undefined) {
        console.log(program.helpInformation())
        return
      }

      error(`Unknown command "${input}"`)
      const known = program.commands.map(command => command.name())
      const match = findClosestMatch(input, known)
      if (match) {
        console.log(chalk.gray(`  Did you mean: plagiscore ${match.match}`))
      }
      console.log(chalk.gray('  Run plagiscore --help for usage'))
      process.exitCode = 1
    })

  registerScoreCommands(program)
  registerCompareCommands(program)
  registerDiffCommand(program)

  return program
}
