import { Command } from 'commander'
import { writeFile } from 'fs/promises'
import { basename } from 'path'
import { loadConfig } from '../../config/loadConfig.js'
import { compareAgainst, compareCorpus, countUndefinedScores } from '../../corpus/compareCorpus.js'
import {
  formatCorpusReportForTerminal,
  formatReportForJson,
  formatTargetReportForTerminal,
} from '../../corpus/formatters.js'
import { collectDocuments, loadDocument, loadDocuments, type SkippedFile } from '../../corpus/loadDocuments.js'
import { printWarning } from '../../shared/error.js'
import { success } from '../output.js'
import { withErrorHandling } from '../withErrorHandling.js'

interface ReportOptions {
  json?: boolean
  output?: string
}

async function emit(output: string, options: ReportOptions): Promise<void> {
  if (options.output) {
    await writeFile(options.output, output + '\n')
    success(`Report saved to ${options.output}`)
  } else {
    console.log(output)
  }
}

function warnUndefined(count: number): void {
  if (count === 0) return
  printWarning(
    `${count} token score(s) are undefined because a document has no tokens`,
    'Check the upstream tokenizer output for empty documents'
  )
}

function warnSkipped(skipped: readonly SkippedFile[]): void {
  for (const { path, error } of skipped) {
    printWarning(`Skipping file ${basename(path)} due to error: ${error.message}`, error.suggestion)
  }
}

export function registerCompareCommands(program: Command): void {
  program
    .command('compare [dir]')
    .description('Score every pair of documents in a directory')
    .option('--json', 'print JSON')
    .option('-o, --output <file>', 'write the report to a file')
    .action(
      withErrorHandling('compare', async (dir: string | undefined, options: ReportOptions) => {
        const config = await loadConfig()
        const documents = await loadDocuments(dir ?? config.compare.input_dir, {
          extensions: config.compare.extensions,
          minFiles: config.compare.min_files,
        })

        const report = compareCorpus(documents)
        warnUndefined(countUndefinedScores(report.matrix.flat()))
        await emit(options.json ? formatReportForJson(report) : formatCorpusReportForTerminal(report), options)
      })
    )

  program
    .command('check <file> [dir]')
    .description('Score one document against every other document in a directory')
    .option('--json', 'print JSON')
    .option('-o, --output <file>', 'write the report to a file')
    .action(
      withErrorHandling('check', async (file: string, dir: string | undefined, options: ReportOptions) => {
        const config = await loadConfig()
        const target = await loadDocument(file)
        // 单个文件出错只跳过，其余照常比对
        const { documents, skipped } = await collectDocuments(dir ?? config.compare.input_dir, {
          extensions: config.compare.extensions,
          minFiles: 1,
        })
        warnSkipped(skipped)

        const report = compareAgainst(target, documents)
        warnUndefined(countUndefinedScores(report.results.map(result => result.scores)))
        await emit(options.json ? formatReportForJson(report) : formatTargetReportForTerminal(report), options)
      })
    )
}
