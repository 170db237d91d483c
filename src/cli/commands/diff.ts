import { Command } from 'commander'
import { loadConfig } from '../../config/loadConfig.js'
import { formatHighlightForTerminal } from '../../corpus/formatters.js'
import { highlightMatches } from '../../corpus/highlightMatches.js'
import { loadDocument } from '../../corpus/loadDocuments.js'
import { withErrorHandling } from '../withErrorHandling.js'

export function registerDiffCommand(program: Command): void {
  program
    .command('diff <a> <b>')
    .description('Print two documents with matching word blocks highlighted')
    .option('-b, --block-size <n>', 'minimum block length in tokens (default from config)')
    .action(
      withErrorHandling('diff', async (a: string, b: string, options: { blockSize?: string }) => {
        const config = await loadConfig()
        const blockSize = options.blockSize === undefined ? config.diff.block_size : Number(options.blockSize)

        const [docA, docB] = await Promise.all([loadDocument(a), loadDocument(b)])
        const highlight = highlightMatches(docA.tokens, docB.tokens, blockSize)
        console.log(formatHighlightForTerminal(highlight, [docA.name, docB.name]))
      })
    )
}
