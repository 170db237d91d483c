import { Command } from 'commander'
import { loadDocument, splitTokens } from '../../corpus/loadDocuments.js'
import type { Document } from '../../corpus/types.js'
import { jaccardScore } from '../../similarity/jaccardScore.js'
import { overlapScore } from '../../similarity/overlapScore.js'
import { similarityRatio } from '../../similarity/similarityRatio.js'
import type { Score } from '../../similarity/types.js'
import { withErrorHandling } from '../withErrorHandling.js'

interface ScoreOptions {
  inline?: boolean
}

async function resolvePair(a: string, b: string, options: ScoreOptions): Promise<[Document, Document]> {
  if (options.inline) {
    const inline = (text: string, name: string): Document => ({
      name,
      path: '',
      text,
      tokens: splitTokens(text),
    })
    return [inline(a, 'a'), inline(b, 'b')]
  }
  return Promise.all([loadDocument(a), loadDocument(b)])
}

function registerScore(
  program: Command,
  name: string,
  description: string,
  score: (a: Document, b: Document) => Score
): void {
  program
    .command(`${name} <a> <b>`)
    .description(description)
    .option('-i, --inline', 'treat <a> and <b> as literal text instead of file paths')
    .action(
      withErrorHandling(name, async (a: string, b: string, options: ScoreOptions) => {
        const [docA, docB] = await resolvePair(a, b, options)
        console.log(score(docA, docB).toFixed(2))
      })
    )
}

export function registerScoreCommands(program: Command): void {
  registerScore(program, 'ratio', 'Character matching-block ratio of two raw texts (0-100)', (a, b) =>
    similarityRatio(a.text, b.text)
  )
  registerScore(program, 'overlap', 'Share of the tokens of <a> found in <b> (0-100)', (a, b) =>
    overlapScore(a.tokens, b.tokens)
  )
  registerScore(program, 'jaccard', 'Jaccard index of the two token sets (0-1)', (a, b) =>
    jaccardScore(a.tokens, b.tokens)
  )
}
