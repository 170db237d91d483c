import { AppError, isAppError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import { fromThrowable, isOk } from '../shared/result.js'
import { jaccardScore } from '../similarity/jaccardScore.js'
import { overlapScore } from '../similarity/overlapScore.js'
import { similarityRatio } from '../similarity/similarityRatio.js'
import type { Score } from '../similarity/types.js'
import type { CorpusReport, Document, PairScores, TargetReport } from './types.js'

const logger = createLogger('compare')

// 分母为零记为 null，其他错误照常抛出
function scoreOrNull(label: string, fn: () => Score): Score | null {
  const result = fromThrowable(fn)
  if (isOk(result)) return result.value
  if (isAppError(result.error, 'ERR_DIVISION_BY_ZERO')) {
    logger.debug(`${label}: ${result.error.message}`)
    return null
  }
  throw result.error
}

/**
 * `a` 对 `b` 的三项分数
 * overlap 以 `a` 为基准
 */
export function scorePair(a: Document, b: Document): PairScores {
  const label = `${a.name} → ${b.name}`
  return {
    ratio: similarityRatio(a.text, b.text),
    overlap: scoreOrNull(label, () => overlapScore(a.tokens, b.tokens)),
    jaccard: scoreOrNull(label, () => jaccardScore(a.tokens, b.tokens)),
  }
}

/**
 * 对每个有序对打分，保留两个方向（overlap 不对称），对角线为 null
 */
export function compareCorpus(documents: readonly Document[]): CorpusReport {
  const matrix = documents.map((a, i) =>
    documents.map((b, j) => (i === j ? null : scorePair(a, b)))
  )

  logger.debug(`Scored ${documents.length * (documents.length - 1)} pairs`)
  return { documents: documents.map(doc => doc.name), matrix }
}

/**
 * `target` 与每个不同名文档比对，按 ratio 从高到低
 */
export function compareAgainst(target: Document, documents: readonly Document[]): TargetReport {
  const others = documents.filter(doc => doc.name !== target.name)
  if (others.length === 0) {
    throw AppError.minimumFiles(1, 2)
  }

  const results = others
    .map(doc => ({ name: doc.name, scores: scorePair(target, doc) }))
    .sort((x, y) => y.scores.ratio - x.scores.ratio || x.name.localeCompare(y.name))

  return { target: target.name, results }
}

/** 结果为 null 的词元分数个数 */
export function countUndefinedScores(scores: Iterable<PairScores | null>): number {
  let count = 0
  for (const pair of scores) {
    if (!pair) continue
    if (pair.overlap === null) count++
    if (pair.jaccard === null) count++
  }
  return count
}
