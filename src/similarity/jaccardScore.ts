import { AppError } from '../shared/error.js'
import { roundScore } from './roundScore.js'
import type { Score, TokenSequence } from './types.js'

/**
 * 两个词元集合的 Jaccard 指数，0-1（不乘 100）
 *
 * @throws AppError ERR_DIVISION_BY_ZERO 两侧均为空时
 */
export function jaccardScore(tokensA: TokenSequence, tokensB: TokenSequence): Score {
  const setA = new Set(tokensA)
  const setB = new Set(tokensB)
  const union = new Set([...setA, ...setB])

  if (union.size === 0) {
    throw AppError.divisionByZero('jaccard score')
  }

  let intersection = 0
  for (const token of union) {
    if (setA.has(token) && setB.has(token)) intersection++
  }

  return roundScore(intersection / union.size)
}
