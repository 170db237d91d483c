import { AppError } from '../shared/error.js'
import { roundScore } from './roundScore.js'
import type { Score, TokenSequence } from './types.js'

/**
 * tokensA 中出现在 tokensB 的词元百分比，0-100
 *
 * tokensA 中每次出现都计数，重复词元权重更高。
 * 不对称：分母只取 tokensA 的长度
 *
 * @throws AppError ERR_DIVISION_BY_ZERO tokensA 为空时
 */
export function overlapScore(tokensA: TokenSequence, tokensB: TokenSequence): Score {
  if (tokensA.length === 0) {
    throw AppError.divisionByZero('overlap score')
  }

  const lookup = new Set(tokensB)
  const overlapCount = tokensA.filter(token => lookup.has(token)).length

  return roundScore((overlapCount / tokensA.length) * 100)
}
