import { AppError } from '../shared/error.js'
import { SequenceMatcher } from '../similarity/SequenceMatcher.js'
import type { MatchingBlock, TokenSequence } from '../similarity/types.js'
import type { Highlight, Segment } from './types.js'

export const DEFAULT_BLOCK_SIZE = 2

function toSegments(tokens: TokenSequence, blocks: MatchingBlock[], side: 'a' | 'b'): Segment[] {
  const segments: Segment[] = []
  let position = 0

  for (const block of blocks) {
    const start = block[side]
    if (start > position) {
      segments.push({ tokens: tokens.slice(position, start), matched: false })
    }
    segments.push({ tokens: tokens.slice(start, start + block.size), matched: true })
    position = start + block.size
  }

  if (position < tokens.length) {
    segments.push({ tokens: tokens.slice(position), matched: false })
  }
  return segments
}

/**
 * 将两侧词元切分为匹配段与非匹配段
 * 只有长度不小于 `minBlockSize` 的匹配块计为匹配
 */
export function highlightMatches(
  tokensA: TokenSequence,
  tokensB: TokenSequence,
  minBlockSize = DEFAULT_BLOCK_SIZE
): Highlight {
  if (!Number.isInteger(minBlockSize) || minBlockSize < 1) {
    throw AppError.invalidArgument(`Block size must be a positive integer, got ${minBlockSize}`)
  }

  const blocks = new SequenceMatcher(tokensA, tokensB)
    .getMatchingBlocks()
    .filter(block => block.size >= minBlockSize)

  return {
    a: toSegments(tokensA, blocks, 'a'),
    b: toSegments(tokensB, blocks, 'b'),
    blocks,
  }
}
