/**
 * @entry 相似度打分核心
 *
 * 纯函数、同步：
 * - similarityRatio: 原始文本的匹配块比率 (0-100)
 * - overlapScore: tokensA 中出现在 tokensB 的比例 (0-100，不对称)
 * - jaccardScore: 词元集合交集与并集之比 (0-1)
 */

export type { Text, TokenSequence, Score, MatchingBlock } from './types.js'
export { SequenceMatcher, AUTOJUNK_MIN_LENGTH, type SequenceMatcherOptions } from './SequenceMatcher.js'
export { roundScore } from './roundScore.js'
export { similarityRatio } from './similarityRatio.js'
export { overlapScore } from './overlapScore.js'
export { jaccardScore } from './jaccardScore.js'
