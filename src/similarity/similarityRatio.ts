import { SequenceMatcher } from './SequenceMatcher.js'
import { roundScore } from './roundScore.js'
import type { Score, Text } from './types.js'

/**
 * 两段原始文本的字符级匹配块比率，0-100
 *
 * 按 Unicode 码点比较。两段空文本得 100。
 * 贪心选块使部分输入的结果依赖参数顺序（"tide"/"diet" 得 25，"diet"/"tide" 得 50）。
 * textB 达到 200 个码点后，其中的高频字符不作为匹配起点（见 SequenceMatcher）
 */
export function similarityRatio(textA: Text, textB: Text): Score {
  const matcher = new SequenceMatcher(Array.from(textA), Array.from(textB))
  return roundScore(matcher.ratio() * 100)
}
