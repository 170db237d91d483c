/** 未分词的原始文本 */
export type Text = string

/**
 * 按文档顺序排列的归一化词元
 * 小写化、去停用词、去数字、词形还原均在上游完成
 */
export type TokenSequence = readonly string[]

/** 保留 2 位小数的相似度 */
export type Score = number

/** seqA[a .. a + size) 与 seqB[b .. b + size) 相同 */
export interface MatchingBlock {
  a: number
  b: number
  size: number
}
