import type { MatchingBlock, Score, Text, TokenSequence } from '../similarity/types.js'

/** 可直接打分的预处理文档 */
export interface Document {
  /** 文件名，目录内唯一 */
  name: string
  path: string
  /** 原始文本，用于 similarityRatio */
  text: Text
  /** 上游归一化后的词元，用于 overlapScore / jaccardScore */
  tokens: TokenSequence
}

export interface PairScores {
  /** similarityRatio，0-100 */
  ratio: Score
  /** 行文档对列文档的 overlapScore；行文档无词元时为 null */
  overlap: Score | null
  /** jaccardScore，0-1；两侧都无词元时为 null */
  jaccard: Score | null
}

/** 文档集合的全部有序对 */
export interface CorpusReport {
  documents: string[]
  /** matrix[i][j] 为 documents[i] 对 documents[j] 的分数；对角线为 null */
  matrix: Array<Array<PairScores | null>>
}

export interface TargetComparison {
  name: string
  scores: PairScores
}

/** 单个文档对其余文档，按 ratio 从高到低 */
export interface TargetReport {
  target: string
  results: TargetComparison[]
}

export interface Segment {
  tokens: string[]
  matched: boolean
}

export interface Highlight {
  a: Segment[]
  b: Segment[]
  /** 长度不小于 minBlockSize 的块，以词元下标计 */
  blocks: MatchingBlock[]
}
