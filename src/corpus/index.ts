/**
 * @entry 语料比对模块
 *
 * 加载预处理文档，两两打分或与单个目标比对；高亮匹配的词块
 */

export type {
  Document,
  PairScores,
  CorpusReport,
  TargetComparison,
  TargetReport,
  Segment,
  Highlight,
} from './types.js'
export {
  loadDocument,
  loadDocuments,
  collectDocuments,
  splitTokens,
  SUPPORTED_EXTENSIONS,
  type DocumentExtension,
  type DocumentCollection,
  type LoadDocumentsOptions,
  type SkippedFile,
} from './loadDocuments.js'
export { scorePair, compareCorpus, compareAgainst, countUndefinedScores } from './compareCorpus.js'
export { highlightMatches, DEFAULT_BLOCK_SIZE } from './highlightMatches.js'
export {
  formatCorpusReportForTerminal,
  formatTargetReportForTerminal,
  formatReportForJson,
  formatHighlightForTerminal,
} from './formatters.js'
