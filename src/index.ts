/**
 * @entry plagiscore
 *
 * 用于抄袭检测的相似度打分。分数只是信号，是否构成抄袭由调用方判断
 */

export * from './similarity/index.js'
export * from './corpus/index.js'
export { AppError, isAppError, type ErrorCode, type ErrorCategory } from './shared/error.js'
