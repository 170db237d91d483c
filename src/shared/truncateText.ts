/**
 * 截断文本并添加后缀
 *
 * 报告表格中的文档名截断到 24 个字符
 */
export function truncateText(text: string, maxLength: number = 24, suffix: string = '…'): string {
  if (text.length <= maxLength) return text
  return text.slice(0, Math.max(0, maxLength - suffix.length)) + suffix
}
