/**
 * 报告渲染：终端文本与 JSON
 */

import chalk from 'chalk'
import { truncateText } from '../shared/truncateText.js'
import type { Score } from '../similarity/types.js'
import type { CorpusReport, Highlight, Segment, TargetReport } from './types.js'

function formatScore(score: Score | null): string {
  return score === null ? '-' : score.toFixed(2)
}

export function formatCorpusReportForTerminal(report: CorpusReport): string {
  const names = report.documents.map(name => truncateText(name))
  const width = Math.max(6, ...names.map(name => name.length))
  const lines: string[] = []

  lines.push(chalk.bold('Similarity ratio (%)'))
  lines.push(''.padEnd(width) + names.map(name => '  ' + name.padStart(width)).join(''))

  report.matrix.forEach((row, i) => {
    const cells = row.map(cell => '  ' + formatScore(cell?.ratio ?? null).padStart(width))
    lines.push((names[i] ?? '').padEnd(width) + cells.join(''))
  })

  lines.push('')
  lines.push(chalk.bold('Token scores'))
  report.matrix.forEach((row, i) => {
    row.forEach((cell, j) => {
      if (!cell) return
      lines.push(
        `  ${names[i] ?? ''} → ${names[j] ?? ''}  overlap ${formatScore(cell.overlap)}  jaccard ${formatScore(cell.jaccard)}`
      )
    })
  })

  return lines.join('\n')
}

export function formatTargetReportForTerminal(report: TargetReport): string {
  const names = report.results.map(result => truncateText(result.name))
  const width = Math.max(8, ...names.map(name => name.length))
  const lines: string[] = []

  lines.push(chalk.bold(`Compared against ${report.target}`))
  lines.push(
    `  ${'document'.padEnd(width)}  ${'ratio'.padStart(6)}  ${'overlap'.padStart(7)}  ${'jaccard'.padStart(7)}`
  )
  lines.push('  ' + chalk.dim('─'.repeat(width + 26)))

  report.results.forEach((result, i) => {
    const { ratio, overlap, jaccard } = result.scores
    lines.push(
      `  ${(names[i] ?? '').padEnd(width)}  ${formatScore(ratio).padStart(6)}  ${formatScore(overlap).padStart(7)}  ${formatScore(jaccard).padStart(7)}`
    )
  })

  return lines.join('\n')
}

export function formatReportForJson(report: CorpusReport | TargetReport): string {
  return JSON.stringify(report, null, 2)
}

function renderSegments(segments: Segment[]): string {
  return segments
    .map(segment => {
      const text = segment.tokens.join(' ')
      return segment.matched ? chalk.bgYellow.black(text) : text
    })
    .join(' ')
}

export function formatHighlightForTerminal(highlight: Highlight, names: [string, string]): string {
  const matched = highlight.blocks.reduce((sum, block) => sum + block.size, 0)
  return [
    chalk.bold(names[0]),
    renderSegments(highlight.a),
    '',
    chalk.bold(names[1]),
    renderSegments(highlight.b),
    '',
    chalk.dim(`${highlight.blocks.length} matching block(s), ${matched} token(s)`),
  ].join('\n')
}
