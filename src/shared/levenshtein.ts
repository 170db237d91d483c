/**
 * Levenshtein 编辑距离
 * 用于命令输错时给出建议
 */

export function levenshteinDistance(a: string, b: string): number {
  const n = b.length

  // 距离矩阵的上一行
  let prev: number[] = Array.from({ length: n + 1 }, (_, j) => j)

  for (let i = 1; i <= a.length; i++) {
    const curr: number[] = [i]
    for (let j = 1; j <= n; j++) {
      const substitution = (prev[j - 1] ?? 0) + (a[i - 1] === b[j - 1] ? 0 : 1)
      const deletion = (prev[j] ?? 0) + 1
      const insertion = (curr[j - 1] ?? 0) + 1
      curr.push(Math.min(substitution, deletion, insertion))
    }
    prev = curr
  }

  return prev[n] ?? 0
}

/**
 * maxDistance 以内最接近的候选，忽略大小写
 */
export function findClosestMatch(
  input: string,
  candidates: readonly string[],
  maxDistance = 2
): { match: string; distance: number } | null {
  let closest: string | null = null
  let minDistance = Infinity

  for (const candidate of candidates) {
    const distance = levenshteinDistance(input.toLowerCase(), candidate.toLowerCase())
    if (distance < minDistance && distance <= maxDistance) {
      minDistance = distance
      closest = candidate
    }
  }

  return closest ? { match: closest, distance: minDistance } : null
}
