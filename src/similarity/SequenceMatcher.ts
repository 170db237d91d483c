/**
 * 最长连续匹配块算法 (Ratcliff/Obershelp)
 *
 * 先找两序列的最长公共块，再对其左右两侧递归。
 * 元素类型不限：文本比对用字符，高亮用词元。
 *
 * 高频元素 (autojunk)：b 长度 >= 200 时，出现次数超过 1 + floor(len(b) / 100)
 * 的元素不参与起始匹配，只在已找到的块两端向外扩展时并入。
 */

import type { MatchingBlock } from './types.js'

/** 启用高频元素过滤的最小 b 长度 */
export const AUTOJUNK_MIN_LENGTH = 200

export interface SequenceMatcherOptions {
  /** 过滤 b 中的高频元素，默认 true */
  autojunk?: boolean
}

export class SequenceMatcher<T> {
  private readonly a: readonly T[]
  private readonly b: readonly T[]
  /** 元素 -> b 中的升序下标 */
  private readonly b2j = new Map<T, number[]>()
  /** 被过滤的高频元素 */
  private readonly popular = new Set<T>()
  private matchingBlocks: MatchingBlock[] | null = null

  constructor(a: readonly T[], b: readonly T[], options: SequenceMatcherOptions = {}) {
    const { autojunk = true } = options
    this.a = a
    this.b = b

    b.forEach((element, j) => {
      const indices = this.b2j.get(element)
      if (indices) {
        indices.push(j)
      } else {
        this.b2j.set(element, [j])
      }
    })

    if (autojunk && b.length >= AUTOJUNK_MIN_LENGTH) {
      const limit = 1 + Math.floor(b.length / 100)
      for (const [element, indices] of this.b2j) {
        if (indices.length > limit) this.popular.add(element)
      }
      for (const element of this.popular) {
        this.b2j.delete(element)
      }
    }
  }

  /** 被 autojunk 过滤掉的元素 */
  popularElements(): ReadonlySet<T> {
    return this.popular
  }

  /**
   * a[alo:ahi] 与 b[blo:bhi] 中的最长匹配块。
   *
   * 等长时取 a 中最早的，再取 b 中最早的。无匹配时返回 (alo, blo) 处的 size 0。
   * 找到的块会向两端扩展相等元素，以覆盖被过滤的高频元素。
   */
  findLongestMatch(alo: number, ahi: number, blo: number, bhi: number): MatchingBlock {
    let bestA = alo
    let bestB = blo
    let bestSize = 0

    // j2len.get(j): 以 a[i - 1], b[j] 结尾的匹配长度
    let j2len = new Map<number, number>()

    for (const [offset, element] of this.a.slice(alo, ahi).entries()) {
      const i = alo + offset
      const nextJ2len = new Map<number, number>()
      const indices = this.b2j.get(element) ?? []

      for (const j of indices) {
        if (j < blo) continue
        if (j >= bhi) break

        const k = (j2len.get(j - 1) ?? 0) + 1
        nextJ2len.set(j, k)
        if (k > bestSize) {
          bestA = i - k + 1
          bestB = j - k + 1
          bestSize = k
        }
      }

      j2len = nextJ2len
    }

    while (bestA > alo && bestB > blo && this.a[bestA - 1] === this.b[bestB - 1]) {
      bestA--
      bestB--
      bestSize++
    }
    while (
      bestA + bestSize < ahi &&
      bestB + bestSize < bhi &&
      this.a[bestA + bestSize] === this.b[bestB + bestSize]
    ) {
      bestSize++
    }

    return { a: bestA, b: bestB, size: bestSize }
  }

  /**
   * 全部匹配块，按位置排序，相邻块合并。
   * 每次返回新数组，修改返回值不影响后续结果。
   */
  getMatchingBlocks(): MatchingBlock[] {
    return this.computeMatchingBlocks().map(block => ({ ...block }))
  }

  private computeMatchingBlocks(): readonly MatchingBlock[] {
    if (this.matchingBlocks) return this.matchingBlocks

    const found: MatchingBlock[] = []
    const queue: Array<[number, number, number, number]> = [[0, this.a.length, 0, this.b.length]]

    let range = queue.pop()
    while (range) {
      const [alo, ahi, blo, bhi] = range
      const block = this.findLongestMatch(alo, ahi, blo, bhi)

      if (block.size > 0) {
        found.push(block)
        if (alo < block.a && blo < block.b) {
          queue.push([alo, block.a, blo, block.b])
        }
        if (block.a + block.size < ahi && block.b + block.size < bhi) {
          queue.push([block.a + block.size, ahi, block.b + block.size, bhi])
        }
      }

      range = queue.pop()
    }

    found.sort((x, y) => x.a - y.a || x.b - y.b)

    const merged: MatchingBlock[] = []
    for (const block of found) {
      const last = merged[merged.length - 1]
      if (last && last.a + last.size === block.a && last.b + last.size === block.b) {
        last.size += block.size
      } else {
        merged.push({ ...block })
      }
    }

    this.matchingBlocks = merged
    return merged
  }

  /** 匹配元素总数 */
  matchedLength(): number {
    return this.computeMatchingBlocks().reduce((sum, block) => sum + block.size, 0)
  }

  /**
   * 2 * matched / (len(a) + len(b))，取值 [0, 1]。
   * 两个空序列视为相同：1。
   */
  ratio(): number {
    const total = this.a.length + this.b.length
    if (total === 0) return 1
    return (2 * this.matchedLength()) / total
  }
}
