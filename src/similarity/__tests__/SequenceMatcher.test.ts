import { describe, it, expect } from 'vitest'
import { SequenceMatcher } from '../SequenceMatcher.js'

const chars = (s: string) => Array.from(s)

describe('SequenceMatcher.findLongestMatch', () => {
  it('should find the longest common block', () => {
    const matcher = new SequenceMatcher(chars('abxcd'), chars('abcd'))
    expect(matcher.findLongestMatch(0, 5, 0, 4)).toEqual({ a: 0, b: 0, size: 2 })
  })

  it('should prefer the earliest block in a, then in b', () => {
    const matcher = new SequenceMatcher(chars(' abcd'), chars('abcd abcd'))
    expect(matcher.findLongestMatch(0, 5, 0, 9)).toEqual({ a: 0, b: 4, size: 5 })
  })

  it('should only look inside the given ranges', () => {
    const matcher = new SequenceMatcher(chars(' abcd'), chars('abcd abcd'))
    expect(matcher.findLongestMatch(1, 5, 0, 4)).toEqual({ a: 1, b: 0, size: 4 })
  })

  it('should return size 0 at the range start when nothing matches', () => {
    const matcher = new SequenceMatcher(chars('abc'), chars('xyz'))
    expect(matcher.findLongestMatch(1, 3, 1, 3)).toEqual({ a: 1, b: 1, size: 0 })
  })
})

describe('SequenceMatcher.getMatchingBlocks', () => {
  it('should recurse into both sides of the longest block', () => {
    const matcher = new SequenceMatcher(chars('abxcd'), chars('abcd'))
    expect(matcher.getMatchingBlocks()).toEqual([
      { a: 0, b: 0, size: 2 },
      { a: 3, b: 2, size: 2 },
    ])
  })

  it('should return no blocks for disjoint sequences', () => {
    const matcher = new SequenceMatcher(chars('abc'), chars('xyz'))
    expect(matcher.getMatchingBlocks()).toEqual([])
  })

  it('should return a single block for identical sequences', () => {
    const matcher = new SequenceMatcher(chars('copied'), chars('copied'))
    expect(matcher.getMatchingBlocks()).toEqual([{ a: 0, b: 0, size: 6 }])
  })

  it('should work over word tokens', () => {
    const matcher = new SequenceMatcher(['the', 'cat', 'sat'], ['a', 'cat', 'sat'])
    expect(matcher.getMatchingBlocks()).toEqual([{ a: 1, b: 1, size: 2 }])
    expect(matcher.matchedLength()).toBe(2)
  })

  it('should not let callers change later results', () => {
    const matcher = new SequenceMatcher(chars('abxcd'), chars('abcd'))
    const blocks = matcher.getMatchingBlocks()
    const first = blocks[0]
    if (first) first.size = 5
    blocks.push({ a: 4, b: 3, size: 1 })

    expect(matcher.getMatchingBlocks()).toEqual([
      { a: 0, b: 0, size: 2 },
      { a: 3, b: 2, size: 2 },
    ])
    expect(matcher.matchedLength()).toBe(4)
    expect(matcher.ratio()).toBeCloseTo(8 / 9, 10)
  })
})

describe('SequenceMatcher.ratio', () => {
  it('should be 1 for two empty sequences', () => {
    expect(new SequenceMatcher([], []).ratio()).toBe(1)
  })

  it('should be 0 when one side is empty', () => {
    expect(new SequenceMatcher([], chars('abc')).ratio()).toBe(0)
  })

  it('should be 2M / total length', () => {
    const matcher = new SequenceMatcher(['the', 'cat', 'sat'], ['a', 'cat', 'sat'])
    expect(matcher.ratio()).toBeCloseTo(4 / 6, 10)
  })
})

describe('SequenceMatcher autojunk', () => {
  const essayA =
    'The river town grew slowly around its old stone bridge, and every spring the market filled with farmers selling honey, wool and fresh bread. '
  const essayB =
    'Every spring the old river market filled with farmers who sold wool, honey and warm bread beside the stone bridge that the town grew around. '

  it('should leave b under 200 elements untouched', () => {
    const matcher = new SequenceMatcher(chars('a'.repeat(199)), chars('a'.repeat(199)))
    expect(matcher.popularElements().size).toBe(0)
  })

  it('should drop elements seen more than 1 + len(b) / 100 times', () => {
    // 'a' appears 199 times in 200 elements, the limit is 3
    const matcher = new SequenceMatcher(chars('x' + 'a'.repeat(199)), chars('a'.repeat(199) + 'y'))
    expect([...matcher.popularElements()]).toEqual(['a'])
    expect(matcher.getMatchingBlocks()).toEqual([])
    expect(matcher.ratio()).toBe(0)
  })

  it('should extend blocks across popular elements', () => {
    const matcher = new SequenceMatcher(chars('a'.repeat(200)), chars('a'.repeat(200)))
    expect(matcher.getMatchingBlocks()).toEqual([{ a: 0, b: 0, size: 200 }])
    expect(matcher.ratio()).toBe(1)
  })

  it('should only seed blocks on rare elements in long text', () => {
    const matcher = new SequenceMatcher(chars(essayA.repeat(2)), chars(essayB.repeat(2)))
    expect(matcher.popularElements().has(' ')).toBe(true)
    expect(matcher.getMatchingBlocks()).toEqual([
      { a: 26, b: 132, size: 7 },
      { a: 54, b: 208, size: 2 },
      { a: 138, b: 279, size: 3 },
    ])
    expect(matcher.matchedLength()).toBe(12)
  })

  it('should match every element when autojunk is off', () => {
    const matcher = new SequenceMatcher(chars('x' + 'a'.repeat(199)), chars('a'.repeat(199) + 'y'), {
      autojunk: false,
    })
    expect(matcher.popularElements().size).toBe(0)
    expect(matcher.getMatchingBlocks()).toEqual([{ a: 1, b: 0, size: 199 }])
  })
})
