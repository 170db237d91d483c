import { describe, it, expect } from 'vitest'
import { similarityRatio } from '../similarityRatio.js'

describe('similarityRatio', () => {
  it('should score identical text 100', () => {
    expect(similarityRatio('plagiarism', 'plagiarism')).toBe(100)
    expect(similarityRatio('a b c', 'a b c')).toBe(100)
  })

  it('should score two empty strings 100', () => {
    expect(similarityRatio('', '')).toBe(100)
  })

  it('should score disjoint text 0', () => {
    expect(similarityRatio('abc', 'xyz')).toBe(0)
    expect(similarityRatio('', 'abc')).toBe(0)
  })

  it('should sum all matching blocks', () => {
    expect(similarityRatio('abcd', 'bcde')).toBe(75)
    expect(similarityRatio('abxcd', 'abcd')).toBe(88.89)
  })

  it('should be symmetric for these inputs', () => {
    const pairs: Array<[string, string]> = [
      ['abcd', 'bcde'],
      ['abxcd', 'abcd'],
      ['abc', 'xyz'],
      ['', 'text'],
    ]
    for (const [a, b] of pairs) {
      expect(similarityRatio(a, b)).toBe(similarityRatio(b, a))
    }
  })

  it('should keep the greedy matcher order sensitivity', () => {
    expect(similarityRatio('tide', 'diet')).toBe(25)
    expect(similarityRatio('diet', 'tide')).toBe(50)
  })

  it('should compare code points, not UTF-16 units', () => {
    expect(similarityRatio('😀a', '😀b')).toBe(50)
  })

  describe('long text', () => {
    const essayA =
      'The river town grew slowly around its old stone bridge, and every spring the market filled with farmers selling honey, wool and fresh bread. '
    const essayB =
      'Every spring the old river market filled with farmers who sold wool, honey and warm bread beside the stone bridge that the town grew around. '

    it('should score a pair under 200 characters on every character', () => {
      expect(similarityRatio(essayA, essayB)).toBe(46.81)
    })

    it('should ignore frequent characters once the second text reaches 200', () => {
      expect(similarityRatio(essayA.repeat(2), essayB.repeat(2))).toBe(4.26)
      expect(similarityRatio(essayB.repeat(2), essayA.repeat(2))).toBe(18.44)
    })

    it('should still score long identical text 100', () => {
      expect(similarityRatio(essayA.repeat(2), essayA.repeat(2))).toBe(100)
    })
  })
})
