import { describe, it, expect } from 'vitest'
import { highlightMatches } from '../highlightMatches.js'

const source = 'the quick brown fox jumps'.split(' ')
const suspect = 'a quick brown fox sat'.split(' ')

describe('highlightMatches', () => {
  it('should mark blocks of at least the default size', () => {
    const result = highlightMatches(source, suspect)
    expect(result.blocks).toEqual([{ a: 1, b: 1, size: 3 }])
    expect(result.a).toEqual([
      { tokens: ['the'], matched: false },
      { tokens: ['quick', 'brown', 'fox'], matched: true },
      { tokens: ['jumps'], matched: false },
    ])
    expect(result.b).toEqual([
      { tokens: ['a'], matched: false },
      { tokens: ['quick', 'brown', 'fox'], matched: true },
      { tokens: ['sat'], matched: false },
    ])
  })

  it('should leave shorter blocks unmatched', () => {
    const result = highlightMatches(source, suspect, 4)
    expect(result.blocks).toEqual([])
    expect(result.a).toEqual([{ tokens: source, matched: false }])
  })

  it('should drop single-token matches at size 2', () => {
    const result = highlightMatches(['x', 'cat', 'y'], ['cat', 'z'])
    expect(result.blocks).toEqual([])
    expect(result.b).toEqual([{ tokens: ['cat', 'z'], matched: false }])
  })

  it('should handle empty input', () => {
    expect(highlightMatches([], ['a', 'b'])).toEqual({
      a: [],
      b: [{ tokens: ['a', 'b'], matched: false }],
      blocks: [],
    })
  })

  it('should reject a block size below 1', () => {
    expect(() => highlightMatches(source, suspect, 0)).toThrow(
      'Block size must be a positive integer, got 0'
    )
  })
})
