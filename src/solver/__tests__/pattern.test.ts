import { describe, it, expect } from 'vitest'
import {
  countCorrect,
  decodeStates,
  decodeWord,
  encodeStates,
  encodeWord,
  fromPercept,
  initialFeedback,
} from '@/solver/pattern'
import { DEFAULT_ALPHABET } from '@/solver/config'
import { FeedbackError } from '@/solver/errors'

describe('decodeWord / encodeWord', () => {
  it('maps letter indices to the literal word', () => {
    expect(decodeWord([2, 17, 0, 13, 4], DEFAULT_ALPHABET)).toBe('crane')
    expect(encodeWord('crane', DEFAULT_ALPHABET)).toEqual([2, 17, 0, 13, 4])
  })

  it('rejects indices outside the alphabet, including the turn-0 sentinel', () => {
    expect(() => decodeWord([26], DEFAULT_ALPHABET)).toThrow(FeedbackError)
    expect(() => decodeWord([-1], DEFAULT_ALPHABET)).toThrow(FeedbackError)
    expect(() => encodeWord('cr4ne', DEFAULT_ALPHABET)).toThrow(FeedbackError)
  })

  it('works with a custom alphabet', () => {
    expect(decodeWord([1, 0, 2], ['x', 'y', 'z'])).toBe('yxz')
  })
})

describe('state codes', () => {
  it('decodes 0, -1 and 1', () => {
    expect(decodeStates([0, -1, 1])).toEqual(['absent', 'present', 'correct'])
    expect(encodeStates(['absent', 'present', 'correct'])).toEqual([0, -1, 1])
  })

  it('rejects unknown codes', () => {
    expect(() => decodeStates([2])).toThrow(FeedbackError)
  })
})

describe('fromPercept', () => {
  it('builds a feedback triple', () => {
    expect(fromPercept([1, [2, 17, 0, 13, 4], [1, 0, -1, 0, 1]])).toEqual({
      turn: 1,
      letterIndices: [2, 17, 0, 13, 4],
      states: ['correct', 'absent', 'present', 'absent', 'correct'],
    })
  })
})

describe('initialFeedback / countCorrect', () => {
  it('uses sentinels on turn 0', () => {
    const fb = initialFeedback(5)
    expect(fb.turn).toBe(0)
    expect(fb.letterIndices).toEqual([-1, -1, -1, -1, -1])
    expect(countCorrect(fb.states)).toBe(0)
  })

  it('counts correct states', () => {
    expect(countCorrect(['absent', 'correct', 'correct', 'present', 'correct'])).toBe(3)
  })
})
