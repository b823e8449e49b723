import { describe, it, expect } from 'vitest'
import { openPosition, pickStuckGuess, possibleLetters, stuckScore } from '@/solver/stuck'

describe('openPosition', () => {
  it('finds the single unresolved slot', () => {
    expect(openPosition(['absent', 'correct', 'correct', 'correct', 'correct'])).toBe(0)
    expect(openPosition(['correct', 'correct', 'present', 'correct', 'correct'])).toBe(2)
  })

  it('is -1 unless exactly one slot is open', () => {
    expect(openPosition(['absent', 'absent', 'correct', 'correct', 'correct'])).toBe(-1)
    expect(openPosition(['correct', 'correct', 'correct'])).toBe(-1)
  })
})

describe('pickStuckGuess', () => {
  const candidates = ['crane', 'drain', 'train', 'brain']

  it('collects the letters still possible in the open slot', () => {
    expect(possibleLetters(candidates, 0)).toEqual(new Set(['c', 'd', 't', 'b']))
  })

  it('penalizes repeated letters by 0.1 per word', () => {
    const letters = new Set(['c', 'd', 't', 'b'])
    expect(stuckScore('doubt', letters)).toBe(3)
    expect(stuckScore('tacit', letters)).toBeCloseTo(0.3, 12)
    expect(stuckScore('crane', letters)).toBe(1)
  })

  it('prefers the dictionary word covering most open letters', () => {
    const dictionary = ['crane', 'drain', 'tacit', 'train', 'doubt', 'brain']
    expect(pickStuckGuess(dictionary, candidates, 0)).toBe('doubt')
  })

  it('does not carry the repeat penalty from one word to the next', () => {
    // 'tacit' is penalized; 'dicot' right after it must score a full 3
    const dictionary = ['tacit', 'dicot', 'crane']
    expect(stuckScore('dicot', new Set(['c', 'd', 't', 'b']))).toBe(3)
    expect(pickStuckGuess(dictionary, candidates, 0)).toBe('dicot')
  })

  it('returns the first maximum on ties', () => {
    expect(pickStuckGuess(['brain', 'crane'], candidates, 0)).toBe('brain')
  })
})
