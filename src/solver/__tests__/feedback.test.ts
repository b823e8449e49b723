import { describe, it, expect } from 'vitest'
import { evaluateGuess, isSolved } from '../feedback'

describe('evaluateGuess', () => {
  it('returns all correct for exact match', () => {
    expect(evaluateGuess('apple', 'apple')).toEqual(['correct', 'correct', 'correct', 'correct', 'correct'])
  })

  it('marks present letters in wrong positions', () => {
    expect(evaluateGuess('elppa', 'apple')).toEqual(['present', 'present', 'correct', 'present', 'present'])
  })

  it('only marks as many duplicates as the secret holds', () => {
    // one 'l' in the secret, matched in place; the other guess 'l' is absent
    expect(evaluateGuess('llama', 'plate')).toEqual(['absent', 'correct', 'correct', 'absent', 'absent'])
  })

  it('prioritizes correct over present for duplicate letters', () => {
    expect(evaluateGuess('poops', 'pools')).toEqual(['correct', 'correct', 'correct', 'absent', 'correct'])
  })

  it('throws for mismatched lengths', () => {
    expect(() => evaluateGuess('app', 'apple')).toThrow()
  })
})

describe('isSolved', () => {
  it('is true only when every state is correct', () => {
    expect(isSolved(['correct', 'correct', 'correct'])).toBe(true)
    expect(isSolved(['correct', 'present', 'correct'])).toBe(false)
    expect(isSolved([])).toBe(false)
  })
})
