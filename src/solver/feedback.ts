import type { LetterState } from './types'

/**
 * Standard game feedback for `guess` against `secret`.
 * Greens are assigned first; yellows then consume the remaining letter counts
 * left to right, so a letter is never marked more often than the secret holds it.
 */
export function evaluateGuess(guess: string, secret: string): LetterState[] {
  if (guess.length !== secret.length) {
    throw new Error('Guess and secret must have same length')
  }
  const L = guess.length
  const result = new Array<LetterState>(L).fill('absent')
  const counts = new Map<string, number>()

  for (let i = 0; i < L; i++) {
    const g = guess[i]
    const s = secret[i]
    if (g === undefined || s === undefined) continue
    if (g === s) {
      result[i] = 'correct'
    } else {
      counts.set(s, (counts.get(s) ?? 0) + 1)
    }
  }

  for (let i = 0; i < L; i++) {
    if (result[i] === 'correct') continue
    const g = guess[i]
    if (g === undefined) continue
    const left = counts.get(g) ?? 0
    if (left > 0) {
      result[i] = 'present'
      counts.set(g, left - 1)
    }
  }

  return result
}

export function isSolved(states: readonly LetterState[]): boolean {
  return states.length > 0 && states.every((s) => s === 'correct')
}
