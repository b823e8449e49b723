import { hasRepeatedLetter } from './scoring'
import type { LetterState } from './types'

export const STUCK_REPEAT_PENALTY = 0.1

/** Position of the single non-correct state, or -1 unless exactly one exists */
export function openPosition(states: readonly LetterState[]): number {
  let open = -1
  for (let i = 0; i < states.length; i++) {
    if (states[i] === 'correct') continue
    if (open !== -1) return -1
    open = i
  }
  return open
}

/** Letters that occupy `position` across the candidates */
export function possibleLetters(candidates: readonly string[], position: number): Set<string> {
  const out = new Set<string>()
  for (const w of candidates) {
    const ch = w[position]
    if (ch !== undefined) out.add(ch)
  }
  return out
}

export function stuckScore(word: string, letters: ReadonlySet<string>): number {
  let score = 0
  for (const ch of word) {
    if (letters.has(ch)) score++
  }
  const repeated = hasRepeatedLetter(word)
  return repeated ? score * STUCK_REPEAT_PENALTY : score
}

/**
 * "One slot left": when every position but one is known, a guess that tests as
 * many of the letters still possible in that slot beats guessing candidates one
 * by one. Searches the full dictionary, so the result may itself be impossible.
 */
export function pickStuckGuess(
  dictionary: readonly string[],
  candidates: readonly string[],
  position: number,
): string | undefined {
  const letters = possibleLetters(candidates, position)
  let best: string | undefined
  let bestScore = -Infinity
  for (const word of dictionary) {
    const s = stuckScore(word, letters)
    if (s > bestScore) {
      bestScore = s
      best = word
    }
  }
  return best
}
