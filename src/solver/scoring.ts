import { letterFrequency, positionFrequencies, tableFrequency } from './stats'

export const REPEAT_PENALTY = 0.9

/** p(1-p): peaks at p = 0.5, where a letter splits the candidates evenly */
export function positionEntropy(p: number): number {
  return p * (1 - p)
}

export function hasRepeatedLetter(word: string): boolean {
  return new Set(word).size < word.length
}

/** Desirability of `word` against the candidate list `against` */
export function scoreWord(word: string, against: readonly string[]): number {
  let s = 0
  for (let i = 0; i < word.length; i++) {
    const ch = word[i]
    if (ch === undefined) continue
    s += positionEntropy(letterFrequency(against, ch, i))
  }
  return hasRepeatedLetter(word) ? s * REPEAT_PENALTY : s
}

/**
 * Scores every entry of `words` against `against` (defaults to `words` itself).
 * Same values as scoreWord, with the frequency table built once.
 */
export function scoreWords(words: readonly string[], against: readonly string[] = words): number[] {
  const L = words[0]?.length ?? 0
  const table = positionFrequencies(against, L)
  return words.map((word) => {
    let s = 0
    for (let i = 0; i < word.length; i++) {
      const ch = word[i]
      if (ch === undefined) continue
      s += positionEntropy(tableFrequency(table, ch, i))
    }
    return hasRepeatedLetter(word) ? s * REPEAT_PENALTY : s
  })
}

/** Index of the first maximum, -1 for an empty list */
export function bestIndex(scores: readonly number[]): number {
  let best = -1
  let bestScore = -Infinity
  for (let i = 0; i < scores.length; i++) {
    const s = scores[i]
    if (s !== undefined && s > bestScore) {
      bestScore = s
      best = i
    }
  }
  return best
}

/** First maximum-scoring word of `words` scored against itself */
export function pickBest(words: readonly string[]): string | undefined {
  return words[bestIndex(scoreWords(words))]
}
