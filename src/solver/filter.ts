import { evaluateGuess } from './feedback'
import { statesEqual } from './pattern'
import type { AbsentRule, LetterState } from './types'

function occurrences(word: string, ch: string): number {
  let n = 0
  for (const c of word) if (c === ch) n++
  return n
}

/**
 * Conservative elimination: scan positions left to right and discard on the
 * first position whose feedback rules the candidate out. An 'absent' letter that
 * occurs more than once in the guess only disqualifies at its own position.
 */
export function keepConservative(
  candidate: string,
  guess: string,
  states: readonly LetterState[],
): boolean {
  for (let i = 0; i < states.length; i++) {
    const g = guess[i]
    if (g === undefined) return false
    const c = candidate[i]
    switch (states[i]) {
      case 'correct':
        if (c !== g) return false
        break
      case 'present':
        if (!candidate.includes(g) || c === g) return false
        break
      case 'absent':
        if (candidate.includes(g) && (occurrences(guess, g) === 1 || c === g)) return false
        break
    }
  }
  return true
}

/** Standard semantics: the candidate must reproduce the observed feedback exactly */
export function keepStandard(
  candidate: string,
  guess: string,
  states: readonly LetterState[],
): boolean {
  if (candidate.length !== guess.length) return false
  return statesEqual(evaluateGuess(guess, candidate), states)
}

export function filterCandidatesArray(
  words: readonly string[],
  guess: string,
  states: readonly LetterState[],
  rule: AbsentRule = 'conservative',
): string[] {
  const keep = rule === 'standard' ? keepStandard : keepConservative
  return words.filter((w) => keep(w, guess, states))
}

/** Narrowing candidate list for one game. Never grows between resets. */
export class CandidateSet {
  private readonly dictionary: readonly string[]
  private readonly rule: AbsentRule
  private words: string[]

  constructor(dictionary: readonly string[], rule: AbsentRule = 'conservative') {
    this.dictionary = dictionary
    this.rule = rule
    this.words = dictionary.slice()
  }

  /** Fresh copy of the dictionary, for a new game */
  reset(): void {
    this.words = this.dictionary.slice()
  }

  size(): number {
    return this.words.length
  }

  isEmpty(): boolean {
    return this.words.length === 0
  }

  applyFeedback(guess: string, states: readonly LetterState[]): void {
    this.words = filterCandidatesArray(this.words, guess, states, this.rule)
  }

  /** Drop the word at index i; returns the removed word */
  removeAt(i: number): string | undefined {
    const [removed] = this.words.splice(i, 1)
    return removed
  }

  /** Live view; callers must not hold it across reductions */
  view(): readonly string[] {
    return this.words
  }

  getAliveWords(): string[] {
    return this.words.slice()
  }
}
