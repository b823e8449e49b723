/** Per-letter feedback state for one guessed position */
export type LetterState = 'absent' | 'present' | 'correct'

/** 'easy' permits the stuck-position heuristic, 'hard' disables it */
export type Mode = 'easy' | 'hard'

/**
 * How an 'absent' state eliminates candidates.
 * - conservative: only eliminate when the evidence is unambiguous at that position
 * - standard: keep a candidate iff it reproduces the observed feedback exactly
 */
export type AbsentRule = 'conservative' | 'standard'

/** Decoded feedback for the previous guess. On turn 0 every letter index is the -1 sentinel. */
export interface Feedback {
  turn: number
  letterIndices: readonly number[]
  states: readonly LetterState[]
}

/** Numeric percept encoding: 0 absent, -1 present, 1 correct */
export type StateCode = -1 | 0 | 1

export type Percept = readonly [turn: number, letterIndices: readonly number[], stateCodes: readonly number[]]

/** Maps letter indices back to the guessed word */
export type WordDecoder = (letterIndices: readonly number[], alphabet: readonly string[]) => string

export interface SolverConfig {
  readonly dictionary: readonly string[]
  readonly alphabet: readonly string[]
  readonly wordLength: number
  readonly maxTurns: number
  readonly mode: Mode
  readonly absentRule: AbsentRule
}
