import { FeedbackError } from './errors'
import type { Feedback, LetterState, Percept, StateCode } from './types'

export const SENTINEL_INDEX = -1

const CODE_BY_STATE: Record<LetterState, StateCode> = {
  absent: 0,
  present: -1,
  correct: 1,
}

function stateFor(code: number): LetterState {
  switch (code) {
    case 0:
      return 'absent'
    case -1:
      return 'present'
    case 1:
      return 'correct'
    default:
      throw new FeedbackError(`unknown state code ${code}`)
  }
}

/** Default decoding collaborator: letter indices -> literal word */
export function decodeWord(letterIndices: readonly number[], alphabet: readonly string[]): string {
  let out = ''
  for (const idx of letterIndices) {
    const letter = alphabet[idx]
    if (letter === undefined) throw new FeedbackError(`letter index ${idx} outside alphabet`)
    out += letter
  }
  return out
}

/** Inverse of decodeWord; used by game hosts to build percepts */
export function encodeWord(word: string, alphabet: readonly string[]): number[] {
  return [...word].map((ch) => {
    const idx = alphabet.indexOf(ch)
    if (idx < 0) throw new FeedbackError(`letter '${ch}' not in alphabet`)
    return idx
  })
}

export function decodeStates(codes: readonly number[]): LetterState[] {
  return codes.map(stateFor)
}

export function encodeStates(states: readonly LetterState[]): StateCode[] {
  return states.map((s) => CODE_BY_STATE[s])
}

/** Adapt a numeric percept tuple to a Feedback triple */
export function fromPercept([turn, letterIndices, stateCodes]: Percept): Feedback {
  return { turn, letterIndices: [...letterIndices], states: decodeStates(stateCodes) }
}

/** Turn-0 feedback: sentinel indices, no information */
export function initialFeedback(wordLength: number): Feedback {
  return {
    turn: 0,
    letterIndices: new Array<number>(wordLength).fill(SENTINEL_INDEX),
    states: new Array<LetterState>(wordLength).fill('absent'),
  }
}

export function countCorrect(states: readonly LetterState[]): number {
  let n = 0
  for (const s of states) if (s === 'correct') n++
  return n
}

export function statesEqual(a: readonly LetterState[], b: readonly LetterState[]): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}
