import { evaluateGuess, isSolved } from '../../src/solver/feedback.ts'
import { encodeStates, encodeWord, SENTINEL_INDEX } from '../../src/solver/pattern.ts'
import type { LetterState, Percept, SolverConfig } from '../../src/solver/types.ts'

export type SubmitResult =
  | { accepted: true; states: LetterState[] }
  | { accepted: false; reason: string }

/**
 * Game host for one secret. Produces numeric percepts the way an external game
 * loop would and enforces the hard-mode rule: revealed greens stay in place and
 * revealed yellows are reused. A rejected guess does not consume a turn.
 */
export class Game {
  private readonly secret: string
  private readonly config: SolverConfig
  private readonly legal: ReadonlySet<string>
  private turn = 0
  private lastIndices: number[]
  private lastCodes: number[]
  private readonly greens = new Map<number, string>()
  private readonly yellows = new Set<string>()
  private won = false

  constructor(secret: string, config: SolverConfig, legal?: ReadonlySet<string>) {
    this.secret = secret
    this.config = config
    this.legal = legal ?? new Set(config.dictionary)
    this.lastIndices = new Array<number>(config.wordLength).fill(SENTINEL_INDEX)
    this.lastCodes = new Array<number>(config.wordLength).fill(0)
  }

  get solved(): boolean {
    return this.won
  }

  get over(): boolean {
    return this.won || this.turn >= this.config.maxTurns
  }

  turnsUsed(): number {
    return this.turn
  }

  percept(): Percept {
    return [this.turn, this.lastIndices.slice(), this.lastCodes.slice()]
  }

  submit(word: string): SubmitResult {
    if (this.over) return { accepted: false, reason: 'game over' }
    if (!this.legal.has(word)) return { accepted: false, reason: `'${word}' not in dictionary` }
    if (this.config.mode === 'hard') {
      const reason = this.hardModeViolation(word)
      if (reason) return { accepted: false, reason }
    }

    const states = evaluateGuess(word, this.secret)
    this.turn++
    this.lastIndices = encodeWord(word, this.config.alphabet)
    this.lastCodes = encodeStates(states)
    for (let i = 0; i < states.length; i++) {
      const ch = word[i]
      if (ch === undefined) continue
      if (states[i] === 'correct') this.greens.set(i, ch)
      else if (states[i] === 'present') this.yellows.add(ch)
    }
    if (isSolved(states)) this.won = true
    return { accepted: true, states }
  }

  private hardModeViolation(word: string): string | null {
    for (const [pos, ch] of this.greens) {
      if (word[pos] !== ch) return `position ${pos + 1} must be '${ch}'`
    }
    for (const ch of this.yellows) {
      if (!word.includes(ch)) return `guess must contain '${ch}'`
    }
    return null
  }
}
