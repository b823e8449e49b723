import { NoCandidatesError, FeedbackError } from './errors'
import { CandidateSet } from './filter'
import { OpenerCache, sharedOpenerCache } from './opener'
import { countCorrect, decodeWord } from './pattern'
import { bestIndex, scoreWords } from './scoring'
import { openPosition, pickStuckGuess } from './stuck'
import type { Feedback, SolverConfig, WordDecoder } from './types'

export type SolverLogger = Pick<Console, 'debug' | 'warn'>

const silentLogger: SolverLogger = {
  debug: () => {},
  warn: () => {},
}

export interface ControllerOptions {
  openers?: OpenerCache
  decode?: WordDecoder
  logger?: SolverLogger
}

/**
 * Turn-by-turn guess selection for one player. Games are played one after the
 * other on the same instance; a turn-0 feedback starts a new game.
 */
export class GuessController {
  private readonly config: SolverConfig
  private readonly candidateSet: CandidateSet
  private readonly openers: OpenerCache
  private readonly decode: WordDecoder
  private readonly logger: SolverLogger
  private counter = 0

  constructor(config: SolverConfig, opts: ControllerOptions = {}) {
    this.config = config
    this.candidateSet = new CandidateSet(config.dictionary, config.absentRule)
    this.openers = opts.openers ?? sharedOpenerCache
    this.decode = opts.decode ?? decodeWord
    this.logger = opts.logger ?? silentLogger
  }

  nextGuess(feedback: Feedback): string {
    this.checkShape(feedback)
    const { turn } = feedback

    if (turn === 0) {
      this.counter = 0
      this.candidateSet.reset()
      return this.opener()
    }

    this.counter++
    const guess = this.decode(feedback.letterIndices, this.config.alphabet)
    this.candidateSet.applyFeedback(guess, feedback.states)

    if (turn !== this.counter) {
      // The previous guess was rejected by the game; its top pick cannot be retried.
      const dropped = this.dropTopCandidate()
      this.logger.warn(
        `[solver] turn ${turn} out of sync with ${this.counter}; dropped '${dropped ?? ''}'`,
      )
      this.counter = turn
    }

    if (this.candidateSet.isEmpty()) throw new NoCandidatesError(turn)

    const stuckAt = this.stuckPosition(feedback)
    if (stuckAt >= 0) {
      const words = this.candidateSet.view()
      const probe = pickStuckGuess(this.config.dictionary, words, stuckAt)
      if (probe !== undefined) {
        this.logger.debug(`[solver] one slot left at ${stuckAt} among ${words.length}; probing '${probe}'`)
        return probe
      }
    }

    const words = this.candidateSet.view()
    const best = words[bestIndex(scoreWords(words))]
    if (best === undefined) throw new NoCandidatesError(turn)
    return best
  }

  /** Snapshot of the words still consistent with this game's feedback */
  candidates(): string[] {
    return this.candidateSet.getAliveWords()
  }

  /** Turns this controller believes the game has accepted */
  guessCount(): number {
    return this.counter
  }

  private opener(): string {
    const word = this.openers.resolve(this.config.dictionary)
    if (word === undefined) throw new NoCandidatesError(0)
    return word
  }

  private dropTopCandidate(): string | undefined {
    const words = this.candidateSet.view()
    const idx = bestIndex(scoreWords(words))
    return idx >= 0 ? this.candidateSet.removeAt(idx) : undefined
  }

  /** Open slot for the stuck heuristic, or -1 when the normal scorer should run */
  private stuckPosition(feedback: Feedback): number {
    const { mode, maxTurns, wordLength } = this.config
    if (mode !== 'easy') return -1
    if (this.candidateSet.size() <= 2) return -1
    if (feedback.turn === maxTurns - 1) return -1
    if (countCorrect(feedback.states) !== wordLength - 1) return -1
    return openPosition(feedback.states)
  }

  private checkShape(feedback: Feedback): void {
    const L = this.config.wordLength
    if (!Number.isInteger(feedback.turn) || feedback.turn < 0) {
      throw new FeedbackError(`turn must be a non-negative integer, got ${feedback.turn}`)
    }
    if (feedback.letterIndices.length !== L || feedback.states.length !== L) {
      throw new FeedbackError(
        `feedback has ${feedback.letterIndices.length} letters and ${feedback.states.length} states, expected ${L}`,
      )
    }
  }
}
