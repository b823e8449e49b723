export type {
  AbsentRule,
  Feedback,
  LetterState,
  Mode,
  Percept,
  SolverConfig,
  StateCode,
  WordDecoder,
} from './types.ts'
export { ConfigError, FeedbackError, NoCandidatesError } from './errors.ts'
export { createConfig, DEFAULT_ALPHABET, DEFAULT_MAX_TURNS, type SolverConfigInput } from './config.ts'
export {
  decodeWord,
  encodeWord,
  decodeStates,
  encodeStates,
  fromPercept,
  initialFeedback,
  SENTINEL_INDEX,
} from './pattern.ts'
export { evaluateGuess, isSolved } from './feedback.ts'
export { letterFrequency, positionFrequencies } from './stats.ts'
export { scoreWord, scoreWords, bestIndex, pickBest, positionEntropy, REPEAT_PENALTY } from './scoring.ts'
export { CandidateSet, filterCandidatesArray, keepConservative, keepStandard } from './filter.ts'
export { OpenerCache, sharedOpenerCache } from './opener.ts'
export { pickStuckGuess, possibleLetters, openPosition, STUCK_REPEAT_PENALTY } from './stuck.ts'
export { GuessController, type ControllerOptions, type SolverLogger } from './controller.ts'
export { loadWordlist, parseWordlist, defaultWordlistPath } from './data/loader.ts'
