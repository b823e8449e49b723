import { ConfigError } from './errors'
import type { AbsentRule, Mode, SolverConfig } from './types'

export const DEFAULT_ALPHABET: readonly string[] = [...'abcdefghijklmnopqrstuvwxyz']
export const DEFAULT_MAX_TURNS = 6

export interface SolverConfigInput {
  dictionary: readonly string[]
  alphabet?: readonly string[]
  wordLength?: number
  maxTurns?: number
  mode?: Mode
  absentRule?: AbsentRule
}

const MODES: readonly Mode[] = ['easy', 'hard']
const ABSENT_RULES: readonly AbsentRule[] = ['conservative', 'standard']

export function isMode(value: string): value is Mode {
  return (MODES as readonly string[]).includes(value)
}

export function isAbsentRule(value: string): value is AbsentRule {
  return (ABSENT_RULES as readonly string[]).includes(value)
}

function positiveInt(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`)
  }
  return value
}

/**
 * Validate and normalize solver settings. Words and alphabet are lower-cased;
 * the dictionary keeps its order since ties are broken by it.
 */
export function createConfig(input: SolverConfigInput): SolverConfig {
  const dictionary = input.dictionary.map((w) => w.trim().toLowerCase())
  if (dictionary.length === 0) throw new ConfigError('dictionary is empty')

  const alphabet = (input.alphabet ?? DEFAULT_ALPHABET).map((ch) => ch.toLowerCase())
  if (alphabet.length === 0) throw new ConfigError('alphabet is empty')
  if (new Set(alphabet).size !== alphabet.length) throw new ConfigError('alphabet has duplicate letters')
  const letters = new Set(alphabet)

  const wordLength = positiveInt('wordLength', input.wordLength ?? dictionary[0]?.length ?? 0)
  const maxTurns = positiveInt('maxTurns', input.maxTurns ?? DEFAULT_MAX_TURNS)

  const mode = input.mode ?? 'easy'
  if (!isMode(mode)) throw new ConfigError(`unknown mode '${String(mode)}'`)
  const absentRule = input.absentRule ?? 'conservative'
  if (!isAbsentRule(absentRule)) throw new ConfigError(`unknown absent rule '${String(absentRule)}'`)

  for (const w of dictionary) {
    if (w.length !== wordLength) {
      throw new ConfigError(`word '${w}' has length ${w.length}, expected ${wordLength}`)
    }
    for (const ch of w) {
      if (!letters.has(ch)) throw new ConfigError(`word '${w}' uses letter '${ch}' outside the alphabet`)
    }
  }

  return Object.freeze({
    dictionary: Object.freeze(dictionary),
    alphabet: Object.freeze(alphabet),
    wordLength,
    maxTurns,
    mode,
    absentRule,
  })
}
