// Shard runner and report formatting, shared by the worker and the CLI.
import { createConfig, isAbsentRule, isMode } from '../../src/solver/config.ts'
import { GuessController, type SolverLogger } from '../../src/solver/controller.ts'
import { NoCandidatesError } from '../../src/solver/errors.ts'
import { fromPercept } from '../../src/solver/pattern.ts'
import { mulberry32, pickIndex } from '../../src/solver/random.ts'
import type { AbsentRule, Mode } from '../../src/solver/types.ts'
import { Game } from './game.ts'

/** One (wordlist × mode × rule) shard of simulated games */
export interface ShardInput {
  datasetId: string
  wordsFile: string
  mode: Mode
  absentRule: AbsentRule
  trials: number
  attempts: number
  seed: number
  verbose: boolean
}

export interface ShardResult {
  datasetId: string
  mode: Mode
  absentRule: AbsentRule
  trials: number
  successes: number
  failCount: number
  attemptHist: number[] // index k = solved on attempt k+1, last index = fails
  totalAttemptsSuccess: number
  rejections: number // guesses the game refused (hard-mode violations)
  exhausted: number // games where the solver ran out of candidates
  totalTimeMs: number
  remainingOnFailAccum: number
}

export interface RowSummary {
  datasetId: string
  mode: Mode
  absentRule: AbsentRule
  trials: number
  solved: number
  failRate: number
  avgAttempts: number
  avgRejections: number
  exhausted: number
  avgTimeMs: number
  avgRemainingOnFail: number
}

/** Submissions allowed per attempt before a game is abandoned */
export const SUBMISSIONS_PER_ATTEMPT = 3

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null
}

function field<T>(obj: Record<string, unknown>, key: string, check: (v: unknown) => v is T): T {
  const v = obj[key]
  if (!check(v)) throw new Error(`Invalid shard input field '${key}'`)
  return v
}

const isString = (v: unknown): v is string => typeof v === 'string'
const isNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v)
const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean'
const isModeValue = (v: unknown): v is Mode => typeof v === 'string' && isMode(v)
const isRuleValue = (v: unknown): v is AbsentRule => typeof v === 'string' && isAbsentRule(v)

/** Validate data received from the parent thread */
export function parseShardInput(data: unknown): ShardInput {
  if (!isRecord(data)) throw new Error('Shard input must be an object')
  return {
    datasetId: field(data, 'datasetId', isString),
    wordsFile: field(data, 'wordsFile', isString),
    mode: field(data, 'mode', isModeValue),
    absentRule: field(data, 'absentRule', isRuleValue),
    trials: field(data, 'trials', isNumber),
    attempts: field(data, 'attempts', isNumber),
    seed: field(data, 'seed', isNumber),
    verbose: field(data, 'verbose', isBoolean),
  }
}

export function runTrials(input: ShardInput, words: readonly string[], logger?: SolverLogger): ShardResult {
  const config = createConfig({
    dictionary: words,
    maxTurns: input.attempts,
    mode: input.mode,
    absentRule: input.absentRule,
  })
  const legal = new Set(config.dictionary)
  const controller = new GuessController(config, { logger })
  const rand = mulberry32(input.seed)
  const attemptHist = new Array<number>(input.attempts + 1).fill(0)
  const submissionLimit = input.attempts * SUBMISSIONS_PER_ATTEMPT
  let successes = 0
  let failCount = 0
  let totalAttemptsSuccess = 0
  let rejections = 0
  let exhausted = 0
  let totalTimeMs = 0
  let remainingOnFailAccum = 0

  for (let t = 0; t < input.trials; t++) {
    const secret = config.dictionary[pickIndex(config.dictionary.length, rand)]
    if (secret === undefined) break
    const game = new Game(secret, config, legal)
    const start = Date.now()
    let submissions = 0
    while (!game.over && submissions < submissionLimit) {
      let guess: string
      try {
        guess = controller.nextGuess(fromPercept(game.percept()))
      } catch (err) {
        if (err instanceof NoCandidatesError) {
          exhausted++
          break
        }
        throw err
      }
      submissions++
      if (!game.submit(guess).accepted) rejections++
    }
    totalTimeMs += Date.now() - start

    if (game.solved) {
      const used = game.turnsUsed()
      successes++
      totalAttemptsSuccess += used
      attemptHist[used - 1]!++
    } else {
      failCount++
      attemptHist[input.attempts]!++
      remainingOnFailAccum += controller.candidates().length
    }
  }

  return {
    datasetId: input.datasetId,
    mode: input.mode,
    absentRule: input.absentRule,
    trials: input.trials,
    successes,
    failCount,
    attemptHist,
    totalAttemptsSuccess,
    rejections,
    exhausted,
    totalTimeMs,
    remainingOnFailAccum,
  }
}

export function aggregate(shards: ShardResult[]): RowSummary[] {
  const rows = shards.map((s) => ({
    datasetId: s.datasetId,
    mode: s.mode,
    absentRule: s.absentRule,
    trials: s.trials,
    solved: s.successes,
    failRate: s.trials > 0 ? s.failCount / s.trials : 0,
    avgAttempts: s.successes > 0 ? s.totalAttemptsSuccess / s.successes : 0,
    avgRejections: s.trials > 0 ? s.rejections / s.trials : 0,
    exhausted: s.exhausted,
    avgTimeMs: s.trials > 0 ? s.totalTimeMs / s.trials : 0,
    avgRemainingOnFail: s.failCount > 0 ? s.remainingOnFailAccum / s.failCount : 0,
  }))
  // Deterministic sort
  rows.sort(
    (a, b) =>
      a.datasetId.localeCompare(b.datasetId) ||
      a.mode.localeCompare(b.mode) ||
      a.absentRule.localeCompare(b.absentRule),
  )
  return rows
}

export function formatCsv(rows: RowSummary[]): string {
  const header =
    'datasetId,mode,absentRule,trials,solved,failRate,avgAttempts,avgRejections,exhausted,avgTimeMs,avgRemainingOnFail'
  const lines = rows.map((r) =>
    [
      r.datasetId,
      r.mode,
      r.absentRule,
      r.trials,
      r.solved,
      r.failRate.toFixed(6),
      r.avgAttempts.toFixed(4),
      r.avgRejections.toFixed(4),
      r.exhausted,
      r.avgTimeMs.toFixed(2),
      r.avgRemainingOnFail.toFixed(2),
    ].join(','),
  )
  return [header, ...lines].join('\n') + '\n'
}

export function formatTable(rows: RowSummary[]): string {
  const cols = ['DATASET', 'MODE', 'RULE', 'TRIALS', 'SOLVED', 'FAIL%', 'AVG_ATT', 'AVG_REJ', 'EXH', 'AVG_MS']
  const widths = [12, 5, 13, 7, 7, 7, 8, 8, 5, 8]
  const pad = (s: string, i: number) => s.padEnd(widths[i] ?? 0)
  const out: string[] = [cols.map((c, i) => pad(c, i)).join(' ')]
  for (const r of rows) {
    out.push(
      [
        r.datasetId,
        r.mode,
        r.absentRule,
        String(r.trials),
        String(r.solved),
        (r.failRate * 100).toFixed(2),
        r.avgAttempts.toFixed(2),
        r.avgRejections.toFixed(2),
        String(r.exhausted),
        r.avgTimeMs.toFixed(1),
      ]
        .map((v, i) => pad(v, i))
        .join(' '),
    )
  }
  return out.join('\n')
}
