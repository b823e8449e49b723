import { describe, it, expect } from 'vitest'
import { loadWordlist, defaultWordlistPath } from '../../../src/solver/data/loader'
import { aggregate, formatCsv, formatTable, parseShardInput, runTrials, type ShardInput, type ShardResult } from '../core'

const baseInput: ShardInput = {
  datasetId: 'words-5',
  wordsFile: defaultWordlistPath(),
  mode: 'easy',
  absentRule: 'conservative',
  trials: 8,
  attempts: 6,
  seed: 42,
  verbose: false,
}

describe('runTrials', () => {
  const words = loadWordlist(defaultWordlistPath())

  it('accounts for every game', () => {
    const r = runTrials(baseInput, words)
    expect(r.trials).toBe(8)
    expect(r.successes + r.failCount).toBe(8)
    expect(r.attemptHist).toHaveLength(7)
    expect(r.attemptHist.reduce((a, b) => a + b, 0)).toBe(8)
    expect(r.exhausted).toBe(0)
  })

  it('never has a guess refused in hard mode, for either absent rule', () => {
    for (const absentRule of ['conservative', 'standard'] as const) {
      const r = runTrials({ ...baseInput, mode: 'hard', absentRule }, words)
      expect(r.rejections).toBe(0)
      expect(r.exhausted).toBe(0)
    }
  })

  it('is deterministic for a seed', () => {
    const a = runTrials(baseInput, words)
    const b = runTrials(baseInput, words)
    expect(a.attemptHist).toEqual(b.attemptHist)
    expect(a.successes).toBe(b.successes)
  })
})

describe('parseShardInput', () => {
  it('accepts a well-formed job', () => {
    expect(parseShardInput({ ...baseInput })).toEqual(baseInput)
  })

  it('rejects malformed jobs', () => {
    expect(() => parseShardInput(null)).toThrow()
    expect(() => parseShardInput({ ...baseInput, mode: 'expert' })).toThrow(/mode/)
    expect(() => parseShardInput({ ...baseInput, trials: '8' })).toThrow(/trials/)
  })
})

describe('report formatting', () => {
  const shard: ShardResult = {
    datasetId: 'words-5',
    mode: 'easy',
    absentRule: 'conservative',
    trials: 4,
    successes: 3,
    failCount: 1,
    attemptHist: [0, 1, 2, 0, 0, 0, 1],
    totalAttemptsSuccess: 8,
    rejections: 2,
    exhausted: 0,
    totalTimeMs: 10,
    remainingOnFailAccum: 3,
  }

  it('aggregates and sorts rows', () => {
    const rows = aggregate([{ ...shard, mode: 'hard' }, shard])
    expect(rows.map((r) => r.mode)).toEqual(['easy', 'hard'])
    expect(rows[0]).toEqual({
      datasetId: 'words-5',
      mode: 'easy',
      absentRule: 'conservative',
      trials: 4,
      solved: 3,
      failRate: 0.25,
      avgAttempts: 8 / 3,
      avgRejections: 0.5,
      exhausted: 0,
      avgTimeMs: 2.5,
      avgRemainingOnFail: 3,
    })
  })

  it('writes CSV lines', () => {
    const csv = formatCsv(aggregate([shard]))
    expect(csv.split('\n')[1]).toBe('words-5,easy,conservative,4,3,0.250000,2.6667,0.5000,0,2.50,3.00')
    expect(csv.endsWith('\n')).toBe(true)
  })

  it('prints a table with one line per row', () => {
    const table = formatTable(aggregate([shard]))
    const lines = table.split('\n')
    expect(lines).toHaveLength(2)
    expect(lines[0]!.startsWith('DATASET')).toBe(true)
    expect(lines[1]!.startsWith('words-5')).toBe(true)
  })
})
