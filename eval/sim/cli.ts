#!/usr/bin/env node
/* eslint-env node */
/* eslint-disable no-console */
/**
 * Lexiprobe simulator CLI
 * Plays seeded games against the solver across (mode × absent rule) shards using worker threads.
 */

import { Command } from 'commander'
import os from 'node:os'
import fs from 'node:fs'
import path from 'node:path'
import { Worker } from 'node:worker_threads'
import { isAbsentRule, isMode } from '../../src/solver/config.ts'
import { defaultWordlistPath } from '../../src/solver/data/loader.ts'
import type { AbsentRule, Mode } from '../../src/solver/types.ts'
import { aggregate, formatCsv, formatTable, type ShardInput, type ShardResult } from './core.ts'

interface WorkerMessage {
  shardResult?: ShardResult
  error?: string
}

function parseCsvList<T extends string>(csv: string, accept: (v: string) => v is T, what: string): T[] {
  const out: T[] = []
  for (const raw of csv.split(',')) {
    const v = raw.trim()
    if (!v) continue
    if (!accept(v)) throw new Error(`Unknown ${what} '${v}'`)
    out.push(v)
  }
  return out
}

function toWorkerMessage(msg: unknown): WorkerMessage {
  if (typeof msg !== 'object' || msg === null) return { error: 'malformed worker message' }
  const out: WorkerMessage = {}
  if ('error' in msg && typeof msg.error === 'string') out.error = msg.error
  // posted by worker.ts
  if ('shardResult' in msg) out.shardResult = msg.shardResult as ShardResult
  return out
}

async function runJobs(jobs: ShardInput[], concurrency: number): Promise<ShardResult[]> {
  const results: ShardResult[] = []
  let active = 0
  let idx = 0
  let completed = 0

  return await new Promise<ShardResult[]>((resolve, reject) => {
    const next = () => {
      if (completed === jobs.length) return resolve(results)
      while (active < concurrency && idx < jobs.length) {
        const job = jobs[idx++]!
        const label = `${job.mode}/${job.absentRule}@${job.datasetId}`
        active++
        const startTs = Date.now()
        process.stdout.write(`Start ${label} (seed=${job.seed})\n`)
        // Workers load TypeScript sources directly, so tsx must be preloaded.
        const worker = new Worker(new URL('./worker.ts', import.meta.url), {
          execArgv: ['--import', 'tsx'],
          workerData: job,
        })
        worker.once('message', (raw: unknown) => {
          active--
          const msg = toWorkerMessage(raw)
          if (msg.error) {
            console.error(`Shard error for ${label}: ${msg.error}`)
            return reject(new Error(msg.error))
          }
          if (msg.shardResult) results.push(msg.shardResult)
          completed++
          process.stdout.write(`Done  ${label} in ${Date.now() - startTs}ms\n`)
          next()
        })
        worker.once('error', (err) => {
          active--
          console.error(`Worker crash for ${label}:`, err)
          reject(err)
        })
      }
    }
    next()
  })
}

async function main() {
  const program = new Command()
  program
    .name('lexiprobe-sim')
    .option('--words <file>', 'Word list (one word per line)', defaultWordlistPath())
    .option('--modes <csv>', 'Game modes CSV (easy,hard)', 'easy,hard')
    .option('--rules <csv>', 'Absent rules CSV (conservative,standard)', 'conservative')
    .option('--trials <n>', 'Games per shard', (v) => Number(v), 200)
    .option('--attempts <n>', 'Max attempts per game', (v) => Number(v), 6)
    .option(
      '--concurrency <n>',
      'Max parallel workers',
      (v) => Number(v),
      Math.min(8, os.cpus().length),
    )
    .option('--seed <n>', 'Base RNG seed (default: timestamp)', (v) => Number(v))
    .option('--out <dir>', 'Results directory', path.resolve('eval', 'results'))
    .option('--verbose', 'Log solver corrections and probes', false)
  program.parse(process.argv)
  const opts = program.opts<{
    words: string
    modes: string
    rules: string
    trials: number
    attempts: number
    concurrency: number
    seed?: number
    out: string
    verbose: boolean
  }>()

  const wordsFile = path.resolve(opts.words)
  if (!fs.existsSync(wordsFile)) {
    console.error('Wordlist not found at', wordsFile)
    process.exit(1)
  }
  const modes: Mode[] = parseCsvList(opts.modes, isMode, 'mode')
  const rules: AbsentRule[] = parseCsvList(opts.rules, isAbsentRule, 'absent rule')
  if (modes.length === 0 || rules.length === 0) {
    console.error('No modes or rules specified')
    process.exit(1)
  }

  const datasetId = path.basename(wordsFile, path.extname(wordsFile))
  const concurrency = Math.max(1, opts.concurrency || 1)
  const baseSeed = opts.seed ?? Date.now()
  const jobs: ShardInput[] = []
  let shardIndex = 0
  for (const mode of modes) {
    for (const absentRule of rules) {
      jobs.push({
        datasetId,
        wordsFile,
        mode,
        absentRule,
        trials: opts.trials,
        attempts: opts.attempts,
        // same secrets for every shard of a run, so shards are comparable
        seed: baseSeed >>> 0,
        verbose: opts.verbose,
      })
      shardIndex++
    }
  }

  console.log(`Running ${shardIndex} shard(s) on ${datasetId} concurrency=${concurrency}`)
  const rows = aggregate(await runJobs(jobs, concurrency))
  const now = new Date()
  const ts = now.toISOString().replace(/[-:]/g, '').replace(/\..+/, '').replace('T', '-')
  fs.mkdirSync(opts.out, { recursive: true })
  const baseName = `run-${ts}`
  const csvPath = path.join(opts.out, `${baseName}.csv`)
  const jsonPath = path.join(opts.out, `${baseName}.json`)
  fs.writeFileSync(csvPath, formatCsv(rows), 'utf8')
  const summary = {
    meta: {
      timestamp: now.toISOString(),
      wordsFile,
      modes,
      rules,
      trialsPerShard: opts.trials,
      attempts: opts.attempts,
      concurrency,
      baseSeed,
    },
    rows,
  }
  fs.writeFileSync(jsonPath, JSON.stringify(summary, null, 2) + '\n', 'utf8')
  fs.copyFileSync(csvPath, path.join(opts.out, 'latest.csv'))
  fs.copyFileSync(jsonPath, path.join(opts.out, 'latest.json'))

  console.log('\n' + formatTable(rows) + '\n')
  console.log('Results written to:')
  console.log('  ' + csvPath)
  console.log('  ' + jsonPath)
}

main().catch((err) => {
  console.error('[fatal]', err)
  process.exit(1)
})
