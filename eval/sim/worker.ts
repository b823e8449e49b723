/* eslint-env node */
/* eslint-disable no-console */
import { parentPort, workerData } from 'node:worker_threads'
import { loadWordlist } from '../../src/solver/data/loader.ts'
import { parseShardInput, runTrials } from './core.ts'

function main() {
  if (!parentPort) return
  try {
    const input = parseShardInput(workerData)
    const words = loadWordlist(input.wordsFile)
    const shardResult = runTrials(input, words, input.verbose ? console : undefined)
    parentPort.postMessage({ done: true, shardResult })
  } catch (err) {
    parentPort.postMessage({ done: true, error: err instanceof Error ? err.message : String(err) })
  }
}

main()
