// Word list loading for Node callers (CLI, simulator, tests).
// Lists are plain text: one word per line, blank lines and '#' comments skipped.

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { ConfigError } from '../errors'

const ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..', '..')

export const WORDLIST_DIR = path.join(ROOT, 'wordlists', 'en')

export function defaultWordlistPath(length = 5): string {
  return path.join(WORDLIST_DIR, `words-${length}.txt`)
}

export function parseWordlist(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((w) => w.trim().toLowerCase())
    .filter((w) => w.length > 0 && !w.startsWith('#'))
}

/** Read a word list; duplicates are dropped keeping the first occurrence */
export function loadWordlist(file: string): string[] {
  if (!fs.existsSync(file)) throw new ConfigError(`Wordlist not found: ${file}`)
  const words = parseWordlist(fs.readFileSync(file, 'utf8'))
  return [...new Set(words)]
}
