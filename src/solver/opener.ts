import { bestIndex, scoreWords } from './scoring'

const keyOf = (dictionary: readonly string[]): string => dictionary.join('\n')

/**
 * Best first guess per dictionary, computed once and reused by every game that
 * follows. Entries are keyed by the dictionary's words, so separate configs
 * built from the same list share one scoring pass.
 */
export class OpenerCache {
  private readonly entries = new Map<string, number>()
  private computeCount = 0

  /** Index of the opener in `dictionary`; scores the full dictionary on first use only */
  resolveIndex(dictionary: readonly string[]): number {
    const key = keyOf(dictionary)
    const cached = this.entries.get(key)
    if (cached !== undefined) return cached
    const idx = bestIndex(scoreWords(dictionary))
    this.entries.set(key, idx)
    this.computeCount++
    return idx
  }

  resolve(dictionary: readonly string[]): string | undefined {
    return dictionary[this.resolveIndex(dictionary)]
  }

  has(dictionary: readonly string[]): boolean {
    return this.entries.has(keyOf(dictionary))
  }

  /** Number of full-dictionary scoring passes performed so far */
  computations(): number {
    return this.computeCount
  }
}

export const sharedOpenerCache = new OpenerCache()
