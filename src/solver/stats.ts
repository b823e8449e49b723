/**
 * Letter position statistics over a candidate list. Nothing here is cached:
 * callers pass the live candidate array and get numbers for exactly that array.
 */

/** Fraction of `words` whose letter at `position` equals `letter` */
export function letterFrequency(words: readonly string[], letter: string, position: number): number {
  const N = words.length
  if (N === 0) return 0
  let freq = 0
  for (const w of words) {
    if (w[position] === letter) freq++
  }
  return freq / N
}

/** Per-position letter frequency table. positions[i].get(ch) === letterFrequency(words, ch, i) */
export interface PositionTable {
  readonly size: number
  readonly positions: readonly ReadonlyMap<string, number>[]
}

export function positionFrequencies(words: readonly string[], wordLength: number): PositionTable {
  const counts = Array.from({ length: wordLength }, () => new Map<string, number>())
  for (const w of words) {
    for (let pos = 0; pos < wordLength; pos++) {
      const ch = w[pos]
      const row = counts[pos]
      if (ch === undefined || row === undefined) continue
      row.set(ch, (row.get(ch) ?? 0) + 1)
    }
  }
  const N = words.length
  const positions = counts.map((row) => {
    const freq = new Map<string, number>()
    if (N > 0) for (const [ch, n] of row) freq.set(ch, n / N)
    return freq
  })
  return { size: N, positions }
}

export function tableFrequency(table: PositionTable, letter: string, position: number): number {
  return table.positions[position]?.get(letter) ?? 0
}
