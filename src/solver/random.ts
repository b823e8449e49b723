// Deterministic lightweight RNG (Mulberry32), used to draw simulated secrets.
export function mulberry32(seed: number): () => number {
  let t = seed >>> 0
  return function () {
    t = (t + 0x6d2b79f5) >>> 0
    let x = Math.imul(t ^ (t >>> 15), 1 | t)
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x)
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296
  }
}

export function pickIndex(length: number, rand: () => number): number {
  return Math.min(length - 1, Math.floor(rand() * length))
}
