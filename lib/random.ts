import type { RandomSource } from "./types"

/** Seeded PRNG (mulberry32), returns floats in [0, 1). */
export const createSeededRandom = (seed: number): RandomSource => {
  let s = seed | 0
  return () => {
    s = (s + 0x6d2b79f5) | 0
    let t = Math.imul(s ^ (s >>> 15), 1 | s)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export const resolveRandomSource = (opts: {
  seed?: number
  random?: RandomSource
}): RandomSource => {
  if (opts.random) return opts.random
  if (opts.seed !== undefined) return createSeededRandom(opts.seed)
  return Math.random
}
