export interface RandomContext {
  random: () => number
  randn: () => number
}

function createScalarRng(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = Math.imul(state ^ (state >>> 15), 1 | state)
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function createRandomContext(seed?: number): RandomContext {
  const rand = seed == null ? Math.random : createScalarRng(seed)
  let spare: number | null = null
  const randn = () => {
    if (spare != null) {
      const v = spare
      spare = null
      return v
    }
    let u = 0
    let v = 0
    while (u === 0) u = rand()
    while (v === 0) v = rand()
    const mag = Math.sqrt(-2.0 * Math.log(u))
    spare = mag * Math.sin(2.0 * Math.PI * v)
    return mag * Math.cos(2.0 * Math.PI * v)
  }
  return { random: rand, randn }
}

export function offsetSeed(base: number | undefined, offset: number): number | undefined {
  if (base == null) return undefined
  const combined = (base + offset) >>> 0
  return combined
}

export function normal(ctx: RandomContext, mean: number, sd: number): number {
  return mean + sd * ctx.randn()
}

export function logNormal(ctx: RandomContext, mu: number, sigma: number): number {
  return Math.exp(mu + sigma * ctx.randn())
}

// p <= 0 never fires, p >= 1 always fires; both still consume one draw
export function bernoulli(ctx: RandomContext, p: number): boolean {
  return ctx.random() < p
}

// Index into `weights` drawn proportionally; weights need not be normalised
export function categorical(ctx: RandomContext, weights: readonly number[]): number {
  const total = weights.reduce((s, w) => s + Math.max(0, w), 0)
  const u = ctx.random() * total
  let acc = 0
  let last = -1
  for (let i = 0; i < weights.length; i++) {
    const w = Math.max(0, weights[i])
    if (w <= 0) continue
    acc += w
    last = i
    if (u < acc) return i
  }
  return last
}
