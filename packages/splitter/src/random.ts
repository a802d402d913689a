import { randomInt } from 'node:crypto'

/**
 * Source of uniform floats in [0, 1).
 */
export interface RandomSource {
  next: () => number
}

/**
 * mulberry32 generator. The seed is reduced to 32 bits, so seeds that are
 * equal modulo 2^32 produce the same sequence.
 */
export class SeededRandom implements RandomSource {
  private state: number

  constructor(readonly seed: number) {
    this.state = seed >>> 0
  }

  next(): number {
    this.state = (this.state + 0x6D2B79F5) | 0
    let t = this.state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function createRandom(seed?: number): SeededRandom {
  return new SeededRandom(seed ?? randomInt(0, 0x100000000))
}

/**
 * Fisher-Yates shuffle, last index first. Mutates and returns `items`.
 */
export function shuffleInPlace<T>(items: T[], random: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(random.next() * (i + 1))
    const tmp = items[i]
    items[i] = items[j]
    items[j] = tmp
  }
  return items
}
