/**
 * Seeded pseudo-random numbers (LCG, glibc constants).
 *
 * Tests draw "generic" joint configurations from here so every run sees the same ones.
 *
 *   setSeed(42)
 *   const q = randomJointVector(-Math.PI, Math.PI)
 */

let state = 1

export function setSeed(seed: number): void {
  state = seed | 0
}

/**
 * Next number in [0, 1).
 */
export function random(): number {
  state = (state * 1664525 + 1013904223) | 0
  return (state >>> 0) / 0x100000000
}

export function randomRange(min: number, max: number): number {
  return min + random() * (max - min)
}

/**
 * A joint vector with every angle drawn uniformly from [min, max).
 */
export function randomJointVector(min: number, max: number, length: number = 6): number[] {
  const q: number[] = new Array(length)
  for (let i = 0; i < length; i++) {
    q[i] = randomRange(min, max)
  }
  return q
}
