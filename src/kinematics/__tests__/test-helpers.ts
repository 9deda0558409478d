import { expect } from '@jest/globals';

/**
 * Elementwise toBeCloseTo. toEqual would tell 0 and -0 apart.
 */
export function expectMatrixClose(actual: number[][], expected: number[][], digits: number = 10): void {
  expect(actual.length).toBe(expected.length);
  for (let i = 0; i < expected.length; i++) {
    expectVectorClose(actual[i], expected[i], digits);
  }
}

export function expectVectorClose(actual: readonly number[], expected: readonly number[], digits: number = 10): void {
  expect(actual.length).toBe(expected.length);
  for (let j = 0; j < expected.length; j++) {
    expect(actual[j]).toBeCloseTo(expected[j], digits);
  }
}
