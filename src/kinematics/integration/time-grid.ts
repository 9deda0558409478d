/**
 * Time grids for the integrator.
 */

import { assertFiniteNumber } from '../validation';

/**
 * `num` evenly spaced samples from start to stop, both ends included.
 */
export function linspace(start: number, stop: number, num: number): number[] {
  assertFiniteNumber(start, 'Grid start');
  assertFiniteNumber(stop, 'Grid stop');
  if (!Number.isInteger(num) || num < 2) {
    throw new Error(`Grid needs an integer sample count of at least 2, got ${num}`);
  }

  const step = (stop - start) / (num - 1);
  const grid = new Array<number>(num);
  for (let i = 0; i < num - 1; i++) {
    grid[i] = start + i * step;
  }
  grid[num - 1] = stop;
  return grid;
}

/**
 * Throws unless the grid is non-empty, finite and strictly increasing.
 */
export function assertTimeGrid(grid: readonly number[], minLength: number = 1): void {
  if (!Array.isArray(grid) || grid.length < minLength) {
    throw new Error(`Time grid needs at least ${minLength} sample(s), got ${Array.isArray(grid) ? grid.length : 0}`);
  }
  grid.forEach((t, i) => assertFiniteNumber(t, `Time grid[${i}]`));
  for (let i = 1; i < grid.length; i++) {
    if (!(grid[i] > grid[i - 1])) {
      throw new Error(`Time grid must be strictly increasing: grid[${i - 1}] = ${grid[i - 1]}, grid[${i}] = ${grid[i]}`);
    }
  }
}
