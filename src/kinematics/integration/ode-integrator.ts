/**
 * ODE integrator for y' = f(y, t), sampled on a caller-supplied time grid.
 *
 * Returns one state per grid sample, the first being y0. Between samples the
 * integrator picks its own intermediate times and states, so f must be pure.
 *
 * Methods:
 * - 'rk45': Dormand-Prince 5(4) with embedded error estimate and step-size control.
 *   The step size carries over from one grid interval to the next and is clipped so
 *   every grid sample is hit exactly. An interval that runs out of step budget, or
 *   whose error estimate is not finite, is finished with fixed RK4 steps and listed
 *   in `warnings`.
 * - 'rk4': classic Runge-Kutta with `substeps` equal steps per grid interval.
 */

import { logDebug, warnOncePerSolve } from '../kinematics-logger';
import type { IntegratorMethod } from '../solver-config';
import { assertFiniteVector } from '../validation';
import { assertTimeGrid } from './time-grid';

export type VectorField = (y: readonly number[], t: number) => number[];

export interface OdeOptions {
  method?: IntegratorMethod;
  /** Relative tolerance (rk45). Default 1.49e-8 */
  rtol?: number;
  /** Absolute tolerance (rk45). Default 1.49e-8 */
  atol?: number;
  /** Step budget per grid interval, accepted and rejected steps combined (rk45). Default 500 */
  maxStepsPerInterval?: number;
  /** Equal steps per grid interval (rk4). Default 1 */
  substeps?: number;
}

export type IntegrationWarningReason = 'step-budget' | 'non-finite-error';

/**
 * A grid interval the adaptive method could not finish on its own.
 */
export interface IntegrationWarning {
  /** Index of the grid sample that closes the interval */
  interval: number;
  tStart: number;
  tEnd: number;
  reason: IntegrationWarningReason;
  /** The fixed-step fallback went non-finite too, so the state was held */
  held: boolean;
}

export interface OdeSolution {
  /** states[i] is the state at timeGrid[i] */
  states: number[][];
  evaluations: number;
  acceptedSteps: number;
  rejectedSteps: number;
  warnings: IntegrationWarning[];
}

const DEFAULT_TOLERANCE = 1.49e-8;

// Dormand-Prince tableau
const C = [0, 1 / 5, 3 / 10, 4 / 5, 8 / 9, 1, 1];
const A: number[][] = [
  [],
  [1 / 5],
  [3 / 40, 9 / 40],
  [44 / 45, -56 / 15, 32 / 9],
  [19372 / 6561, -25360 / 2187, 64448 / 6561, -212 / 729],
  [9017 / 3168, -355 / 33, 46732 / 5247, 49 / 176, -5103 / 18656],
  [35 / 384, 0, 500 / 1113, 125 / 192, -2187 / 6784, 11 / 84],
];
// 5th-order weights minus embedded 4th-order weights
const E = [71 / 57600, 0, -71 / 16695, 71 / 1920, -17253 / 339200, 22 / 525, -1 / 40];

const SAFETY = 0.9;
// RK4 steps used to finish an interval the adaptive method gave up on
const FALLBACK_SUBSTEPS = 10;
const MIN_FACTOR = 0.2;
const MAX_FACTOR = 5;

function checkedEvaluate(f: VectorField, y: readonly number[], t: number, dimension: number): number[] {
  const dy = f(y, t);
  if (dy.length !== dimension) {
    throw new Error(`Vector field returned ${dy.length} components, expected ${dimension}`);
  }
  return dy;
}

function axpy(y: readonly number[], h: number, terms: Array<[number, number[]]>): number[] {
  const out = y.slice();
  for (const [coefficient, k] of terms) {
    if (coefficient === 0) continue;
    for (let i = 0; i < out.length; i++) {
      out[i] += h * coefficient * k[i];
    }
  }
  return out;
}

function rk4Step(f: VectorField, y: readonly number[], t: number, h: number, n: number): number[] {
  const k1 = checkedEvaluate(f, y, t, n);
  const k2 = checkedEvaluate(f, axpy(y, h / 2, [[1, k1]]), t + h / 2, n);
  const k3 = checkedEvaluate(f, axpy(y, h / 2, [[1, k2]]), t + h / 2, n);
  const k4 = checkedEvaluate(f, axpy(y, h, [[1, k3]]), t + h, n);
  return axpy(y, h / 6, [[1, k1], [2, k2], [2, k3], [1, k4]]);
}

function integrateRK4(f: VectorField, y0: number[], grid: readonly number[], substeps: number): OdeSolution {
  const states: number[][] = [y0.slice()];
  let y = y0.slice();

  for (let i = 1; i < grid.length; i++) {
    const h = (grid[i] - grid[i - 1]) / substeps;
    for (let s = 0; s < substeps; s++) {
      y = rk4Step(f, y, grid[i - 1] + s * h, h, y0.length);
    }
    states.push(y.slice());
  }

  const steps = (grid.length - 1) * substeps;
  return { states, evaluations: 4 * steps, acceptedSteps: steps, rejectedSteps: 0, warnings: [] };
}

/**
 * Fixed RK4 steps from t to tEnd. Null when a step leaves the finite range.
 */
function finishWithRK4(
  f: VectorField,
  y: readonly number[],
  t: number,
  tEnd: number
): { y: number[] | null; evaluations: number } {
  const h = (tEnd - t) / FALLBACK_SUBSTEPS;
  let current = y.slice();
  let evaluations = 0;

  for (let s = 0; s < FALLBACK_SUBSTEPS; s++) {
    current = rk4Step(f, current, t + s * h, h, y.length);
    evaluations += 4;
    if (!current.every(Number.isFinite)) {
      return { y: null, evaluations };
    }
  }
  return { y: current, evaluations };
}

function integrateRK45(
  f: VectorField,
  y0: number[],
  grid: readonly number[],
  rtol: number,
  atol: number,
  maxStepsPerInterval: number
): OdeSolution {
  const n = y0.length;
  const states: number[][] = [y0.slice()];
  let evaluations = 0;
  let acceptedSteps = 0;
  let rejectedSteps = 0;
  const warnings: IntegrationWarning[] = [];

  let y = y0.slice();
  let t = grid[0];
  let h = grid.length > 1 ? grid[1] - grid[0] : 0;
  // First stage of the next step; reused after an accepted step (FSAL)
  let k1: number[] | null = null;

  for (let i = 1; i < grid.length; i++) {
    const tEnd = grid[i];
    let steps = 0;
    let reason: IntegrationWarningReason | null = null;

    while (t < tEnd) {
      if (steps >= maxStepsPerInterval) {
        reason = 'step-budget';
        break;
      }
      steps++;

      const remaining = tEnd - t;
      const lastStep = h >= remaining;
      const step = lastStep ? remaining : h;

      if (k1 === null) {
        k1 = checkedEvaluate(f, y, t, n);
        evaluations++;
      }

      const k: number[][] = [k1];
      for (let s = 1; s < 7; s++) {
        const terms = A[s].map((a, j): [number, number[]] => [a, k[j]]);
        k.push(checkedEvaluate(f, axpy(y, step, terms), t + C[s] * step, n));
        evaluations++;
      }

      // Stage 7 is evaluated at the 5th-order solution
      const yNew = axpy(y, step, A[6].map((a, j): [number, number[]] => [a, k[j]]));

      let errSq = 0;
      for (let d = 0; d < n; d++) {
        let e = 0;
        for (let s = 0; s < 7; s++) {
          e += E[s] * k[s][d];
        }
        const scale = atol + rtol * Math.max(Math.abs(y[d]), Math.abs(yNew[d]));
        const ratio = (step * e) / scale;
        errSq += ratio * ratio;
      }
      const errNorm = n > 0 ? Math.sqrt(errSq / n) : 0;

      if (!Number.isFinite(errNorm)) {
        reason = 'non-finite-error';
        break;
      }

      if (errNorm <= 1) {
        y = yNew;
        t = lastStep ? tEnd : t + step;
        k1 = k[6];
        acceptedSteps++;
        const factor = errNorm === 0 ? MAX_FACTOR : Math.min(MAX_FACTOR, SAFETY * Math.pow(errNorm, -0.2));
        // A step clipped to the grid sample never shrinks the carried step size
        h = lastStep ? Math.max(h, step * factor) : step * Math.max(1, factor);
      } else {
        rejectedSteps++;
        h = step * Math.max(MIN_FACTOR, SAFETY * Math.pow(errNorm, -0.2));
      }
    }

    if (reason !== null) {
      const fallback = finishWithRK4(f, y, t, tEnd);
      evaluations += fallback.evaluations;
      const held = fallback.y === null;
      if (fallback.y !== null) {
        y = fallback.y;
      }
      warnings.push({ interval: i, tStart: grid[i - 1], tEnd, reason, held });
      warnOncePerSolve(
        reason === 'step-budget'
          ? `[ODE] Step budget of ${maxStepsPerInterval} exhausted, finishing interval(s) with fixed RK4 steps`
          : '[ODE] Non-finite error estimate, finishing interval(s) with fixed RK4 steps'
      );

      t = tEnd;
      k1 = null;
      h = grid[i] - grid[i - 1];
    }

    states.push(y.slice());
  }

  return { states, evaluations, acceptedSteps, rejectedSteps, warnings };
}

/**
 * Integrate y' = f(y, t) from y0 over the grid.
 */
export function integrateOde(
  f: VectorField,
  y0: readonly number[],
  timeGrid: readonly number[],
  options: OdeOptions = {}
): OdeSolution {
  assertTimeGrid(timeGrid);
  assertFiniteVector(y0, y0.length, 'Initial state');

  const method = options.method ?? 'rk45';
  const start = y0.slice();

  let solution: OdeSolution;
  if (method === 'rk4') {
    const substeps = options.substeps ?? 1;
    if (!Number.isInteger(substeps) || substeps < 1) {
      throw new Error(`RK4 substeps must be a positive integer, got ${substeps}`);
    }
    solution = integrateRK4(f, start, timeGrid, substeps);
  } else {
    const rtol = options.rtol ?? DEFAULT_TOLERANCE;
    const atol = options.atol ?? DEFAULT_TOLERANCE;
    const maxSteps = options.maxStepsPerInterval ?? 500;
    if (!(rtol > 0) || !(atol > 0)) {
      throw new Error(`Tolerances must be positive, got rtol = ${rtol}, atol = ${atol}`);
    }
    solution = integrateRK45(f, start, timeGrid, rtol, atol, maxSteps);
  }

  logDebug(
    `[ODE] ${method}: ${timeGrid.length} samples, ${solution.evaluations} evaluations, ` +
    `${solution.acceptedSteps} accepted / ${solution.rejectedSteps} rejected steps, ` +
    `${solution.warnings.length} fallback interval(s)`
  );

  return solution;
}
