/**
 * Solver Configuration
 *
 * Process-wide defaults for the differential IK solver. A solve reads these once
 * when it starts; per-call options take precedence.
 */

/**
 * Integrator options:
 * - 'rk45': adaptive Dormand-Prince, error-controlled between grid samples
 * - 'rk4': classic fixed-step Runge-Kutta, a fixed number of substeps per grid interval
 */
export type IntegratorMethod = 'rk45' | 'rk4';

/**
 * Which decomposition candidate the vector field treats as the current pose:
 * - 'first': the first candidate returned (the m2 = -1 branch when both exist)
 * - 'closest': the candidate whose angles are nearest the target's
 */
export type BranchPolicy = 'first' | 'closest';

/** |det J| below this marks a configuration as singular. */
export const DEFAULT_SINGULARITY_EPSILON = 1e-9;

let INTEGRATOR_METHOD: IntegratorMethod = 'rk45';
let BRANCH_POLICY: BranchPolicy = 'first';
let SINGULARITY_EPSILON = DEFAULT_SINGULARITY_EPSILON;

export function setIntegratorMethod(method: IntegratorMethod): void {
  INTEGRATOR_METHOD = method;
}

export function getIntegratorMethod(): IntegratorMethod {
  return INTEGRATOR_METHOD;
}

export function setBranchPolicy(policy: BranchPolicy): void {
  BRANCH_POLICY = policy;
}

export function getBranchPolicy(): BranchPolicy {
  return BRANCH_POLICY;
}

export function setSingularityEpsilon(epsilon: number): void {
  if (!(epsilon > 0) || !Number.isFinite(epsilon)) {
    throw new Error(`Singularity epsilon must be a positive finite number, got ${epsilon}`);
  }
  SINGULARITY_EPSILON = epsilon;
}

export function getSingularityEpsilon(): number {
  return SINGULARITY_EPSILON;
}

/**
 * Restore every default. Tests call this so one suite's settings don't leak into another.
 */
export function resetSolverConfig(): void {
  INTEGRATOR_METHOD = 'rk45';
  BRANCH_POLICY = 'first';
  SINGULARITY_EPSILON = DEFAULT_SINGULARITY_EPSILON;
}
