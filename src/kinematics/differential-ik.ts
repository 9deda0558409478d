/**
 * Differential Inverse Kinematics
 *
 * Drives the joints toward a target pose with the closed-loop law
 *
 *   dq/dt = J(q) * (x_target - x(q)) * gain
 *
 * where x(q) is a decomposition candidate of the end-effector pose. The law is
 * handed to the ODE integrator as a vector field. There is no convergence test:
 * the whole grid is always integrated and whatever trajectory results is returned.
 * Grid intervals the adaptive integrator could not finish on its own are listed in
 * `integrationWarnings` rather than aborting the solve.
 *
 * The gain defaults to (t_f - t_0) / numSamples. It is a tuning constant tied to
 * grid resolution, not a physical time constant.
 */

import { DEFAULT_DH_TABLE } from './dh-transform';
import type { DHTransformTable } from './dh-transform';
import { forwardKinematicsFrames } from './forward-kinematics';
import { geometricJacobian, isSingular, jacobianDeterminant, matrixVectorMultiply } from './geometric-jacobian';
import { integrateOde } from './integration/ode-integrator';
import type { IntegrationWarning, OdeOptions, VectorField } from './integration/ode-integrator';
import { assertTimeGrid } from './integration/time-grid';
import { beginSolve, log, warnOncePerSolve } from './kinematics-logger';
import { decomposePose, firstCandidate, selectCandidate } from './pose-decomposition';
import type { PoseCandidates } from './pose-decomposition';
import { getBranchPolicy, getIntegratorMethod, getSingularityEpsilon } from './solver-config';
import type { BranchPolicy } from './solver-config';
import { JOINT_COUNT } from './types';
import type { FrameList, Jacobian, JointVector, Pose, Trajectory } from './types';
import { assertFiniteNumber, assertJointVector, assertPose } from './validation';

export interface VectorFieldParams {
  targetPose: Pose;
  gain: number;
  table?: DHTransformTable;
  branchPolicy?: BranchPolicy;
}

/**
 * Proportional gain derived from the grid: span divided by sample count.
 */
export function defaultGain(timeGrid: readonly number[]): number {
  assertTimeGrid(timeGrid, 2);
  return (timeGrid[timeGrid.length - 1] - timeGrid[0]) / timeGrid.length;
}

export function poseError(target: Pose, current: Pose): Pose {
  assertPose(target, 'Target pose');
  assertPose(current, 'Current pose');
  return [
    target[0] - current[0],
    target[1] - current[1],
    target[2] - current[2],
    target[3] - current[3],
    target[4] - current[4],
    target[5] - current[5],
  ];
}

/**
 * Euclidean norm of the pose error, position and angle components together.
 */
export function poseErrorNorm(target: Pose, current: Pose): number {
  return Math.sqrt(poseError(target, current).reduce((sum, e) => sum + e * e, 0));
}

/**
 * Target pose reached by a reference configuration (first decomposition candidate).
 */
export function targetPoseFromConfiguration(qReference: JointVector, table: DHTransformTable = DEFAULT_DH_TABLE): Pose {
  const frames = forwardKinematicsFrames(qReference, table);
  const pose = firstCandidate(decomposePose(frames[frames.length - 1]));
  if (pose === undefined) {
    throw new Error(
      `Reference configuration [${qReference.join(', ')}] has a degenerate end-effector orientation; no target pose candidate`
    );
  }
  return pose;
}

/**
 * Build the closed-loop vector field. The returned function captures only the
 * frozen target, the gain and the table, so the integrator may call it at any
 * state and time, in any order.
 */
export function createVectorField(params: VectorFieldParams): VectorField {
  assertPose(params.targetPose, 'Target pose');
  assertFiniteNumber(params.gain, 'Gain');

  const target: Pose = [...params.targetPose];
  Object.freeze(target);
  const gain = params.gain;
  const table = params.table ?? DEFAULT_DH_TABLE;
  const policy = params.branchPolicy ?? getBranchPolicy();

  return (q: readonly number[], _t: number): number[] => {
    const frames = forwardKinematicsFrames(q, table);
    const J = geometricJacobian(frames);
    const current = selectCandidate(decomposePose(frames[frames.length - 1]), policy, target);

    if (current === undefined) {
      warnOncePerSolve('[IK] Degenerate end-effector orientation, no pose candidate: holding configuration');
      return new Array<number>(JOINT_COUNT).fill(0);
    }

    const delta = poseError(target, current).map(e => e * gain);
    return matrixVectorMultiply(J, delta);
  };
}

export interface ConfigurationReport {
  frames: FrameList;
  jacobian: Jacobian;
  determinant: number;
  singular: boolean;
  candidates: PoseCandidates;
}

/**
 * Everything the vector field computes at one configuration, for inspection.
 */
export function inspectConfiguration(
  q: JointVector,
  table: DHTransformTable = DEFAULT_DH_TABLE,
  singularityEpsilon: number = getSingularityEpsilon()
): ConfigurationReport {
  const frames = forwardKinematicsFrames(q, table);
  const jacobian = geometricJacobian(frames);
  return {
    frames,
    jacobian,
    determinant: jacobianDeterminant(jacobian),
    singular: isSingular(jacobian, singularityEpsilon),
    candidates: decomposePose(frames[frames.length - 1]),
  };
}

/**
 * Pose error norm of a configuration against a target, or null when the
 * configuration's orientation has no decomposition candidate.
 */
export function poseErrorAt(
  q: JointVector,
  targetPose: Pose,
  table: DHTransformTable = DEFAULT_DH_TABLE,
  branchPolicy: BranchPolicy = getBranchPolicy()
): number | null {
  const frames = forwardKinematicsFrames(q, table);
  const current = selectCandidate(decomposePose(frames[frames.length - 1]), branchPolicy, targetPose);
  return current === undefined ? null : poseErrorNorm(targetPose, current);
}

export function trajectoryPoseErrors(
  trajectory: Trajectory,
  targetPose: Pose,
  table: DHTransformTable = DEFAULT_DH_TABLE,
  branchPolicy: BranchPolicy = getBranchPolicy()
): Array<number | null> {
  return trajectory.map(q => poseErrorAt(q, targetPose, table, branchPolicy));
}

export interface SolveMotionOptions {
  q0: JointVector;
  targetPose: Pose;
  timeGrid: readonly number[];
  table?: DHTransformTable;
  /** Overrides defaultGain(timeGrid) */
  gain?: number;
  branchPolicy?: BranchPolicy;
  integrator?: OdeOptions;
  /** Scan every sample's Jacobian for singularities after integrating. Default true */
  inspectSingularities?: boolean;
  singularityEpsilon?: number;
}

export interface MotionSolution {
  /** trajectory[i] is the joint vector at timeGrid[i] */
  trajectory: Trajectory;
  timeGrid: number[];
  gain: number;
  /** Indices of samples whose Jacobian is singular */
  singularSamples: number[];
  /** Pose error norm at the first and last samples (null when degenerate) */
  initialPoseError: number | null;
  finalPoseError: number | null;
  evaluations: number;
  /** Intervals finished by the fixed-step fallback */
  integrationWarnings: IntegrationWarning[];
}

/**
 * Integrate the closed-loop law from q0 over the time grid.
 */
export function solveMotion(options: SolveMotionOptions): MotionSolution {
  assertJointVector(options.q0, 'Initial joint vector');
  assertPose(options.targetPose, 'Target pose');
  assertTimeGrid(options.timeGrid, 2);

  const table = options.table ?? DEFAULT_DH_TABLE;
  const gain = options.gain ?? defaultGain(options.timeGrid);
  const branchPolicy = options.branchPolicy ?? getBranchPolicy();
  const singularityEpsilon = options.singularityEpsilon ?? getSingularityEpsilon();
  const method = options.integrator?.method ?? getIntegratorMethod();

  beginSolve();
  log(
    `[IK] Solving over ${options.timeGrid.length} samples in [${options.timeGrid[0]}, ${options.timeGrid[options.timeGrid.length - 1]}], ` +
    `gain ${gain}, ${method}, branch '${branchPolicy}'`
  );

  const field = createVectorField({ targetPose: options.targetPose, gain, table, branchPolicy });
  const ode = integrateOde(field, options.q0, options.timeGrid, { ...options.integrator, method });

  const singularSamples: number[] = [];
  if (options.inspectSingularities ?? true) {
    ode.states.forEach((q, i) => {
      if (isSingular(geometricJacobian(forwardKinematicsFrames(q, table)), singularityEpsilon)) {
        singularSamples.push(i);
      }
    });
    if (singularSamples.length > 0) {
      warnOncePerSolve(`[IK] Warning: ${singularSamples.length} sample(s) at singular configurations, first at index ${singularSamples[0]}`);
    }
  }

  if (ode.warnings.length > 0) {
    warnOncePerSolve(
      `[IK] Warning: integrator fell back to fixed steps on ${ode.warnings.length} interval(s), ` +
      `first ending at t = ${ode.warnings[0].tEnd}`
    );
  }

  const trajectory = ode.states;
  const initialPoseError = poseErrorAt(trajectory[0], options.targetPose, table, branchPolicy);
  const finalPoseError = poseErrorAt(trajectory[trajectory.length - 1], options.targetPose, table, branchPolicy);

  log(
    `[IK] Done: ${ode.evaluations} field evaluations, pose error ` +
    `${initialPoseError?.toFixed(4) ?? 'n/a'} -> ${finalPoseError?.toFixed(4) ?? 'n/a'}`
  );

  return {
    trajectory,
    timeGrid: [...options.timeGrid],
    gain,
    singularSamples,
    initialPoseError,
    finalPoseError,
    evaluations: ode.evaluations,
    integrationWarnings: ode.warnings,
  };
}
