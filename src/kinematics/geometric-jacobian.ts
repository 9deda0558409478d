/**
 * Geometric Jacobian of the arm.
 *
 * All joints are revolute, so joint i contributes
 *
 *   linear:  z_i x (o_ee - o_i)
 *   angular: z_i
 *
 * where z_i and o_i are the z-axis and origin of frame i (frame 0 is the base)
 * and o_ee is the end-effector origin.
 */

import { det } from 'mathjs';
import { axisColumn, translation } from './homogeneous-transform';
import { getSingularityEpsilon } from './solver-config';
import { JOINT_COUNT } from './types';
import type { FrameList, Jacobian, JointVector, Vec3Tuple } from './types';
import { assertFrameList, assertJointVector, assertSquareMatrix } from './validation';

function cross(a: Vec3Tuple, b: Vec3Tuple): Vec3Tuple {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0]
  ];
}

/**
 * Build the 6x6 Jacobian from the base frame and the six link frames.
 */
export function geometricJacobian(frames: FrameList): Jacobian {
  assertFrameList(frames);

  const oEE = translation(frames[frames.length - 1]);
  const J: Jacobian = Array.from({ length: 6 }, () => new Array<number>(JOINT_COUNT).fill(0));

  for (let i = 0; i < JOINT_COUNT; i++) {
    const z = axisColumn(frames[i], 2);
    const o = translation(frames[i]);
    const linear = cross(z, [oEE[0] - o[0], oEE[1] - o[1], oEE[2] - o[2]]);

    for (let r = 0; r < 3; r++) {
      J[r][i] = linear[r];
      J[r + 3][i] = z[r];
    }
  }

  return J;
}

export function jacobianDeterminant(J: Jacobian): number {
  assertSquareMatrix(J, JOINT_COUNT, 'Jacobian');
  return det(J);
}

/**
 * True when |det J| < epsilon: the arm has lost at least one degree of freedom here.
 * Velocities computed at such a configuration are unreliable but still computed.
 */
export function isSingular(J: Jacobian, epsilon: number = getSingularityEpsilon()): boolean {
  return Math.abs(jacobianDeterminant(J)) < epsilon;
}

/**
 * End-effector twist [v; omega] produced by joint velocities qDot.
 */
export function cartesianVelocity(J: Jacobian, qDot: JointVector): number[] {
  assertSquareMatrix(J, JOINT_COUNT, 'Jacobian');
  assertJointVector(qDot, 'Joint velocity vector');
  return matrixVectorMultiply(J, qDot);
}

export function matrixVectorMultiply(A: number[][], v: readonly number[]): number[] {
  return A.map(row => row.reduce((sum, value, i) => sum + value * v[i], 0));
}
