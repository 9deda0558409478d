/**
 * Position Jacobian by reverse-mode autodiff.
 *
 * Runs the same closed-form DH table over scalar-autograd Values and back-propagates
 * each end-effector coordinate. Independent of the cross-product construction in
 * geometric-jacobian.ts, so the two can validate each other.
 */

import { V } from 'scalar-autograd';
import type { Value } from 'scalar-autograd';
import { buildDHParameters, DEFAULT_LINK_LENGTHS } from './dh-parameters';
import type { LinkLengths } from './dh-parameters';
import { evaluateDHRow } from './dh-transform';
import type { ScalarOps } from './dh-transform';
import { JOINT_COUNT } from './types';
import type { JointVector } from './types';
import { assertJointVector } from './validation';

export const valueOps: ScalarOps<Value> = {
  constant: v => V.C(v),
  add: (a, b) => V.add(a, b),
  sub: (a, b) => V.sub(a, b),
  mul: (a, b) => V.mul(a, b),
  sin: a => V.sin(a),
  cos: a => V.cos(a),
};

function multiplyValueMatrices(A: Value[][], B: Value[][]): Value[][] {
  const result: Value[][] = [];
  for (let i = 0; i < 4; i++) {
    const row: Value[] = [];
    for (let j = 0; j < 4; j++) {
      let sum = V.mul(A[i][0], B[0][j]);
      for (let k = 1; k < 4; k++) {
        sum = V.add(sum, V.mul(A[i][k], B[k][j]));
      }
      row.push(sum);
    }
    result.push(row);
  }
  return result;
}

/**
 * End-effector origin as a differentiable function of the joint variables.
 */
export function endEffectorPositionValues(jointVariables: Value[], linkLengths: LinkLengths = DEFAULT_LINK_LENGTHS): [Value, Value, Value] {
  const rows = buildDHParameters(linkLengths);

  let T = evaluateDHRow(valueOps, rows[0], jointVariables[0]);
  for (let i = 1; i < JOINT_COUNT; i++) {
    T = multiplyValueMatrices(T, evaluateDHRow(valueOps, rows[i], jointVariables[i]));
  }

  return [T[0][3], T[1][3], T[2][3]];
}

/**
 * 3x6 matrix of d(position)/dq at configuration q.
 * Matches rows 0-2 of the geometric Jacobian.
 */
export function autodiffPositionJacobian(q: JointVector, linkLengths: LinkLengths = DEFAULT_LINK_LENGTHS): number[][] {
  assertJointVector(q);

  const jacobian: number[][] = [];
  for (let axis = 0; axis < 3; axis++) {
    // Fresh graph per coordinate so no gradient is shared between rows
    const variables = q.map(angle => V.W(angle));
    const coordinate = endEffectorPositionValues(variables, linkLengths)[axis];
    coordinate.backward();
    jacobian.push(variables.map(v => v.grad));
  }

  return jacobian;
}
