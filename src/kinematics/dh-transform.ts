/**
 * DH Transform Table
 *
 * Closed-form per-joint transforms. The expansion of
 *
 *   Rz(theta) * Tz(d) * Tx(a) * Rx(alpha)
 *
 * is written out once below; the only runtime input is the joint angle. The factor
 * order is fixed, and __tests__/dh-transform.test.ts checks the closed form against
 * the explicit product.
 *
 * The expansion is generic over the scalar type so the same table drives both the
 * numeric forward kinematics and the autodiff Jacobian check.
 */

import { buildDHParameters, DEFAULT_LINK_LENGTHS } from './dh-parameters';
import type { DHRow, LinkLengths } from './dh-parameters';
import { JOINT_COUNT } from './types';
import type { HomogeneousTransform } from './types';
import { assertFiniteNumber } from './validation';

/**
 * Arithmetic needed to evaluate the closed form.
 */
export interface ScalarOps<T> {
  constant(value: number): T;
  add(a: T, b: T): T;
  sub(a: T, b: T): T;
  mul(a: T, b: T): T;
  sin(a: T): T;
  cos(a: T): T;
}

export const numberOps: ScalarOps<number> = {
  constant: v => v,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  sin: Math.sin,
  cos: Math.cos,
};

/**
 * Evaluate one DH row at a joint angle.
 *
 * With ct = cos(theta), st = sin(theta), ca = cos(alpha), sa = sin(alpha):
 *
 *   [ ct  -st*ca   st*sa   a*ct ]
 *   [ st   ct*ca  -ct*sa   a*st ]
 *   [ 0    sa      ca      d    ]
 *   [ 0    0       0       1    ]
 *
 * theta = q + offset is expanded with the angle-sum identities so the offset stays exact.
 */
export function evaluateDHRow<T>(ops: ScalarOps<T>, row: DHRow, angle: T): T[][] {
  const cq = ops.cos(angle);
  const sq = ops.sin(angle);
  const co = ops.constant(row.thetaOffset.cos);
  const so = ops.constant(row.thetaOffset.sin);

  const ct = ops.sub(ops.mul(cq, co), ops.mul(sq, so));
  const st = ops.add(ops.mul(sq, co), ops.mul(cq, so));

  const ca = ops.constant(row.alpha.cos);
  const sa = ops.constant(row.alpha.sin);
  const a = ops.constant(row.a);
  const zero = ops.constant(0);
  const one = ops.constant(1);

  return [
    [ct, ops.sub(zero, ops.mul(st, ca)), ops.mul(st, sa), ops.mul(a, ct)],
    [st, ops.mul(ct, ca), ops.sub(zero, ops.mul(ct, sa)), ops.mul(a, st)],
    [zero, sa, ca, ops.constant(row.d)],
    [zero, zero, zero, one],
  ];
}

export interface DHTransformTable {
  readonly linkLengths: LinkLengths;
  readonly rows: readonly DHRow[];
  /** Transform from frame `jointIndex` to frame `jointIndex + 1` (0-based joint index). */
  transform(jointIndex: number, angle: number): HomogeneousTransform;
}

export function assertJointIndex(jointIndex: number): void {
  if (!Number.isInteger(jointIndex) || jointIndex < 0 || jointIndex >= JOINT_COUNT) {
    throw new Error(`Joint index must be an integer in [0, ${JOINT_COUNT - 1}], got ${jointIndex}`);
  }
}

/**
 * Build the transform table once for a set of link lengths.
 */
export function createDHTransformTable(linkLengths: LinkLengths = DEFAULT_LINK_LENGTHS): DHTransformTable {
  const rows = Object.freeze(buildDHParameters(linkLengths));
  const lengths = Object.freeze([...linkLengths]);

  return {
    linkLengths: lengths,
    rows,
    transform(jointIndex: number, angle: number): HomogeneousTransform {
      assertJointIndex(jointIndex);
      assertFiniteNumber(angle, `Angle of joint ${jointIndex}`);
      return evaluateDHRow(numberOps, rows[jointIndex], angle);
    },
  };
}

export const DEFAULT_DH_TABLE: DHTransformTable = createDHTransformTable();
