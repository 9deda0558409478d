/**
 * Pose Decomposer
 *
 * Splits an end-effector transform into position plus three angles (a1, a2, a3)
 * with W = Rx(a1) * Ry(a2) * Rz(a3). Most rotations have two such triples, one per
 * sign m2 of cos(a2):
 *
 *   m2 = +1:  (a1, a2, a3)
 *   m2 = -1:  (a1 + pi, pi - a2, a3 + pi)   (wrapped to (-pi, pi])
 *
 * Both branches are evaluated, m2 = -1 first, and returned as a small collection so
 * callers choose one deliberately.
 *
 * When |W[0][2]| is below DECOMPOSITION_EPSILON a branch yields no candidate. That
 * happens whenever sin(a2) = 0, so for such rotations the collection is empty.
 */

import { composeTransforms, elementaryRotation, rotationBlock } from './homogeneous-transform';
import { logDebug } from './kinematics-logger';
import type { BranchPolicy } from './solver-config';
import type { HomogeneousTransform, Pose, RotationMatrix } from './types';
import { assertHomogeneousTransform, assertPose } from './validation';

export const DECOMPOSITION_EPSILON = 1e-9;

export type BranchSign = -1 | 1;

export interface PoseCandidate {
  /** Sign choice that produced this triple */
  branch: BranchSign;
  pose: Pose;
}

/**
 * Zero, one or two decompositions of the same transform, in branch order (-1, +1).
 */
export interface PoseCandidates {
  readonly candidates: readonly PoseCandidate[];
  /** Branches that produced no candidate */
  readonly degenerateBranches: readonly BranchSign[];
}

const BRANCH_ORDER: readonly BranchSign[] = [-1, 1];

function isNearZero(value: number): boolean {
  return Math.abs(value) < DECOMPOSITION_EPSILON;
}

function decomposeBranch(W: HomogeneousTransform, m2: BranchSign): [number, number, number] | null {
  if (isNearZero(Math.abs(W[0][2]))) {
    return null;
  }

  const a3 = Math.atan2(-W[0][1] * m2, W[0][0] * m2);
  const c3 = Math.cos(a3);

  let a2: number;
  if (!isNearZero(c3)) {
    a2 = Math.atan2(W[0][2], W[0][0] / c3);
  } else {
    // W[0][0] carries no information when cos(a3) vanishes; recover cos(a2) from W[0][1]
    const s3 = Math.sin(a3);
    a2 = Math.atan2(W[0][2], W[0][1] / -s3);
  }

  const c2 = Math.cos(a2);
  const a1 = Math.atan2(-W[1][2] / c2, W[2][2] / c2);

  return [a1, a2, a3];
}

/**
 * Decompose a homogeneous transform into its pose candidates.
 */
export function decomposePose(T: HomogeneousTransform): PoseCandidates {
  assertHomogeneousTransform(T);

  const candidates: PoseCandidate[] = [];
  const degenerateBranches: BranchSign[] = [];

  for (const m2 of BRANCH_ORDER) {
    const angles = decomposeBranch(T, m2);
    if (angles === null) {
      degenerateBranches.push(m2);
      continue;
    }
    candidates.push({
      branch: m2,
      pose: [T[0][3], T[1][3], T[2][3], angles[0], angles[1], angles[2]],
    });
  }

  if (degenerateBranches.length > 0) {
    logDebug(`[Decompose] |W[0][2]| = ${Math.abs(T[0][2]).toExponential(2)} below epsilon, ${candidates.length} candidate(s)`);
  }

  return { candidates, degenerateBranches };
}

export function firstCandidate(result: PoseCandidates): Pose | undefined {
  return result.candidates.length > 0 ? result.candidates[0].pose : undefined;
}

/**
 * Wrap an angle difference into (-pi, pi].
 */
export function wrapAngle(angle: number): number {
  const wrapped = angle - 2 * Math.PI * Math.floor((angle + Math.PI) / (2 * Math.PI));
  return wrapped === -Math.PI ? Math.PI : wrapped;
}

function angularDistance(a: Pose, b: readonly number[]): number {
  let sum = 0;
  for (let i = 3; i < 6; i++) {
    const d = wrapAngle(a[i] - b[i]);
    sum += d * d;
  }
  return Math.sqrt(sum);
}

/**
 * Pick one candidate:
 * - 'first': insertion order
 * - 'closest': smallest wrapped angle distance to `reference` (required for this policy)
 */
export function selectCandidate(
  result: PoseCandidates,
  policy: BranchPolicy,
  reference?: Pose
): Pose | undefined {
  if (result.candidates.length === 0) {
    return undefined;
  }
  if (policy === 'first') {
    return result.candidates[0].pose;
  }
  if (reference === undefined) {
    throw new Error("Branch policy 'closest' needs a reference pose");
  }
  assertPose(reference, 'Reference pose');

  let best = result.candidates[0].pose;
  let bestDistance = angularDistance(best, reference);
  for (const candidate of result.candidates.slice(1)) {
    const distance = angularDistance(candidate.pose, reference);
    if (distance < bestDistance) {
      best = candidate.pose;
      bestDistance = distance;
    }
  }
  return best;
}

/**
 * Rebuild the rotation block Rx(a1) * Ry(a2) * Rz(a3) from a decomposed triple.
 */
export function rotationFromAngles(a1: number, a2: number, a3: number): RotationMatrix {
  return rotationBlock(
    composeTransforms([elementaryRotation('x', a1), elementaryRotation('y', a2), elementaryRotation('z', a3)])
  );
}

/**
 * Rebuild the full homogeneous transform a pose describes.
 */
export function transformFromPose(pose: Pose): HomogeneousTransform {
  assertPose(pose);
  const T = composeTransforms([elementaryRotation('x', pose[3]), elementaryRotation('y', pose[4]), elementaryRotation('z', pose[5])]);
  T[0][3] = pose[0];
  T[1][3] = pose[1];
  T[2][3] = pose[2];
  return T;
}
