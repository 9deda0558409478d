/**
 * Forward Kinematics Engine
 *
 * Chains the per-joint DH transforms: T_0 = I, T_i = T_{i-1} * A_i(q_i).
 */

import { DEFAULT_DH_TABLE } from './dh-transform';
import type { DHTransformTable } from './dh-transform';
import { identityTransform, multiplyTransforms } from './homogeneous-transform';
import { JOINT_COUNT } from './types';
import type { FrameList, HomogeneousTransform, JointVector } from './types';
import { assertJointVector } from './validation';

/**
 * All seven frames (base + one per joint) in base coordinates.
 * Consumers that need intermediate axes and origins, like the Jacobian, use this.
 */
export function forwardKinematicsFrames(q: JointVector, table: DHTransformTable = DEFAULT_DH_TABLE): FrameList {
  assertJointVector(q);

  const frames: FrameList = [identityTransform()];
  for (let i = 0; i < JOINT_COUNT; i++) {
    frames.push(multiplyTransforms(frames[i], table.transform(i, q[i])));
  }
  return frames;
}

/**
 * End-effector frame only.
 */
export function endEffectorTransform(q: JointVector, table: DHTransformTable = DEFAULT_DH_TABLE): HomogeneousTransform {
  const frames = forwardKinematicsFrames(q, table);
  return frames[frames.length - 1];
}
