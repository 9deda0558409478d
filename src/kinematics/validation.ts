/**
 * Shape checks for kinematics inputs.
 *
 * Every public operation validates its inputs here before doing any arithmetic,
 * so a malformed vector fails with a message instead of producing NaNs downstream.
 */

import { FRAME_COUNT, JOINT_COUNT } from './types';
import type { FrameList, HomogeneousTransform, JointVector, Pose } from './types';

export function assertFiniteNumber(value: number, name: string): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`${name} must be a finite number, got ${value}`);
  }
}

export function assertFiniteVector(values: readonly number[], length: number, name: string): void {
  if (!Array.isArray(values)) {
    throw new Error(`${name} must be an array of ${length} numbers`);
  }
  if (values.length !== length) {
    throw new Error(`${name} must have ${length} entries, got ${values.length}`);
  }
  values.forEach((v, i) => assertFiniteNumber(v, `${name}[${i}]`));
}

export function assertJointVector(q: JointVector, name: string = 'Joint vector'): void {
  assertFiniteVector(q, JOINT_COUNT, name);
}

export function assertPose(pose: Pose | readonly number[], name: string = 'Pose'): void {
  assertFiniteVector(pose, 6, name);
}

/**
 * Structural check only: 4x4 of finite numbers. Orthonormality is a numerical
 * property and is checked separately by isRotationOrthonormal().
 */
export function assertHomogeneousTransform(T: HomogeneousTransform, name: string = 'Transform'): void {
  if (!Array.isArray(T) || T.length !== 4) {
    throw new Error(`${name} must be a 4x4 matrix, got ${Array.isArray(T) ? T.length : 0} rows`);
  }
  for (let r = 0; r < 4; r++) {
    assertFiniteVector(T[r], 4, `${name} row ${r}`);
  }
}

export function assertFrameList(frames: FrameList): void {
  if (!Array.isArray(frames) || frames.length !== FRAME_COUNT) {
    throw new Error(
      `Frame list must hold ${FRAME_COUNT} transforms (base + ${JOINT_COUNT} links), got ${Array.isArray(frames) ? frames.length : 0}`
    );
  }
  frames.forEach((T, i) => assertHomogeneousTransform(T, `Frame ${i}`));
}

export function assertSquareMatrix(M: number[][], size: number, name: string): void {
  if (!Array.isArray(M) || M.length !== size) {
    throw new Error(`${name} must be ${size}x${size}, got ${Array.isArray(M) ? M.length : 0} rows`);
  }
  for (let r = 0; r < size; r++) {
    assertFiniteVector(M[r], size, `${name} row ${r}`);
  }
}
