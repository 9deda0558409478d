/**
 * 4x4 homogeneous transform algebra on plain number arrays.
 *
 * Matrices are row-major number[][]. Nothing here mutates its arguments; every
 * operation returns a fresh matrix.
 */

import type { HomogeneousTransform, RotationMatrix, Vec3Tuple } from './types';

export type Axis = 'x' | 'y' | 'z';

export function identityTransform(): HomogeneousTransform {
  return [
    [1, 0, 0, 0],
    [0, 1, 0, 0],
    [0, 0, 1, 0],
    [0, 0, 0, 1]
  ];
}

/**
 * Multiply two 4x4 matrices.
 */
export function multiplyTransforms(A: HomogeneousTransform, B: HomogeneousTransform): HomogeneousTransform {
  const result: HomogeneousTransform = [
    [0, 0, 0, 0],
    [0, 0, 0, 0],
    [0, 0, 0, 0],
    [0, 0, 0, 0]
  ];

  for (let i = 0; i < 4; i++) {
    for (let j = 0; j < 4; j++) {
      let sum = 0;
      for (let k = 0; k < 4; k++) {
        sum += A[i][k] * B[k][j];
      }
      result[i][j] = sum;
    }
  }

  return result;
}

/**
 * Left-to-right product: compose([A, B, C]) = A * B * C.
 */
export function composeTransforms(transforms: HomogeneousTransform[]): HomogeneousTransform {
  return transforms.reduce((acc, T) => multiplyTransforms(acc, T), identityTransform());
}

/**
 * Pure rotation about a coordinate axis.
 */
export function elementaryRotation(axis: Axis, angle: number): HomogeneousTransform {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  switch (axis) {
    case 'x':
      return [
        [1, 0, 0, 0],
        [0, c, -s, 0],
        [0, s, c, 0],
        [0, 0, 0, 1]
      ];
    case 'y':
      return [
        [c, 0, s, 0],
        [0, 1, 0, 0],
        [-s, 0, c, 0],
        [0, 0, 0, 1]
      ];
    case 'z':
      return [
        [c, -s, 0, 0],
        [s, c, 0, 0],
        [0, 0, 1, 0],
        [0, 0, 0, 1]
      ];
  }
}

/**
 * Pure translation along a coordinate axis.
 */
export function elementaryTranslation(axis: Axis, distance: number): HomogeneousTransform {
  const T = identityTransform();
  const row = axis === 'x' ? 0 : axis === 'y' ? 1 : 2;
  T[row][3] = distance;
  return T;
}

export function rotationBlock(T: HomogeneousTransform): RotationMatrix {
  return [
    [T[0][0], T[0][1], T[0][2]],
    [T[1][0], T[1][1], T[1][2]],
    [T[2][0], T[2][1], T[2][2]]
  ];
}

export function translation(T: HomogeneousTransform): Vec3Tuple {
  return [T[0][3], T[1][3], T[2][3]];
}

/**
 * Column `col` of the rotation block, e.g. col 2 is the frame's z-axis in base coordinates.
 */
export function axisColumn(T: HomogeneousTransform, col: 0 | 1 | 2): Vec3Tuple {
  return [T[0][col], T[1][col], T[2][col]];
}

export function determinant3x3(M: number[][]): number {
  return (
    M[0][0] * (M[1][1] * M[2][2] - M[1][2] * M[2][1]) -
    M[0][1] * (M[1][0] * M[2][2] - M[1][2] * M[2][0]) +
    M[0][2] * (M[1][0] * M[2][1] - M[1][1] * M[2][0])
  );
}

/**
 * True when R^T R is the identity and det R = 1, both within tolerance.
 */
export function isRotationOrthonormal(R: RotationMatrix, tolerance: number = 1e-9): boolean {
  for (let i = 0; i < 3; i++) {
    for (let j = 0; j < 3; j++) {
      const dot = R[0][i] * R[0][j] + R[1][i] * R[1][j] + R[2][i] * R[2][j];
      const expected = i === j ? 1 : 0;
      if (Math.abs(dot - expected) > tolerance) {
        return false;
      }
    }
  }
  return Math.abs(determinant3x3(R) - 1) <= tolerance;
}

/**
 * Largest absolute elementwise difference between two matrices of the same shape.
 */
export function maxAbsDifference(A: number[][], B: number[][]): number {
  let max = 0;
  for (let i = 0; i < A.length; i++) {
    for (let j = 0; j < A[i].length; j++) {
      max = Math.max(max, Math.abs(A[i][j] - B[i][j]));
    }
  }
  return max;
}
