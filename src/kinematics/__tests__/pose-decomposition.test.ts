import { describe, it, expect } from '@jest/globals';
import { endEffectorTransform } from '../forward-kinematics';
import { composeTransforms, elementaryRotation, elementaryTranslation, maxAbsDifference, rotationBlock } from '../homogeneous-transform';
import {
  decomposePose,
  firstCandidate,
  rotationFromAngles,
  selectCandidate,
  transformFromPose,
  wrapAngle,
} from '../pose-decomposition';
import { randomJointVector, setSeed } from '../seeded-random';
import { expectVectorClose } from './test-helpers';

function xyzRotation(a1: number, a2: number, a3: number, offset: [number, number, number] = [0, 0, 0]) {
  return composeTransforms([
    elementaryTranslation('x', offset[0]),
    elementaryTranslation('y', offset[1]),
    elementaryTranslation('z', offset[2]),
    elementaryRotation('x', a1),
    elementaryRotation('y', a2),
    elementaryRotation('z', a3),
  ]);
}

describe('decomposePose', () => {
  it('returns both branches for a generic rotation, m2 = -1 first', () => {
    const T = xyzRotation(0.3, 0.4, 0.5, [1, 2, 3]);
    const result = decomposePose(T);

    expect(result.candidates).toHaveLength(2);
    expect(result.degenerateBranches).toEqual([]);
    expect(result.candidates.map(c => c.branch)).toEqual([-1, 1]);

    expectVectorClose(result.candidates[1].pose, [1, 2, 3, 0.3, 0.4, 0.5], 12);
    expectVectorClose(result.candidates[0].pose, [1, 2, 3, 0.3 - Math.PI, Math.PI - 0.4, 0.5 - Math.PI], 12);
  });

  it('rebuilds the rotation block from either candidate', () => {
    const T = xyzRotation(-1.1, 0.7, 2.5);
    const W = rotationBlock(T);
    for (const { pose } of decomposePose(T).candidates) {
      expect(maxAbsDifference(rotationFromAngles(pose[3], pose[4], pose[5]), W)).toBeLessThan(1e-12);
    }
  });

  it('takes the cos(a3) = 0 path when a3 is a quarter turn', () => {
    const T = xyzRotation(0.2, 0.5, Math.PI / 2);
    const [first, second] = decomposePose(T).candidates;

    expectVectorClose(second.pose.slice(3), [0.2, 0.5, Math.PI / 2], 12);
    expectVectorClose(first.pose.slice(3), [0.2 - Math.PI, Math.PI - 0.5, -Math.PI / 2], 12);
    for (const { pose } of [first, second]) {
      expect(maxAbsDifference(rotationFromAngles(pose[3], pose[4], pose[5]), rotationBlock(T))).toBeLessThan(1e-12);
    }
  });

  it('returns no candidates when W[0][2] vanishes', () => {
    // Pure rotation about x: sin(a2) = 0
    const T = xyzRotation(0.3, 0, 0, [4, 5, 6]);
    const result = decomposePose(T);

    expect(result.candidates).toHaveLength(0);
    expect(result.degenerateBranches).toEqual([-1, 1]);
    expect(firstCandidate(result)).toBeUndefined();
    expect(selectCandidate(result, 'first')).toBeUndefined();
  });

  it('treats |W[0][2]| just under epsilon as degenerate and just over as regular', () => {
    expect(decomposePose(xyzRotation(0.3, 5e-10, 0.1)).candidates).toHaveLength(0);
    expect(decomposePose(xyzRotation(0.3, 1e-6, 0.1)).candidates).toHaveLength(2);
  });

  it('round-trips forward kinematics for random configurations', () => {
    setSeed(99);
    for (let trial = 0; trial < 30; trial++) {
      const T = endEffectorTransform(randomJointVector(-Math.PI, Math.PI));
      const { candidates } = decomposePose(T);

      expect(candidates.length).toBeGreaterThanOrEqual(1);
      for (const { pose } of candidates) {
        expect(maxAbsDifference(transformFromPose(pose), T)).toBeLessThan(1e-6);
      }
    }
  });

  it('rejects anything but a 4x4 matrix', () => {
    expect(() => decomposePose([[1, 0, 0], [0, 1, 0], [0, 0, 1]])).toThrow('Transform must be a 4x4 matrix, got 3 rows');
    expect(() => decomposePose([[1, 0, 0, 0], [0, 1, 0, 0], [0, 0, 1], [0, 0, 0, 1]])).toThrow(
      'Transform row 2 must have 4 entries, got 3'
    );
  });
});

describe('selectCandidate', () => {
  const result = decomposePose(xyzRotation(0.3, 0.4, 0.5));

  it('returns insertion order under the first policy', () => {
    expect(selectCandidate(result, 'first')).toBe(result.candidates[0].pose);
  });

  it('returns the candidate nearest the reference under the closest policy', () => {
    expect(selectCandidate(result, 'closest', [0, 0, 0, 0.25, 0.45, 0.5])).toBe(result.candidates[1].pose);
    expect(selectCandidate(result, 'closest', [0, 0, 0, -2.8, 2.7, -2.6])).toBe(result.candidates[0].pose);
  });

  it('compares angles modulo a full turn', () => {
    // 0.3 + 2*pi is the same orientation as candidate 1
    expect(selectCandidate(result, 'closest', [0, 0, 0, 0.3 + 2 * Math.PI, 0.4, 0.5])).toBe(result.candidates[1].pose);
  });

  it('needs a reference for the closest policy', () => {
    expect(() => selectCandidate(result, 'closest')).toThrow("Branch policy 'closest' needs a reference pose");
  });
});

describe('wrapAngle', () => {
  it('maps into (-pi, pi]', () => {
    expect(wrapAngle(0.5)).toBeCloseTo(0.5, 15);
    expect(wrapAngle(1.5 * Math.PI)).toBeCloseTo(-0.5 * Math.PI, 12);
    expect(wrapAngle(-1.5 * Math.PI)).toBeCloseTo(0.5 * Math.PI, 12);
    expect(wrapAngle(-Math.PI)).toBe(Math.PI);
    expect(wrapAngle(Math.PI)).toBe(Math.PI);
  });
});
