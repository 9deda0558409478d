import { describe, it, expect } from '@jest/globals';
import { buildDHParameters } from '../dh-parameters';
import { createDHTransformTable, DEFAULT_DH_TABLE } from '../dh-transform';
import {
  composeTransforms,
  elementaryRotation,
  elementaryTranslation,
  isRotationOrthonormal,
  maxAbsDifference,
  rotationBlock,
} from '../homogeneous-transform';
import { randomRange, setSeed } from '../seeded-random';
import { expectMatrixClose } from './test-helpers';

// Fixed angles of the arm, as plain radians
const THETA_OFFSETS = [0, 0, 0, 0, -Math.PI / 2, 0];
const TWISTS = [Math.PI / 2, 0, -Math.PI / 2, -Math.PI / 2, -Math.PI / 2, 0];

describe('DH transform table', () => {
  it('matches Rz * Tz * Tx * Rx composed from elementary transforms', () => {
    const lengths = [1, 2, 3, 4, 5, 6];
    const table = createDHTransformTable(lengths);
    const rows = buildDHParameters(lengths);

    for (const angle of [0, 0.3, -1.2, 2.9]) {
      for (let i = 0; i < 6; i++) {
        const composed = composeTransforms([
          elementaryRotation('z', angle + THETA_OFFSETS[i]),
          elementaryTranslation('z', rows[i].d),
          elementaryTranslation('x', rows[i].a),
          elementaryRotation('x', TWISTS[i]),
        ]);
        expect(maxAbsDifference(table.transform(i, angle), composed)).toBeLessThan(1e-12);
      }
    }
  });

  it('depends on the order of the factors', () => {
    // Translating before rotating puts joint 2's link somewhere else entirely
    const angle = 0.7;
    const swapped = composeTransforms([
      elementaryTranslation('x', 1),
      elementaryRotation('z', angle),
    ]);
    expect(maxAbsDifference(DEFAULT_DH_TABLE.transform(1, angle), swapped)).toBeGreaterThan(0.1);
  });

  it('folds l5 + l6 into the last offset', () => {
    const table = createDHTransformTable([1, 2, 3, 4, 5, 6]);
    expect(table.transform(5, 0)[2][3]).toBe(11);
    expect(table.transform(0, 0)[2][3]).toBe(1);
    expect(table.transform(1, 0)[0][3]).toBe(2);
    expect(table.transform(2, 0)[0][3]).toBe(3);
    expect(table.transform(3, 0)[2][3]).toBe(4);
  });

  it('applies the -pi/2 offset of joint 5 exactly', () => {
    expectMatrixClose(DEFAULT_DH_TABLE.transform(4, 0), [
      [0, 0, 1, 0],
      [-1, 0, 0, 0],
      [0, -1, 0, 0],
      [0, 0, 0, 1],
    ], 15);
  });

  it('produces orthonormal rotation blocks and a [0, 0, 0, 1] bottom row', () => {
    setSeed(11);
    for (let trial = 0; trial < 20; trial++) {
      const angle = randomRange(-10, 10);
      for (let i = 0; i < 6; i++) {
        const T = DEFAULT_DH_TABLE.transform(i, angle);
        expect(isRotationOrthonormal(rotationBlock(T), 1e-12)).toBe(true);
        expect(T[3]).toEqual([0, 0, 0, 1]);
      }
    }
  });

  it('rejects bad joint indices and angles', () => {
    expect(() => DEFAULT_DH_TABLE.transform(6, 0)).toThrow('Joint index must be an integer in [0, 5], got 6');
    expect(() => DEFAULT_DH_TABLE.transform(-1, 0)).toThrow('got -1');
    expect(() => DEFAULT_DH_TABLE.transform(1.5, 0)).toThrow('got 1.5');
    expect(() => DEFAULT_DH_TABLE.transform(0, NaN)).toThrow('Angle of joint 0 must be a finite number, got NaN');
  });

  it('rejects bad link lengths', () => {
    expect(() => createDHTransformTable([1, 1, 1, 1, 1])).toThrow('Link lengths must have 6 entries, got 5');
    expect(() => createDHTransformTable([1, 1, -2, 1, 1, 1])).toThrow('Link length l3 must be positive, got -2');
    expect(() => createDHTransformTable([1, 1, 1, Infinity, 1, 1])).toThrow('Link lengths[3] must be a finite number');
  });

  it('keeps its own copy of the link lengths', () => {
    const lengths = [1, 1, 1, 1, 1, 1];
    const table = createDHTransformTable(lengths);
    lengths[0] = 5;
    expect(table.linkLengths[0]).toBe(1);
    expect(table.transform(0, 0)[2][3]).toBe(1);
  });
});
