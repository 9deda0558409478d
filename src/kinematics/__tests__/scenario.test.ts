import { describe, it, expect, beforeAll } from '@jest/globals';
import { poseErrorAt } from '../differential-ik';
import { createDHTransformTable } from '../dh-transform';
import { resetSolverConfig } from '../solver-config';
import { DEFAULT_SCENARIO, runScenario } from '../scenario';
import type { ScenarioResult } from '../scenario';
import { buildJointAnglePlot } from '../trajectory-plot';
import { expectVectorClose } from './test-helpers';

describe('default scenario', () => {
  let result: ScenarioResult;

  beforeAll(() => {
    resetSolverConfig();
    result = runScenario();
  }, 60000);

  it('samples every grid point', () => {
    expect(result.trajectory).toHaveLength(10000);
    expect(result.timeGrid[0]).toBe(0);
    expect(result.timeGrid[9999]).toBe(10);
    expect(result.gain).toBeCloseTo(0.001, 15);
    for (const q of [result.trajectory[0], result.trajectory[5000], result.trajectory[9999]]) {
      expect(q).toHaveLength(6);
    }
  });

  it('starts from the zero configuration', () => {
    expect(result.trajectory[0]).toEqual([0, 0, 0, 0, 0, 0]);
  });

  it('ends closer to the target pose than it started', () => {
    const table = createDHTransformTable(DEFAULT_SCENARIO.linkLengths);
    const first = poseErrorAt(result.trajectory[0], result.targetPose, table);
    const last = poseErrorAt(result.trajectory[9999], result.targetPose, table);

    if (first === null || last === null) {
      throw new Error('Expected pose candidates at the first and last samples');
    }
    expect(last).toBeLessThan(first);
    expect(result.initialPoseError).toBe(first);
    expect(result.finalPoseError).toBe(last);
    expect(last).toBeCloseTo(1.766, 2);
  });

  it('reaches the expected final configuration', () => {
    expectVectorClose(result.trajectory[9999], [
      -0.010662,
      -0.031911,
      0.033394,
      0.011287,
      -0.008461,
      -0.013120,
    ], 3);
  });

  it('never passes through a singular configuration', () => {
    expect(result.singularSamples).toEqual([]);
    expect(result.integrationWarnings).toEqual([]);
  });

  it('builds a plot payload with one series per joint', () => {
    const plot = buildJointAnglePlot(result.timeGrid, result.trajectory);
    expect(plot.x).toHaveLength(10000);
    expect(plot.series.map(s => s.label)).toEqual(['joint 0', 'joint 1', 'joint 2', 'joint 3', 'joint 4', 'joint 5']);
    expect(plot.series[2].y[9999]).toBe(result.trajectory[9999][2]);
    expect(plot.xlabel).toBe('Time (s)');
    expect(plot.ylabel).toBe('Joint angles (rad)');
  });

  it('lands on the same configuration with fixed-step RK4', () => {
    const rk4 = runScenario(DEFAULT_SCENARIO, { integrator: { method: 'rk4' } });
    expectVectorClose(rk4.trajectory[9999], result.trajectory[9999], 4);
  }, 60000);
});

describe('buildJointAnglePlot', () => {
  it('splits a trajectory into joint columns', () => {
    const plot = buildJointAnglePlot([0, 1], [
      [1, 2, 3, 4, 5, 6],
      [7, 8, 9, 10, 11, 12],
    ]);
    expect(plot.x).toEqual([0, 1]);
    expect(plot.series.map(s => s.y)).toEqual([
      [1, 7],
      [2, 8],
      [3, 9],
      [4, 10],
      [5, 11],
      [6, 12],
    ]);
    expect(plot.title).toBe('Joint angles during configuration change');
  });

  it('rejects mismatched lengths', () => {
    expect(() => buildJointAnglePlot([0, 1, 2], [[0, 0, 0, 0, 0, 0]])).toThrow(
      'Time grid has 3 samples but trajectory has 1'
    );
  });
});
