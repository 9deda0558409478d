/**
 * Demonstration scenario: unit link lengths, start from the zero configuration and
 * drive toward the pose reached by setting every joint to 0.1 rad.
 */

import { createDHTransformTable } from './dh-transform';
import type { LinkLengths } from './dh-parameters';
import { solveMotion, targetPoseFromConfiguration } from './differential-ik';
import type { MotionSolution } from './differential-ik';
import { linspace } from './integration/time-grid';
import type { OdeOptions } from './integration/ode-integrator';
import type { BranchPolicy } from './solver-config';
import type { JointVector, Pose } from './types';

export interface MotionScenario {
  linkLengths: LinkLengths;
  /** Starting configuration */
  initialConfiguration: JointVector;
  /** Configuration whose end-effector pose becomes the target */
  inputConfiguration: JointVector;
  t0: number;
  tf: number;
  numSamples: number;
}

export const DEFAULT_SCENARIO: MotionScenario = {
  linkLengths: [1, 1, 1, 1, 1, 1],
  initialConfiguration: [0, 0, 0, 0, 0, 0],
  inputConfiguration: [0.1, 0.1, 0.1, 0.1, 0.1, 0.1],
  t0: 0,
  tf: 10,
  numSamples: 10000,
};

export interface ScenarioResult extends MotionSolution {
  targetPose: Pose;
}

export function runScenario(
  scenario: MotionScenario = DEFAULT_SCENARIO,
  options: { branchPolicy?: BranchPolicy; integrator?: OdeOptions } = {}
): ScenarioResult {
  const table = createDHTransformTable(scenario.linkLengths);
  const targetPose = targetPoseFromConfiguration(scenario.inputConfiguration, table);
  const timeGrid = linspace(scenario.t0, scenario.tf, scenario.numSamples);

  const solution = solveMotion({
    q0: scenario.initialConfiguration,
    targetPose,
    timeGrid,
    table,
    branchPolicy: options.branchPolicy,
    integrator: options.integrator,
  });

  return { ...solution, targetPose };
}
