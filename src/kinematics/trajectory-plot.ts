/**
 * Plot payload for a joint-angle trajectory.
 *
 * Rendering is left to whatever charting front end consumes this; the payload is
 * one x-axis (time) and one series per joint.
 */

import { JOINT_COUNT } from './types';
import type { Trajectory } from './types';

export interface PlotSeries {
  y: number[];
  label: string;
}

export interface JointAnglePlot {
  x: number[];
  xlabel: string;
  ylabel: string;
  title: string;
  series: PlotSeries[];
}

export function buildJointAnglePlot(timeGrid: readonly number[], trajectory: Trajectory): JointAnglePlot {
  if (timeGrid.length !== trajectory.length) {
    throw new Error(`Time grid has ${timeGrid.length} samples but trajectory has ${trajectory.length}`);
  }

  const series: PlotSeries[] = [];
  for (let joint = 0; joint < JOINT_COUNT; joint++) {
    series.push({
      y: trajectory.map(q => q[joint]),
      label: `joint ${joint}`,
    });
  }

  return {
    x: [...timeGrid],
    xlabel: 'Time (s)',
    ylabel: 'Joint angles (rad)',
    title: 'Joint angles during configuration change',
    series,
  };
}
