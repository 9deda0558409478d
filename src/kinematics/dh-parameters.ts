/**
 * Denavit-Hartenberg parameters of the arm.
 *
 * Joint i maps frame i-1 to frame i as Rz(q_i + thetaOffset) * Tz(d) * Tx(a) * Rx(alpha).
 * Fixed angles are stored as exact cos/sin pairs so quarter turns produce exact
 * zeros instead of cos(pi/2) round-off.
 */

import { JOINT_COUNT } from './types';
import { assertFiniteVector } from './validation';

/** A fixed rotation angle, stored by its cosine and sine. */
export interface Turn {
  readonly cos: number;
  readonly sin: number;
}

export const NO_TURN: Turn = { cos: 1, sin: 0 };
export const QUARTER_TURN: Turn = { cos: 0, sin: 1 };
export const NEGATIVE_QUARTER_TURN: Turn = { cos: 0, sin: -1 };

export interface DHRow {
  /** Added to the joint angle before rotating about z */
  readonly thetaOffset: Turn;
  /** Link offset along the new z-axis */
  readonly d: number;
  /** Link length along the new x-axis */
  readonly a: number;
  /** Link twist about the new x-axis */
  readonly alpha: Turn;
}

export type LinkLengths = readonly number[];

export const DEFAULT_LINK_LENGTHS: LinkLengths = [1, 1, 1, 1, 1, 1];

export function assertLinkLengths(linkLengths: LinkLengths): void {
  assertFiniteVector(linkLengths, JOINT_COUNT, 'Link lengths');
  linkLengths.forEach((l, i) => {
    if (l <= 0) {
      throw new Error(`Link length l${i + 1} must be positive, got ${l}`);
    }
  });
}

/**
 * DH table of the arm for the given link lengths l1..l6.
 *
 * The last row folds the tool length into the wrist offset (d = l5 + l6).
 */
export function buildDHParameters(linkLengths: LinkLengths = DEFAULT_LINK_LENGTHS): DHRow[] {
  assertLinkLengths(linkLengths);
  const [l1, l2, l3, l4, l5, l6] = linkLengths;

  return [
    { thetaOffset: NO_TURN, d: l1, a: 0, alpha: QUARTER_TURN },
    { thetaOffset: NO_TURN, d: 0, a: l2, alpha: NO_TURN },
    { thetaOffset: NO_TURN, d: 0, a: l3, alpha: NEGATIVE_QUARTER_TURN },
    { thetaOffset: NO_TURN, d: l4, a: 0, alpha: NEGATIVE_QUARTER_TURN },
    { thetaOffset: NEGATIVE_QUARTER_TURN, d: 0, a: 0, alpha: NEGATIVE_QUARTER_TURN },
    { thetaOffset: NO_TURN, d: l5 + l6, a: 0, alpha: NO_TURN },
  ];
}
