/**
 * Shared types for the kinematics core.
 */

/** Number of revolute joints on the arm. */
export const JOINT_COUNT = 6;

/** Base frame plus one frame per joint. */
export const FRAME_COUNT = JOINT_COUNT + 1;

/** Joint angles in radians, one per joint. */
export type JointVector = readonly number[];

/** 4x4 row-major matrix: rotation block, translation column, bottom row [0, 0, 0, 1]. */
export type HomogeneousTransform = number[][];

/** 3x3 row-major rotation matrix. */
export type RotationMatrix = number[][];

export type Vec3Tuple = [number, number, number];

/**
 * Base frame followed by the six accumulated link frames, all in base coordinates.
 * Frame i is T_1 * ... * T_i; frame 0 is the identity.
 */
export type FrameList = HomogeneousTransform[];

/**
 * 6x6 geometric Jacobian. Rows 0-2: linear velocity, rows 3-5: angular velocity.
 * Column i belongs to joint i.
 */
export type Jacobian = number[][];

/**
 * End-effector pose: [x, y, z, a1, a2, a3] where the rotation block equals
 * Rx(a1) * Ry(a2) * Rz(a3).
 */
export type Pose = [number, number, number, number, number, number];

/** Joint-angle samples, one per time-grid entry. */
export type Trajectory = number[][];
