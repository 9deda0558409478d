/**
 * Kinematics of a 6-DOF revolute arm described by DH parameters.
 *
 * - Closed-form DH transform table and forward kinematics
 * - Geometric Jacobian, singularity test, autodiff cross-check
 * - Pose decomposition into position + Rx*Ry*Rz angles, both branches
 * - Differential IK: closed-loop joint velocities integrated over a time grid
 *
 * @module kinematics
 */

export type { FrameList, HomogeneousTransform, Jacobian, JointVector, Pose, RotationMatrix, Trajectory, Vec3Tuple } from './types';
export { FRAME_COUNT, JOINT_COUNT } from './types';

export { buildDHParameters, DEFAULT_LINK_LENGTHS, NEGATIVE_QUARTER_TURN, NO_TURN, QUARTER_TURN } from './dh-parameters';
export type { DHRow, LinkLengths, Turn } from './dh-parameters';
export { createDHTransformTable, DEFAULT_DH_TABLE, evaluateDHRow, numberOps } from './dh-transform';
export type { DHTransformTable, ScalarOps } from './dh-transform';

export {
  axisColumn,
  composeTransforms,
  elementaryRotation,
  elementaryTranslation,
  identityTransform,
  isRotationOrthonormal,
  multiplyTransforms,
  rotationBlock,
  translation,
} from './homogeneous-transform';
export type { Axis } from './homogeneous-transform';

export { endEffectorTransform, forwardKinematicsFrames } from './forward-kinematics';
export { cartesianVelocity, geometricJacobian, isSingular, jacobianDeterminant } from './geometric-jacobian';
export { autodiffPositionJacobian } from './autodiff-jacobian';

export {
  decomposePose,
  DECOMPOSITION_EPSILON,
  firstCandidate,
  rotationFromAngles,
  selectCandidate,
  transformFromPose,
  wrapAngle,
} from './pose-decomposition';
export type { BranchSign, PoseCandidate, PoseCandidates } from './pose-decomposition';

export {
  createVectorField,
  defaultGain,
  inspectConfiguration,
  poseError,
  poseErrorAt,
  poseErrorNorm,
  solveMotion,
  targetPoseFromConfiguration,
  trajectoryPoseErrors,
} from './differential-ik';
export type { ConfigurationReport, MotionSolution, SolveMotionOptions, VectorFieldParams } from './differential-ik';

export { integrateOde } from './integration/ode-integrator';
export type { IntegrationWarning, IntegrationWarningReason, OdeOptions, OdeSolution, VectorField } from './integration/ode-integrator';
export { linspace } from './integration/time-grid';

export { DEFAULT_SCENARIO, runScenario } from './scenario';
export type { MotionScenario, ScenarioResult } from './scenario';
export { buildJointAnglePlot } from './trajectory-plot';
export type { JointAnglePlot, PlotSeries } from './trajectory-plot';

export {
  getBranchPolicy,
  getIntegratorMethod,
  getSingularityEpsilon,
  resetSolverConfig,
  setBranchPolicy,
  setIntegratorMethod,
  setSingularityEpsilon,
} from './solver-config';
export type { BranchPolicy, IntegratorMethod } from './solver-config';

export { clearKinematicsLogs, kinematicsLogs, setLogCallback, setVerbosity } from './kinematics-logger';
