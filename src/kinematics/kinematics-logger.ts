/**
 * Log sink for the kinematics core.
 *
 * Every line lands in `kinematicsLogs`; outside Jest it is echoed to the console.
 * A solve calls beginSolve() first, and warnings raised from inside the vector
 * field or the stepping loop go through warnOncePerSolve() so a solve reports
 * each of them a single time.
 */

export type Verbosity = 'normal' | 'verbose';
export type LogListener = (message: string) => void;

export const kinematicsLogs: string[] = [];

let verbosity: Verbosity = 'normal';
let listener: LogListener | null = null;
let previousMessage: string | null = null;
const solveWarnings = new Set<string>();

const echoToConsole = process.env.NODE_ENV !== 'test' || process.env.KINEMATICS_VERBOSE_TESTS === 'true';

export function setLogCallback(callback: LogListener | null): void {
  listener = callback;
}

/** 'verbose' adds per-solve integrator statistics and decomposition details. */
export function setVerbosity(level: Verbosity): void {
  verbosity = level;
}

export function getVerbosity(): Verbosity {
  return verbosity;
}

export function log(message: string): void {
  // Repeated lines from back-to-back solves collapse into one
  if (message === previousMessage) {
    return;
  }
  previousMessage = message;

  kinematicsLogs.push(message);
  if (echoToConsole) {
    console.log(message);
  }
  if (listener) {
    listener(message);
  }
}

export function logDebug(message: string): void {
  if (verbosity === 'verbose') {
    log(message);
  }
}

/**
 * Mark the start of a solve. Warnings already raised may be raised again.
 */
export function beginSolve(): void {
  solveWarnings.clear();
}

export function warnOncePerSolve(message: string): void {
  if (solveWarnings.has(message)) {
    return;
  }
  solveWarnings.add(message);
  log(message);
}

export function clearKinematicsLogs(): void {
  kinematicsLogs.length = 0;
  previousMessage = null;
  solveWarnings.clear();
}
