import { ConfigError } from './errors';

/**
 * Minimum time between presented frames for a given frame-rate cap.
 * Returns exactly `1000 / maxFPS`.
 */
export function intervalForFps(maxFPS: number): number {
  if (!Number.isFinite(maxFPS) || maxFPS <= 0) {
    throw new ConfigError(`maxFPS must be a positive number, got ${maxFPS}`);
  }
  return 1000 / maxFPS;
}

export function validateTolerance(toleranceMs: number): number {
  if (!Number.isFinite(toleranceMs) || toleranceMs < 0) {
    throw new ConfigError(
      `frameToleranceMs must be zero or positive, got ${toleranceMs}`,
    );
  }
  return toleranceMs;
}

/**
 * The frame-rate gate. A refresh at `timestamp` may present a frame once at
 * least `intervalMs` (less the jitter tolerance) has passed since the last
 * frame that passed the gate.
 */
export function shouldPresent(
  timestamp: number,
  lastFrameTimestamp: number,
  intervalMs: number,
  toleranceMs = 0,
): boolean {
  return timestamp - lastFrameTimestamp >= intervalMs - toleranceMs;
}
