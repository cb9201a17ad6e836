// ─────────────────────────────────────────────────────────────────────────────
// Error kinds thrown by the presenter. None of them are retried: each one is
// caller misuse and surfaces on the call that caused it.
// ─────────────────────────────────────────────────────────────────────────────

export type PresenterErrorCode = 'config' | 'precondition' | 'surface-mismatch';

export class PresenterError extends Error {
  readonly code: PresenterErrorCode;

  constructor(code: PresenterErrorCode, message: string) {
    super(`pixel-pacer: ${message}`);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid configuration: non-positive FPS, bad dimensions, missing 2D context. */
export class ConfigError extends PresenterError {
  constructor(message: string) {
    super('config', message);
  }
}

/** Lifecycle misuse, e.g. `stop()` without a running loop. */
export class PrecondViolation extends PresenterError {
  constructor(message: string) {
    super('precondition', message);
  }
}

/** Frame buffer, transfer buffer and backing store disagree in length. */
export class SurfaceMismatch extends PresenterError {
  readonly expected: number;
  readonly actual: number;

  constructor(what: string, expected: number, actual: number) {
    super(
      'surface-mismatch',
      `${what} is ${actual} bytes, transfer buffer is ${expected}`,
    );
    this.expected = expected;
    this.actual = actual;
  }
}
