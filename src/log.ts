// Console logging shared by every module. Debug output is off unless enabled
// globally with setDebugLogging() or for one presenter through its `debug`
// option; errors always go to console.error and to the reporter, when one is
// installed.

const PREFIX = 'pixel-pacer:';

export type ErrorReporter = (
  error: unknown,
  context?: Record<string, unknown>,
) => void;

let debugEnabled = false;
let errorReporter: ErrorReporter | null = null;

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugLogging(): boolean {
  return debugEnabled;
}

export function setErrorReporter(reporter: ErrorReporter | null): void {
  errorReporter = reporter;
}

export interface DebugLogger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}

/** Debug output for one component: on when `enabled`, or while enabled globally. */
export function scopedDebug(enabled: boolean): DebugLogger {
  return {
    log: (...args) => {
      if (enabled || debugEnabled) console.log(PREFIX, ...args);
    },
    warn: (...args) => {
      if (enabled || debugEnabled) console.warn(PREFIX, ...args);
    },
  };
}

export function logError(error: unknown, context?: Record<string, unknown>): void {
  console.error(PREFIX, error);
  errorReporter?.(error, context);
}
