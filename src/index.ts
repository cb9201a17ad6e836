// ─────────────────────────────────────────────────────────────────────────────
// FramePresenter: copies a software-rendered RGBA frame onto a <canvas> once
// per display refresh, capped to a maximum frame rate.
//
// Features:
//   • Paced by the display's own refresh callbacks; the FPS cap skips ticks
//     instead of running a separate timer
//   • One transfer buffer allocated up front, reused for every frame
//   • Render steps report "changed" so an idle frame is not re-uploaded
//   • Host handles (document, requestAnimationFrame) are injected, so the
//     loop is driven by `tick()` and testable without a browser
//   • Frame statistics: presented / skipped / unchanged counts and measured FPS
//
// Usage:
//
//   const presenter = createFullWindowPresenter(window);
//   presenter.start(30, (surface) => {
//     surface.fillRect(10, 10, 50, 50, { r: 255, g: 0, b: 0 });
//     return true;
//   });
//   stopOnUnload(presenter, window);
//
//   // Later:
//   presenter.setFPS(60); // takes effect next tick
//   presenter.stop();
// ─────────────────────────────────────────────────────────────────────────────

import { ConfigError, PrecondViolation } from './errors';
import {
  browserHost,
  canvasTarget,
  type PresentationTarget,
  type PresenterHost,
  type RefreshHandle,
  type RefreshScheduler,
} from './host';
import { logError, scopedDebug, type DebugLogger } from './log';
import { intervalForFps, shouldPresent, validateTolerance } from './pacing';
import { FrameStatsRecorder, type FrameStats } from './stats';
import { Surface, type RenderStep } from './surface';
import { FrameTransfer } from './transfer';

export * from './errors';
export * from './host';
export * from './pacing';
export * from './patterns';
export * from './stats';
export * from './surface';
export { FrameTransfer } from './transfer';
export {
  setDebugLogging,
  setErrorReporter,
  type ErrorReporter,
} from './log';

// ── Public types ─────────────────────────────────────────────────────────────

/** Configuration options for a presenter. Every field is optional. */
export interface PresenterOptions {
  /** Frame-rate cap used when `start()` is called without one. */
  maxFPS: number;

  /**
   * Lets a refresh that arrives up to this many milliseconds early still pass
   * the frame-rate gate. 0 means the full interval must elapse.
   */
  frameToleranceMs: number;

  /**
   * Debug-log this presenter's lifecycle transitions. Other presenters are
   * unaffected; `setDebugLogging(true)` turns debug output on for all of them.
   */
  debug: boolean;
}

export const DEFAULTS: PresenterOptions = {
  maxFPS: 60,
  frameToleranceMs: 0,
  debug: false,
};

type PresenterState = 'stopped' | 'running';

interface RunOutcome {
  failed: boolean;
  error: unknown;
}

interface RunWaiter {
  resolve: () => void;
  reject: (error: unknown) => void;
}

// A run stopped from inside the render step, settled once the step returns.
interface StoppedRun {
  outcome: RunOutcome;
  waiters: RunWaiter[];
}

// ── Presenter ────────────────────────────────────────────────────────────────

/**
 * Frame pacer and presenter.
 *
 * A two-state machine. `start()` arms one refresh callback; every callback
 * runs {@link tick}, which re-arms exactly once after processing, so at most
 * one callback is ever pending. `stop()` cancels that callback and settles
 * {@link whenStopped}.
 *
 * The render step runs synchronously inside `tick` and always returns before
 * the copy begins, so the frame buffer is never read while it is written.
 */
export class FramePresenter {
  readonly surface: Surface;

  private readonly target: PresentationTarget;
  private readonly scheduler: RefreshScheduler;
  private readonly config: PresenterOptions;
  private readonly transfer: FrameTransfer;
  private readonly recorder = new FrameStatsRecorder();
  private readonly debug: DebugLogger;

  private state: PresenterState = 'stopped';
  private intervalMs: number;
  private lastTimestamp = 0;
  private renderStep: RenderStep | null = null;
  private pending: RefreshHandle | null = null;
  private run = 0;
  private inRenderStep = false;
  private stoppedInStep: StoppedRun[] = [];

  // How the last run ended; null while running.
  private outcome: RunOutcome | null = { failed: false, error: undefined };
  private waiters: RunWaiter[] = [];

  private readonly onRefresh = (timestamp: number) => this.tick(timestamp);

  /**
   * @param target    Where frames are presented. Its size fixes the Surface size.
   * @param scheduler Refresh-callback primitive, usually {@link browserScheduler}.
   * @param options   Partial configuration; unspecified fields use defaults.
   */
  constructor(
    target: PresentationTarget,
    scheduler: RefreshScheduler,
    options?: Partial<PresenterOptions>,
  ) {
    this.config = { ...DEFAULTS, ...options };
    validateTolerance(this.config.frameToleranceMs);
    this.intervalMs = intervalForFps(this.config.maxFPS);
    this.debug = scopedDebug(this.config.debug);

    this.target = target;
    this.scheduler = scheduler;
    this.surface = new Surface(target.width, target.height);
    this.transfer = new FrameTransfer(this.surface.byteLength);
  }

  get width(): number {
    return this.surface.width;
  }

  get height(): number {
    return this.surface.height;
  }

  get running(): boolean {
    return this.state === 'running';
  }

  /** Minimum milliseconds between presented frames: `1000 / maxFPS`. */
  get targetIntervalMs(): number {
    return this.intervalMs;
  }

  /** Timestamp of the last refresh that passed the frame-rate gate. */
  get lastFrameTimestampMs(): number {
    return this.lastTimestamp;
  }

  /**
   * Start presenting. With no render step every frame that passes the gate
   * is copied as-is; drawing then happens elsewhere.
   *
   * @throws ConfigError when `maxFPS` is not a positive number.
   * @throws PrecondViolation when already running.
   */
  start(maxFPS = this.config.maxFPS, renderStep: RenderStep | null = null): void {
    if (this.state === 'running') {
      throw new PrecondViolation('start() called while already running');
    }
    this.intervalMs = intervalForFps(maxFPS);
    this.renderStep = renderStep;
    this.recorder.resetClock();
    this.run++;
    this.outcome = null;
    this.state = 'running';
    this.arm();
    this.debug.log(`started at ${maxFPS} fps (${this.intervalMs.toFixed(3)}ms interval)`);
  }

  /**
   * Change the frame-rate cap. Valid in either state; the next evaluated
   * refresh uses the new interval.
   *
   * @throws ConfigError when `maxFPS` is not a positive number.
   */
  setFPS(maxFPS: number): void {
    this.intervalMs = intervalForFps(maxFPS);
    this.debug.log(`fps set to ${maxFPS}`);
  }

  /**
   * Stop presenting. No render step or copy runs after this returns.
   *
   * Precondition: the presenter is running. Calling it before `start()` or
   * twice throws.
   *
   * @throws PrecondViolation when not running.
   */
  stop(): void {
    if (this.state !== 'running') {
      throw new PrecondViolation('stop() called without a running presenter');
    }
    this.halt();
    this.debug.log('stopped');
  }

  /**
   * Resolves when the current run is stopped; rejects with the error when the
   * run ended because a frame failed. Settles immediately once stopped.
   */
  whenStopped(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const waiter = { resolve, reject };
      const stoppedInStep = this.stoppedInStep.at(-1);
      if (!this.outcome) this.waiters.push(waiter);
      else if (stoppedInStep) stoppedInStep.waiters.push(waiter);
      else settleWaiter(waiter, this.outcome);
    });
  }

  stats(): FrameStats {
    return this.recorder.snapshot();
  }

  /**
   * Evaluate one display refresh at `timestamp` (ms, monotonic). Called by the
   * scheduler; also callable directly by a custom host loop. A tick that
   * arrives while stopped does nothing.
   */
  tick(timestamp: number): void {
    if (this.state !== 'running') return;
    this.pending = null;

    if (
      !shouldPresent(
        timestamp,
        this.lastTimestamp,
        this.intervalMs,
        this.config.frameToleranceMs,
      )
    ) {
      this.recorder.recordSkip();
      this.arm();
      return;
    }

    this.lastTimestamp = timestamp;

    const run = this.run;
    let copied = false;
    try {
      const changed = this.callRenderStep();
      // A render step that stopped this run gets no copy, even if it started another.
      if (changed && this.run === run && this.state === 'running') {
        this.transfer.copy(this.surface.pixels, this.target);
        copied = true;
      }
    } catch (error) {
      logError(error, { timestamp });
      this.fail(error);
      throw error;
    } finally {
      this.settleStoppedInStep();
    }
    this.recorder.recordFrame(timestamp, copied);

    // The render step may have stopped (or restarted) the presenter.
    if (this.state === 'running' && this.pending === null) this.arm();
  }

  // ── Internals ────────────────────────────────────────────────────────────

  private arm(): void {
    this.pending = this.scheduler.registerNextRefresh(this.onRefresh);
  }

  private callRenderStep(): boolean {
    if (!this.renderStep) return true;
    this.inRenderStep = true;
    try {
      return this.renderStep(this.surface);
    } finally {
      this.inRenderStep = false;
    }
  }

  private halt(outcome: RunOutcome = { failed: false, error: undefined }): void {
    this.state = 'stopped';
    if (this.pending !== null) {
      this.scheduler.cancelRefresh(this.pending);
      this.pending = null;
    }
    this.outcome = outcome;
    const waiters = this.waiters;
    this.waiters = [];
    // The render step may still throw, which fails the run it stopped.
    if (this.inRenderStep) this.stoppedInStep.push({ outcome, waiters });
    else for (const waiter of waiters) settleWaiter(waiter, outcome);
  }

  private fail(error: unknown): void {
    const outcome: RunOutcome = { failed: true, error };
    for (const stopped of this.stoppedInStep) stopped.outcome = outcome;
    if (this.state === 'running') this.halt(outcome);
    else this.outcome = outcome;
  }

  private settleStoppedInStep(): void {
    const stopped = this.stoppedInStep;
    this.stoppedInStep = [];
    for (const { outcome, waiters } of stopped) {
      for (const waiter of waiters) settleWaiter(waiter, outcome);
    }
  }
}

function settleWaiter(waiter: RunWaiter, outcome: RunOutcome): void {
  if (outcome.failed) waiter.reject(outcome.error);
  else waiter.resolve();
}

// ── Factories ────────────────────────────────────────────────────────────────

/**
 * Create a `widthPx × heightPx` canvas, append it to the host document's
 * body, and return a presenter bound to it.
 */
export function createPresenter(
  widthPx: number,
  heightPx: number,
  host: PresenterHost,
  options?: Partial<PresenterOptions>,
): FramePresenter {
  validateDimensions(widthPx, heightPx);
  const canvas = host.document.createElement('canvas');
  canvas.width = widthPx;
  canvas.height = heightPx;
  host.document.body.appendChild(canvas);

  return attachExisting(canvas, widthPx, heightPx, host, options);
}

/** Bind a presenter to a canvas the caller already has. The canvas is not resized. */
export function attachExisting(
  canvas: HTMLCanvasElement,
  widthPx: number,
  heightPx: number,
  host: Pick<PresenterHost, 'scheduler'>,
  options?: Partial<PresenterOptions>,
): FramePresenter {
  validateDimensions(widthPx, heightPx);
  const target = canvasTarget(canvas, widthPx, heightPx);
  const presenter = new FramePresenter(target, host.scheduler, options);
  if (canvas.width !== widthPx || canvas.height !== heightPx) {
    scopedDebug(options?.debug ?? false).warn(
      `canvas is ${canvas.width}×${canvas.height}, presenting ${widthPx}×${heightPx} at the origin`,
    );
  }
  return presenter;
}

function validateDimensions(widthPx: number, heightPx: number): void {
  if (
    !Number.isInteger(widthPx) ||
    !Number.isInteger(heightPx) ||
    widthPx <= 0 ||
    heightPx <= 0
  ) {
    throw new ConfigError(
      `presenter dimensions must be positive integers, got ${widthPx}×${heightPx}`,
    );
  }
}

/** A presenter on a new canvas that fills the window's inner size. */
export function createFullWindowPresenter(
  win: Window,
  options?: Partial<PresenterOptions>,
): FramePresenter {
  return createPresenter(win.innerWidth, win.innerHeight, browserHost(win), options);
}
