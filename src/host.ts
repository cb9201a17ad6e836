// ─────────────────────────────────────────────────────────────────────────────
// Host capabilities the presenter is built on. Nothing here reaches for
// `window` or `document` globals; every handle is passed in, so the pacing
// logic runs the same against a real browser and against test doubles.
// ─────────────────────────────────────────────────────────────────────────────

import { ConfigError } from './errors';
import { BYTES_PER_PIXEL } from './surface';

// ── Refresh scheduling ───────────────────────────────────────────────────────

/** Opaque handle returned by {@link RefreshScheduler.registerNextRefresh}. */
export type RefreshHandle = number;

export type RefreshCallback = (timestamp: number) => void;

/** Runs a callback once, right before the next display repaint. */
export interface RefreshScheduler {
  registerNextRefresh(callback: RefreshCallback): RefreshHandle;
  cancelRefresh(handle: RefreshHandle): void;
}

export type AnimationFrameHost = Pick<
  Window,
  'requestAnimationFrame' | 'cancelAnimationFrame'
>;

/** Scheduler backed by `requestAnimationFrame` on the given window. */
export function browserScheduler(win: AnimationFrameHost): RefreshScheduler {
  return {
    registerNextRefresh: (callback) => win.requestAnimationFrame(callback),
    cancelRefresh: (handle) => win.cancelAnimationFrame(handle),
  };
}

/** Everything `createPresenter` needs from the page. */
export interface PresenterHost {
  document: Document;
  scheduler: RefreshScheduler;
}

export function browserHost(win: Window): PresenterHost {
  return { document: win.document, scheduler: browserScheduler(win) };
}

// ── Presentation target ──────────────────────────────────────────────────────

/**
 * The visible surface a frame is blitted onto. `backing` is the target's own
 * pixel store (`width × height × 4` bytes); `presentAt` pushes it to screen.
 */
export interface PresentationTarget {
  readonly width: number;
  readonly height: number;
  readonly backing: Uint8ClampedArray;
  presentAt(x: number, y: number): void;
}

/** The pixel store a 2D context hands out (an `ImageData` in browsers). */
export interface PixelStore {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}

/** The part of `CanvasRenderingContext2D` used for full-frame blits. */
export interface ImageDataContext {
  createImageData(width: number, height: number): PixelStore;
  putImageData(imageData: PixelStore, dx: number, dy: number): void;
}

/**
 * Target backed by a single `ImageData` from `ctx`, created once and presented
 * with `putImageData`. Note width, then height.
 */
export function contextTarget(
  ctx: ImageDataContext,
  width: number,
  height: number,
): PresentationTarget {
  const imageData = ctx.createImageData(width, height);
  if (imageData.data.length !== width * height * BYTES_PER_PIXEL) {
    throw new ConfigError(
      `image data for ${width}×${height} has ${imageData.data.length} bytes`,
    );
  }
  return {
    width,
    height,
    backing: imageData.data,
    presentAt: (x, y) => ctx.putImageData(imageData, x, y),
  };
}

/**
 * Target over a `<canvas>` element's 2D context. Dimensions default to the
 * canvas's own `width`/`height` attributes.
 */
export function canvasTarget(
  canvas: HTMLCanvasElement,
  width = canvas.width,
  height = canvas.height,
): PresentationTarget {
  const ctx = canvas.getContext('2d');
  if (!ctx) {
    throw new ConfigError('failed to acquire 2D context for the canvas');
  }
  return contextTarget(ctx, width, height);
}

// ── Page lifecycle ───────────────────────────────────────────────────────────

export interface Stoppable {
  readonly running: boolean;
  stop(): void;
}

/**
 * Stop `presenter` when the page unloads, so no refresh callback outlives
 * the document. Returns a function that removes the listener.
 */
export function stopOnUnload(
  presenter: Stoppable,
  target: Pick<EventTarget, 'addEventListener' | 'removeEventListener'>,
): () => void {
  const onUnload = () => {
    if (presenter.running) presenter.stop();
  };
  target.addEventListener('beforeunload', onUnload, { once: true });
  return () => target.removeEventListener('beforeunload', onUnload);
}
