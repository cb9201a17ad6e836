import { vi } from 'vitest';
import type {
  ImageDataContext,
  PixelStore,
  PresentationTarget,
  RefreshCallback,
  RefreshHandle,
  RefreshScheduler,
} from './host';

/**
 * A refresh scheduler driven by hand: `fire(t)` runs the pending callback
 * with timestamp `t`, the way the browser would before a repaint.
 */
export class ManualScheduler implements RefreshScheduler {
  readonly pending = new Map<RefreshHandle, RefreshCallback>();
  registered = 0;
  cancelled: RefreshHandle[] = [];
  private nextHandle = 1;

  registerNextRefresh(callback: RefreshCallback): RefreshHandle {
    const handle = this.nextHandle++;
    this.pending.set(handle, callback);
    this.registered++;
    return handle;
  }

  cancelRefresh(handle: RefreshHandle): void {
    this.cancelled.push(handle);
    this.pending.delete(handle);
  }

  /** Run every callback pending right now with `timestamp`. */
  fire(timestamp: number): void {
    const callbacks = [...this.pending.values()];
    this.pending.clear();
    for (const callback of callbacks) callback(timestamp);
  }

  /** Fire each timestamp in order. */
  fireAll(timestamps: readonly number[]): void {
    for (const t of timestamps) this.fire(t);
  }
}

/** An in-memory presentation target that records every present. */
export function createMemoryTarget(width: number, height: number) {
  const presentAt = vi.fn<(x: number, y: number) => void>();
  const target: PresentationTarget = {
    width,
    height,
    backing: new Uint8ClampedArray(width * height * 4),
    presentAt,
  };
  return { target, presentAt };
}

/**
 * Stand-in for `CanvasRenderingContext2D`. happy-dom has no 2D context, so
 * canvas tests install this through {@link stubCanvasContext}.
 */
export function createFakeContext() {
  const created: PixelStore[] = [];
  const putImageData = vi.fn<(imageData: PixelStore, dx: number, dy: number) => void>();
  const ctx: ImageDataContext = {
    createImageData(width, height) {
      const imageData: PixelStore = {
        width,
        height,
        data: new Uint8ClampedArray(width * height * 4),
      };
      created.push(imageData);
      return imageData;
    },
    putImageData,
  };
  return { ctx, created, putImageData };
}

/**
 * Make every canvas's `getContext('2d')` return a fake context for the
 * duration of a test. Returns the fake and a restore function.
 */
export function stubCanvasContext() {
  const fake = createFakeContext();
  const proto = HTMLCanvasElement.prototype;
  const original = Object.getOwnPropertyDescriptor(proto, 'getContext');
  Object.defineProperty(proto, 'getContext', {
    configurable: true,
    writable: true,
    value: (kind: string) => (kind === '2d' ? fake.ctx : null),
  });
  const restore = () => {
    if (original) Object.defineProperty(proto, 'getContext', original);
    else Reflect.deleteProperty(proto, 'getContext');
  };
  return { ...fake, restore };
}
