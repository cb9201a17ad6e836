import { SurfaceMismatch } from './errors';
import type { PresentationTarget } from './host';

/**
 * Moves a finished frame onto a presentation target through one transfer
 * buffer that is allocated up front and reused for every copy.
 *
 * Copy order: frame → transfer buffer → target backing store →
 * `presentAt(0, 0)`. Always a full frame; there are no partial-rect updates.
 */
export class FrameTransfer {
  private readonly buffer: Uint8ClampedArray;

  constructor(byteLength: number) {
    this.buffer = new Uint8ClampedArray(byteLength);
  }

  get byteLength(): number {
    return this.buffer.length;
  }

  /**
   * Copy `frame` to `target` and present it at the origin. Lengths are
   * checked on every call; nothing is copied when they disagree.
   */
  copy(frame: Uint8ClampedArray, target: PresentationTarget): void {
    const expected = this.buffer.length;
    if (frame.length !== expected) {
      throw new SurfaceMismatch('frame buffer', expected, frame.length);
    }
    const backing = target.backing;
    if (backing.length !== expected) {
      throw new SurfaceMismatch('presentation backing store', expected, backing.length);
    }

    this.buffer.set(frame);
    backing.set(this.buffer);
    target.presentAt(0, 0);
  }
}
