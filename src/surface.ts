import { ConfigError } from './errors';

/** An RGBA color with 0–255 channels. Alpha defaults to 255. */
export interface Color {
  r: number;
  g: number;
  b: number;
  a?: number;
}

export const BYTES_PER_PIXEL = 4;

/**
 * Draws the next frame into `surface` and reports whether anything changed.
 * Returning `false` keeps the previously presented frame on screen.
 */
export type RenderStep = (surface: Surface) => boolean;

/**
 * The software frame a render step draws into: `width × height` RGBA pixels,
 * row-major with the origin at the top-left corner.
 *
 * The pixel buffer is allocated once and never resized. To present at another
 * size, build a new presenter.
 */
export class Surface {
  readonly width: number;
  readonly height: number;
  readonly pixels: Uint8ClampedArray;

  constructor(width: number, height: number) {
    if (!isDimension(width) || !isDimension(height)) {
      throw new ConfigError(
        `surface dimensions must be positive integers, got ${width}×${height}`,
      );
    }
    this.width = width;
    this.height = height;
    this.pixels = new Uint8ClampedArray(width * height * BYTES_PER_PIXEL);
  }

  /** Byte length of the frame buffer. */
  get byteLength(): number {
    return this.pixels.length;
  }

  clear(color: Color): void {
    this.fillRect(0, 0, this.width, this.height, color);
  }

  /** Write one pixel. Coordinates outside the surface are ignored. */
  setPixel(x: number, y: number, color: Color): void {
    if (!this.contains(x, y)) return;
    const i = (y * this.width + x) * BYTES_PER_PIXEL;
    this.pixels[i] = color.r;
    this.pixels[i + 1] = color.g;
    this.pixels[i + 2] = color.b;
    this.pixels[i + 3] = color.a ?? 255;
  }

  getPixel(x: number, y: number): Required<Color> | undefined {
    if (!this.contains(x, y)) return undefined;
    const i = (y * this.width + x) * BYTES_PER_PIXEL;
    return {
      r: this.pixels[i],
      g: this.pixels[i + 1],
      b: this.pixels[i + 2],
      a: this.pixels[i + 3],
    };
  }

  /** Fill a rectangle, clipped to the surface bounds. */
  fillRect(x: number, y: number, w: number, h: number, color: Color): void {
    const x0 = Math.max(0, Math.floor(x));
    const y0 = Math.max(0, Math.floor(y));
    const x1 = Math.min(this.width, Math.floor(x + w));
    const y1 = Math.min(this.height, Math.floor(y + h));
    if (x0 >= x1 || y0 >= y1) return;

    const a = color.a ?? 255;
    const pixels = this.pixels;
    for (let row = y0; row < y1; row++) {
      let i = (row * this.width + x0) * BYTES_PER_PIXEL;
      for (let col = x0; col < x1; col++) {
        pixels[i] = color.r;
        pixels[i + 1] = color.g;
        pixels[i + 2] = color.b;
        pixels[i + 3] = a;
        i += BYTES_PER_PIXEL;
      }
    }
  }

  private contains(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      y >= 0 &&
      x < this.width &&
      y < this.height
    );
  }
}

function isDimension(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
