import { bench, describe } from 'vitest';
import { createNoise3D } from 'simplex-noise';
import { FramePresenter } from './index';
import { noiseField } from './patterns';
import { Surface } from './surface';
import { FrameTransfer } from './transfer';
import type { PresentationTarget, RefreshScheduler } from './host';

// ── Frame parameters (640 × 480, 60 fps) ────────────────────────────────────

const WIDTH = 640;
const HEIGHT = 480;
const BYTES = WIDTH * HEIGHT * 4;

const target: PresentationTarget = {
  width: WIDTH,
  height: HEIGHT,
  backing: new Uint8ClampedArray(BYTES),
  presentAt: () => undefined,
};

// Never fires on its own; the bench drives tick() directly.
const scheduler: RefreshScheduler = {
  registerNextRefresh: () => 0,
  cancelRefresh: () => undefined,
};

// ── Benchmarks ──────────────────────────────────────────────────────────────

describe(`pixel-pacer frame (${WIDTH} × ${HEIGHT}, ${BYTES} bytes)`, () => {
  const surface = new Surface(WIDTH, HEIGHT);
  const transfer = new FrameTransfer(BYTES);
  const step = noiseField({ noise3D: createNoise3D() });

  bench('transfer copy', () => {
    transfer.copy(surface.pixels, target);
  });

  bench('noise field render step', () => {
    step(surface);
  });

  const presenter = new FramePresenter(target, scheduler);
  presenter.start(60, step);
  let t = 0;

  bench('presenter tick (gate pass + render + copy)', () => {
    t += 17;
    presenter.tick(t);
  });
});
