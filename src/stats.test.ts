import { describe, it, expect } from 'vitest';
import { FPS_SAMPLES, FrameStatsRecorder } from './stats';

describe('FrameStatsRecorder', () => {
  it('starts at zero', () => {
    expect(new FrameStatsRecorder().snapshot()).toEqual({
      ticks: 0,
      presented: 0,
      skipped: 0,
      unchanged: 0,
      fps: 0,
    });
  });

  it('reports 0 fps until two frames pass the gate', () => {
    const recorder = new FrameStatsRecorder();
    recorder.recordFrame(100, true);
    expect(recorder.snapshot().fps).toBe(0);
  });

  it('averages the gaps between gate-passing frames', () => {
    const recorder = new FrameStatsRecorder();
    recorder.recordFrame(0, true);
    recorder.recordSkip();
    recorder.recordFrame(20, false);
    recorder.recordFrame(60, true);

    // Gaps of 20ms and 40ms average to 30ms.
    const stats = recorder.snapshot();
    expect(stats.fps).toBeCloseTo(1000 / 30, 5);
    expect(stats).toMatchObject({ ticks: 4, presented: 2, skipped: 1, unchanged: 1 });
  });

  it(`keeps only the last ${FPS_SAMPLES} gaps`, () => {
    const recorder = new FrameStatsRecorder();
    let t = 0;
    recorder.recordFrame(t, true);
    for (let i = 0; i < FPS_SAMPLES; i++) {
      t += 100;
      recorder.recordFrame(t, true);
    }
    for (let i = 0; i < FPS_SAMPLES; i++) {
      t += 25;
      recorder.recordFrame(t, true);
    }
    expect(recorder.snapshot().fps).toBe(40);
  });

  it('does not count the pause across resetClock()', () => {
    const recorder = new FrameStatsRecorder();
    recorder.recordFrame(0, true);
    recorder.recordFrame(50, true);
    recorder.resetClock();
    recorder.recordFrame(10_000, true);

    expect(recorder.snapshot().fps).toBe(20);
  });
});
