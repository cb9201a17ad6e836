// Frame counters for a presenter. The FPS figure averages the gaps between
// the last FPS_SAMPLES frames that passed the rate gate.

export const FPS_SAMPLES = 20;

export interface FrameStats {
  /** Refresh callbacks evaluated while running. */
  ticks: number;
  /** Frames copied to the presentation target. */
  presented: number;
  /** Ticks rejected by the frame-rate gate. */
  skipped: number;
  /** Ticks that passed the gate but whose render step reported no change. */
  unchanged: number;
  /** Rolling average of gate-passing frames per second, 0 until two have passed. */
  fps: number;
}

export class FrameStatsRecorder {
  private ticks = 0;
  private presented = 0;
  private skipped = 0;
  private unchanged = 0;

  private readonly intervals = new Float32Array(FPS_SAMPLES);
  private intervalIndex = 0;
  private intervalCount = 0;
  private lastGateTimestamp: number | null = null;

  recordSkip(): void {
    this.ticks++;
    this.skipped++;
  }

  /** Record a tick that passed the gate, and whether it was copied. */
  recordFrame(timestamp: number, copied: boolean): void {
    this.ticks++;
    if (copied) this.presented++;
    else this.unchanged++;

    if (this.lastGateTimestamp !== null) {
      const dtMs = timestamp - this.lastGateTimestamp;
      if (dtMs > 0) {
        this.intervals[this.intervalIndex] = dtMs;
        this.intervalIndex = (this.intervalIndex + 1) % FPS_SAMPLES;
        if (this.intervalCount < FPS_SAMPLES) this.intervalCount++;
      }
    }
    this.lastGateTimestamp = timestamp;
  }

  /** Forget the last gate timestamp so a restart does not count the pause. */
  resetClock(): void {
    this.lastGateTimestamp = null;
  }

  snapshot(): FrameStats {
    let sum = 0;
    for (let i = 0; i < this.intervalCount; i++) sum += this.intervals[i];
    const avgMs = this.intervalCount > 0 ? sum / this.intervalCount : 0;

    return {
      ticks: this.ticks,
      presented: this.presented,
      skipped: this.skipped,
      unchanged: this.unchanged,
      fps: avgMs > 0 ? 1000 / avgMs : 0,
    };
  }
}
