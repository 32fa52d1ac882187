/**
 * Level Meter
 *
 * Smoothed RMS energy of capture buffers. The normalized level is a
 * best-effort display signal; the detector reads the smoothed RMS.
 */

export function computeRms(samples: Float32Array): number {
  if (samples.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    sum += samples[i] * samples[i];
  }
  return Math.sqrt(sum / samples.length);
}

export class LevelMeter {
  private history: number[] = [];
  private smoothed = 0;

  constructor(private readonly windowSize = 8) {}

  /** Add a buffer's RMS and return the smoothed RMS */
  push(rms: number): number {
    this.history.push(rms);
    if (this.history.length > this.windowSize) {
      this.history.shift();
    }
    this.smoothed = this.history.reduce((sum, value) => sum + value, 0) / this.history.length;
    return this.smoothed;
  }

  get rms(): number {
    return this.smoothed;
  }

  /** Level in [0, 1] for visualization */
  get level(): number {
    return Math.min(1, Math.max(0, this.smoothed * 10));
  }

  reset(): void {
    this.history = [];
    this.smoothed = 0;
  }
}
