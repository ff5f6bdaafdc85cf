import { inverseLerp01, lerp, lerpClamped } from "./math";
import type { RhythmConfig } from "./types";

/** Population standard deviation of the frame around `mean` */
export function spectralSpread(spectrum: ArrayLike<number>, mean: number): number {
  if (spectrum.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < spectrum.length; i++) {
    const d = spectrum[i] - mean;
    sum += d * d;
  }
  return Math.sqrt(sum / spectrum.length);
}

export interface RhythmTuning {
  smoothingTime: number;
  shuffleInterval: number;
}

/**
 * Retunes height smoothing and shuffle cadence from how spread out the
 * spectrum is. Wide spread (percussive, dynamic) → snappy and restless;
 * narrow spread (sustained tones) → slow and calm.
 */
export class RhythmAdaptationController {
  smoothedSpread = 0;

  update(spread: number, dt: number, config: RhythmConfig): RhythmTuning {
    this.smoothedSpread = lerpClamped(this.smoothedSpread, spread, config.changeSpeed * dt);
    return this.tuning(config);
  }

  tuning(config: RhythmConfig): RhythmTuning {
    const t = inverseLerp01(config.spreadLow, config.spreadHigh, this.smoothedSpread);
    return {
      smoothingTime: lerp(config.maxSmoothingTime, config.minSmoothingTime, t),
      shuffleInterval: lerp(config.maxShuffleInterval, config.minShuffleInterval, t),
    };
  }

  reset(): void {
    this.smoothedSpread = 0;
  }
}
