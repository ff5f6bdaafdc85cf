import { clamp01, lerpClamped } from "./math";

/**
 * Asymmetric envelope follower step: lerps up toward a louder input at
 * `attackSpeed`, decays exponentially at `releaseSpeed` otherwise.
 */
export function followEnvelope(
  smoothed: number,
  raw: number,
  attackSpeed: number,
  releaseSpeed: number,
  dt: number
): number {
  if (raw > smoothed) {
    return lerpClamped(smoothed, raw, attackSpeed * dt);
  }
  return Math.max(0, smoothed - smoothed * releaseSpeed * dt);
}

/**
 * Running-max normalizer. The ceiling jumps up to any louder frame and
 * sinks linearly otherwise, so quiet tracks still fill the display.
 */
export class AutoGain {
  maxObservedIntensity: number;

  constructor(private floor: number) {
    this.maxObservedIntensity = floor;
  }

  setFloor(floor: number): void {
    this.floor = floor;
    this.maxObservedIntensity = Math.max(this.maxObservedIntensity, floor);
  }

  observe(frameMax: number): void {
    if (frameMax > this.maxObservedIntensity) this.maxObservedIntensity = frameMax;
  }

  normalize(intensity: number): number {
    return clamp01(intensity / this.maxObservedIntensity);
  }

  decay(decaySpeed: number, dt: number): void {
    this.maxObservedIntensity = Math.max(this.floor, this.maxObservedIntensity - decaySpeed * dt);
  }

  reset(): void {
    this.maxObservedIntensity = this.floor;
  }
}
