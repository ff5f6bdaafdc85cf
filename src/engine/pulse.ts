import { stepSmoothDamp, type SpringState } from "./math";

/**
 * Target height for a column: its base height plus a beat bonus that ramps
 * linearly from `lastBeatEnergy * energyBoost` down to 0 over the pulse.
 */
export function mixBeatPulse(
  baseHeight: number,
  lastBeatEnergy: number,
  energyBoost: number,
  pulseFactor: number,
  rows: number
): number {
  if (pulseFactor <= 0) return Math.min(rows, baseHeight);
  const bonus = lastBeatEnergy * energyBoost * pulseFactor;
  return Math.min(rows, baseHeight + bonus);
}

/**
 * Critically damped approach of the displayed height toward its target,
 * kept within [0, rows]. Mutates `height`.
 */
export function smoothHeight(
  height: SpringState,
  target: number,
  smoothingTime: number,
  rows: number,
  dt: number
): void {
  stepSmoothDamp(height, target, smoothingTime, dt);
  if (height.value > rows) {
    height.value = rows;
    height.velocity = 0;
  } else if (height.value < 0) {
    height.value = 0;
    height.velocity = 0;
  }
}
