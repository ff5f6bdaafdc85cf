import { MathUtils } from "three";

export const clamp01 = (v: number) => MathUtils.clamp(v, 0, 1);

export const lerp = MathUtils.lerp;

/** Lerp with the factor clamped to 0-1, so large dt steps never overshoot */
export const lerpClamped = (from: number, to: number, t: number) =>
  MathUtils.lerp(from, to, clamp01(t));

/** Inverse lerp clamped to 0-1; 0 when the range is empty */
export const inverseLerp01 = (low: number, high: number, value: number) =>
  clamp01(MathUtils.inverseLerp(low, high, value));

export type SpringState = { value: number; velocity: number };

/**
 * Critically damped approach of `state.value` toward `target`, reaching it in
 * roughly `smoothTime` seconds without overshooting. Mutates `state`.
 */
export const stepSmoothDamp = (
  state: SpringState,
  target: number,
  smoothTime: number,
  dt: number
) => {
  const time = Math.max(1e-4, smoothTime);
  const omega = 2 / time;
  const x = omega * dt;
  const decay = 1 / (1 + x + 0.48 * x * x + 0.235 * x * x * x);

  const change = state.value - target;
  const temp = (state.velocity + omega * change) * dt;
  let velocity = (state.velocity - omega * temp) * decay;
  let value = target + (change + temp) * decay;

  // Never pass the target
  if (target - state.value > 0 === value > target) {
    value = target;
    velocity = 0;
  }

  state.value = value;
  state.velocity = velocity;
};

/** Magnitudes are non-negative reals; anything else reads as silence */
export const sanitizeMagnitude = (v: number) => (Number.isFinite(v) && v > 0 ? v : 0);
