import { describe, it, expect } from "vitest";
import { AutoGain, followEnvelope } from "./envelope";

describe("followEnvelope", () => {
  it("rises by lerping toward a louder input", () => {
    expect(followEnvelope(0, 1, 10, 2, 0.05)).toBe(0.5);
  });

  it("decays exponentially toward a quieter input", () => {
    expect(followEnvelope(1, 0, 10, 2, 0.05)).toBeCloseTo(0.9);
  });

  it("never overshoots on a long frame", () => {
    expect(followEnvelope(0, 1, 10, 2, 1)).toBe(1);
  });

  it("never goes negative", () => {
    expect(followEnvelope(1, 0, 10, 50, 0.05)).toBe(0);
  });

  it("rises and falls monotonically at their own rates", () => {
    const dt = 1 / 60;
    const attackSpeed = 20;
    const releaseSpeed = 3;
    let value = 0;

    const rise: number[] = [];
    for (let i = 0; i < 30; i++) {
      value = followEnvelope(value, 1, attackSpeed, releaseSpeed, dt);
      rise.push(value);
    }
    const fall: number[] = [];
    for (let i = 0; i < 30; i++) {
      value = followEnvelope(value, 0, attackSpeed, releaseSpeed, dt);
      fall.push(value);
    }

    rise.slice(1).forEach((v, i) => expect(v).toBeGreaterThan(rise[i]));
    fall.slice(1).forEach((v, i) => expect(v).toBeLessThan(fall[i]));
    expect(rise[29]).toBeLessThanOrEqual(1);
    expect(fall[29]).toBeGreaterThanOrEqual(0);

    // Half a second in, the attack is nearly done while the release is not
    expect(1 - rise[29]).toBeLessThan(0.01);
    expect(fall[29]).toBeGreaterThan(0.2);
  });
});

describe("AutoGain", () => {
  it("normalizes against the loudest frame seen", () => {
    const gain = new AutoGain(0.001);
    gain.observe(0.5);
    expect(gain.maxObservedIntensity).toBe(0.5);
    expect(gain.normalize(0.25)).toBe(0.5);
    expect(gain.normalize(2)).toBe(1);
  });

  it("ignores quieter frames", () => {
    const gain = new AutoGain(0.001);
    gain.observe(0.5);
    gain.observe(0.2);
    expect(gain.maxObservedIntensity).toBe(0.5);
  });

  it("sinks linearly and stops at its floor", () => {
    const gain = new AutoGain(0.001);
    gain.observe(0.5);
    gain.decay(0.5, 0.2);
    expect(gain.maxObservedIntensity).toBeCloseTo(0.4);
    gain.decay(0.5, 10);
    expect(gain.maxObservedIntensity).toBe(0.001);
  });
});
