import { describe, it, expect } from "vitest";
import { BeatDetector, type BeatDetectorOptions } from "./beatDetector";

const options: BeatDetectorOptions = {
  thresholdRatio: 1.3,
  decaySpeed: 0.1,
  duration: 0.2,
  minEnergyFloor: 1e-4,
  minBeatEnergy: 0.01,
};

const beatsFor = (energies: number[], detector = new BeatDetector(options)) =>
  energies.map((e) => detector.detect(e).isBeat);

describe("BeatDetector", () => {
  it("fires on the spike and nowhere else", () => {
    expect(beatsFor([1, 1, 1, 1, 5, 1, 1])).toEqual([false, false, false, false, true, false, false]);
  });

  it("starts a pulse carrying the beat energy", () => {
    const detector = new BeatDetector(options);
    beatsFor([1, 1, 5], detector);
    expect(detector.lastBeatEnergy).toBe(5);
    expect(detector.pulseTimer).toBe(0.2);
    expect(detector.pulseFactor).toBe(1);

    detector.advance(0.05);
    expect(detector.pulseFactor).toBeCloseTo(0.75);

    detector.advance(1);
    expect(detector.isPulsing).toBe(false);
    expect(detector.pulseFactor).toBe(0);
  });

  it("ignores hits that only match a loud passage", () => {
    // the reference only reaches 4.1 on the hit, so the threshold is 5.33
    expect(beatsFor([4, 4, 4, 4, 5])).toEqual([false, false, false, false, false]);
  });

  it("catches small hits in a quiet passage", () => {
    expect(beatsFor([0.1, 0.1, 0.1, 0.2])).toEqual([false, false, false, true]);
  });

  it("stays quiet in silence and low noise", () => {
    const detector = new BeatDetector(options);
    expect(beatsFor([0, 0, 0, 0.005, 0, 0.008], detector).some(Boolean)).toBe(false);
    expect(detector.prevEnergy).toBeGreaterThanOrEqual(1e-4);
  });

  it("primes again after a reset", () => {
    const detector = new BeatDetector(options);
    beatsFor([0.1, 0.1], detector);
    detector.reset();
    expect(detector.detect(5).isBeat).toBe(false);
    expect(detector.prevEnergy).toBe(5);
  });

  it("waits for energy above the floor before priming", () => {
    const detector = new BeatDetector(options);
    expect(beatsFor([0, 0, 0.3, 0.3], detector)).toEqual([false, false, false, false]);
    expect(detector.prevEnergy).toBeCloseTo(0.3);
  });
});
