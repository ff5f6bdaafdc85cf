import { describe, it, expect } from "vitest";
import { bandEnergy, bandToBins, estimateEnergy, meanSquare } from "./bandEnergy";

describe("bandToBins", () => {
  it("converts a kick band to bin indices", () => {
    // 22050 Hz / 512 bins = 43.07 Hz per bin
    expect(bandToBins(60, 120, 44100, 512)).toEqual({ startBin: 1, endBin: 2 });
  });

  it("collapses to a single bin for a narrow band", () => {
    expect(bandToBins(50, 60, 44100, 512)).toEqual({ startBin: 1, endBin: 1 });
  });

  it("clamps to the last bin", () => {
    expect(bandToBins(20000, 30000, 44100, 512)).toEqual({ startBin: 464, endBin: 511 });
  });
});

describe("bandEnergy", () => {
  it("averages the inclusive range", () => {
    expect(bandEnergy([0, 2, 4, 6], { startBin: 1, endBin: 2 })).toBe(3);
  });

  it("reads invalid magnitudes as zero", () => {
    expect(bandEnergy([0, Number.NaN, 4, -2], { startBin: 1, endBin: 3 })).toBeCloseTo(4 / 3);
  });
});

describe("estimateEnergy", () => {
  it("uses the waveform in wideband mode", () => {
    expect(meanSquare([1, -1, 2, 0])).toBe(1.5);
    expect(estimateEnergy({ mode: "wideband" }, [9, 9], 44100, [1, -1, 2, 0])).toBe(1.5);
  });

  it("falls back to the spectrum when there is no waveform", () => {
    expect(estimateEnergy({ mode: "wideband" }, [1, 3], 44100)).toBe(5);
  });

  it("averages the band in band mode", () => {
    const spectrum = new Float32Array(512).fill(0.1);
    spectrum[1] = 0.9;
    spectrum[2] = 0.7;
    expect(estimateEnergy({ mode: "band", minHz: 60, maxHz: 120 }, spectrum, 44100)).toBeCloseTo(0.8);
  });

  it("is zero for an empty frame", () => {
    expect(meanSquare([])).toBe(0);
  });
});
