import { describe, it, expect } from "vitest";
import { computeSpectrum, fftInPlace, getSamplesForFrame, isPowerOfTwo } from "./fft";

const argMax = (values: Float32Array) => values.reduce((best, v, i) => (v > values[best] ? i : best), 0);

describe("fftInPlace", () => {
  it("turns an impulse into a flat spectrum", () => {
    const real = new Float32Array([1, 0, 0, 0, 0, 0, 0, 0]);
    const imag = new Float32Array(8);
    fftInPlace(real, imag, 8);
    for (let i = 0; i < 8; i++) {
      expect(real[i]).toBeCloseTo(1, 6);
      expect(imag[i]).toBeCloseTo(0, 6);
    }
  });

  it("puts a constant signal in the DC bin", () => {
    const real = new Float32Array(8).fill(1);
    const imag = new Float32Array(8);
    fftInPlace(real, imag, 8);
    expect(real[0]).toBeCloseTo(8, 5);
    for (let i = 1; i < 8; i++) {
      expect(Math.hypot(real[i], imag[i])).toBeCloseTo(0, 5);
    }
  });
});

describe("computeSpectrum", () => {
  it("peaks at the bin of a pure tone", () => {
    const n = 256;
    const tone = Float32Array.from({ length: n }, (_, i) => Math.sin((2 * Math.PI * 8 * i) / n));
    const spectrum = computeSpectrum(tone, n, { scale: "linear" });

    expect(spectrum).toHaveLength(128);
    expect(argMax(spectrum)).toBe(8);
    expect(spectrum[64]).toBeLessThan(1e-3);
  });

  it("maps silence to zero on the decibel scale", () => {
    const spectrum = computeSpectrum(new Float32Array(64), 64);
    expect(Array.from(spectrum)).toEqual(new Array(32).fill(0));
  });

  it("clips loud bins to 1 on the decibel scale", () => {
    const n = 256;
    const tone = Float32Array.from({ length: n }, (_, i) => Math.sin((2 * Math.PI * 8 * i) / n));
    expect(computeSpectrum(tone, n)[8]).toBe(1);
  });

  it("writes into a caller buffer of the right size", () => {
    const out = new Float32Array(32);
    expect(computeSpectrum(new Float32Array(64), 64, { out })).toBe(out);
    expect(computeSpectrum(new Float32Array(64), 64, { out: new Float32Array(4) })).not.toBe(out);
  });

  it("rejects sizes that are not a power of two", () => {
    expect(() => computeSpectrum([], 100)).toThrow(RangeError);
    expect(isPowerOfTwo(1024)).toBe(true);
    expect(isPowerOfTwo(1)).toBe(false);
  });
});

describe("getSamplesForFrame", () => {
  it("windows from the frame's first sample and zero pads", () => {
    const channel = Float32Array.from({ length: 10 }, (_, i) => i);
    const samples = getSamplesForFrame(channel, 10, 3, 5, 8);
    expect(Array.from(samples)).toEqual([6, 7, 8, 9, 0, 0, 0, 0]);
  });
});
