import { describe, it, expect } from "vitest";
import { generateMockSpectrum } from "./mockSpectrum";
import { VisualizerEngine } from "../engine";

describe("generateMockSpectrum", () => {
  it("is a pure function of time", () => {
    const a = generateMockSpectrum(3.21);
    const b = generateMockSpectrum(3.21);
    expect(Array.from(a.spectrum)).toEqual(Array.from(b.spectrum));
    expect(a.sampleRate).toBe(44100);
    expect(a.isProducingAudio).toBe(true);
  });

  it("stays within 0-1", () => {
    for (const time of [0, 0.1, 1.7, 30, 95.5]) {
      const { spectrum } = generateMockSpectrum(time, { binCount: 256 });
      expect(spectrum).toHaveLength(256);
      for (const v of spectrum) {
        expect(v).toBeGreaterThanOrEqual(0);
        expect(v).toBeLessThanOrEqual(1);
      }
    }
  });

  it("hits the kick band on the beat and lets it ring out", () => {
    // 128 BPM: one beat every 0.46875 s, bin 2 is ~86 Hz
    const onBeat = generateMockSpectrum(0.46875).spectrum[2];
    const offBeat = generateMockSpectrum(0.46875 * 1.5).spectrum[2];
    expect(onBeat).toBeGreaterThan(0.9);
    expect(offBeat).toBeLessThan(0.05);
  });

  it("reuses a caller buffer of the right size", () => {
    const out = new Float32Array(512);
    expect(generateMockSpectrum(1, { out }).spectrum).toBe(out);
  });

  it("drives the engine's beat detector on every kick", () => {
    const engine = new VisualizerEngine();
    const beatsAt = (time: number) => Math.floor((time * 128) / 60);
    let onsets = 0;

    for (let i = 0; i < 240; i++) {
      const time = i / 60;
      const snapshot = generateMockSpectrum(time);
      const frame = engine.tick({ ...snapshot, deltaTime: 1 / 60 });
      if (i > 0 && beatsAt(time) > beatsAt((i - 1) / 60)) {
        onsets++;
        expect(frame.isBeat).toBe(true);
      }
    }
    expect(onsets).toBe(8);
  });
});
