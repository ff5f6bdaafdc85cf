import type { SpectrumSnapshot } from "./types";

export interface MockSpectrumOptions {
  binCount?: number;
  sampleRate?: number;
  bpm?: number;
  /** Reused when it already has binCount entries */
  out?: Float32Array;
}

// Deterministic hash noise, same trick as the camera shake
const pseudoRandom = (n: number) => {
  const x = Math.sin(n * 12.9898 + 78.233) * 43758.5453;
  return x - Math.floor(x);
};

/**
 * Synthetic spectrum simulating an EDM track at ~128 BPM, a pure function of
 * `time` so previews render the same frame twice:
 * - kick on every beat (40-130 Hz)
 * - half-time bass wobble (150-300 Hz)
 * - pad rolling off above 1 kHz, louder in the drop
 * - hi-hats on 8ths (6-16 kHz)
 */
export function generateMockSpectrum(
  time: number,
  { binCount = 512, sampleRate = 44100, bpm = 128, out }: MockSpectrumOptions = {}
): SpectrumSnapshot {
  const spectrum = out && out.length === binCount ? out : new Float32Array(binCount);
  const hzPerBin = sampleRate / 2 / binCount;

  const beats = (time * bpm) / 60;
  const beatPhase = beats - Math.floor(beats);
  const eighthPhase = beats * 2 - Math.floor(beats * 2);
  const wobblePhase = beats / 2 - Math.floor(beats / 2);

  // Build-up and drop structure (every 16 bars = 64 beats)
  const measureInSection = Math.floor(beats / 4) % 16;
  const isDrop = measureInSection < 8;

  const kick = Math.exp(-beatPhase * 8);
  const wobble = 0.3 + 0.2 * Math.sin(wobblePhase * Math.PI * 4);
  const hihat = Math.exp(-eighthPhase * 12);
  const padLevel = isDrop ? 0.35 : 0.2;
  const noiseSeed = Math.floor(time * 240);

  for (let i = 0; i < binCount; i++) {
    const hz = i * hzPerBin;
    let value = 0.02 * pseudoRandom(noiseSeed * 1031 + i);

    if (hz >= 40 && hz < 130) value += 0.95 * kick;
    if (hz >= 150 && hz < 300) value += wobble;
    if (hz >= 300 && hz < 6000) value += padLevel * Math.min(1, 1000 / hz);
    if (hz >= 6000 && hz < 16000) value += 0.4 * hihat;

    spectrum[i] = Math.min(1, value);
  }

  return { spectrum, sampleRate, isProducingAudio: true };
}
