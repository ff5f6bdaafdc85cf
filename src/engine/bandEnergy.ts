import { sanitizeMagnitude } from "./math";
import type { BeatDetectionMode } from "./types";

export interface BinRange {
  startBin: number;
  endBin: number;
}

/**
 * Map a frequency band onto inclusive bin indices of a `binCount`-bin
 * spectrum. Each bin covers nyquist / binCount Hz.
 */
export function bandToBins(
  minHz: number,
  maxHz: number,
  sampleRate: number,
  binCount: number
): BinRange {
  const hzPerBin = sampleRate / 2 / binCount;
  const lastBin = Math.max(binCount - 1, 0);
  const clampBin = (bin: number) => Math.min(Math.max(bin, 0), lastBin);

  const startBin = clampBin(Math.floor(minHz / hzPerBin));
  const endBin = Math.max(startBin, clampBin(Math.floor(maxHz / hzPerBin)));
  return { startBin, endBin };
}

/** Mean magnitude over an inclusive bin range */
export function bandEnergy(spectrum: ArrayLike<number>, range: BinRange): number {
  let sum = 0;
  let count = 0;
  for (let i = range.startBin; i <= range.endBin && i < spectrum.length; i++) {
    sum += sanitizeMagnitude(spectrum[i]);
    count++;
  }
  return count > 0 ? sum / count : 0;
}

/** Mean of squared samples */
export function meanSquare(samples: ArrayLike<number>): number {
  if (samples.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    const v = samples[i];
    if (Number.isFinite(v)) sum += v * v;
  }
  return sum / samples.length;
}

/**
 * Single energy value for beat detection. Band mode averages the configured
 * band of the spectrum; wideband mode takes the mean square of the waveform,
 * or of the spectrum when no waveform was supplied.
 */
export function estimateEnergy(
  detection: BeatDetectionMode,
  spectrum: ArrayLike<number>,
  sampleRate: number,
  waveform?: ArrayLike<number>
): number {
  if (detection.mode === "band") {
    const range = bandToBins(detection.minHz, detection.maxHz, sampleRate, spectrum.length);
    return bandEnergy(spectrum, range);
  }
  return meanSquare(waveform ?? spectrum);
}
