// =============================================================================
// RAW FFT IMPLEMENTATION
// Matches Web Audio API's getByteFrequencyData behavior (before the /255)
// =============================================================================

export type SpectrumScale = "decibels" | "linear";

export interface SpectrumOptions {
  /**
   * "decibels" maps the Web Audio default range (-100 to -30 dB) onto 0-1,
   * "linear" returns raw magnitudes normalized by FFT size
   */
  scale?: SpectrumScale;
  minDecibels?: number;
  maxDecibels?: number;
  /** Reused when it already has fftSize / 2 entries */
  out?: Float32Array;
}

export const isPowerOfTwo = (n: number) => Number.isInteger(n) && n >= 2 && (n & (n - 1)) === 0;

/** Blackman window coefficient, same window the AnalyserNode applies */
const blackman = (i: number, n: number) =>
  0.42 - 0.5 * Math.cos((2 * Math.PI * i) / (n - 1)) + 0.08 * Math.cos((4 * Math.PI * i) / (n - 1));

/**
 * Magnitude spectrum of the first `fftSize` samples (zero padded), one value
 * per positive-frequency bin
 */
export function computeSpectrum(
  samples: ArrayLike<number>,
  fftSize: number,
  { scale = "decibels", minDecibels = -100, maxDecibels = -30, out }: SpectrumOptions = {}
): Float32Array {
  if (!isPowerOfTwo(fftSize)) {
    throw new RangeError(`fftSize must be a power of two, got ${fftSize}`);
  }

  const n = fftSize;
  const real = new Float32Array(n);
  const imag = new Float32Array(n);

  for (let i = 0; i < n; i++) {
    real[i] = (i < samples.length ? samples[i] : 0) * blackman(i, n);
  }

  fftInPlace(real, imag, n);

  const binCount = n / 2;
  const magnitudes = out && out.length === binCount ? out : new Float32Array(binCount);
  const dbRange = maxDecibels - minDecibels;

  for (let i = 0; i < binCount; i++) {
    const mag = Math.sqrt(real[i] * real[i] + imag[i] * imag[i]) / n;
    if (scale === "linear") {
      magnitudes[i] = mag;
    } else {
      const db = 20 * Math.log10(mag + 1e-10);
      magnitudes[i] = Math.max(0, Math.min(1, (db - minDecibels) / dbRange));
    }
  }

  return magnitudes;
}

/** In-place Cooley-Tukey radix-2 FFT */
export function fftInPlace(real: Float32Array, imag: Float32Array, n: number): void {
  // Bit-reversal permutation
  let j = 0;
  for (let i = 0; i < n - 1; i++) {
    if (i < j) {
      [real[i], real[j]] = [real[j], real[i]];
      [imag[i], imag[j]] = [imag[j], imag[i]];
    }
    let k = n >> 1;
    while (k <= j) {
      j -= k;
      k >>= 1;
    }
    j += k;
  }

  for (let len = 2; len <= n; len <<= 1) {
    const halfLen = len >> 1;
    const angleStep = -Math.PI / halfLen;
    const wpr = Math.cos(angleStep);
    const wpi = Math.sin(angleStep);
    for (let i = 0; i < n; i += len) {
      let wr = 1,
        wi = 0;
      for (let k = 0; k < halfLen; k++) {
        const idx1 = i + k;
        const idx2 = i + k + halfLen;
        const tr = wr * real[idx2] - wi * imag[idx2];
        const ti = wr * imag[idx2] + wi * real[idx2];
        real[idx2] = real[idx1] - tr;
        imag[idx2] = imag[idx1] - ti;
        real[idx1] += tr;
        imag[idx1] += ti;
        const newWr = wr * wpr - wi * wpi;
        wi = wr * wpi + wi * wpr;
        wr = newWr;
      }
    }
  }
}

/**
 * Window of `fftSize` samples starting at the given video frame, zero padded
 * past the end of the track
 */
export function getSamplesForFrame(
  channelData: Float32Array,
  sampleRate: number,
  frame: number,
  fps: number,
  fftSize: number
): Float32Array {
  const samplesPerFrame = sampleRate / fps;
  const startSample = Math.floor(frame * samplesPerFrame);

  const samples = new Float32Array(fftSize);
  for (let i = 0; i < fftSize; i++) {
    const idx = startSample + i;
    samples[i] = idx >= 0 && idx < channelData.length ? channelData[idx] : 0;
  }
  return samples;
}
