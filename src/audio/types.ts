/**
 * One frame of analysed audio, the shape every provider in this folder hands
 * to the engine
 */
export interface SpectrumSnapshot {
  /** Magnitudes normalized to 0-1, one per bin up to nyquist */
  spectrum: Float32Array;
  /** Time-domain samples for wideband beat detection, when the source has them */
  waveform?: Float32Array;
  sampleRate: number;
  isProducingAudio: boolean;
}
