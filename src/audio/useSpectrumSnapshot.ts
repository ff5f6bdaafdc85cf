import { useMemo } from "react";
import { useCurrentFrame, useVideoConfig } from "remotion";
import { useAudioData } from "@remotion/media-utils";
import { computeSpectrum, getSamplesForFrame } from "./fft";
import type { SpectrumSnapshot } from "./types";

export interface SpectrumSnapshotResult extends SpectrumSnapshot {
  /** Whether audio data is still loading */
  isLoading: boolean;
}

interface UseSpectrumSnapshotOptions {
  /** Path to audio file (use staticFile()) */
  src: string;
  /** FFT size, a power of two; the spectrum has fftSize / 2 bins. Default 1024 */
  fftSize?: number;
  /** Frame offset into the audio file (for trimming start) */
  frameOffset?: number;
}

const FALLBACK_SAMPLE_RATE = 44100;

/**
 * Spectrum of the audio file at the current video frame, computed with our
 * own FFT so offline renders see the same values the live AnalyserNode would.
 *
 * @example
 * ```tsx
 * const snapshot = useSpectrumSnapshot({ src: staticFile("music.wav"), fftSize: 1024 });
 * const visuals = useVisualizerEngine(snapshot, frame / fps, { binCount: 512 });
 * ```
 */
export function useSpectrumSnapshot({
  src,
  fftSize = 1024,
  frameOffset = 0,
}: UseSpectrumSnapshotOptions): SpectrumSnapshotResult {
  const frame = useCurrentFrame();
  const { fps } = useVideoConfig();
  const offsetFrame = frame + frameOffset;

  const audioData = useAudioData(src);

  return useMemo((): SpectrumSnapshotResult => {
    if (!audioData) {
      return {
        spectrum: new Float32Array(fftSize / 2),
        sampleRate: FALLBACK_SAMPLE_RATE,
        isProducingAudio: false,
        isLoading: true,
      };
    }

    const { sampleRate } = audioData;
    const channelData = audioData.channelWaveforms[0]; // Mono or left channel
    const startSample = Math.floor(offsetFrame * (sampleRate / fps));
    const waveform = getSamplesForFrame(channelData, sampleRate, offsetFrame, fps, fftSize);

    return {
      spectrum: computeSpectrum(waveform, fftSize),
      waveform,
      sampleRate,
      isProducingAudio: startSample >= 0 && startSample < channelData.length,
      isLoading: false,
    };
  }, [audioData, offsetFrame, fps, fftSize]);
}
