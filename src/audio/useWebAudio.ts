import { useEffect, useRef, useState, useCallback } from "react";
import type { SpectrumSnapshot } from "./types";

export interface WebAudioSource {
  isPlaying: boolean;
  play: () => Promise<void>;
  pause: () => void;
  toggle: () => void;
  /**
   * Pull the analyser's current frame. The returned buffers are reused and
   * overwritten by the next call.
   */
  readSnapshot: () => SpectrumSnapshot;
}

interface UseWebAudioOptions {
  src: string;
  /** AnalyserNode fftSize; the spectrum has fftSize / 2 bins */
  fftSize?: number;
  visualLeadTime?: number; // seconds to delay audio (visuals react ahead)
}

const createBuffers = (binCount: number, fftSize: number) => ({
  bytes: new Uint8Array(binCount),
  spectrum: new Float32Array(binCount),
  waveform: new Float32Array(fftSize),
});

type AnalyserBuffers = ReturnType<typeof createBuffers>;

export function useWebAudio({
  src,
  fftSize = 1024,
  visualLeadTime = 0,
}: UseWebAudioOptions): WebAudioSource {
  const audioContextRef = useRef<AudioContext | null>(null);
  const analyserRef = useRef<AnalyserNode | null>(null);
  const audioElementRef = useRef<HTMLAudioElement | null>(null);
  const buffersRef = useRef<AnalyserBuffers>(createBuffers(fftSize / 2, fftSize));

  const [isPlaying, setIsPlaying] = useState(false);

  // Initialize audio context and analyser
  useEffect(() => {
    const audioElement = new Audio();
    audioElement.loop = true;
    audioElement.preload = "auto";
    audioElementRef.current = audioElement;

    // Log loading errors
    audioElement.addEventListener("error", () => {
      const err = audioElement.error;
      console.error("Audio error code:", err?.code, "message:", err?.message);
    });

    audioElement.addEventListener("canplaythrough", () => {
      console.log("Audio loaded and ready to play");
    });

    // Set src after adding listeners
    audioElement.src = src;
    audioElement.load();

    const audioContext = new AudioContext();
    audioContextRef.current = audioContext;

    const analyser = audioContext.createAnalyser();
    analyser.fftSize = fftSize;
    analyser.smoothingTimeConstant = 0;
    analyserRef.current = analyser;

    const source = audioContext.createMediaElementSource(audioElement);
    source.connect(analyser);

    // Delay audio output so visuals react ahead of sound
    if (visualLeadTime > 0) {
      const delayNode = audioContext.createDelay(visualLeadTime);
      delayNode.delayTime.value = visualLeadTime;
      analyser.connect(delayNode);
      delayNode.connect(audioContext.destination);
    } else {
      analyser.connect(audioContext.destination);
    }

    buffersRef.current = createBuffers(analyser.frequencyBinCount, analyser.fftSize);

    // Handle play/pause state
    audioElement.addEventListener("play", () => setIsPlaying(true));
    audioElement.addEventListener("pause", () => setIsPlaying(false));
    audioElement.addEventListener("ended", () => setIsPlaying(false));

    return () => {
      audioElement.pause();
      audioElement.removeAttribute("src");
      audioElement.load(); // Reset without triggering error
      source.disconnect();
      analyser.disconnect();
      analyserRef.current = null;
      audioContextRef.current = null;
      audioContext.close().catch((err: unknown) => console.error("AudioContext close error:", err));
    };
  }, [src, fftSize, visualLeadTime]);

  const readSnapshot = useCallback((): SpectrumSnapshot => {
    const analyser = analyserRef.current;
    const audioContext = audioContextRef.current;
    const audioElement = audioElementRef.current;
    const buffers = buffersRef.current;

    if (!analyser || !audioContext || !audioElement) {
      return {
        spectrum: buffers.spectrum.fill(0),
        waveform: buffers.waveform.fill(0),
        sampleRate: audioContext?.sampleRate ?? 44100,
        isProducingAudio: false,
      };
    }

    analyser.getByteFrequencyData(buffers.bytes);
    for (let i = 0; i < buffers.bytes.length; i++) {
      buffers.spectrum[i] = buffers.bytes[i] / 255; // Normalize to 0-1
    }
    analyser.getFloatTimeDomainData(buffers.waveform);

    return {
      spectrum: buffers.spectrum,
      waveform: buffers.waveform,
      sampleRate: audioContext.sampleRate,
      isProducingAudio: !audioElement.paused && !audioElement.ended,
    };
  }, []);

  const play = useCallback(async () => {
    const audioContext = audioContextRef.current;
    const audioElement = audioElementRef.current;

    if (!audioElement || !audioContext) {
      console.error("Audio not initialized");
      return;
    }

    try {
      if (audioContext.state === "suspended") {
        await audioContext.resume();
        console.log("AudioContext resumed");
      }
      await audioElement.play();
      console.log("Audio playing");
    } catch (err) {
      console.error("Play error:", err);
    }
  }, []);

  const pause = useCallback(() => {
    audioElementRef.current?.pause();
  }, []);

  const toggle = useCallback(() => {
    if (isPlaying) {
      pause();
    } else {
      void play();
    }
  }, [isPlaying, play, pause]);

  return {
    isPlaying,
    play,
    pause,
    toggle,
    readSnapshot,
  };
}
