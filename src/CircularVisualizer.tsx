import { ThreeCanvas } from "@remotion/three";
import { useCurrentFrame, useVideoConfig, staticFile } from "remotion";
import { Audio } from "@remotion/media";
import * as THREE from "three";
import { useEffect, useState } from "react";
import { useSpectrumSnapshot } from "./audio/useSpectrumSnapshot";
import { useVisualizerEngine } from "./visualizer/useVisualizerEngine";
import { VisualizerRing } from "./visualizer/VisualizerRing";
import { FFT_SIZE, RING_CONFIG } from "./visualizer/presets";
import type { VisualizerFrame } from "./engine";

const AUDIO_SRC = staticFile("music.wav");

/**
 * Shown when no audio file is found in public/
 */
const MissingAudioMessage: React.FC = () => (
  <div
    style={{
      width: "100%",
      height: "100%",
      backgroundColor: "#0a0a0f",
      display: "flex",
      alignItems: "center",
      justifyContent: "center",
      fontFamily: "system-ui, -apple-system, sans-serif",
    }}
  >
    <div style={{ textAlign: "center", color: "#fff", padding: 40 }}>
      <div style={{ fontSize: 48, marginBottom: 24 }}>No Audio File Found</div>
      <div style={{ fontSize: 20, color: "#888", lineHeight: 1.6 }}>
        Add a file named <code style={{ color: "#0ff", background: "#1a1a2e", padding: "2px 8px", borderRadius: 4 }}>music.wav</code> to the <code style={{ color: "#0ff", background: "#1a1a2e", padding: "2px 8px", borderRadius: 4 }}>public/</code> folder
      </div>
    </div>
  </div>
);

/**
 * Canvas + camera shared by every ring composition
 */
export const RingCanvas: React.FC<{ frame: VisualizerFrame; children?: React.ReactNode }> = ({
  frame,
  children,
}) => {
  const { width, height } = useVideoConfig();

  return (
    <div style={{ backgroundColor: "#000", position: "relative", width: "100%", height: "100%" }}>
      <ThreeCanvas
        width={width}
        height={height}
        camera={{ position: [0, 0, 8], fov: 60 }}
        gl={{
          antialias: true,
          alpha: false,
          powerPreference: "high-performance",
          toneMapping: THREE.ACESFilmicToneMapping,
          toneMappingExposure: 1.2,
        }}
      >
        <VisualizerRing frame={frame} />
      </ThreeCanvas>
      {children}
    </div>
  );
};

const RingFromAudio: React.FC = () => {
  const frame = useCurrentFrame();
  const { fps } = useVideoConfig();

  const snapshot = useSpectrumSnapshot({ src: AUDIO_SRC, fftSize: FFT_SIZE });
  const visuals = useVisualizerEngine(snapshot, frame / fps, RING_CONFIG);

  return (
    <RingCanvas frame={visuals}>
      <Audio src={AUDIO_SRC} />
    </RingCanvas>
  );
};

/**
 * Main composition: the ring driven by public/music.wav
 */
export const CircularVisualizer: React.FC = () => {
  const [audioExists, setAudioExists] = useState<boolean | null>(null);

  useEffect(() => {
    fetch(AUDIO_SRC, { method: "HEAD" })
      .then((res) => setAudioExists(res.ok))
      .catch((err: unknown) => {
        console.error("Audio check failed:", err);
        setAudioExists(false);
      });
  }, []);

  if (audioExists === false) {
    return <MissingAudioMessage />;
  }

  return <RingFromAudio />;
};
