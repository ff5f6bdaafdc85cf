import { useEffect, useState, useCallback } from "react";
import { Canvas } from "@react-three/fiber";
import * as THREE from "three";
import { useWebAudio } from "./audio/useWebAudio";
import { useVisualizerEngine } from "./visualizer/useVisualizerEngine";
import { VisualizerRing } from "./visualizer/VisualizerRing";
import { FFT_SIZE, RING_CONFIG } from "./visualizer/presets";

// Clock shared with the render loop, updated without React state
const sharedState = {
  time: performance.now() / 1000,
};

export const App: React.FC = () => {
  const [, forceUpdate] = useState(0);

  const { isPlaying, toggle, readSnapshot } = useWebAudio({
    src: "/music.wav",
    fftSize: FFT_SIZE,
    visualLeadTime: 0.05, // visuals react 50ms ahead of audio
  });

  // Re-render at display rate so the engine ticks every frame
  useEffect(() => {
    let animationId: number;

    const tick = (now: number) => {
      sharedState.time = now / 1000;
      forceUpdate((n) => n + 1);
      animationId = requestAnimationFrame(tick);
    };

    animationId = requestAnimationFrame(tick);
    return () => cancelAnimationFrame(animationId);
  }, []);

  const visuals = useVisualizerEngine(readSnapshot(), sharedState.time, RING_CONFIG);

  const handleClick = useCallback(() => {
    toggle();
  }, [toggle]);

  // Spacebar play/pause
  useEffect(() => {
    const handleKeyDown = (e: KeyboardEvent) => {
      if (e.code === "Space") {
        e.preventDefault();
        toggle();
      }
    };
    window.addEventListener("keydown", handleKeyDown);
    return () => window.removeEventListener("keydown", handleKeyDown);
  }, [toggle]);

  return (
    <div
      style={{ width: "100%", height: "100%", backgroundColor: "#000", position: "relative", cursor: "pointer" }}
      onClick={handleClick}
    >
      <Canvas
        camera={{ position: [0, 0, 8], fov: 60 }}
        gl={{
          antialias: true,
          alpha: false,
          powerPreference: "high-performance",
          toneMapping: THREE.ACESFilmicToneMapping,
          toneMappingExposure: 1.2,
        }}
      >
        <VisualizerRing frame={visuals} />
      </Canvas>

      {/* Play prompt */}
      {!isPlaying && (
        <div
          style={{
            position: "absolute",
            top: "50%",
            left: "50%",
            transform: "translate(-50%, -50%)",
            color: "rgba(0, 220, 180, 0.8)",
            fontFamily: "'JetBrains Mono', monospace",
            fontSize: "24px",
            letterSpacing: "4px",
            pointerEvents: "none",
          }}
        >
          CLICK TO START
        </div>
      )}
    </div>
  );
};
