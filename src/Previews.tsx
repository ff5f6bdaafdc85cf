import { useCurrentFrame, useVideoConfig } from "remotion";
import { useMemo } from "react";
import { generateMockSpectrum } from "./audio/mockSpectrum";
import { useVisualizerEngine } from "./visualizer/useVisualizerEngine";
import { RingCanvas } from "./CircularVisualizer";
import type { VisualizerConfigInput } from "./engine";

// Shared hook: the synthetic 128 BPM track through one engine
function useMockVisuals(config: VisualizerConfigInput) {
  const frame = useCurrentFrame();
  const { fps } = useVideoConfig();
  const time = frame / fps;
  const snapshot = useMemo(() => generateMockSpectrum(time), [time]);
  return useVisualizerEngine(snapshot, time, config);
}

const PreviewLabel: React.FC<{ text: string; isBeat: boolean }> = ({ text, isBeat }) => (
  <div
    style={{
      position: "absolute",
      top: 40,
      left: 40,
      color: isBeat ? "#fff" : "rgba(0, 220, 180, 0.8)",
      fontFamily: "'JetBrains Mono', monospace",
      fontSize: 28,
      letterSpacing: 4,
    }}
  >
    {text}
  </div>
);

const Preview: React.FC<{ label: string; config: VisualizerConfigInput }> = ({ label, config }) => {
  const visuals = useMockVisuals(config);
  return (
    <RingCanvas frame={visuals}>
      <PreviewLabel text={label} isBeat={visuals.isBeat} />
    </RingCanvas>
  );
};

const ROTATE: VisualizerConfigInput = {
  shuffle: { enabled: true, interval: 1, style: "rotate" },
};

const RANDOM: VisualizerConfigInput = {
  shuffle: { enabled: true, interval: 1, style: "random", seed: 7 },
};

const ANTI_STUCK: VisualizerConfigInput = {
  antiStuck: { enabled: true, threshold: 0.85, timeLimit: 1, baselineMemory: 1 },
};

const WIDEBAND: VisualizerConfigInput = {
  beat: { detection: { mode: "wideband" }, energyBoost: 2 },
};

const RHYTHM: VisualizerConfigInput = {
  rhythm: { enabled: true },
  shuffle: { enabled: true, style: "rotate" },
};

export const Preview_RotateShuffle: React.FC = () => <Preview label="ROTATE SHUFFLE" config={ROTATE} />;
export const Preview_RandomShuffle: React.FC = () => <Preview label="RANDOM SHUFFLE" config={RANDOM} />;
export const Preview_AntiStuck: React.FC = () => <Preview label="ANTI-STUCK" config={ANTI_STUCK} />;
export const Preview_WidebandBeat: React.FC = () => <Preview label="WIDEBAND BEAT" config={WIDEBAND} />;
export const Preview_Rhythm: React.FC = () => <Preview label="RHYTHM ADAPTATION" config={RHYTHM} />;
