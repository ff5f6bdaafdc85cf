import type { VisualizerConfigInput } from "../engine";

export const FFT_SIZE = 1024;

/** Ring used by the main composition and the live app */
export const RING_CONFIG: VisualizerConfigInput = {
  columns: 12,
  rowsPerColumn: 4,
  binCount: FFT_SIZE / 2,
  shuffle: { enabled: true, style: "rotate" },
  rhythm: { enabled: true },
  antiStuck: { enabled: true },
};
