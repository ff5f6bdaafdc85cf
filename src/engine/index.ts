export { VisualizerEngine } from "./engine";
export { ConfigurationError } from "./errors";
export {
  DEFAULT_PALETTE,
  DEFAULT_VISUALIZER_CONFIG,
  MAX_COLUMNS,
  MAX_ROWS,
  resolveConfig,
  validateConfig,
} from "./config";
export { ColumnIndexMap, Shuffler } from "./indexMap";
export { bandToBins, bandEnergy, estimateEnergy, meanSquare } from "./bandEnergy";
export { BeatDetector } from "./beatDetector";
export { RhythmAdaptationController, spectralSpread } from "./rhythm";
export { AutoGain, followEnvelope } from "./envelope";
export { suppressStuck } from "./antiStuck";
export { mixBeatPulse, smoothHeight } from "./pulse";
export { ColorCycler, toRGBA } from "./colorCycler";
export { createSeededRandom } from "./random";
export type * from "./types";
