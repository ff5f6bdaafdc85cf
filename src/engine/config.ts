import { ConfigurationError } from "./errors";
import type { VisualizerConfig, VisualizerConfigInput } from "./types";

export const MAX_COLUMNS = 100;
export const MAX_ROWS = 20;
export const MAX_BINS = 32768;

/**
 * Neon palette, one colour per column for the default 12-column ring
 */
export const DEFAULT_PALETTE = [
  "#ff0080",
  "#ff2a55",
  "#ff6a00",
  "#ffb300",
  "#e5ff00",
  "#6bff3a",
  "#00ff9c",
  "#00ffe1",
  "#00b3ff",
  "#2a5bff",
  "#7a2aff",
  "#d400ff",
];

/**
 * Tuned for spectra normalized to 0-1 (the Web Audio dB range), which is what
 * every provider in src/audio produces.
 */
export const DEFAULT_VISUALIZER_CONFIG: VisualizerConfig = {
  columns: 12,
  rowsPerColumn: 4,
  binCount: 512,
  palette: DEFAULT_PALETTE,
  sampleRate: 44100,
  attackSpeed: 25,
  releaseSpeed: 1.5,
  baselineSensitivity: 0.5,
  gain: { mode: "auto", decaySpeed: 0.5 },
  gainFloor: 0.001,
  colorCycleSpeed: 0.5,
  smoothingTime: 0.12,
  silenceFadeSpeed: 10,
  shuffle: {
    enabled: false,
    interval: 4,
    style: "rotate",
    seed: 1,
  },
  rhythm: {
    enabled: false,
    minSmoothingTime: 0.05,
    maxSmoothingTime: 0.25,
    minShuffleInterval: 2,
    maxShuffleInterval: 10,
    changeSpeed: 1.5,
    spreadLow: 0.05,
    spreadHigh: 0.3,
  },
  antiStuck: {
    enabled: false,
    threshold: 0.9,
    timeLimit: 2,
    baselineMemory: 1.5,
  },
  beat: {
    detection: { mode: "band", minHz: 60, maxHz: 120 }, // kick fundamental
    energyBoost: 1.5,
    thresholdRatio: 1.3,
    decaySpeed: 0.1,
    duration: 0.2,
    pulseSmoothingFactor: 0.35,
    minEnergyFloor: 1e-4,
    minBeatEnergy: 0.01,
  },
};

/**
 * Merge a partial configuration over a base (the defaults, or the config an
 * engine is already running with). Tagged variants are replaced, not merged.
 */
export function resolveConfig(
  input: VisualizerConfigInput = {},
  base: VisualizerConfig = DEFAULT_VISUALIZER_CONFIG
): VisualizerConfig {
  const { shuffle, rhythm, antiStuck, beat, gain, palette, ...scalars } = input;
  return {
    ...base,
    ...scalars,
    palette: palette ?? base.palette,
    gain: gain ?? base.gain,
    shuffle: { ...base.shuffle, ...shuffle },
    rhythm: { ...base.rhythm, ...rhythm },
    antiStuck: { ...base.antiStuck, ...antiStuck },
    beat: { ...base.beat, ...beat },
  };
}

const requireFinite = (field: string, value: number) => {
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(field, `expected a finite number, got ${value}`);
  }
};

const requirePositive = (field: string, value: number) => {
  requireFinite(field, value);
  if (value <= 0) throw new ConfigurationError(field, `must be > 0, got ${value}`);
};

const requireNonNegative = (field: string, value: number) => {
  requireFinite(field, value);
  if (value < 0) throw new ConfigurationError(field, `must be >= 0, got ${value}`);
};

const requireIntInRange = (field: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(field, `must be an integer in [${min}, ${max}], got ${value}`);
  }
};

const requireOrdered = (lowField: string, low: number, highField: string, high: number) => {
  if (low > high) {
    throw new ConfigurationError(lowField, `must not exceed ${highField} (${low} > ${high})`);
  }
};

/**
 * Throws ConfigurationError on the first unusable field
 */
export function validateConfig(config: VisualizerConfig): VisualizerConfig {
  requireIntInRange("columns", config.columns, 1, MAX_COLUMNS);
  requireIntInRange("rowsPerColumn", config.rowsPerColumn, 1, MAX_ROWS);
  requireIntInRange("binCount", config.binCount, 1, MAX_BINS);

  if (config.palette.length < config.columns) {
    throw new ConfigurationError(
      "palette",
      `needs at least one colour per column (${config.palette.length} < ${config.columns})`
    );
  }

  requirePositive("sampleRate", config.sampleRate);
  requirePositive("attackSpeed", config.attackSpeed);
  requirePositive("releaseSpeed", config.releaseSpeed);
  requireNonNegative("baselineSensitivity", config.baselineSensitivity);
  requirePositive("gainFloor", config.gainFloor);
  requireFinite("colorCycleSpeed", config.colorCycleSpeed);
  requirePositive("smoothingTime", config.smoothingTime);
  requirePositive("silenceFadeSpeed", config.silenceFadeSpeed);

  if (config.gain.mode === "auto") {
    requireNonNegative("gain.decaySpeed", config.gain.decaySpeed);
  } else {
    requireNonNegative("gain.sensitivity", config.gain.sensitivity);
  }

  const { shuffle, rhythm, antiStuck, beat } = config;
  requirePositive("shuffle.interval", shuffle.interval);
  if (!Number.isInteger(shuffle.seed)) {
    throw new ConfigurationError("shuffle.seed", `must be an integer, got ${shuffle.seed}`);
  }

  requirePositive("rhythm.minSmoothingTime", rhythm.minSmoothingTime);
  requirePositive("rhythm.maxSmoothingTime", rhythm.maxSmoothingTime);
  requireOrdered("rhythm.minSmoothingTime", rhythm.minSmoothingTime, "rhythm.maxSmoothingTime", rhythm.maxSmoothingTime);
  requirePositive("rhythm.minShuffleInterval", rhythm.minShuffleInterval);
  requirePositive("rhythm.maxShuffleInterval", rhythm.maxShuffleInterval);
  requireOrdered("rhythm.minShuffleInterval", rhythm.minShuffleInterval, "rhythm.maxShuffleInterval", rhythm.maxShuffleInterval);
  requirePositive("rhythm.changeSpeed", rhythm.changeSpeed);
  requireNonNegative("rhythm.spreadLow", rhythm.spreadLow);
  requireFinite("rhythm.spreadHigh", rhythm.spreadHigh);
  if (rhythm.spreadHigh <= rhythm.spreadLow) {
    throw new ConfigurationError("rhythm.spreadHigh", "must be greater than rhythm.spreadLow");
  }

  requireNonNegative("antiStuck.threshold", antiStuck.threshold);
  requireNonNegative("antiStuck.timeLimit", antiStuck.timeLimit);
  requirePositive("antiStuck.baselineMemory", antiStuck.baselineMemory);

  if (beat.detection.mode === "band") {
    requireNonNegative("beat.detection.minHz", beat.detection.minHz);
    requireFinite("beat.detection.maxHz", beat.detection.maxHz);
    if (beat.detection.minHz >= beat.detection.maxHz) {
      throw new ConfigurationError(
        "beat.detection.minHz",
        `must be below maxHz (${beat.detection.minHz} >= ${beat.detection.maxHz})`
      );
    }
  }
  requireNonNegative("beat.energyBoost", beat.energyBoost);
  requirePositive("beat.thresholdRatio", beat.thresholdRatio);
  requireNonNegative("beat.decaySpeed", beat.decaySpeed);
  if (beat.decaySpeed > 1) {
    throw new ConfigurationError("beat.decaySpeed", `is a lerp factor and must be <= 1, got ${beat.decaySpeed}`);
  }
  requirePositive("beat.duration", beat.duration);
  requirePositive("beat.pulseSmoothingFactor", beat.pulseSmoothingFactor);
  requirePositive("beat.minEnergyFloor", beat.minEnergyFloor);
  requireNonNegative("beat.minBeatEnergy", beat.minBeatEnergy);

  return config;
}
