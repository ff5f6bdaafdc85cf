export type ShuffleStyle = "rotate" | "random";

export type GainConfig =
  | { mode: "auto"; decaySpeed: number }
  | { mode: "manual"; sensitivity: number };

export type BeatDetectionMode =
  | { mode: "band"; minHz: number; maxHz: number }
  | { mode: "wideband" };

/** RGBA with channels in 0-1 */
export interface RGBA {
  r: number;
  g: number;
  b: number;
  a: number;
}

/** A palette entry: any CSS colour three.js can parse, or explicit RGBA */
export type PaletteColor = string | RGBA;

export interface ShuffleConfig {
  enabled: boolean;
  /** Seconds between remaps when rhythm adaptation is off */
  interval: number;
  style: ShuffleStyle;
  /** Seed for the random style, so runs are reproducible */
  seed: number;
}

export interface RhythmConfig {
  enabled: boolean;
  minSmoothingTime: number;
  maxSmoothingTime: number;
  minShuffleInterval: number;
  maxShuffleInterval: number;
  /** How fast the smoothed spread follows the current one (per second) */
  changeSpeed: number;
  /** Spread at or below which motion is calmest */
  spreadLow: number;
  /** Spread at or above which motion is snappiest */
  spreadHigh: number;
}

export interface AntiStuckConfig {
  enabled: boolean;
  /** Normalized intensity above which a column counts as pinned */
  threshold: number;
  /** Seconds a column may stay pinned before its floor starts rising */
  timeLimit: number;
  /** Seconds the floor takes to catch up (and to relax back) */
  baselineMemory: number;
}

export interface BeatConfig {
  detection: BeatDetectionMode;
  /** Rows added per unit of beat energy at the start of a pulse */
  energyBoost: number;
  thresholdRatio: number;
  /** Lerp factor applied to the reference energy each tick */
  decaySpeed: number;
  /** Pulse length in seconds */
  duration: number;
  /** Height smoothing time is multiplied by this while a pulse is active */
  pulseSmoothingFactor: number;
  minEnergyFloor: number;
  minBeatEnergy: number;
}

export interface VisualizerConfig {
  columns: number;
  rowsPerColumn: number;
  /** Spectrum length K the engine expects every tick */
  binCount: number;
  palette: PaletteColor[];
  /** Sample rate of the stream the spectrum came from, for Hz → bin conversion */
  sampleRate: number;
  attackSpeed: number;
  releaseSpeed: number;
  baselineSensitivity: number;
  gain: GainConfig;
  /** Auto-gain ceiling never drops below this */
  gainFloor: number;
  /** Palette steps per second */
  colorCycleSpeed: number;
  /** Height smoothing time (seconds) when rhythm adaptation is off */
  smoothingTime: number;
  /** Fade rate toward zero while nothing is playing (per second) */
  silenceFadeSpeed: number;
  shuffle: ShuffleConfig;
  rhythm: RhythmConfig;
  antiStuck: AntiStuckConfig;
  beat: BeatConfig;
}

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends unknown[]
    ? T[K]
    : T[K] extends object
      ? Partial<T[K]>
      : T[K];
};

/** What callers pass in: any subset, tagged variants replaced whole */
export type VisualizerConfigInput = Omit<DeepPartial<VisualizerConfig>, "gain" | "beat"> & {
  gain?: GainConfig;
  beat?: Omit<Partial<BeatConfig>, "detection"> & { detection?: BeatDetectionMode };
};

export interface ColumnState {
  smoothedIntensity: number;
  currentVisualHeight: number;
  heightVelocity: number;
  stuckTimer: number;
  falloffBaseline: number;
  falloffBaselineVelocity: number;
}

export interface GlobalState {
  maxObservedIntensity: number;
  colorCycleOffset: number;
  shuffleTimer: number;
  intensityVarianceSmoothed: number;
  prevEnergy: number;
  beatPulseTimer: number;
  lastBeatEnergy: number;
}

export type DegenerateInput = "short-frame" | "invalid-magnitude" | "silent-frame" | "invalid-delta";

/** One tick's worth of input */
export interface TickInput {
  spectrum: ArrayLike<number>;
  /** Time-domain samples, only read by wideband beat detection */
  waveform?: ArrayLike<number>;
  isProducingAudio: boolean;
  deltaTime: number;
}

export interface VisualizerFrame {
  columns: number;
  rows: number;
  /** Displayed height per column, in rows (0..rows) */
  heights: Float32Array;
  /** Activation per cell, column-major: index = column * rows + row */
  levels: Float32Array;
  colorIndices: Uint16Array;
  colors: RGBA[];
  isBeat: boolean;
  /** 1 at the start of a pulse, 0 when none is active */
  beatPulse: number;
  energy: number;
  smoothingTime: number;
  shuffleInterval: number;
  diagnostics: DegenerateInput[];
}
