import { suppressStuck } from "./antiStuck";
import { estimateEnergy } from "./bandEnergy";
import { BeatDetector, type BeatDetectorOptions } from "./beatDetector";
import { ColorCycler } from "./colorCycler";
import { resolveConfig, validateConfig } from "./config";
import { AutoGain, followEnvelope } from "./envelope";
import { ColumnIndexMap, Shuffler } from "./indexMap";
import { clamp01, lerpClamped, type SpringState } from "./math";
import { mixBeatPulse, smoothHeight } from "./pulse";
import { createSeededRandom } from "./random";
import { RhythmAdaptationController, spectralSpread, type RhythmTuning } from "./rhythm";
import type {
  ColumnState,
  DegenerateInput,
  GlobalState,
  RGBA,
  TickInput,
  VisualizerConfig,
  VisualizerConfigInput,
  VisualizerFrame,
} from "./types";

const createColumnState = (): ColumnState => ({
  smoothedIntensity: 0,
  currentVisualHeight: 0,
  heightVelocity: 0,
  stuckTimer: 0,
  falloffBaseline: 0,
  falloffBaselineVelocity: 0,
});

const beatOptions = (config: VisualizerConfig): BeatDetectorOptions => ({
  thresholdRatio: config.beat.thresholdRatio,
  decaySpeed: config.beat.decaySpeed,
  duration: config.beat.duration,
  minEnergyFloor: config.beat.minEnergyFloor,
  minBeatEnergy: config.beat.minBeatEnergy,
});

/** Everything sized by the layout; rebuilt whenever columns, rows or bins change */
interface Grid {
  columns: ColumnState[];
  indexMap: ColumnIndexMap;
  shuffler: Shuffler;
  spectrum: Float32Array;
  rawIntensities: Float32Array;
  frame: VisualizerFrame;
}

const needsRelayout = (prev: VisualizerConfig, next: VisualizerConfig) =>
  prev.columns !== next.columns ||
  prev.rowsPerColumn !== next.rowsPerColumn ||
  prev.binCount !== next.binCount;

/**
 * Audio-reactive driver for a columns × rows grid of cells.
 *
 * Call `tick` once per animation frame with the latest spectrum. Every stage
 * runs synchronously over buffers sized when the layout is set, so the whole
 * pipeline is a deterministic function of its inputs and can be replayed from
 * recorded frames.
 *
 * @example
 * ```ts
 * const engine = new VisualizerEngine({ columns: 16, rowsPerColumn: 6 });
 * const frame = engine.tick({ spectrum, isProducingAudio: true, deltaTime: 1 / 60 });
 * const level = engine.activationLevel(3, 0);
 * ```
 */
export class VisualizerEngine {
  private config: VisualizerConfig;
  private grid: Grid;
  private readonly gain: AutoGain;
  private readonly beat: BeatDetector;
  private readonly rhythm = new RhythmAdaptationController();
  private readonly colors: ColorCycler;
  private tuning: RhythmTuning;

  constructor(input: VisualizerConfigInput = {}) {
    this.config = validateConfig(resolveConfig(input));
    this.gain = new AutoGain(this.config.gainFloor);
    this.beat = new BeatDetector(beatOptions(this.config));
    this.colors = new ColorCycler(this.config.palette);
    this.tuning = this.baseTuning();
    this.grid = this.createGrid();
  }

  getConfig(): VisualizerConfig {
    return this.config;
  }

  /**
   * Apply a partial update between ticks. Throws ConfigurationError and keeps
   * the current configuration if the result is invalid. Changing the column,
   * row or bin count re-lays the grid and clears all per-column state.
   */
  configure(input: VisualizerConfigInput): void {
    const next = validateConfig(resolveConfig(input, this.config));
    const prev = this.config;
    this.config = next;

    this.gain.setFloor(next.gainFloor);
    this.beat.setOptions(beatOptions(next));
    if (next.palette !== prev.palette) this.colors.setPalette(next.palette);
    if (!next.rhythm.enabled) this.tuning = this.baseTuning();
    if (needsRelayout(prev, next)) {
      this.grid = this.createGrid();
    } else if (next.shuffle.seed !== prev.shuffle.seed) {
      this.grid.shuffler = new Shuffler(this.grid.indexMap, createSeededRandom(next.shuffle.seed));
    }
  }

  /** Back to the state right after construction, keeping the configuration */
  reset(): void {
    this.gain.reset();
    this.beat.reset();
    this.rhythm.reset();
    this.colors.reset();
    this.tuning = this.baseTuning();
    this.grid = this.createGrid();
  }

  /**
   * Advance one frame. The returned frame is reused: it stays valid until the
   * next `tick`, `configure` or `reset`.
   */
  tick(input: TickInput): VisualizerFrame {
    const dt = input.deltaTime;
    if (!Number.isFinite(dt) || dt <= 0) {
      this.grid.frame.isBeat = false;
      this.grid.frame.diagnostics = ["invalid-delta"];
      return this.grid.frame;
    }

    const diagnostics: DegenerateInput[] = [];
    const mean = this.readSpectrum(input.spectrum, diagnostics);

    let isBeat = false;
    let energy = 0;
    if (input.isProducingAudio) {
      if (mean === 0) diagnostics.push("silent-frame");
      const result = this.process(input, mean, dt);
      isBeat = result.isBeat;
      energy = result.energy;
    } else {
      this.fadeOut(dt);
    }

    this.colors.advance(this.config.colorCycleSpeed, dt);
    this.writeFrame(isBeat, energy, diagnostics);
    this.beat.advance(dt);
    return this.grid.frame;
  }

  /** clamp01(height − row): lit below the column's height, dark above it */
  activationLevel(column: number, row: number): number {
    this.checkColumn(column);
    const rows = this.config.rowsPerColumn;
    if (!Number.isInteger(row) || row < 0 || row >= rows) {
      throw new RangeError(`row must be an integer in [0, ${rows}), got ${row}`);
    }
    return this.grid.frame.levels[column * rows + row];
  }

  /** A copy of the column's current colour */
  color(column: number): RGBA {
    this.checkColumn(column);
    return { ...this.grid.frame.colors[column] };
  }

  getColumnState(column: number): Readonly<ColumnState> {
    return { ...this.grid.columns[column] };
  }

  getGlobalState(): GlobalState {
    return {
      maxObservedIntensity: this.gain.maxObservedIntensity,
      colorCycleOffset: this.colors.offset,
      shuffleTimer: this.grid.shuffler.elapsed,
      intensityVarianceSmoothed: this.rhythm.smoothedSpread,
      prevEnergy: this.beat.prevEnergy,
      beatPulseTimer: this.beat.pulseTimer,
      lastBeatEnergy: this.beat.lastBeatEnergy,
    };
  }

  getIndexMap(): number[] {
    return this.grid.indexMap.toArray();
  }

  private checkColumn(column: number): void {
    const columns = this.config.columns;
    if (!Number.isInteger(column) || column < 0 || column >= columns) {
      throw new RangeError(`column must be an integer in [0, ${columns}), got ${column}`);
    }
  }

  private baseTuning(): RhythmTuning {
    return { smoothingTime: this.config.smoothingTime, shuffleInterval: this.config.shuffle.interval };
  }

  private createGrid(): Grid {
    const { columns, rowsPerColumn, binCount, shuffle } = this.config;
    const indexMap = new ColumnIndexMap(columns);
    this.beat.reset();

    const grid: Grid = {
      columns: Array.from({ length: columns }, createColumnState),
      indexMap,
      shuffler: new Shuffler(indexMap, createSeededRandom(shuffle.seed)),
      spectrum: new Float32Array(binCount),
      rawIntensities: new Float32Array(columns),
      frame: {
        columns,
        rows: rowsPerColumn,
        heights: new Float32Array(columns),
        levels: new Float32Array(columns * rowsPerColumn),
        colorIndices: new Uint16Array(columns),
        colors: Array.from({ length: columns }, () => ({ r: 0, g: 0, b: 0, a: 0 })),
        isBeat: false,
        beatPulse: 0,
        energy: 0,
        smoothingTime: this.tuning.smoothingTime,
        shuffleInterval: this.tuning.shuffleInterval,
        diagnostics: [],
      },
    };
    this.fillFrame(grid, false, 0, []);
    return grid;
  }

  /** Copy the frame into the engine's buffer, repairing it on the way. Returns the mean. */
  private readSpectrum(source: ArrayLike<number>, diagnostics: DegenerateInput[]): number {
    const spectrum = this.grid.spectrum;
    if (source.length < spectrum.length) diagnostics.push("short-frame");

    let invalid = false;
    let sum = 0;
    for (let i = 0; i < spectrum.length; i++) {
      const v = i < source.length ? source[i] : 0;
      if (Number.isFinite(v) && v >= 0) {
        spectrum[i] = v;
        sum += v;
      } else {
        spectrum[i] = 0;
        invalid = true;
      }
    }
    if (invalid) diagnostics.push("invalid-magnitude");
    return sum / spectrum.length;
  }

  private process(input: TickInput, mean: number, dt: number): { isBeat: boolean; energy: number } {
    const config = this.config;
    const rows = config.rowsPerColumn;
    const { spectrum, columns, indexMap, shuffler, rawIntensities } = this.grid;

    if (config.rhythm.enabled) {
      this.tuning = this.rhythm.update(spectralSpread(spectrum, mean), dt, config.rhythm);
    }

    if (config.shuffle.enabled) {
      shuffler.update(dt, this.tuning.shuffleInterval, config.shuffle.style);
    }

    const energy = estimateEnergy(config.beat.detection, spectrum, config.sampleRate, input.waveform);
    const { isBeat } = this.beat.detect(energy);

    const baseline = mean * config.baselineSensitivity;
    const manualGain = config.gain.mode === "manual" ? config.gain.sensitivity : 1;
    let frameMax = 0;
    for (let c = 0; c < columns.length; c++) {
      const raw = Math.max(spectrum[indexMap.binFor(c, spectrum.length)] * manualGain, baseline);
      rawIntensities[c] = raw;
      if (raw > frameMax) frameMax = raw;
    }

    if (config.gain.mode === "auto") this.gain.observe(frameMax);

    const pulseFactor = this.beat.pulseFactor;
    const smoothingTime = this.beat.isPulsing
      ? this.tuning.smoothingTime * config.beat.pulseSmoothingFactor
      : this.tuning.smoothingTime;

    for (let c = 0; c < columns.length; c++) {
      const column = columns[c];
      column.smoothedIntensity = followEnvelope(
        column.smoothedIntensity,
        rawIntensities[c],
        config.attackSpeed,
        config.releaseSpeed,
        dt
      );

      const normalized = this.normalize(column.smoothedIntensity);
      const display = config.antiStuck.enabled
        ? suppressStuck(column, normalized, config.antiStuck, dt)
        : normalized;

      // The pulse bonus goes on after suppression, so it is never floored away
      const target = mixBeatPulse(
        display * rows,
        this.beat.lastBeatEnergy,
        config.beat.energyBoost,
        pulseFactor,
        rows
      );
      this.smoothColumn(column, target, smoothingTime, dt);
    }

    if (config.gain.mode === "auto") this.gain.decay(config.gain.decaySpeed, dt);

    return { isBeat, energy };
  }

  /** Nothing playing: ease every column to zero instead of freezing */
  private fadeOut(dt: number): void {
    const config = this.config;
    const rows = config.rowsPerColumn;
    const fade = config.silenceFadeSpeed * dt;

    for (const column of this.grid.columns) {
      column.smoothedIntensity = lerpClamped(column.smoothedIntensity, 0, fade);
      const target = mixBeatPulse(
        this.normalize(column.smoothedIntensity) * rows,
        this.beat.lastBeatEnergy,
        config.beat.energyBoost,
        this.beat.pulseFactor,
        rows
      );
      this.smoothColumn(column, target, this.tuning.smoothingTime, dt);
    }
  }

  private normalize(intensity: number): number {
    return this.config.gain.mode === "auto" ? this.gain.normalize(intensity) : clamp01(intensity);
  }

  private smoothColumn(column: ColumnState, target: number, smoothingTime: number, dt: number): void {
    const height: SpringState = { value: column.currentVisualHeight, velocity: column.heightVelocity };
    smoothHeight(height, target, smoothingTime, this.config.rowsPerColumn, dt);
    column.currentVisualHeight = height.value;
    column.heightVelocity = height.velocity;
  }

  private writeFrame(isBeat: boolean, energy: number, diagnostics: DegenerateInput[]): void {
    this.fillFrame(this.grid, isBeat, energy, diagnostics);
  }

  private fillFrame(grid: Grid, isBeat: boolean, energy: number, diagnostics: DegenerateInput[]): void {
    const frame = grid.frame;
    const rows = this.config.rowsPerColumn;

    for (let c = 0; c < grid.columns.length; c++) {
      const height = grid.columns[c].currentVisualHeight;
      frame.heights[c] = height;
      for (let r = 0; r < rows; r++) {
        frame.levels[c * rows + r] = clamp01(height - r);
      }
      frame.colorIndices[c] = this.colors.indexFor(c);
      // Copied so writes to the frame never reach the palette
      const source = this.colors.colorFor(c);
      const target = frame.colors[c];
      target.r = source.r;
      target.g = source.g;
      target.b = source.b;
      target.a = source.a;
    }

    frame.isBeat = isBeat;
    frame.beatPulse = this.beat.pulseFactor;
    frame.energy = energy;
    frame.smoothingTime = this.tuning.smoothingTime;
    frame.shuffleInterval = this.tuning.shuffleInterval;
    frame.diagnostics = diagnostics;
  }
}
