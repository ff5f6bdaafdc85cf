import {
  ConfigurationError,
  VisualizerEngine,
  resolveConfig,
  type DegenerateInput,
  type VisualizerConfigInput,
  type VisualizerFrame,
} from "../engine";
import type { SpectrumSnapshot } from "../audio/types";

const FIRST_TICK_DELTA = 1 / 60;

const DIAGNOSTIC_MESSAGES: Record<DegenerateInput, string> = {
  "short-frame": "spectrum has fewer bins than binCount; missing bins read as 0",
  "invalid-magnitude": "spectrum contains NaN, infinite or negative magnitudes; read as 0",
  "silent-frame": "source reports audio but every bin is 0",
  "invalid-delta": "time did not advance; tick skipped",
};

export interface DriverLogger {
  warn: (message: string) => void;
  error: (message: string) => void;
}

/**
 * Feeds an engine from a clock that may be scrubbed: ticks once per distinct
 * time, derives deltaTime from consecutive times, starts over when time jumps
 * backwards (Remotion renders frames out of order), and logs each kind of
 * degenerate input once. A new config object replaces the previous one
 * outright: fields it leaves out go back to their defaults.
 */
export class VisualizerDriver {
  private engine: VisualizerEngine | null = null;
  private config: VisualizerConfigInput | null = null;
  private lastTime = -Infinity;
  private frame: VisualizerFrame | null = null;
  private readonly warned = new Set<DegenerateInput>();

  constructor(private readonly logger: DriverLogger = console) {}

  update(snapshot: SpectrumSnapshot, time: number, config: VisualizerConfigInput): VisualizerFrame {
    const engine = this.prepare(snapshot, config);

    // Time went backwards - reset all state
    if (time < this.lastTime - 0.05) {
      engine.reset();
      this.lastTime = -Infinity;
      this.frame = null;
    }

    if (this.frame && time <= this.lastTime) return this.frame;

    const deltaTime = Number.isFinite(this.lastTime) ? time - this.lastTime : FIRST_TICK_DELTA;
    this.lastTime = time;

    const frame = engine.tick({
      spectrum: snapshot.spectrum,
      waveform: snapshot.waveform,
      isProducingAudio: snapshot.isProducingAudio,
      deltaTime,
    });
    this.report(frame.diagnostics);
    this.frame = frame;
    return frame;
  }

  getEngine(): VisualizerEngine | null {
    return this.engine;
  }

  private prepare(snapshot: SpectrumSnapshot, config: VisualizerConfigInput): VisualizerEngine {
    let engine = this.engine;
    if (!engine) {
      engine = new VisualizerEngine({ ...config, sampleRate: snapshot.sampleRate });
      this.engine = engine;
      this.config = config;
      return engine;
    }

    if (config !== this.config) {
      this.config = config;
      try {
        engine.configure({ ...resolveConfig(config), sampleRate: snapshot.sampleRate });
      } catch (err) {
        if (!(err instanceof ConfigurationError)) throw err;
        this.logger.error(`Visualizer config rejected, keeping the previous one: ${err.message}`);
      }
    }

    if (engine.getConfig().sampleRate !== snapshot.sampleRate) {
      engine.configure({ sampleRate: snapshot.sampleRate });
    }
    return engine;
  }

  private report(diagnostics: DegenerateInput[]): void {
    for (const kind of diagnostics) {
      if (this.warned.has(kind)) continue;
      this.warned.add(kind);
      this.logger.warn(`Visualizer input (${kind}): ${DIAGNOSTIC_MESSAGES[kind]}`);
    }
  }
}
