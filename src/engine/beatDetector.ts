import { lerp } from "./math";

export interface BeatDetectorOptions {
  thresholdRatio: number;
  /** Lerp factor toward the current energy, applied once per tick */
  decaySpeed: number;
  /** Pulse length in seconds */
  duration: number;
  minEnergyFloor: number;
  minBeatEnergy: number;
}

export interface BeatResult {
  isBeat: boolean;
  threshold: number;
}

/**
 * Adaptive-threshold beat detector.
 *
 * Keeps an exponential reference of recent energy; a tick whose energy
 * exceeds `reference * thresholdRatio` (and `minBeatEnergy`) is a beat and
 * restarts the pulse timer. The first observation above `minEnergyFloor`
 * only primes the reference; silent ticks before it are ignored.
 */
export class BeatDetector {
  prevEnergy: number;
  lastBeatEnergy = 0;
  pulseTimer = 0;
  private primed = false;

  constructor(private options: BeatDetectorOptions) {
    this.prevEnergy = options.minEnergyFloor;
  }

  setOptions(options: BeatDetectorOptions): void {
    this.options = options;
    this.prevEnergy = Math.max(this.prevEnergy, options.minEnergyFloor);
  }

  detect(energy: number): BeatResult {
    const { thresholdRatio, decaySpeed, duration, minEnergyFloor, minBeatEnergy } = this.options;

    if (!this.primed) {
      if (energy > minEnergyFloor) {
        this.primed = true;
        this.prevEnergy = energy;
      }
      return { isBeat: false, threshold: Math.max(this.prevEnergy * thresholdRatio, minBeatEnergy) };
    }

    this.prevEnergy = Math.max(lerp(this.prevEnergy, energy, decaySpeed), minEnergyFloor);
    const threshold = Math.max(this.prevEnergy * thresholdRatio, minBeatEnergy);
    const isBeat = energy > threshold;

    if (isBeat) {
      this.lastBeatEnergy = energy;
      this.pulseTimer = duration;
    }

    return { isBeat, threshold };
  }

  /** 1 → 0 over the pulse; 0 when no pulse is running */
  get pulseFactor(): number {
    return this.pulseTimer > 0 ? Math.min(1, this.pulseTimer / this.options.duration) : 0;
  }

  get isPulsing(): boolean {
    return this.pulseTimer > 0;
  }

  advance(dt: number): void {
    this.pulseTimer = Math.max(0, this.pulseTimer - dt);
  }

  reset(): void {
    this.primed = false;
    this.prevEnergy = this.options.minEnergyFloor;
    this.lastBeatEnergy = 0;
    this.pulseTimer = 0;
  }
}
