import type { Random } from "./random";
import type { ShuffleStyle } from "./types";

/**
 * Which spectrum slot feeds which column. Always a permutation of [0, N).
 */
export class ColumnIndexMap {
  private readonly entries: Uint16Array;

  constructor(columns: number) {
    this.entries = new Uint16Array(columns);
    this.reset();
  }

  get length(): number {
    return this.entries.length;
  }

  toArray(): number[] {
    return Array.from(this.entries);
  }

  reset(): void {
    for (let i = 0; i < this.entries.length; i++) this.entries[i] = i;
  }

  /** Cyclic shift by one: the last entry wraps to the front */
  rotate(): void {
    const n = this.entries.length;
    if (n < 2) return;
    const last = this.entries[n - 1];
    this.entries.copyWithin(1, 0, n - 1);
    this.entries[0] = last;
  }

  /** In-place Fisher–Yates */
  shuffle(random: Random): void {
    for (let i = this.entries.length - 1; i > 0; i--) {
      const j = Math.floor(random() * (i + 1));
      const tmp = this.entries[i];
      this.entries[i] = this.entries[j];
      this.entries[j] = tmp;
    }
  }

  remap(style: ShuffleStyle, random: Random): void {
    if (style === "rotate") {
      this.rotate();
    } else {
      this.shuffle(random);
    }
  }

  /** Spectrum bin read by `column` for a frame of `binCount` bins */
  binFor(column: number, binCount: number): number {
    const bin = Math.floor((this.entries[column] * binCount) / this.entries.length);
    return Math.min(Math.max(bin, 0), Math.max(binCount - 1, 0));
  }
}

/**
 * Accumulates time and remaps the index map every `interval` seconds
 */
export class Shuffler {
  private timer = 0;

  constructor(
    private readonly map: ColumnIndexMap,
    private readonly random: Random
  ) {}

  get elapsed(): number {
    return this.timer;
  }

  /** Returns true when a remap happened this tick */
  update(dt: number, interval: number, style: ShuffleStyle): boolean {
    this.timer += dt;
    if (this.timer < interval) return false;
    this.map.remap(style, this.random);
    this.timer = 0;
    return true;
  }

  reset(): void {
    this.timer = 0;
  }
}
