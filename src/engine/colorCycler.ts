import { Color } from "three";
import type { PaletteColor, RGBA } from "./types";

/** Channels come back in three's linear working space, ready for materials */
export function toRGBA(input: PaletteColor): RGBA {
  if (typeof input !== "string") return { ...input };
  const color = new Color(input);
  return { r: color.r, g: color.g, b: color.b, a: 1 };
}

/**
 * Rotates palette slots around the columns at `speed` slots per second
 */
export class ColorCycler {
  offset = 0;
  private colors: RGBA[];

  constructor(palette: PaletteColor[]) {
    this.colors = palette.map(toRGBA);
  }

  setPalette(palette: PaletteColor[]): void {
    this.colors = palette.map(toRGBA);
    this.offset %= this.colors.length;
  }

  advance(speed: number, dt: number): void {
    const length = this.colors.length;
    // Wrapped so it never loses precision on long sessions
    this.offset = (((this.offset + speed * dt) % length) + length) % length;
  }

  indexFor(column: number): number {
    return (column + Math.floor(this.offset)) % this.colors.length;
  }

  colorFor(column: number): RGBA {
    return this.colors[this.indexFor(column)];
  }

  reset(): void {
    this.offset = 0;
  }
}
