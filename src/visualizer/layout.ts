import { ConfigurationError, MAX_COLUMNS, MAX_ROWS } from "../engine";

/** One cell of the ring: an annular sector. Angles are in degrees. */
export interface CellGeometry {
  column: number;
  row: number;
  innerRadius: number;
  outerRadius: number;
  /** Where the sector starts, counter-clockwise from +x */
  startAngle: number;
  angularWidth: number;
}

export interface CircularLayoutOptions {
  columns: number;
  rows: number;
  innerRadius?: number;
  /** Radial distance between the inner edges of consecutive rows */
  radiusStep?: number;
  /** Radial thickness of each cell */
  barHeight?: number;
  /**
   * Share of the column's slot each row fills, so outer rows can taper.
   * Rows past the end of the array use 1.
   */
  rowAngularFactors?: number[];
}

export const DEFAULT_ROW_ANGULAR_FACTORS = [1, 0.95, 0.9, 0.85];

/**
 * Concentric ring layout: column c owns the slot [c·360/N, (c+1)·360/N) and
 * row r sits `r * radiusStep` further out, centred in that slot.
 *
 * Returns cells indexed [column][row].
 */
export function generateCircularLayout({
  columns,
  rows,
  innerRadius = 80,
  radiusStep = 50,
  barHeight = 40,
  rowAngularFactors = DEFAULT_ROW_ANGULAR_FACTORS,
}: CircularLayoutOptions): CellGeometry[][] {
  if (!Number.isInteger(columns) || columns < 1 || columns > MAX_COLUMNS) {
    throw new ConfigurationError("columns", `must be an integer in [1, ${MAX_COLUMNS}], got ${columns}`);
  }
  if (!Number.isInteger(rows) || rows < 1 || rows > MAX_ROWS) {
    throw new ConfigurationError("rows", `must be an integer in [1, ${MAX_ROWS}], got ${rows}`);
  }
  if (!(innerRadius >= 0) || !Number.isFinite(innerRadius)) {
    throw new ConfigurationError("innerRadius", `must be >= 0, got ${innerRadius}`);
  }
  if (!(radiusStep >= 0) || !Number.isFinite(radiusStep)) {
    throw new ConfigurationError("radiusStep", `must be >= 0, got ${radiusStep}`);
  }
  if (!(barHeight > 0) || !Number.isFinite(barHeight)) {
    throw new ConfigurationError("barHeight", `must be > 0, got ${barHeight}`);
  }
  rowAngularFactors.forEach((factor, i) => {
    if (!(factor > 0 && factor <= 1)) {
      throw new ConfigurationError(`rowAngularFactors[${i}]`, `must be in (0, 1], got ${factor}`);
    }
  });

  const increment = 360 / columns;

  return Array.from({ length: columns }, (_, column) =>
    Array.from({ length: rows }, (_, row): CellGeometry => {
      const angularWidth = increment * (rowAngularFactors[row] ?? 1);
      const inner = innerRadius + row * radiusStep;
      return {
        column,
        row,
        innerRadius: inner,
        outerRadius: inner + barHeight,
        startAngle: column * increment + (increment - angularWidth) / 2,
        angularWidth,
      };
    })
  );
}
