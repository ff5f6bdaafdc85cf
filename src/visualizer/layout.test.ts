import { describe, it, expect } from "vitest";
import { generateCircularLayout } from "./layout";
import { ConfigurationError } from "../engine";

describe("generateCircularLayout", () => {
  it("gives each column an equal slot and stacks rows outward", () => {
    const layout = generateCircularLayout({ columns: 4, rows: 2 });

    expect(layout).toHaveLength(4);
    expect(layout[0]).toHaveLength(2);
    expect(layout[0][0]).toEqual({
      column: 0,
      row: 0,
      innerRadius: 80,
      outerRadius: 120,
      startAngle: 0,
      angularWidth: 90,
    });
    const outer = layout[2][1];
    expect(outer).toMatchObject({ column: 2, row: 1, innerRadius: 130, outerRadius: 170 });
    expect(outer.angularWidth).toBeCloseTo(85.5, 10);
    expect(outer.startAngle).toBeCloseTo(182.25, 10);
  });

  it("centres tapered rows in their slot", () => {
    const layout = generateCircularLayout({
      columns: 6,
      rows: 3,
      rowAngularFactors: [1, 0.5],
    });
    const cell = layout[1][1];
    expect(cell.angularWidth).toBe(30);
    expect(cell.startAngle).toBe(75);
    expect(cell.startAngle + cell.angularWidth / 2).toBe(90);
    // no factor for row 2, so it fills the slot
    expect(layout[1][2].angularWidth).toBe(60);
  });

  it("honours custom radii", () => {
    const layout = generateCircularLayout({
      columns: 1,
      rows: 3,
      innerRadius: 0,
      radiusStep: 10,
      barHeight: 5,
    });
    expect(layout[0].map((c) => [c.innerRadius, c.outerRadius])).toEqual([
      [0, 5],
      [10, 15],
      [20, 25],
    ]);
  });

  it("rejects layouts it cannot draw", () => {
    const fieldOf = (run: () => void) => {
      try {
        run();
      } catch (err) {
        if (err instanceof ConfigurationError) return err.field;
        throw err;
      }
      return null;
    };

    expect(fieldOf(() => generateCircularLayout({ columns: 0, rows: 4 }))).toBe("columns");
    expect(fieldOf(() => generateCircularLayout({ columns: 4, rows: 21 }))).toBe("rows");
    expect(fieldOf(() => generateCircularLayout({ columns: 4, rows: 4, barHeight: 0 }))).toBe("barHeight");
    expect(fieldOf(() => generateCircularLayout({ columns: 4, rows: 4, innerRadius: -1 }))).toBe("innerRadius");
    expect(fieldOf(() => generateCircularLayout({ columns: 4, rows: 4, rowAngularFactors: [1, 1.2] }))).toBe(
      "rowAngularFactors[1]"
    );
  });
});
