import { describe, it, expect } from "vitest";
import { buildArcGeometry } from "./arcGeometry";
import type { CellGeometry } from "./layout";
import { ConfigurationError } from "../engine";

const cell: CellGeometry = {
  column: 0,
  row: 0,
  innerRadius: 1,
  outerRadius: 2,
  startAngle: 0,
  angularWidth: 90,
};

describe("buildArcGeometry", () => {
  it("emits four vertices and two triangles per segment", () => {
    const geometry = buildArcGeometry(cell, 10);
    expect(geometry.getAttribute("position").count).toBe(40);
    expect(geometry.getIndex()?.count).toBe(60);
  });

  it("places vertices on the inner and outer radius", () => {
    const position = buildArcGeometry(cell, 4).getAttribute("position");
    for (let i = 0; i < position.count; i++) {
      const radius = Math.hypot(position.getX(i), position.getY(i));
      expect(radius).toBeCloseTo(i % 2 === 0 ? 1 : 2, 5);
      expect(position.getZ(i)).toBe(0);
    }
  });

  it("spans the sector from its start angle", () => {
    const position = buildArcGeometry(cell, 2).getAttribute("position");
    // first inner corner sits on +x, last outer corner on +y
    expect(position.getX(0)).toBeCloseTo(1, 5);
    expect(position.getY(0)).toBeCloseTo(0, 5);
    expect(position.getX(7)).toBeCloseTo(0, 5);
    expect(position.getY(7)).toBeCloseTo(2, 5);
  });

  it("winds triangles to face +Z", () => {
    const geometry = buildArcGeometry(cell, 3);
    const position = geometry.getAttribute("position");
    const index = geometry.getIndex();
    expect(index).not.toBeNull();
    if (!index) return;

    for (let t = 0; t < index.count; t += 3) {
      const [a, b, c] = [index.getX(t), index.getX(t + 1), index.getX(t + 2)];
      const abx = position.getX(b) - position.getX(a);
      const aby = position.getY(b) - position.getY(a);
      const acx = position.getX(c) - position.getX(a);
      const acy = position.getY(c) - position.getY(a);
      expect(abx * acy - aby * acx).toBeGreaterThan(0);
    }
  });

  it("needs at least one segment", () => {
    expect(() => buildArcGeometry(cell, 0)).toThrow(ConfigurationError);
  });
});
