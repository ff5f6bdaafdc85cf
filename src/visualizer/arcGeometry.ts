import * as THREE from "three";
import { ConfigurationError } from "../engine";
import type { CellGeometry } from "./layout";

/**
 * Flat annular sector in the XY plane, built from `segments` quads
 * (4 vertices, 2 triangles each) facing +Z.
 */
export function buildArcGeometry(cell: CellGeometry, segments = 10): THREE.BufferGeometry {
  if (!Number.isInteger(segments) || segments < 1) {
    throw new ConfigurationError("segments", `must be a positive integer, got ${segments}`);
  }

  const positions = new Float32Array(segments * 4 * 3);
  const normals = new Float32Array(segments * 4 * 3);
  const uvs = new Float32Array(segments * 4 * 2);
  const indices: number[] = [];

  const start = THREE.MathUtils.degToRad(cell.startAngle);
  const step = THREE.MathUtils.degToRad(cell.angularWidth) / segments;

  for (let s = 0; s < segments; s++) {
    const a0 = start + s * step;
    const a1 = a0 + step;
    const base = s * 4;

    // inner a0, outer a0, inner a1, outer a1
    const corners: Array<[number, number, number]> = [
      [cell.innerRadius, a0, 0],
      [cell.outerRadius, a0, 1],
      [cell.innerRadius, a1, 0],
      [cell.outerRadius, a1, 1],
    ];
    corners.forEach(([radius, angle, v], k) => {
      const i = base + k;
      positions[i * 3] = Math.cos(angle) * radius;
      positions[i * 3 + 1] = Math.sin(angle) * radius;
      normals[i * 3 + 2] = 1;
      uvs[i * 2] = (s + (k >> 1)) / segments;
      uvs[i * 2 + 1] = v;
    });

    indices.push(base, base + 1, base + 2, base + 2, base + 1, base + 3);
  }

  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute("position", new THREE.BufferAttribute(positions, 3));
  geometry.setAttribute("normal", new THREE.BufferAttribute(normals, 3));
  geometry.setAttribute("uv", new THREE.BufferAttribute(uvs, 2));
  geometry.setIndex(indices);
  return geometry;
}
