import { useEffect, useMemo } from "react";
import * as THREE from "three";
import type { VisualizerFrame } from "../engine";
import { buildArcGeometry } from "./arcGeometry";
import { generateCircularLayout, DEFAULT_ROW_ANGULAR_FACTORS } from "./layout";

interface VisualizerRingProps {
  frame: VisualizerFrame;
  innerRadius?: number;
  radiusStep?: number;
  barHeight?: number;
  rowAngularFactors?: number[];
  /** Quads per cell arc */
  curveSegments?: number;
  /** Colour of an unlit cell; lit cells blend toward their column colour */
  baseColor?: THREE.ColorRepresentation;
  baseOpacity?: number;
  /** Layout units are pixels at 1080p; this maps them into scene units */
  scale?: number;
}

interface RingCell {
  key: string;
  geometry: THREE.BufferGeometry;
  material: THREE.MeshBasicMaterial;
}

/**
 * Concentric ring of arc cells, one mesh per cell. Every render copies the
 * frame's activation levels and column colours onto the cell materials.
 */
export const VisualizerRing: React.FC<VisualizerRingProps> = ({
  frame,
  innerRadius = 80,
  radiusStep = 50,
  barHeight = 40,
  rowAngularFactors = DEFAULT_ROW_ANGULAR_FACTORS,
  curveSegments = 10,
  baseColor = "#1a1a2e",
  baseOpacity = 0.35,
  scale = 0.01,
}) => {
  const { columns, rows } = frame;

  const cells = useMemo<RingCell[]>(() => {
    const layout = generateCircularLayout({
      columns,
      rows,
      innerRadius,
      radiusStep,
      barHeight,
      rowAngularFactors,
    });
    // Column-major, same order as frame.levels
    return layout.flat().map((cell) => ({
      key: `${cell.column}-${cell.row}`,
      geometry: buildArcGeometry(cell, curveSegments),
      material: new THREE.MeshBasicMaterial({
        transparent: true,
        side: THREE.DoubleSide,
        depthWrite: false,
      }),
    }));
  }, [columns, rows, innerRadius, radiusStep, barHeight, rowAngularFactors, curveSegments]);

  useEffect(() => {
    return () => {
      cells.forEach(({ geometry, material }) => {
        geometry.dispose();
        material.dispose();
      });
    };
  }, [cells]);

  const base = useMemo(() => new THREE.Color(baseColor), [baseColor]);
  const active = useMemo(() => new THREE.Color(), []);

  // Update materials
  cells.forEach(({ material }, i) => {
    const column = Math.floor(i / rows);
    const level = frame.levels[i];
    const { r, g, b, a } = frame.colors[column];
    active.setRGB(r, g, b);
    material.color.copy(base).lerp(active, level);
    material.opacity = THREE.MathUtils.lerp(baseOpacity, a, level);
  });

  return (
    <group scale={scale}>
      {cells.map(({ key, geometry, material }) => (
        <mesh key={key} geometry={geometry} material={material} />
      ))}
    </group>
  );
};
