import { clamp01, stepSmoothDamp, type SpringState } from "./math";
import type { AntiStuckConfig, ColumnState } from "./types";

const MIN_HEADROOM = 1e-3;

/**
 * Re-floors a column that has sat near the top for too long.
 *
 * Once pinned for longer than `timeLimit`, the column's floor chases its
 * normalized intensity over `baselineMemory` seconds and the column shows only
 * what sits above that floor, stretched back to 0-1. When the column drops
 * below `threshold` the floor sinks back to 0 at 1/baselineMemory per second.
 *
 * Mutates the stuck timer and floor on `column`; returns the display value.
 */
export function suppressStuck(
  column: ColumnState,
  normalized: number,
  config: AntiStuckConfig,
  dt: number
): number {
  if (normalized > config.threshold) {
    column.stuckTimer += dt;
  } else {
    column.stuckTimer = 0;
  }

  if (column.stuckTimer > config.timeLimit) {
    const floor: SpringState = {
      value: column.falloffBaseline,
      velocity: column.falloffBaselineVelocity,
    };
    stepSmoothDamp(floor, normalized, config.baselineMemory, dt);
    column.falloffBaseline = Math.max(0, floor.value);
    column.falloffBaselineVelocity = floor.velocity;
  } else {
    column.falloffBaseline = Math.max(0, column.falloffBaseline - dt / config.baselineMemory);
    column.falloffBaselineVelocity = 0;
  }

  if (column.falloffBaseline <= 0) return normalized;

  const headroom = Math.max(1 - column.falloffBaseline, MIN_HEADROOM);
  return clamp01((normalized - column.falloffBaseline) / headroom);
}
