import { useRef } from "react";
import type { VisualizerConfigInput, VisualizerFrame } from "../engine";
import type { SpectrumSnapshot } from "../audio/types";
import { VisualizerDriver } from "./driver";

const NO_OVERRIDES: VisualizerConfigInput = {};

/**
 * One engine per mounted component, ticked once per distinct `time`.
 *
 * Pass a stable `config` object (module constant or memoized); a new object
 * is treated as a live reconfiguration over the defaults, not over the
 * previous config.
 */
export function useVisualizerEngine(
  snapshot: SpectrumSnapshot,
  time: number,
  config: VisualizerConfigInput = NO_OVERRIDES
): VisualizerFrame {
  const driverRef = useRef<VisualizerDriver | null>(null);
  if (!driverRef.current) {
    driverRef.current = new VisualizerDriver();
  }
  return driverRef.current.update(snapshot, time, config);
}
