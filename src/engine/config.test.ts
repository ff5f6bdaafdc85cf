import { describe, it, expect } from "vitest";
import { DEFAULT_VISUALIZER_CONFIG, resolveConfig, validateConfig } from "./config";
import { ConfigurationError } from "./errors";
import type { VisualizerConfigInput } from "./types";

const fieldOf = (input: VisualizerConfigInput) => {
  try {
    validateConfig(resolveConfig(input));
  } catch (error) {
    if (error instanceof ConfigurationError) return error.field;
    throw error;
  }
  return null;
};

describe("resolveConfig", () => {
  it("returns the defaults for an empty input", () => {
    expect(resolveConfig()).toEqual(DEFAULT_VISUALIZER_CONFIG);
  });

  it("merges nested sections field by field", () => {
    const config = resolveConfig({ columns: 8, shuffle: { enabled: true } });
    expect(config.columns).toBe(8);
    expect(config.shuffle).toEqual({ ...DEFAULT_VISUALIZER_CONFIG.shuffle, enabled: true });
  });

  it("replaces tagged variants whole", () => {
    const config = resolveConfig({
      gain: { mode: "manual", sensitivity: 2 },
      beat: { detection: { mode: "wideband" } },
    });
    expect(config.gain).toEqual({ mode: "manual", sensitivity: 2 });
    expect(config.beat.detection).toEqual({ mode: "wideband" });
    expect(config.beat.thresholdRatio).toBe(DEFAULT_VISUALIZER_CONFIG.beat.thresholdRatio);
  });

  it("merges over a running configuration", () => {
    const running = resolveConfig({ columns: 6 });
    expect(resolveConfig({ rowsPerColumn: 3 }, running).columns).toBe(6);
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(fieldOf({})).toBeNull();
  });

  it("rejects column counts outside 1-100", () => {
    expect(fieldOf({ columns: 0 })).toBe("columns");
    expect(fieldOf({ columns: 101, palette: Array(101).fill("#fff") })).toBe("columns");
    expect(fieldOf({ columns: 2.5 })).toBe("columns");
  });

  it("rejects row counts outside 1-20", () => {
    expect(fieldOf({ rowsPerColumn: 21 })).toBe("rowsPerColumn");
  });

  it("needs a colour for every column", () => {
    expect(fieldOf({ columns: 3, palette: ["#fff", "#000"] })).toBe("palette");
  });

  it("rejects an empty or inverted beat band", () => {
    expect(fieldOf({ beat: { detection: { mode: "band", minHz: 120, maxHz: 60 } } })).toBe(
      "beat.detection.minHz"
    );
    expect(fieldOf({ beat: { detection: { mode: "band", minHz: 100, maxHz: 100 } } })).toBe(
      "beat.detection.minHz"
    );
  });

  it("rejects inverted rhythm bounds", () => {
    expect(fieldOf({ rhythm: { minSmoothingTime: 0.5, maxSmoothingTime: 0.1 } })).toBe(
      "rhythm.minSmoothingTime"
    );
    expect(fieldOf({ rhythm: { minShuffleInterval: 12 } })).toBe("rhythm.minShuffleInterval");
  });

  it("rejects non-finite numbers", () => {
    expect(fieldOf({ attackSpeed: Number.NaN })).toBe("attackSpeed");
    expect(fieldOf({ beat: { duration: Number.POSITIVE_INFINITY } })).toBe("beat.duration");
  });

  it("treats the beat decay as a lerp factor", () => {
    expect(fieldOf({ beat: { decaySpeed: 1.5 } })).toBe("beat.decaySpeed");
  });

  it("names the field in the message", () => {
    expect(() => validateConfig(resolveConfig({ columns: 0 }))).toThrow(/^columns: /);
  });
});
