import { describe, it, expect } from "vitest";

import { readEnv } from "./env.js";

describe("readEnv", () => {
  it("falls back to defaults for unset and blank values", () => {
    const settings = readEnv({ MAX_CHARS: "", CROSS_FADE_SECONDS: "  " });

    expect(settings.maxChars).toBe(135);
    expect(settings.crossFadeSeconds).toBe(0.1);
    expect(settings.minChunkRatio).toBe(0.2);
    expect(settings.synthesisConcurrency).toBe(2);
    expect(settings.jobTtlMs).toBe(4_800_000);
  });

  it("reads configured numbers", () => {
    const settings = readEnv({ MAX_CHARS: "80", MIN_CHUNK_RATIO: "0.5", DEFAULT_SPEED: "1.25" });

    expect(settings.maxChars).toBe(80);
    expect(settings.minChunkRatio).toBe(0.5);
    expect(settings.defaultSpeed).toBe(1.25);
  });

  it("rejects a non-positive chunk limit", () => {
    expect(() => readEnv({ MAX_CHARS: "0" })).toThrow("MAX_CHARS must be at least 1, got 0");
    expect(() => readEnv({ MAX_CHARS: "-5" })).toThrow("MAX_CHARS must be at least 1, got -5");
  });

  it("rejects values that are not numbers", () => {
    expect(() => readEnv({ MAX_CHARS: "lots" })).toThrow('MAX_CHARS must be an integer, got "lots"');
    expect(() => readEnv({ CROSS_FADE_SECONDS: "soon" })).toThrow(
      'CROSS_FADE_SECONDS must be a number, got "soon"',
    );
  });

  it("rejects ratios and durations outside their ranges", () => {
    expect(() => readEnv({ MIN_CHUNK_RATIO: "1.5" })).toThrow(
      "MIN_CHUNK_RATIO must be at most 1, got 1.5",
    );
    expect(() => readEnv({ CROSS_FADE_SECONDS: "-0.1" })).toThrow(
      "CROSS_FADE_SECONDS must be at least 0, got -0.1",
    );
    expect(() => readEnv({ DEFAULT_SPEED: "3" })).toThrow("DEFAULT_SPEED must be at most 2, got 3");
    expect(() => readEnv({ SYNTHESIS_CONCURRENCY: "0" })).toThrow(
      "SYNTHESIS_CONCURRENCY must be at least 1, got 0",
    );
  });
});
