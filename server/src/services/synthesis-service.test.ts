import { describe, it, expect } from "vitest";

import {
  FormatMismatchError,
  InvalidInputError,
  InvalidParameterError,
  NotFoundError,
  SynthesisBackendError,
} from "../errors.js";
import { FakeSynthesizer, type FakeSynthesizerOptions } from "../test-utils/fake-synthesizer.js";
import { JobStore, type EvictionPolicy } from "./job-store.js";
import { SynthesisService, type SynthesisSettings } from "./synthesis-service.js";

const keepEverything: EvictionPolicy = { name: "none", select: () => [] };

const baseSettings: SynthesisSettings = {
  maxChars: 20,
  maxInputChars: 500,
  minChunkRatio: 0.2,
  mergeTolerance: 0,
  normalizeText: false,
  crossFadeSeconds: 0,
  crossFadeCurve: "linear",
  minTargetSeconds: 0,
  concurrency: 2,
  defaultSpeed: 0.9,
  voiceDefaults: { area: "northern" },
};

function setup(
  settings: Partial<SynthesisSettings> = {},
  fakeOptions: FakeSynthesizerOptions = {},
) {
  const synthesizer = new FakeSynthesizer(fakeOptions);
  const store = new JobStore({ policy: keepEverything });
  const service = new SynthesisService(synthesizer, store, { ...baseSettings, ...settings });
  return { synthesizer, store, service };
}

describe("SynthesisService.segmentAndResolve", () => {
  it("segments the text and resolves the voice once", () => {
    const { service } = setup();
    const { chunks, voice } = service.segmentAndResolve(
      "Xin chào. Đây là một câu dài hơn giới hạn ký tự cho phép, nên nó cần được chia nhỏ.",
      { gender: "female" },
    );

    expect(chunks[0].content).toBe("Xin chào.");
    expect(chunks).toHaveLength(6);
    expect(voice).toEqual({
      gender: "female",
      area: "northern",
      group: "unspecified",
      emotion: "unspecified",
    });
  });

  it("rejects empty text", () => {
    const { service } = setup();
    expect(() => service.segmentAndResolve("   ")).toThrow(InvalidInputError);
  });

  it("rejects text over the input ceiling", () => {
    const { service } = setup({ maxInputChars: 10 });
    expect(() => service.segmentAndResolve("Mười một ký")).toThrow(InvalidInputError);
  });

  it("rejects unknown voice values", () => {
    const { service } = setup();
    expect(() => service.segmentAndResolve("Xin chào.", { area: "western" })).toThrow(
      InvalidParameterError,
    );
  });

  it("normalizes the text first when enabled", () => {
    const { service } = setup({ normalizeText: true, maxChars: 135 });
    const { chunks } = service.segmentAndResolve("Dòng một\nDòng hai");

    expect(chunks.map((chunk) => chunk.content)).toEqual(["Dòng một. Dòng hai."]);
  });
});

describe("SynthesisService.synthesize", () => {
  const text = "Một hai ba. Bốn năm sáu. Bảy tám chín.";

  it("assembles chunks in their original order even when they finish out of order", async () => {
    const { service } = setup(
      { maxChars: 12, concurrency: 4 },
      { delayMs: (index) => (4 - index) * 5 },
    );

    const { audio, chunks } = await service.synthesize({ text });

    expect(chunks.map((chunk) => chunk.content)).toEqual([
      "Một hai ba.",
      "Bốn năm sáu.",
      "Bảy tám",
      "chín.",
    ]);
    expect(audio.samples.length).toBe(350);
    expect(audio.samples[0]).toBeCloseTo(0.1, 6);
    expect(audio.samples[110]).toBeCloseTo(0.2, 6);
    expect(audio.samples[230]).toBeCloseTo(0.3, 6);
    expect(audio.samples[349]).toBeCloseTo(0.4, 6);
  });

  it("keeps at most the configured number of backend calls in flight", async () => {
    const { service, synthesizer } = setup(
      { maxChars: 12, concurrency: 2 },
      { delayMs: () => 5 },
    );

    await service.synthesize({ text });

    expect(synthesizer.calls).toHaveLength(4);
    expect(synthesizer.maxInFlight).toBe(2);
  });

  it("passes the same frozen request options to every chunk", async () => {
    const { service, synthesizer } = setup({ maxChars: 12 });

    await service.synthesize({ text, voice: { emotion: "sad" }, sampleIteration: 2 });

    const [first, ...rest] = synthesizer.calls.map((call) => call.options);
    expect(first).toEqual({
      voice: { gender: "unspecified", area: "northern", group: "unspecified", emotion: "sad" },
      speed: 0.9,
      sampleIteration: 2,
    });
    expect(Object.isFrozen(first)).toBe(true);
    for (const options of rest) {
      expect(options).toBe(first);
    }
  });

  it("validates speed and sample iteration", async () => {
    const { service, synthesizer } = setup();

    await expect(service.synthesize({ text: "Xin chào.", speed: 3 })).rejects.toMatchObject({
      field: "speed",
    });
    await expect(
      service.synthesize({ text: "Xin chào.", sampleIteration: -1 }),
    ).rejects.toBeInstanceOf(InvalidParameterError);
    expect(synthesizer.calls).toHaveLength(0);
  });

  it("fails the whole job when one chunk fails", async () => {
    const { service, store } = setup({ maxChars: 12, concurrency: 1 }, { failOn: 1 });

    const run = service.synthesize({ text });

    await expect(run).rejects.toBeInstanceOf(SynthesisBackendError);
    await expect(run).rejects.toMatchObject({ chunkIndex: 1 });
    expect(store.size).toBe(0);
  });

  it("reports mismatched sample rates", async () => {
    const { service } = setup(
      { maxChars: 12 },
      { sampleRateFor: (index) => (index === 2 ? 2000 : 1000) },
    );

    await expect(service.synthesize({ text })).rejects.toBeInstanceOf(FormatMismatchError);
  });

  it("pads short results to the minimum duration", async () => {
    const { service } = setup({ minTargetSeconds: 1.0 });

    const { audio } = await service.synthesize({ text: "Xin chào." });

    expect(audio.samples.length).toBe(1000);
    expect(audio.durationSeconds).toBe(1);
  });
});

describe("SynthesisService jobs", () => {
  it("round-trips audio through registerJob and fetchJob", async () => {
    const { service } = setup();
    const { audio } = await service.synthesize({ text: "Xin chào." });

    const summary = service.registerJob(audio);

    expect(summary.sizeBytes).toBe(audio.sizeBytes);
    expect(service.fetchJob(summary.jobId).data.equals(audio.data)).toBe(true);
  });

  it("assigns distinct ids to separate registrations", async () => {
    const { service } = setup();
    const first = await service.synthesize({ text: "Xin chào." });
    const second = await service.synthesize({ text: "Tạm biệt." });

    expect(service.registerJob(first.audio).jobId).not.toBe(
      service.registerJob(second.audio).jobId,
    );
  });

  it("cannot fetch an evicted job", async () => {
    const { service } = setup();
    const { audio } = await service.synthesize({ text: "Xin chào." });
    const { jobId } = service.registerJob(audio);

    expect(service.evictJob(jobId)).toBe(true);
    expect(() => service.fetchJob(jobId)).toThrow(NotFoundError);
    expect(() => service.fetchJob("nonexistent")).toThrow(NotFoundError);
  });
});
