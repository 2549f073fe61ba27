import { SynthesisBackendError } from "../errors.js";
import type { BackendStatus, SegmentSynthesizer } from "../services/synthesizer/types.js";
import type { SynthesisOptions, SynthesizedSegment, TextChunk } from "../types/audio.js";

export type FakeSynthesizerOptions = {
  sampleRate?: number;
  /** Samples produced per character of chunk content. */
  samplesPerChar?: number;
  /** Per-chunk delay, to make chunks finish out of order. */
  delayMs?: (index: number) => number;
  failOn?: number;
  sampleRateFor?: (index: number) => number;
};

/**
 * In-process stand-in for the speech backend. Chunk `i` is rendered as a
 * constant signal of amplitude `(i + 1) / 10`.
 */
export class FakeSynthesizer implements SegmentSynthesizer {
  readonly calls: Array<{ index: number; options: SynthesisOptions }> = [];
  private inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly options: FakeSynthesizerOptions = {}) {}

  async ready(): Promise<BackendStatus> {
    return { ok: true, details: { backend: "fake" } };
  }

  async synthesize(chunk: TextChunk, options: SynthesisOptions): Promise<SynthesizedSegment> {
    this.calls.push({ index: chunk.index, options });
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      const delay = this.options.delayMs?.(chunk.index) ?? 0;
      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }

      if (this.options.failOn === chunk.index) {
        throw new SynthesisBackendError(chunk.index, `backend failed on chunk ${chunk.index}`);
      }

      const sampleRate = this.options.sampleRateFor?.(chunk.index) ?? this.options.sampleRate ?? 1000;
      const samples = new Float32Array(
        chunk.content.length * (this.options.samplesPerChar ?? 10),
      ).fill((chunk.index + 1) / 10);

      return {
        chunkIndex: chunk.index,
        samples,
        sampleRate,
        durationSeconds: samples.length / sampleRate,
      };
    } finally {
      this.inFlight -= 1;
    }
  }
}
