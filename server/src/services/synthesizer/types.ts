import type {
  SynthesisOptions,
  SynthesizedSegment,
  TextChunk,
} from "../../types/audio.js";

export type BackendStatus = { ok: boolean; details?: Record<string, unknown> };

/** Boundary to the external speech model: one call per chunk. */
export interface SegmentSynthesizer {
  ready(): Promise<BackendStatus>;
  /** Rejects with `SynthesisBackendError` carrying `chunk.index`. */
  synthesize(chunk: TextChunk, options: SynthesisOptions): Promise<SynthesizedSegment>;
}
