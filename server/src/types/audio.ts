import type { VoiceParameters } from "./voice.js";

export type TextChunk = {
  index: number;
  content: string;
  /** Offset of the first character of `content` in the segmented text. */
  start: number;
  end: number;
  /** Whitespace between this chunk and the next one (or the end of the text). */
  separator: string;
  estimatedChars: number;
};

export const MIN_SPEED = 0.25;
export const MAX_SPEED = 2.0;

/** Request-scoped settings shared by every chunk of one synthesis. */
export type SynthesisOptions = Readonly<{
  voice: VoiceParameters;
  speed: number;
  sampleIteration?: number;
}>;

export type SynthesizedSegment = {
  chunkIndex: number;
  /** Mono samples in [-1, 1]. */
  samples: Float32Array;
  sampleRate: number;
  durationSeconds: number;
};

export type AudioFormat = "wav";

export type AssembledAudio = {
  samples: Float32Array;
  sampleRate: number;
  durationSeconds: number;
  format: AudioFormat;
  /** Encoded container bytes (16-bit PCM mono WAV). */
  data: Buffer;
  sizeBytes: number;
};

export type SynthesisJob = {
  id: string;
  audio: AssembledAudio;
  createdAt: number;
  sizeBytes: number;
};

export type JobSummary = {
  jobId: string;
  durationSeconds: number;
  sampleRate: number;
  sizeBytes: number;
  createdAt: number;
};
