/**
 * - segmentAndResolve: validates and segments the request text, resolves the voice once.
 * - synthesizeAll: fans chunks out to the synthesizer, joins them in chunk order and assembles.
 * - registerJob / fetchJob / evictJob: the deferred delivery pattern on top of JobStore.
 * - synthesize: the whole request in one call, used by every delivery route.
 */
import { InvalidInputError, InvalidParameterError } from "../errors.js";
import { mapOrdered } from "../lib/concurrency.js";
import { log } from "../logger.js";
import {
  MAX_SPEED,
  MIN_SPEED,
  type AssembledAudio,
  type JobSummary,
  type SynthesisOptions,
  type TextChunk,
} from "../types/audio.js";
import type {
  ExplicitVoiceParameters,
  VoiceDefaults,
  VoiceParameters,
} from "../types/voice.js";
import type { CrossFadeCurve } from "../config/env.js";
import { assemble } from "./assembler.js";
import type { JobStore } from "./job-store.js";
import { segment } from "./segmenter.js";
import type { SegmentSynthesizer } from "./synthesizer/types.js";
import { normalizeText } from "./text-normalizer.js";
import { resolveVoice } from "./voice-resolver.js";

export type SynthesisSettings = {
  maxChars: number;
  maxInputChars: number;
  minChunkRatio: number;
  mergeTolerance: number;
  normalizeText: boolean;
  crossFadeSeconds: number;
  crossFadeCurve: CrossFadeCurve;
  minTargetSeconds: number;
  concurrency: number;
  defaultSpeed: number;
  voiceDefaults: VoiceDefaults;
};

export type SynthesisRequest = {
  text: string;
  voice?: ExplicitVoiceParameters;
  speed?: number;
  sampleIteration?: number;
};

export type SynthesisResult = {
  audio: AssembledAudio;
  chunks: TextChunk[];
  voice: VoiceParameters;
};

export class SynthesisService {
  constructor(
    private readonly synthesizer: SegmentSynthesizer,
    private readonly store: JobStore,
    private readonly settings: SynthesisSettings,
  ) {}

  segmentAndResolve(
    text: string,
    explicitVoice: ExplicitVoiceParameters = {},
  ): { chunks: TextChunk[]; voice: VoiceParameters } {
    if (!text.trim()) {
      throw new InvalidInputError("Text is empty");
    }
    if (text.length > this.settings.maxInputChars) {
      throw new InvalidInputError(
        `Text is ${text.length} characters long; the limit is ${this.settings.maxInputChars}`,
      );
    }

    const source = this.settings.normalizeText ? normalizeText(text) : text;
    const chunks = segment(source, this.settings.maxChars, {
      minChunkRatio: this.settings.minChunkRatio,
      mergeTolerance: this.settings.mergeTolerance,
    });
    const voice = resolveVoice(explicitVoice, this.settings.voiceDefaults);

    log.debug(
      {
        chunkCount: chunks.length,
        chunkLengths: chunks.map((chunk) => chunk.content.length),
        maxChars: this.settings.maxChars,
      },
      "Text segmented",
    );

    return { chunks, voice };
  }

  async synthesizeAll(
    chunks: readonly TextChunk[],
    options: SynthesisOptions,
  ): Promise<AssembledAudio> {
    const started = Date.now();
    const segments = await mapOrdered(chunks, this.settings.concurrency, (chunk) =>
      this.synthesizer.synthesize(chunk, options),
    );

    const audio = assemble(segments, {
      crossFadeSeconds: this.settings.crossFadeSeconds,
      minTargetSeconds: this.settings.minTargetSeconds,
      curve: this.settings.crossFadeCurve,
    });

    log.info(
      {
        chunkCount: chunks.length,
        durationSeconds: audio.durationSeconds,
        sampleRate: audio.sampleRate,
        elapsedMs: Date.now() - started,
      },
      "Synthesis completed",
    );

    return audio;
  }

  async synthesize(request: SynthesisRequest): Promise<SynthesisResult> {
    const { chunks, voice } = this.segmentAndResolve(request.text, request.voice);
    const options = this.buildOptions(voice, request);
    const audio = await this.synthesizeAll(chunks, options);
    return { audio, chunks, voice };
  }

  registerJob(audio: AssembledAudio): JobSummary {
    const summary = this.store.create(audio);
    log.info(
      { jobId: summary.jobId, sizeBytes: summary.sizeBytes, jobs: this.store.size },
      "Job registered",
    );
    return summary;
  }

  fetchJob(jobId: string): AssembledAudio {
    return this.store.fetch(jobId);
  }

  evictJob(jobId: string): boolean {
    return this.store.evict(jobId);
  }

  private buildOptions(
    voice: VoiceParameters,
    request: SynthesisRequest,
  ): SynthesisOptions {
    const speed = request.speed ?? this.settings.defaultSpeed;
    if (!Number.isFinite(speed) || speed < MIN_SPEED || speed > MAX_SPEED) {
      throw new InvalidParameterError(
        "speed",
        `speed must be between ${MIN_SPEED} and ${MAX_SPEED}, got ${speed}`,
      );
    }

    const { sampleIteration } = request;
    if (
      sampleIteration !== undefined &&
      (!Number.isInteger(sampleIteration) || sampleIteration < 0)
    ) {
      throw new InvalidParameterError(
        "sampleIteration",
        `sampleIteration must be a non-negative integer, got ${sampleIteration}`,
      );
    }

    return Object.freeze({ voice, speed, sampleIteration });
  }
}
