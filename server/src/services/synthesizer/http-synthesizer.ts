/**
 * Segment synthesizer backed by an inference server over HTTP.
 *
 * POST {baseUrl}/synthesize with a JSON body; the server answers with a mono
 * WAV file (16-bit PCM or 32-bit float).
 */
import { SynthesisBackendError } from "../../errors.js";
import { decodeWav } from "../../lib/wav.js";
import { log } from "../../logger.js";
import type {
  SynthesisOptions,
  SynthesizedSegment,
  TextChunk,
} from "../../types/audio.js";
import { UNSPECIFIED, type VoiceParameters } from "../../types/voice.js";
import type { BackendStatus, SegmentSynthesizer } from "./types.js";

export type HttpSynthesizerOptions = {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  readyTimeoutMs?: number;
};

type SynthesizePayload = {
  text: string;
  speed: number;
  gender?: string;
  area?: string;
  group?: string;
  emotion?: string;
  sample_iteration?: number;
};

export class HttpSegmentSynthesizer implements SegmentSynthesizer {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly readyTimeoutMs: number;

  constructor(options: HttpSynthesizerOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.readyTimeoutMs = options.readyTimeoutMs ?? 2000;
  }

  async ready(): Promise<BackendStatus> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/health`, {
        signal: AbortSignal.timeout(this.readyTimeoutMs),
      });
      return {
        ok: response.ok,
        details: { url: this.baseUrl, status: response.status },
      };
    } catch (error) {
      return {
        ok: false,
        details: {
          url: this.baseUrl,
          error: error instanceof Error ? error.message : String(error),
        },
      };
    }
  }

  async synthesize(
    chunk: TextChunk,
    options: SynthesisOptions,
  ): Promise<SynthesizedSegment> {
    const started = Date.now();
    let audio: Buffer;

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/synthesize`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "audio/wav",
        },
        body: JSON.stringify(buildPayload(chunk.content, options)),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Backend error (${response.status}): ${errorText.slice(0, 200)}`);
      }

      audio = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new SynthesisBackendError(
        chunk.index,
        `Synthesis failed for chunk ${chunk.index}: ${describe(error)}`,
        { cause: error },
      );
    }

    let decoded: ReturnType<typeof decodeWav>;
    try {
      decoded = decodeWav(audio);
    } catch (error) {
      throw new SynthesisBackendError(
        chunk.index,
        `Backend returned unreadable audio for chunk ${chunk.index}: ${describe(error)}`,
        { cause: error },
      );
    }

    if (decoded.samples.length === 0) {
      throw new SynthesisBackendError(
        chunk.index,
        `Backend returned empty audio for chunk ${chunk.index}`,
      );
    }

    log.debug(
      {
        chunkIndex: chunk.index,
        elapsedMs: Date.now() - started,
        samples: decoded.samples.length,
        sampleRate: decoded.sampleRate,
      },
      "Chunk synthesized",
    );

    return {
      chunkIndex: chunk.index,
      samples: decoded.samples,
      sampleRate: decoded.sampleRate,
      durationSeconds: decoded.samples.length / decoded.sampleRate,
    };
  }
}

export function buildPayload(text: string, options: SynthesisOptions): SynthesizePayload {
  const payload: SynthesizePayload = { text, speed: options.speed };
  const voice: VoiceParameters = options.voice;

  if (voice.gender !== UNSPECIFIED) payload.gender = voice.gender;
  if (voice.area !== UNSPECIFIED) payload.area = voice.area;
  if (voice.group !== UNSPECIFIED) payload.group = voice.group;
  if (voice.emotion !== UNSPECIFIED) payload.emotion = voice.emotion;
  if (options.sampleIteration !== undefined) {
    payload.sample_iteration = options.sampleIteration;
  }

  return payload;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
