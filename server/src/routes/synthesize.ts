import type { FastifyInstance } from "fastify";

import { InvalidInputError, InvalidParameterError } from "../errors.js";
import type {
  SynthesisRequest,
  SynthesisService,
} from "../services/synthesis-service.js";
import { sendError } from "../utils/http-errors.js";
import { API_PREFIX } from "./prefix.js";

type SynthesizeRequestBody = {
  text?: unknown;
  speed?: unknown;
  outputFormat?: unknown;
  gender?: unknown;
  area?: unknown;
  group?: unknown;
  emotion?: unknown;
  sampleIteration?: unknown;
};

type SynthesizeFileResponse = {
  jobId: string;
  downloadUrl: string;
  durationSeconds: number;
  sampleRate: number;
  format: string;
  fileSizeBytes: number;
};

/** Registers the stream, deferred-file and direct-download synthesis routes. */
export async function registerSynthesizeRoutes(
  app: FastifyInstance,
  service: SynthesisService,
): Promise<void> {
  app.post<{ Body: SynthesizeRequestBody }>(
    `${API_PREFIX}/synthesize`,
    async (request, reply) => {
      try {
        const { audio } = await service.synthesize(parseSynthesizeBody(request.body));
        reply.header("Content-Type", "audio/wav");
        reply.header("Content-Disposition", 'inline; filename="speech.wav"');
        return reply.send(audio.data);
      } catch (error) {
        return sendError(request, reply, error);
      }
    },
  );

  app.post<{ Body: SynthesizeRequestBody }>(
    `${API_PREFIX}/synthesize/file`,
    async (request, reply) => {
      try {
        const { audio, chunks } = await service.synthesize(parseSynthesizeBody(request.body));
        const summary = service.registerJob(audio);
        request.log.info(
          { jobId: summary.jobId, chunkCount: chunks.length },
          "Synthesis stored for download",
        );

        const response: SynthesizeFileResponse = {
          jobId: summary.jobId,
          downloadUrl: `${API_PREFIX}/download/${summary.jobId}`,
          durationSeconds: Math.round(summary.durationSeconds * 100) / 100,
          sampleRate: summary.sampleRate,
          format: audio.format,
          fileSizeBytes: summary.sizeBytes,
        };
        return reply.status(201).send(response);
      } catch (error) {
        return sendError(request, reply, error);
      }
    },
  );

  app.post<{ Body: SynthesizeRequestBody }>(
    `${API_PREFIX}/synthesize/download`,
    async (request, reply) => {
      try {
        const { audio } = await service.synthesize(parseSynthesizeBody(request.body));
        reply.header("Content-Type", "audio/wav");
        reply.header(
          "Content-Disposition",
          'attachment; filename="synthesis_result.wav"',
        );
        return reply.send(audio.data);
      } catch (error) {
        return sendError(request, reply, error);
      }
    },
  );
}

/**
 * Validates the JSON body shape; value ranges are checked by the service.
 * Optional fields sent as `null` count as absent.
 */
export function parseSynthesizeBody(body: unknown): SynthesisRequest {
  if (typeof body !== "object" || body === null) {
    throw new InvalidInputError("Request body must be a JSON object");
  }
  const input: SynthesizeRequestBody = {
    text: Reflect.get(body, "text"),
    speed: Reflect.get(body, "speed") ?? undefined,
    outputFormat: Reflect.get(body, "outputFormat"),
    gender: Reflect.get(body, "gender"),
    area: Reflect.get(body, "area"),
    group: Reflect.get(body, "group"),
    emotion: Reflect.get(body, "emotion"),
    sampleIteration: Reflect.get(body, "sampleIteration") ?? undefined,
  };

  if (typeof input.text !== "string") {
    throw new InvalidInputError("text is required");
  }

  if (input.speed !== undefined && typeof input.speed !== "number") {
    throw new InvalidParameterError("speed", "speed must be a number");
  }

  if (input.outputFormat !== undefined && input.outputFormat !== "wav") {
    throw new InvalidParameterError(
      "outputFormat",
      `Unsupported outputFormat ${JSON.stringify(input.outputFormat)}; expected "wav"`,
    );
  }

  if (input.sampleIteration !== undefined && typeof input.sampleIteration !== "number") {
    throw new InvalidParameterError("sampleIteration", "sampleIteration must be a number");
  }

  return {
    text: input.text,
    speed: input.speed,
    sampleIteration: input.sampleIteration,
    voice: {
      gender: input.gender,
      area: input.area,
      group: input.group,
      emotion: input.emotion,
    },
  };
}
