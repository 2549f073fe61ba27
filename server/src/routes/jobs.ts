import type { FastifyInstance } from "fastify";

import { NotFoundError } from "../errors.js";
import type { SynthesisService } from "../services/synthesis-service.js";
import { sendError } from "../utils/http-errors.js";
import { API_PREFIX } from "./prefix.js";

type JobParams = {
  jobId: string;
};

/** Registers download and eviction routes for stored synthesis jobs. */
export async function registerJobRoutes(
  app: FastifyInstance,
  service: SynthesisService,
): Promise<void> {
  app.get<{ Params: JobParams }>(
    `${API_PREFIX}/download/:jobId`,
    async (request, reply) => {
      const jobId = request.params.jobId.trim();

      try {
        const audio = service.fetchJob(jobId);
        request.log.debug({ jobId, sizeBytes: audio.sizeBytes }, "Serving stored audio");
        reply.header("Content-Type", `audio/${audio.format}`);
        reply.header(
          "Content-Disposition",
          `attachment; filename="speech_${jobId}.${audio.format}"`,
        );
        reply.header("Content-Length", audio.sizeBytes);
        return reply.send(audio.data);
      } catch (error) {
        return sendError(request, reply, error, { jobId });
      }
    },
  );

  app.delete<{ Params: JobParams }>(
    `${API_PREFIX}/jobs/:jobId`,
    async (request, reply) => {
      const jobId = request.params.jobId.trim();
      if (!service.evictJob(jobId)) {
        return sendError(
          request,
          reply,
          new NotFoundError(`Job '${jobId}' not found or has expired`),
          { jobId },
        );
      }

      request.log.info({ jobId }, "Job evicted");
      return reply.status(204).send();
    },
  );
}
