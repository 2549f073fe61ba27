import type { FastifyInstance } from "fastify";

import type { JobStore } from "../services/job-store.js";
import type { BackendStatus, SegmentSynthesizer } from "../services/synthesizer/types.js";
import { API_PREFIX } from "./prefix.js";

type HealthResponse = {
  status: "healthy";
  uptime: number;
  jobs: number;
  backend: BackendStatus;
};

/** Registers the liveness route for load balancers and monitoring. */
export async function registerHealthRoutes(
  app: FastifyInstance,
  deps: { synthesizer: SegmentSynthesizer; store: JobStore; startedAt: number },
): Promise<void> {
  app.get<{ Reply: HealthResponse }>(`${API_PREFIX}/health`, async (_request, reply) => {
    const backend = await deps.synthesizer.ready();
    return reply.send({
      status: "healthy",
      uptime: Math.floor((Date.now() - deps.startedAt) / 1000),
      jobs: deps.store.size,
      backend,
    });
  });
}
