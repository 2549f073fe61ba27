import Fastify from "fastify";
import cors from "@fastify/cors";

import { env } from "./config/env.js";
import { getVoiceDefaults } from "./config/voice.js";
import {
  JobStore,
  capacityPolicy,
  combinePolicies,
  ttlPolicy,
} from "./services/job-store.js";
import {
  SynthesisService,
  type SynthesisSettings,
} from "./services/synthesis-service.js";
import { HttpSegmentSynthesizer } from "./services/synthesizer/http-synthesizer.js";
import type { SegmentSynthesizer } from "./services/synthesizer/types.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerSynthesizeRoutes } from "./routes/synthesize.js";
import { registerJobRoutes } from "./routes/jobs.js";

export type BuildAppOptions = {
  synthesizer?: SegmentSynthesizer;
  store?: JobStore;
  settings?: Partial<SynthesisSettings>;
};

export function defaultSettings(): SynthesisSettings {
  return {
    maxChars: env.maxChars,
    maxInputChars: env.maxInputChars,
    minChunkRatio: env.minChunkRatio,
    mergeTolerance: env.mergeTolerance,
    normalizeText: env.normalizeText,
    crossFadeSeconds: env.crossFadeSeconds,
    crossFadeCurve: env.crossFadeCurve,
    minTargetSeconds: env.minTargetSeconds,
    concurrency: env.synthesisConcurrency,
    defaultSpeed: env.defaultSpeed,
    voiceDefaults: getVoiceDefaults(),
  };
}

export async function buildApp(options: BuildAppOptions = {}) {
  const app = Fastify({
    logger: {
      level: env.logLevel,
    },
  });

  const synthesizer =
    options.synthesizer ?? new HttpSegmentSynthesizer({ baseUrl: env.synthBackendUrl });
  const store =
    options.store ??
    new JobStore({
      policy: combinePolicies(
        ttlPolicy(env.jobTtlMs),
        capacityPolicy({ maxJobs: env.maxJobs, maxBytes: env.maxJobBytes }),
      ),
    });
  const service = new SynthesisService(synthesizer, store, {
    ...defaultSettings(),
    ...options.settings,
  });

  await app.register(cors, {
    origin: true,
  });

  await registerHealthRoutes(app, { synthesizer, store, startedAt: Date.now() });
  await registerSynthesizeRoutes(app, service);
  await registerJobRoutes(app, service);

  const timer = setInterval(() => {
    const removed = store.gc();
    if (removed > 0) {
      app.log.debug({ removed }, "Cleaned up expired jobs");
    }
  }, Math.min(Math.max(env.jobTtlMs, 60_000), 10 * 60_000));

  timer.unref();

  app.addHook("onClose", (_instance, done) => {
    clearInterval(timer);
    done();
  });

  return app;
}
