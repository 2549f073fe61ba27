import { randomUUID } from "node:crypto";

import { NotFoundError } from "../errors.js";
import { log } from "../logger.js";
import type { AssembledAudio, JobSummary, SynthesisJob } from "../types/audio.js";

/**
 * Chooses which jobs to drop. `jobs` is ordered oldest first; the returned
 * ids are evicted in order.
 */
export interface EvictionPolicy {
  readonly name: string;
  select(jobs: readonly SynthesisJob[], now: number): string[];
  /** Checked on every read; an expired job is dropped before it is served. */
  isExpired?(job: SynthesisJob, now: number): boolean;
}

/** Drops jobs created more than `ttlMs` ago. */
export function ttlPolicy(ttlMs: number): EvictionPolicy {
  return {
    name: `ttl(${ttlMs}ms)`,
    select: (jobs, now) =>
      jobs.filter((job) => now - job.createdAt > ttlMs).map((job) => job.id),
    isExpired: (job, now) => now - job.createdAt > ttlMs,
  };
}

/** Drops the oldest jobs until both the count and the byte total fit. */
export function capacityPolicy(limits: { maxJobs?: number; maxBytes?: number }): EvictionPolicy {
  const maxJobs = limits.maxJobs ?? Number.POSITIVE_INFINITY;
  const maxBytes = limits.maxBytes ?? Number.POSITIVE_INFINITY;
  return {
    name: `capacity(${maxJobs} jobs, ${maxBytes} bytes)`,
    select: (jobs) => {
      let count = jobs.length;
      let bytes = jobs.reduce((sum, job) => sum + job.sizeBytes, 0);
      const selected: string[] = [];
      for (const job of jobs) {
        if (count <= maxJobs && bytes <= maxBytes) {
          break;
        }
        selected.push(job.id);
        count -= 1;
        bytes -= job.sizeBytes;
      }
      return selected;
    },
  };
}

export function combinePolicies(...policies: EvictionPolicy[]): EvictionPolicy {
  return {
    name: policies.map((policy) => policy.name).join(" + "),
    select: (jobs, now) => {
      const selected = new Set<string>();
      for (const policy of policies) {
        const remaining = jobs.filter((job) => !selected.has(job.id));
        for (const id of policy.select(remaining, now)) {
          selected.add(id);
        }
      }
      return [...selected];
    },
    isExpired: (job, now) => policies.some((policy) => policy.isExpired?.(job, now) ?? false),
  };
}

export type JobStoreOptions = {
  policy: EvictionPolicy;
  generateId?: () => string;
  now?: () => number;
};

const defaultGenerateId = (): string => randomUUID().replace(/-/g, "");

/**
 * Holds finished synthesis results for the two-step delivery pattern.
 * Jobs are `Ready` as soon as they are created and stay readable until the
 * policy or an explicit `evict` removes them.
 */
export class JobStore {
  private readonly jobs = new Map<string, SynthesisJob>();
  private readonly policy: EvictionPolicy;
  private readonly generateId: () => string;
  private readonly now: () => number;
  private bytes = 0;

  constructor(options: JobStoreOptions) {
    this.policy = options.policy;
    this.generateId = options.generateId ?? defaultGenerateId;
    this.now = options.now ?? Date.now;
  }

  /** Takes ownership of a copy of `audio` and returns its identifier. */
  create(audio: AssembledAudio): JobSummary {
    const id = this.nextId();
    const data = Buffer.from(audio.data);
    const job: SynthesisJob = {
      id,
      audio: {
        samples: audio.samples.slice(),
        sampleRate: audio.sampleRate,
        durationSeconds: audio.durationSeconds,
        format: audio.format,
        data,
        sizeBytes: data.length,
      },
      createdAt: this.now(),
      sizeBytes: data.length,
    };

    this.jobs.set(id, job);
    this.bytes += job.sizeBytes;
    log.debug({ jobId: id, sizeBytes: job.sizeBytes }, "Job created");

    this.applyPolicy(job.createdAt, id);

    return {
      jobId: id,
      durationSeconds: job.audio.durationSeconds,
      sampleRate: job.audio.sampleRate,
      sizeBytes: job.sizeBytes,
      createdAt: job.createdAt,
    };
  }

  /** Returns a copy; the stored bytes never leave the store. */
  fetch(jobId: string): AssembledAudio {
    const job = this.live(jobId);
    if (!job) {
      throw new NotFoundError(`Job '${jobId}' not found or has expired`);
    }
    const { audio } = job;
    return {
      ...audio,
      samples: audio.samples.slice(),
      data: Buffer.from(audio.data),
    };
  }

  has(jobId: string): boolean {
    return this.live(jobId) !== undefined;
  }

  evict(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job) {
      return false;
    }
    this.jobs.delete(jobId);
    this.bytes -= job.sizeBytes;
    return true;
  }

  /** Evicts every job created before `cutoffMs`. */
  evictOlderThan(cutoffMs: number): number {
    let removed = 0;
    for (const job of [...this.jobs.values()]) {
      if (job.createdAt < cutoffMs && this.evict(job.id)) {
        removed += 1;
      }
    }
    return removed;
  }

  /** Runs the eviction policy over all jobs. */
  gc(now: number = this.now()): number {
    const removed = this.applyPolicy(now);
    if (removed > 0) {
      log.debug({ removed }, "Expired jobs cleaned up");
    }
    return removed;
  }

  get size(): number {
    return this.jobs.size;
  }

  get totalBytes(): number {
    return this.bytes;
  }

  private applyPolicy(now: number, keepId?: string): number {
    // Map iteration follows insertion order, which is creation order.
    const ordered = [...this.jobs.values()];
    let removed = 0;
    for (const id of this.policy.select(ordered, now)) {
      if (id !== keepId && this.evict(id)) {
        removed += 1;
      }
    }
    return removed;
  }

  private live(jobId: string): SynthesisJob | undefined {
    const job = this.jobs.get(jobId);
    if (!job) {
      return undefined;
    }
    if (this.policy.isExpired?.(job, this.now())) {
      this.evict(jobId);
      log.debug({ jobId }, "Expired job dropped on read");
      return undefined;
    }
    return job;
  }

  private nextId(): string {
    let id = this.generateId();
    while (this.jobs.has(id)) {
      id = this.generateId();
    }
    return id;
  }
}
