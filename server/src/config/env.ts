import { config as loadEnv } from "dotenv";

import { MAX_SPEED, MIN_SPEED } from "../types/audio.js";

loadEnv();

const secondInMs = 1000;

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type CrossFadeCurve = "linear" | "equal-power";

type Range = { min?: number; max?: number };

function parseLogLevel(value: string | undefined): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value);
  return match ?? "info";
}

function checkRange(name: string, value: number, range: Range): number {
  if (range.min !== undefined && value < range.min) {
    throw new Error(`${name} must be at least ${range.min}, got ${value}`);
  }
  if (range.max !== undefined && value > range.max) {
    throw new Error(`${name} must be at most ${range.max}, got ${value}`);
  }
  return value;
}

function parseIntVar(
  source: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  range: Range = {},
): number {
  const raw = source[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return checkRange(name, parsed, range);
}

function parseFloatVar(
  source: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  range: Range = {},
): number {
  const raw = source[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return checkRange(name, parsed, range);
}

function parseCurve(value: string | undefined): CrossFadeCurve {
  return value === "equal-power" ? "equal-power" : "linear";
}

/** Builds the settings object; out-of-range numbers fail at startup. */
export function readEnv(source: NodeJS.ProcessEnv) {
  return {
    port: parseIntVar(source, "PORT", 3000, { min: 0, max: 65535 }),
    host: source.HOST ?? "0.0.0.0",
    logLevel: parseLogLevel(source.LOG_LEVEL),
    synthBackendUrl: source.SYNTH_BACKEND_URL ?? "http://localhost:8000",
    synthesisConcurrency: parseIntVar(source, "SYNTHESIS_CONCURRENCY", 2, { min: 1 }),
    normalizeText: source.NORMALIZE_TEXT === "true",
    maxChars: parseIntVar(source, "MAX_CHARS", 135, { min: 1 }),
    maxInputChars: parseIntVar(source, "MAX_INPUT_CHARS", 500, { min: 1 }),
    minChunkRatio: parseFloatVar(source, "MIN_CHUNK_RATIO", 0.2, { min: 0, max: 1 }),
    mergeTolerance: parseIntVar(source, "MERGE_TOLERANCE", 0, { min: 0 }),
    crossFadeSeconds: parseFloatVar(source, "CROSS_FADE_SECONDS", 0.1, { min: 0 }),
    crossFadeCurve: parseCurve(source.CROSS_FADE_CURVE),
    minTargetSeconds: parseFloatVar(source, "MIN_TARGET_SECONDS", 1.0, { min: 0 }),
    defaultSpeed: parseFloatVar(source, "DEFAULT_SPEED", 0.9, {
      min: MIN_SPEED,
      max: MAX_SPEED,
    }),
    jobTtlMs: parseIntVar(source, "JOB_TTL_MS", 4800 * secondInMs, { min: 1 }),
    maxJobs: parseIntVar(source, "MAX_JOBS", 256, { min: 1 }),
    maxJobBytes: parseIntVar(source, "MAX_JOB_BYTES", 256 * 1024 * 1024, { min: 1 }),
    defaultVoice: {
      gender: source.DEFAULT_GENDER,
      area: source.DEFAULT_AREA,
      group: source.DEFAULT_GROUP,
      emotion: source.DEFAULT_EMOTION,
    },
  };
}

export const env = readEnv(process.env);

export type Env = typeof env;
