import { InvalidParameterError } from "../errors.js";
import {
  AREAS,
  EMOTIONS,
  GENDERS,
  GROUPS,
  UNSPECIFIED,
  type ExplicitVoiceParameters,
  type Unspecified,
  type VoiceDefaults,
  type VoiceField,
  type VoiceParameters,
} from "../types/voice.js";

function matchMember<T extends string>(
  allowed: readonly T[],
  value: unknown,
): T | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  return allowed.find((member) => member === value);
}

function isAbsent(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

function requireMember<T extends string>(
  field: VoiceField,
  allowed: readonly T[],
  value: unknown,
): T {
  const member = matchMember(allowed, value);
  if (member === undefined) {
    throw new InvalidParameterError(
      field,
      `Invalid ${field} ${JSON.stringify(value)}; expected one of: ${allowed.join(", ")}`,
    );
  }
  return member;
}

function resolveField<T extends string>(
  field: VoiceField,
  allowed: readonly T[],
  explicit: unknown,
  fallback: T | undefined,
): T | Unspecified {
  if (!isAbsent(explicit)) {
    return requireMember(field, allowed, explicit);
  }
  return fallback ?? UNSPECIFIED;
}

/**
 * Resolves the voice for one request: explicit value, then configured
 * default, then "unspecified". The result is frozen and reused for every
 * chunk of the request.
 */
export function resolveVoice(
  explicit: ExplicitVoiceParameters,
  defaults: VoiceDefaults,
): VoiceParameters {
  return Object.freeze({
    gender: resolveField("gender", GENDERS, explicit.gender, defaults.gender),
    area: resolveField("area", AREAS, explicit.area, defaults.area),
    group: resolveField("group", GROUPS, explicit.group, defaults.group),
    emotion: resolveField("emotion", EMOTIONS, explicit.emotion, defaults.emotion),
  });
}

/** Validates configured defaults; blank values are treated as not configured. */
export function parseVoiceDefaults(
  raw: Partial<Record<VoiceField, string | undefined>>,
): VoiceDefaults {
  const pick = <T extends string>(field: VoiceField, allowed: readonly T[]): T | undefined => {
    const value = raw[field]?.trim();
    return value ? requireMember(field, allowed, value) : undefined;
  };

  return Object.freeze({
    gender: pick("gender", GENDERS),
    area: pick("area", AREAS),
    group: pick("group", GROUPS),
    emotion: pick("emotion", EMOTIONS),
  });
}
