export const GENDERS = ["male", "female"] as const;
export const AREAS = ["northern", "southern", "central"] as const;
export const GROUPS = ["story", "news", "audiobook", "interview", "review"] as const;
export const EMOTIONS = [
  "neutral",
  "serious",
  "monotone",
  "sad",
  "surprised",
  "happy",
  "angry",
] as const;

export const UNSPECIFIED = "unspecified";
export type Unspecified = typeof UNSPECIFIED;

export type Gender = (typeof GENDERS)[number];
export type Area = (typeof AREAS)[number];
export type Group = (typeof GROUPS)[number];
export type Emotion = (typeof EMOTIONS)[number];

export type VoiceParameters = Readonly<{
  gender: Gender | Unspecified;
  area: Area | Unspecified;
  group: Group | Unspecified;
  emotion: Emotion | Unspecified;
}>;

export type VoiceField = keyof VoiceParameters;

/** Raw, unvalidated values as they arrive from a request or the environment. */
export type ExplicitVoiceParameters = Partial<Record<VoiceField, unknown>>;

export type VoiceDefaults = Partial<{
  gender: Gender;
  area: Area;
  group: Group;
  emotion: Emotion;
}>;
