import { env } from "./env.js";
import { parseVoiceDefaults } from "../services/voice-resolver.js";
import type { VoiceDefaults } from "../types/voice.js";

let cachedVoiceDefaults: VoiceDefaults | undefined;

/** Returns the cached voice defaults derived from the environment. */
export function getVoiceDefaults(): VoiceDefaults {
  if (cachedVoiceDefaults) {
    return cachedVoiceDefaults;
  }

  cachedVoiceDefaults = parseVoiceDefaults(env.defaultVoice);
  return cachedVoiceDefaults;
}
