import { describe, it, expect } from "vitest";

import { InvalidParameterError } from "../errors.js";
import { parseVoiceDefaults, resolveVoice } from "./voice-resolver.js";

describe("resolveVoice", () => {
  it("prefers explicit values, then defaults, then unspecified", () => {
    const voice = resolveVoice(
      { gender: "female", emotion: null },
      { gender: "male", area: "southern", emotion: "happy" },
    );

    expect(voice).toEqual({
      gender: "female",
      area: "southern",
      group: "unspecified",
      emotion: "happy",
    });
  });

  it("returns a frozen value", () => {
    const voice = resolveVoice({}, {});
    expect(Object.isFrozen(voice)).toBe(true);
    expect(voice).toEqual({
      gender: "unspecified",
      area: "unspecified",
      group: "unspecified",
      emotion: "unspecified",
    });
  });

  it("names the offending field for values outside the enumeration", () => {
    let caught: unknown;
    try {
      resolveVoice({ group: "podcast" }, { group: "news" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidParameterError);
    expect(caught).toMatchObject({ field: "group", code: "INVALID_PARAMETER" });
  });

  it("rejects non-string explicit values", () => {
    expect(() => resolveVoice({ emotion: 3 }, {})).toThrow(InvalidParameterError);
  });
});

describe("parseVoiceDefaults", () => {
  it("ignores blank entries and validates the rest", () => {
    expect(parseVoiceDefaults({ gender: "female", area: " ", group: undefined })).toEqual({
      gender: "female",
      area: undefined,
      group: undefined,
      emotion: undefined,
    });
    expect(() => parseVoiceDefaults({ area: "western" })).toThrow(InvalidParameterError);
  });
});
