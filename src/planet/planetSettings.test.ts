import { describe, expect, it } from "vitest";
import {
  DEFAULT_PLANET_SETTINGS,
  loadPlanetSettingsFromJson,
  parsePlanetSettings,
  PlanetSettingsValidationError,
  resolvePlanetSettingsFromEnv,
} from "./planetSettings";

describe("parsePlanetSettings", () => {
  it("layers partial payloads over the defaults", () => {
    const settings = parsePlanetSettings({ seed: 42, radius: 6 });
    expect(settings).toEqual({ seed: 42, scale: 1, radius: 6, segments: 200 });
    expect(Object.isFrozen(settings)).toBe(true);
  });

  it("returns the defaults for an empty object", () => {
    expect(parsePlanetSettings({})).toEqual(DEFAULT_PLANET_SETTINGS);
  });

  it("rejects non-object payloads", () => {
    expect(() => parsePlanetSettings([])).toThrow("Planet settings must be a JSON object");
    expect(() => parsePlanetSettings(null)).toThrow(PlanetSettingsValidationError);
  });

  it("rejects malformed fields", () => {
    expect(() => parsePlanetSettings({ scale: "big" })).toThrow("scale must be a finite number");
    expect(() => parsePlanetSettings({ seed: 1.5 })).toThrow("seed must be an integer");
    expect(() => parsePlanetSettings({ radius: 0 })).toThrow("radius must be a positive number");
    expect(() => parsePlanetSettings({ segments: 2 })).toThrow("segments must be an integer of at least 3");
  });
});

describe("loadPlanetSettingsFromJson", () => {
  it("parses JSON text", () => {
    expect(loadPlanetSettingsFromJson('{"seed":7,"scale":2.5,"segments":64}')).toEqual({
      seed: 7,
      scale: 2.5,
      radius: 1,
      segments: 64,
    });
  });

  it("wraps syntax errors with the underlying cause", () => {
    let caught: unknown;
    try {
      loadPlanetSettingsFromJson("{seed:");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(PlanetSettingsValidationError);
    if (caught instanceof PlanetSettingsValidationError) {
      expect(caught.message).toBe("Unable to parse planet settings JSON");
      expect(caught.name).toBe("PlanetSettingsValidationError");
      expect(caught.cause).toBeInstanceOf(SyntaxError);
    }
  });
});

describe("resolvePlanetSettingsFromEnv", () => {
  it("falls back to defaults when nothing is configured", () => {
    expect(resolvePlanetSettingsFromEnv({})).toEqual(DEFAULT_PLANET_SETTINGS);
  });

  it("reads trimmed PLANET_* overrides and ignores blank ones", () => {
    const settings = resolvePlanetSettingsFromEnv({
      PLANET_SEED: " 1234 ",
      PLANET_SCALE: "0.75",
      PLANET_RADIUS: "",
      PLANET_SEGMENTS: "32",
    });
    expect(settings).toEqual({ seed: 1234, scale: 0.75, radius: 1, segments: 32 });
  });

  it("reports unparsable values with the offending key", () => {
    expect(() => resolvePlanetSettingsFromEnv({ PLANET_SCALE: "tall" })).toThrow(
      'PLANET_SCALE must be a finite number, received "tall"',
    );
    expect(() => resolvePlanetSettingsFromEnv({ PLANET_SEGMENTS: "2" })).toThrow(
      "segments must be an integer of at least 3",
    );
  });
});
