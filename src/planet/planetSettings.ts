import { readEnvValue, type EnvMap } from "../config/env";

export interface PlanetSettings {
  //1.- Integer seed driving both the permutation table and the derived noise parameters.
  readonly seed: number;
  //2.- Height multiplier applied after sea level is subtracted.
  readonly scale: number;
  //3.- Base radius of the sphere before displacement.
  readonly radius: number;
  //4.- Width and height segment count of the sphere mesh handed to the displacement pass.
  readonly segments: number;
}

export const DEFAULT_PLANET_SETTINGS: PlanetSettings = Object.freeze({
  seed: 0,
  scale: 1,
  radius: 1,
  segments: 200,
});

export class PlanetSettingsValidationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PlanetSettingsValidationError";
  }
}

function ensureRecord(value: unknown): Record<string, unknown> {
  //1.- Confirm the payload is an object literal before attempting to read its properties.
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new PlanetSettingsValidationError("Planet settings must be a JSON object");
  }
  return value as Record<string, unknown>;
}

function ensureNumber(value: unknown, field: string, fallback: number): number {
  //1.- Missing fields inherit the defaults; present ones must be finite numbers.
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new PlanetSettingsValidationError(`${field} must be a finite number`);
  }
  return value;
}

function validate(settings: PlanetSettings): PlanetSettings {
  if (!Number.isInteger(settings.seed)) {
    throw new PlanetSettingsValidationError("seed must be an integer");
  }
  if (settings.radius <= 0) {
    throw new PlanetSettingsValidationError("radius must be a positive number");
  }
  if (!Number.isInteger(settings.segments) || settings.segments < 3) {
    throw new PlanetSettingsValidationError("segments must be an integer of at least 3");
  }
  return Object.freeze({ ...settings });
}

export function parsePlanetSettings(raw: unknown): PlanetSettings {
  //1.- Convert untyped JSON into a typed record, layering it over the defaults.
  const record = ensureRecord(raw);
  return validate({
    seed: ensureNumber(record.seed, "seed", DEFAULT_PLANET_SETTINGS.seed),
    scale: ensureNumber(record.scale, "scale", DEFAULT_PLANET_SETTINGS.scale),
    radius: ensureNumber(record.radius, "radius", DEFAULT_PLANET_SETTINGS.radius),
    segments: ensureNumber(record.segments, "segments", DEFAULT_PLANET_SETTINGS.segments),
  });
}

export function loadPlanetSettingsFromJson(json: string): PlanetSettings {
  //1.- Parse the text payload so syntax errors surface as validation feedback.
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new PlanetSettingsValidationError("Unable to parse planet settings JSON", { cause: error });
  }
  return parsePlanetSettings(parsed);
}

function parseEnvNumber(env: EnvMap, name: string, fallback: number): number {
  const raw = readEnvValue(env, name);
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new PlanetSettingsValidationError(`${name} must be a finite number, received "${raw}"`);
  }
  return value;
}

export function resolvePlanetSettingsFromEnv(env: EnvMap = process.env): PlanetSettings {
  //1.- Read each PLANET_* override, keeping the defaults for unset or blank keys.
  return validate({
    seed: parseEnvNumber(env, "PLANET_SEED", DEFAULT_PLANET_SETTINGS.seed),
    scale: parseEnvNumber(env, "PLANET_SCALE", DEFAULT_PLANET_SETTINGS.scale),
    radius: parseEnvNumber(env, "PLANET_RADIUS", DEFAULT_PLANET_SETTINGS.radius),
    segments: parseEnvNumber(env, "PLANET_SEGMENTS", DEFAULT_PLANET_SETTINGS.segments),
  });
}
