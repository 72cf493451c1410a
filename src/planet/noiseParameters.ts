import { randomRange } from "../noise/seededHash";

export interface NoiseParameters {
  //1.- Continent scale: low frequency macro field controlling land masses.
  readonly macroFreq: number;
  readonly macroOctaves: number;
  readonly macroAmp: number;
  //2.- Detail scale: higher frequency micro field roughening the surface.
  readonly microFreq: number;
  readonly microOctaves: number;
  readonly microAmp: number;
  //3.- Mountain scale: ridged field gated by the continent mask.
  readonly ridgeFreq: number;
  readonly ridgeOctaves: number;
  readonly ridgeAmp: number;
  //4.- Shared spectral controls for every fractal sum.
  readonly lacunarity: number;
  readonly gain: number;
}

export type NoiseParameterField = keyof NoiseParameters;

export interface NoiseParameterRange {
  readonly salt: number;
  readonly min: number;
  readonly max: number;
  readonly integer: boolean;
}

export const NOISE_PARAMETER_RANGES: Readonly<Record<NoiseParameterField, NoiseParameterRange>> =
  Object.freeze({
    macroFreq: { salt: 11, min: 0.03, max: 0.18, integer: false },
    macroOctaves: { salt: 12, min: 2, max: 5, integer: true },
    macroAmp: { salt: 13, min: 0.6, max: 1.6, integer: false },
    microFreq: { salt: 21, min: 0.8, max: 3.0, integer: false },
    microOctaves: { salt: 22, min: 2, max: 6, integer: true },
    microAmp: { salt: 23, min: 0.05, max: 0.5, integer: false },
    ridgeFreq: { salt: 31, min: 0.6, max: 2.5, integer: false },
    ridgeOctaves: { salt: 32, min: 1, max: 4, integer: true },
    ridgeAmp: { salt: 33, min: 0.2, max: 1.2, integer: false },
    lacunarity: { salt: 41, min: 1.8, max: 2.2, integer: false },
    gain: { salt: 42, min: 0.35, max: 0.6, integer: false },
  });

function sampleField(seed: number, field: NoiseParameterField): number {
  //1.- Every field draws from its own fixed salt so fields never alias one another for a seed.
  const range = NOISE_PARAMETER_RANGES[field];
  const value = randomRange(seed, range.salt, range.min, range.max);
  return range.integer ? Math.floor(value) : value;
}

export function deriveNoiseParameters(seed: number): NoiseParameters {
  const normalisedSeed = seed >>> 0;
  return Object.freeze({
    macroFreq: sampleField(normalisedSeed, "macroFreq"),
    macroOctaves: sampleField(normalisedSeed, "macroOctaves"),
    macroAmp: sampleField(normalisedSeed, "macroAmp"),
    microFreq: sampleField(normalisedSeed, "microFreq"),
    microOctaves: sampleField(normalisedSeed, "microOctaves"),
    microAmp: sampleField(normalisedSeed, "microAmp"),
    ridgeFreq: sampleField(normalisedSeed, "ridgeFreq"),
    ridgeOctaves: sampleField(normalisedSeed, "ridgeOctaves"),
    ridgeAmp: sampleField(normalisedSeed, "ridgeAmp"),
    lacunarity: sampleField(normalisedSeed, "lacunarity"),
    gain: sampleField(normalisedSeed, "gain"),
  } satisfies NoiseParameters);
}
