import { smoothstep } from "../math/scalar";
import { normalize, scale, type Vec3 } from "../math/vector";
import { fbm, ridgedFbm } from "../noise/fractal";
import type { GenerationContext } from "./generationContext";

export const SEA_LEVEL = 0.45;
export const MACRO_WEIGHT = 0.65;
export const MICRO_WEIGHT = 0.3;
export const RIDGE_WEIGHT = 0.6;
export const POLAR_BOOST = 0.08;

export interface HeightSample {
  readonly direction: Vec3;
  readonly macro: number;
  readonly micro: number;
  readonly ridge: number;
  readonly continentMask: number;
  readonly polarBoost: number;
  //1.- Signed elevation after sea level and scale; negative values lie under water.
  readonly height: number;
}

export function sampleHeight(context: GenerationContext, direction: Vec3): HeightSample {
  const { parameters: params, permutation } = context;
  //1.- Evaluate on the unit sphere so the field is independent of the input length.
  const n = normalize(direction);
  //2.- Macro continents, micro detail and ridged mountains all share lacunarity and gain.
  const macro =
    fbm(
      n.x * params.macroFreq,
      n.y * params.macroFreq,
      n.z * params.macroFreq,
      params.macroOctaves,
      params.lacunarity,
      params.gain,
      permutation,
    ) * params.macroAmp;
  const micro =
    fbm(
      n.x * params.microFreq,
      n.y * params.microFreq,
      n.z * params.microFreq,
      params.microOctaves,
      params.lacunarity,
      params.gain,
      permutation,
    ) * params.microAmp;
  const ridge =
    ridgedFbm(
      n.x * params.ridgeFreq,
      n.y * params.ridgeFreq,
      n.z * params.ridgeFreq,
      params.ridgeOctaves,
      params.lacunarity,
      params.gain,
      permutation,
    ) * params.ridgeAmp;
  //3.- Suppress mountains in ocean basins and lift the caps around the polar (y) axis.
  const continentMask = smoothstep(0.35, 0.65, macro);
  const polarBoost = smoothstep(0.6, 0.95, Math.abs(n.y)) * POLAR_BOOST;
  const combined =
    macro * MACRO_WEIGHT + micro * MICRO_WEIGHT + ridge * continentMask * RIDGE_WEIGHT + polarBoost;
  return {
    direction: n,
    macro,
    micro,
    ridge,
    continentMask,
    polarBoost,
    height: (combined - SEA_LEVEL) * context.scale,
  };
}

export function height(context: GenerationContext, direction: Vec3): number {
  return sampleHeight(context, direction).height;
}

export function finalPosition(context: GenerationContext, direction: Vec3): Vec3 {
  //1.- Push the unit direction out to the base radius plus the scaled signed height.
  const sample = sampleHeight(context, direction);
  return scale(sample.direction, context.radius + sample.height);
}
