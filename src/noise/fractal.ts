import { clamp } from "../math/scalar";
import { gradientNoise } from "./gradientNoise";
import type { PermutationTable } from "./permutationTable";

function octaveCount(octaves: number): number {
  //1.- Treat non-finite or fractional counts as the largest whole number of octaves they allow.
  return Number.isFinite(octaves) ? Math.max(0, Math.floor(octaves)) : 0;
}

/**
 * Fractal Brownian motion normalised into [0, 1]. Each octave is remapped from [-1, 1]
 * before weighting, and the sum is divided by the accumulated amplitude.
 */
export function fbm(
  x: number,
  y: number,
  z: number,
  octaves: number,
  lacunarity: number,
  gain: number,
  table?: PermutationTable,
): number {
  const count = octaveCount(octaves);
  let amplitude = 1;
  let frequency = 1;
  let sum = 0;
  let amplitudeSum = 0;
  for (let i = 0; i < count; i += 1) {
    //1.- Remap the octave into [0, 1]; the clamp absorbs the few samples improved noise pushes past one.
    const n = gradientNoise(x * frequency, y * frequency, z * frequency, table);
    sum += clamp(n * 0.5 + 0.5, 0, 1) * amplitude;
    amplitudeSum += amplitude;
    amplitude *= gain;
    frequency *= lacunarity;
  }
  //2.- Zero octaves or amplitudes cancelling to nothing yield zero rather than a division by zero.
  if (amplitudeSum === 0 || !Number.isFinite(amplitudeSum)) {
    return 0;
  }
  return sum / amplitudeSum;
}

/**
 * Ridged multifractal noise, non-negative and typically below ~1.2. Gain only feeds the
 * weight carried between octaves; octave amplitude always halves.
 */
export function ridgedFbm(
  x: number,
  y: number,
  z: number,
  octaves: number,
  lacunarity: number,
  gain: number,
  table?: PermutationTable,
): number {
  const count = octaveCount(octaves);
  let sum = 0;
  let frequency = 1;
  let amplitude = 1;
  let weight = 1;
  for (let i = 0; i < count; i += 1) {
    //1.- Fold the signal around zero and square it so ridges become sharp crests.
    const folded = 1 - Math.abs(gradientNoise(x * frequency, y * frequency, z * frequency, table));
    //2.- Scale by the previous octave's weight so detail only grows along existing ridge lines.
    const n = folded * folded * weight;
    sum += n * amplitude;
    weight = clamp(n * gain, 0, 1);
    frequency *= lacunarity;
    amplitude *= 0.5;
  }
  return sum;
}
