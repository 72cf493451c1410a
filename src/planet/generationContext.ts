import { buildPermutationTable, type PermutationTable } from "../noise/permutationTable";
import { deriveNoiseParameters, type NoiseParameters } from "./noiseParameters";

export interface GenerationContext {
  //1.- Unsigned seed both the permutation table and the noise parameters were derived from.
  readonly seed: number;
  //2.- Multiplier applied to the signed height after sea level is subtracted.
  readonly scale: number;
  //3.- Base sphere radius the height is added to when displacing positions.
  readonly radius: number;
  readonly parameters: NoiseParameters;
  readonly permutation: PermutationTable;
}

export interface GenerationContextInput {
  seed: number;
  scale: number;
  radius: number;
}

export const DEFAULT_SEED = 0;
export const DEFAULT_SCALE = 1;
export const DEFAULT_RADIUS = 1;

export class GenerationContextError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GenerationContextError";
  }
}

function ensureFinite(value: number, field: string): number {
  if (!Number.isFinite(value)) {
    throw new GenerationContextError(`${field} must be a finite number`);
  }
  return value;
}

export function createGenerationContext({ seed, scale, radius }: GenerationContextInput): GenerationContext {
  //1.- Reject inputs that would poison every downstream height with NaN.
  ensureFinite(seed, "seed");
  ensureFinite(scale, "scale");
  ensureFinite(radius, "radius");
  //2.- Interpret the seed as a 32-bit integer the way callers passing int32 values expect.
  const normalisedSeed = Math.trunc(seed) >>> 0;
  //3.- Build every derived structure up front and freeze the bundle so readers can share it freely.
  return Object.freeze({
    seed: normalisedSeed,
    scale,
    radius,
    parameters: deriveNoiseParameters(normalisedSeed),
    permutation: buildPermutationTable(normalisedSeed),
  });
}

let defaultContext: GenerationContext | null = null;

export function defaultGenerationContext(): GenerationContext {
  if (defaultContext === null) {
    defaultContext = createGenerationContext({
      seed: DEFAULT_SEED,
      scale: DEFAULT_SCALE,
      radius: DEFAULT_RADIUS,
    });
  }
  return defaultContext;
}
