export { DEFAULT_LOGGER, mergeLogger, type Logger } from "./logging/logger";
export { readEnvValue, type EnvMap } from "./config/env";
export { clamp, fade, lerp, smoothstep } from "./math/scalar";
export { length, normalize, scale, vec3, ZERO_VECTOR, type Vec3 } from "./math/vector";
export { hash01, hash32, randomRange } from "./noise/seededHash";
export {
  buildPermutationTable,
  defaultPermutationTable,
  mulberry32,
  PERMUTATION_SIZE,
  type PermutationTable,
} from "./noise/permutationTable";
export { grad, gradientNoise } from "./noise/gradientNoise";
export { fbm, ridgedFbm } from "./noise/fractal";
export {
  deriveNoiseParameters,
  NOISE_PARAMETER_RANGES,
  type NoiseParameterField,
  type NoiseParameterRange,
  type NoiseParameters,
} from "./planet/noiseParameters";
export {
  createGenerationContext,
  defaultGenerationContext,
  DEFAULT_RADIUS,
  DEFAULT_SCALE,
  DEFAULT_SEED,
  GenerationContextError,
  type GenerationContext,
  type GenerationContextInput,
} from "./planet/generationContext";
export {
  finalPosition,
  height,
  MACRO_WEIGHT,
  MICRO_WEIGHT,
  POLAR_BOOST,
  RIDGE_WEIGHT,
  sampleHeight,
  SEA_LEVEL,
  type HeightSample,
} from "./planet/heightField";
export { PlanetGenerator, type PlanetGeneratorOptions } from "./planet/planetGenerator";
export {
  DEFAULT_PLANET_SETTINGS,
  loadPlanetSettingsFromJson,
  parsePlanetSettings,
  PlanetSettingsValidationError,
  resolvePlanetSettingsFromEnv,
  type PlanetSettings,
} from "./planet/planetSettings";
export { classifySurface, type SurfaceClassification } from "./planet/surfaceClassification";
export {
  applyDisplacement,
  buildPlanetGeometry,
  createPlanetGeometry,
  type DisplacementResult,
  type PlanetGeometryBundle,
} from "./planet/planetGeometry";
