import { mergeLogger, type Logger } from "../logging/logger";
import type { Vec3 } from "../math/vector";
import {
  createGenerationContext,
  defaultGenerationContext,
  type GenerationContext,
} from "./generationContext";
import { finalPosition, height } from "./heightField";

export interface PlanetGeneratorOptions {
  logger?: Partial<Logger>;
}

function resolveCount(available: number, count: number | undefined): number {
  //1.- Default to every available point and never read past the end of the input.
  if (count === undefined) {
    return available;
  }
  //2.- NaN and negative counts, -Infinity included, select nothing; +Infinity selects everything.
  if (Number.isNaN(count)) {
    return 0;
  }
  return Math.min(available, Math.max(0, Math.floor(count)));
}

/**
 * Session facade over the height field. `init` swaps in a freshly built, frozen
 * {@link GenerationContext}; queries read whichever context is current, so a re-seed never
 * exposes a partially rebuilt permutation table.
 */
export class PlanetGenerator {
  private readonly logger: Logger;
  private current: GenerationContext | null = null;
  private warnedUninitialised = false;

  constructor(options: PlanetGeneratorOptions = {}) {
    this.logger = mergeLogger(options.logger);
  }

  get initialised(): boolean {
    return this.current !== null;
  }

  get context(): GenerationContext {
    //1.- Before init, hand out the shared seed 0 context so every query stays defined.
    if (this.current === null) {
      if (!this.warnedUninitialised) {
        this.warnedUninitialised = true;
        this.logger.warn("planet queried before init; falling back to seed 0");
      }
      return defaultGenerationContext();
    }
    return this.current;
  }

  init(seed: number, scale: number, radius: number): GenerationContext {
    //1.- Build the complete replacement first, then publish it with a single assignment.
    const next = createGenerationContext({ seed, scale, radius });
    this.current = next;
    this.logger.debug("planet context initialised", { seed: next.seed, scale, radius });
    return next;
  }

  height(x: number, y: number, z: number): number {
    return height(this.context, { x, y, z });
  }

  finalPosition(x: number, y: number, z: number): Vec3 {
    return finalPosition(this.context, { x, y, z });
  }

  batchDisplace(points: readonly Vec3[], count?: number): Vec3[] {
    //1.- Pin the context once so the whole batch is evaluated against a single seed.
    const context = this.context;
    const total = resolveCount(points.length, count);
    const displaced: Vec3[] = new Array<Vec3>(total);
    for (let index = 0; index < total; index += 1) {
      displaced[index] = finalPosition(context, points[index]);
    }
    return displaced;
  }

  displaceBuffer(positions: Float32Array, count?: number): Float32Array {
    //1.- Treat the buffer as packed xyz triplets and write the displaced points into a fresh array.
    const context = this.context;
    const total = resolveCount(Math.floor(positions.length / 3), count);
    const output = new Float32Array(total * 3);
    for (let index = 0; index < total; index += 1) {
      const offset = index * 3;
      const displaced = finalPosition(context, {
        x: positions[offset],
        y: positions[offset + 1],
        z: positions[offset + 2],
      });
      output[offset] = displaced.x;
      output[offset + 1] = displaced.y;
      output[offset + 2] = displaced.z;
    }
    return output;
  }
}
