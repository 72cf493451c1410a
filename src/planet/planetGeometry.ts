import * as THREE from "three";
import { createGenerationContext, type GenerationContext } from "./generationContext";
import { sampleHeight } from "./heightField";
import type { PlanetSettings } from "./planetSettings";
import { classifySurface, type SurfaceClassification } from "./surfaceClassification";

export interface DisplacementResult {
  readonly vertexCount: number;
  //1.- Signed height per vertex in attribute order.
  readonly heights: Float32Array;
  readonly surface: SurfaceClassification;
}

export interface PlanetGeometryBundle {
  readonly geometry: THREE.SphereGeometry;
  readonly context: GenerationContext;
  readonly result: DisplacementResult;
}

export function createPlanetGeometry(settings: Pick<PlanetSettings, "segments">): THREE.SphereGeometry {
  //1.- Start from a unit sphere; displacement rewrites every vertex to its final radius.
  return new THREE.SphereGeometry(1, settings.segments, settings.segments);
}

export function applyDisplacement(
  geometry: THREE.BufferGeometry,
  context: GenerationContext,
): DisplacementResult {
  const position = geometry.getAttribute("position");
  const vertexCount = position.count;
  const heights = new Float32Array(vertexCount);
  //1.- Reuse one scratch vector while walking the attribute to avoid heap churn in the vertex loop.
  const scratch = new THREE.Vector3();
  for (let index = 0; index < vertexCount; index += 1) {
    scratch.set(position.getX(index), position.getY(index), position.getZ(index));
    const sample = sampleHeight(context, scratch);
    const radius = context.radius + sample.height;
    heights[index] = sample.height;
    position.setXYZ(
      index,
      sample.direction.x * radius,
      sample.direction.y * radius,
      sample.direction.z * radius,
    );
  }
  //2.- Flag the upload and rebuild normals so lighting follows the displaced surface.
  position.needsUpdate = true;
  geometry.computeVertexNormals();
  return Object.freeze({ vertexCount, heights, surface: classifySurface(heights) });
}

export function buildPlanetGeometry(settings: PlanetSettings): PlanetGeometryBundle {
  const context = createGenerationContext(settings);
  const geometry = createPlanetGeometry(settings);
  const result = applyDisplacement(geometry, context);
  return Object.freeze({ geometry, context, result });
}
