export interface SurfaceClassification {
  //1.- 1 where the vertex sits below sea level (negative height), 0 on land.
  readonly oceanMask: Uint8Array;
  readonly oceanVertexCount: number;
  readonly landVertexCount: number;
  readonly oceanFraction: number;
  readonly minHeight: number;
  readonly maxHeight: number;
}

export function classifySurface(heights: ArrayLike<number>): SurfaceClassification {
  //1.- Allocate a mask mirroring the vertex count so consumers can branch on ocean membership.
  const vertexCount = heights.length;
  const oceanMask = new Uint8Array(vertexCount);
  let oceanCount = 0;
  let minHeight = Infinity;
  let maxHeight = -Infinity;
  //2.- Flag every vertex under the zero sea level and track the elevation extremes.
  for (let index = 0; index < vertexCount; index += 1) {
    const value = heights[index];
    if (value < 0) {
      oceanMask[index] = 1;
      oceanCount += 1;
    }
    if (value < minHeight) {
      minHeight = value;
    }
    if (value > maxHeight) {
      maxHeight = value;
    }
  }
  const classification: SurfaceClassification = {
    oceanMask,
    oceanVertexCount: oceanCount,
    landVertexCount: vertexCount - oceanCount,
    oceanFraction: vertexCount > 0 ? oceanCount / vertexCount : 0,
    minHeight: vertexCount > 0 ? minHeight : 0,
    maxHeight: vertexCount > 0 ? maxHeight : 0,
  };
  return Object.freeze(classification);
}
