export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

const DEGENERATE_LENGTH = 1e-9;

export const ZERO_VECTOR: Vec3 = Object.freeze({ x: 0, y: 0, z: 0 });

export function vec3(x = 0, y = 0, z = 0): Vec3 {
  return { x, y, z };
}

export function length(v: Vec3): number {
  return Math.hypot(v.x, v.y, v.z);
}

export function scale(v: Vec3, s: number): Vec3 {
  return { x: v.x * s, y: v.y * s, z: v.z * s };
}

export function normalize(v: Vec3): Vec3 {
  //1.- Collapse degenerate inputs onto the origin rather than dividing by a vanishing length.
  const len = length(v);
  if (!(len > DEGENERATE_LENGTH)) {
    return ZERO_VECTOR;
  }
  return { x: v.x / len, y: v.y / len, z: v.z / len };
}
