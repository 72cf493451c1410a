export function clamp(value: number, min: number, max: number): number {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
}

export function lerp(a: number, b: number, t: number): number {
  return a + t * (b - a);
}

export function smoothstep(edge0: number, edge1: number, x: number): number {
  //1.- Clamp the interpolation factor before applying the cubic Hermite blend t^2(3 - 2t).
  const t = clamp((x - edge0) / (edge1 - edge0), 0, 1);
  return t * t * (3 - 2 * t);
}

export function fade(t: number): number {
  //1.- Quintic curve 6t^5 - 15t^4 + 10t^3 keeps first and second derivatives continuous at lattice faces.
  return t * t * t * (t * (t * 6 - 15) + 10);
}
