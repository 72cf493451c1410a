const FRACTION_BITS = 0xffffff;
const FRACTION_SCALE = 0x1000000;

export function hash32(input: number): number {
  //1.- Run the integer avalanche finaliser entirely in unsigned 32-bit space.
  let x = input >>> 0;
  x = (x ^ 61 ^ (x >>> 16)) >>> 0;
  x = (x + (x << 3)) >>> 0;
  x = (x ^ (x >>> 4)) >>> 0;
  x = Math.imul(x, 0x27d4eb2d) >>> 0;
  x = (x ^ (x >>> 15)) >>> 0;
  return x;
}

export function hash01(seed: number, salt = 0): number {
  //1.- Keep the low 24 bits so the quotient is exactly representable and strictly below one.
  const mixed = hash32((seed >>> 0) + (salt >>> 0));
  return (mixed & FRACTION_BITS) / FRACTION_SCALE;
}

export function randomRange(seed: number, salt: number, min: number, max: number): number {
  return min + (max - min) * hash01(seed, salt);
}
