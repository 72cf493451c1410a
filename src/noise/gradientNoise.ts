import { fade, lerp } from "../math/scalar";
import { defaultPermutationTable, type PermutationTable } from "./permutationTable";

export function grad(hash: number, x: number, y: number, z: number): number {
  //1.- The low four bits pick one of the twelve cube-edge gradients (four repeated) and dot it with the offset.
  const h = hash & 15;
  const u = h < 8 ? x : y;
  const v = h < 4 ? y : h === 12 || h === 14 ? x : z;
  return ((h & 1) === 0 ? u : -u) + ((h & 2) === 0 ? v : -v);
}

/**
 * Improved Perlin noise in three dimensions, approximately in [-1, 1] and zero at every
 * lattice point. Falls back to the seed 0 table when none is supplied.
 */
export function gradientNoise(
  x: number,
  y: number,
  z: number,
  table: PermutationTable = defaultPermutationTable(),
): number {
  const p = table.values;
  //1.- Split each coordinate into a wrapped lattice cell and the fractional offset inside it.
  const floorX = Math.floor(x);
  const floorY = Math.floor(y);
  const floorZ = Math.floor(z);
  const cellX = floorX & 255;
  const cellY = floorY & 255;
  const cellZ = floorZ & 255;
  const fx = x - floorX;
  const fy = y - floorY;
  const fz = z - floorZ;
  //2.- Ease the offsets so the interpolation weights have continuous derivatives.
  const u = fade(fx);
  const v = fade(fy);
  const w = fade(fz);
  //3.- Hash the eight surrounding corners through the duplicated permutation table.
  const a = p[cellX] + cellY;
  const aa = p[a] + cellZ;
  const ab = p[a + 1] + cellZ;
  const b = p[cellX + 1] + cellY;
  const ba = p[b] + cellZ;
  const bb = p[b + 1] + cellZ;
  //4.- Blend the corner gradient contributions trilinearly.
  return lerp(
    lerp(
      lerp(grad(p[aa], fx, fy, fz), grad(p[ba], fx - 1, fy, fz), u),
      lerp(grad(p[ab], fx, fy - 1, fz), grad(p[bb], fx - 1, fy - 1, fz), u),
      v,
    ),
    lerp(
      lerp(grad(p[aa + 1], fx, fy, fz - 1), grad(p[ba + 1], fx - 1, fy, fz - 1), u),
      lerp(grad(p[ab + 1], fx, fy - 1, fz - 1), grad(p[bb + 1], fx - 1, fy - 1, fz - 1), u),
      v,
    ),
    w,
  );
}
