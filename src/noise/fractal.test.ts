import { describe, expect, it } from "vitest";
import { fbm, ridgedFbm } from "./fractal";
import { gradientNoise } from "./gradientNoise";
import { buildPermutationTable } from "./permutationTable";

const table = buildPermutationTable(0);

describe("fbm", () => {
  it("returns zero for zero or negative octave counts", () => {
    expect(fbm(0.3, 0.7, 0.1, 0, 2, 0.5, table)).toBe(0);
    expect(fbm(0.3, 0.7, 0.1, -3, 2, 0.5, table)).toBe(0);
  });

  it("returns zero when the amplitudes cancel out instead of dividing by zero", () => {
    //1.- A gain of -1 makes the two octave amplitudes sum to exactly zero.
    expect(fbm(0.3, 0.7, 0.1, 2, 2, -1, table)).toBe(0);
  });

  it("remaps a single octave from [-1, 1] into [0, 1]", () => {
    const raw = gradientNoise(0.3, 0.7, 0.1, table);
    expect(fbm(0.3, 0.7, 0.1, 1, 2, 0.5, table)).toBeCloseTo(raw * 0.5 + 0.5, 15);
    expect(fbm(0.3, 0.7, 0.1, 1, 2, 0.5, table)).toBeCloseTo(0.42164667830562563, 14);
  });

  it("normalises multi-octave sums by the accumulated amplitude", () => {
    expect(fbm(0.3, 0.7, 0.1, 4, 2, 0.5, table)).toBeCloseTo(0.416889691895692, 14);
  });

  it("stays within [0, 1] across documented lacunarity and gain ranges", () => {
    for (let i = 0; i < 400; i += 1) {
      const octaves = 1 + (i % 6);
      const lacunarity = 1.8 + (i % 5) * 0.1;
      const gain = 0.35 + (i % 6) * 0.05;
      const value = fbm(i * 0.41 - 60, i * 0.29 + 3, i * -0.13, octaves, lacunarity, gain, table);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(1);
    }
  });

  it("floors fractional octave counts", () => {
    expect(fbm(0.3, 0.7, 0.1, 4.9, 2, 0.5, table)).toBe(fbm(0.3, 0.7, 0.1, 4, 2, 0.5, table));
  });
});

describe("ridgedFbm", () => {
  it("folds a single octave into (1 - |n|)^2", () => {
    const raw = gradientNoise(0.3, 0.7, 0.1, table);
    expect(ridgedFbm(0.3, 0.7, 0.1, 1, 2, 0.5, table)).toBeCloseTo((1 - Math.abs(raw)) ** 2, 15);
    expect(ridgedFbm(0.3, 0.7, 0.1, 1, 2, 0.5, table)).toBeCloseTo(0.711143685304671, 14);
  });

  it("carries the clamped weight between octaves", () => {
    expect(ridgedFbm(0.3, 0.7, 0.1, 3, 2, 0.5, table)).toBeCloseTo(0.7661191743329558, 14);
  });

  it("stops adding detail after an octave when gain zeroes the weight", () => {
    //1.- With gain 0 the carried weight collapses, so later octaves contribute nothing.
    expect(ridgedFbm(0.3, 0.7, 0.1, 5, 2, 0, table)).toBe(ridgedFbm(0.3, 0.7, 0.1, 1, 2, 0, table));
  });

  it("never goes negative", () => {
    for (let i = 0; i < 400; i += 1) {
      const value = ridgedFbm(i * 0.37 - 40, i * 0.21, i * 0.53 + 9, 1 + (i % 4), 2, 0.5, table);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(2);
    }
  });

  it("returns zero without octaves", () => {
    expect(ridgedFbm(0.3, 0.7, 0.1, 0, 2, 0.5, table)).toBe(0);
  });
});
