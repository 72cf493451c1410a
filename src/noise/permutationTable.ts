export const PERMUTATION_SIZE = 256;

export interface PermutationTable {
  //1.- Seed the shuffle was derived from, kept for diagnostics and equality checks.
  readonly seed: number;
  //2.- 512 lattice hashes: a permutation of 0..255 followed by an identical copy.
  readonly values: readonly number[];
}

export function mulberry32(seed: number): () => number {
  //1.- Sequential generator used only inside a single table build so its state never escapes.
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

export function buildPermutationTable(seed: number): PermutationTable {
  const normalisedSeed = seed >>> 0;
  const values = new Uint8Array(PERMUTATION_SIZE * 2);
  for (let i = 0; i < PERMUTATION_SIZE; i += 1) {
    values[i] = i;
  }
  //1.- Fisher-Yates from the top index down, drawing every swap partner from the seeded mulberry32 stream.
  const rand = mulberry32(normalisedSeed);
  for (let i = PERMUTATION_SIZE - 1; i > 0; i -= 1) {
    const j = Math.floor(rand() * (i + 1));
    const swap = values[i];
    values[i] = values[j];
    values[j] = swap;
  }
  //2.- Mirror the permutation into the upper half so corner lookups of index + 255 never wrap.
  values.copyWithin(PERMUTATION_SIZE, 0, PERMUTATION_SIZE);
  //3.- Publish a frozen copy; typed arrays cannot be frozen and shared tables must stay read-only.
  return Object.freeze({ seed: normalisedSeed, values: Object.freeze(Array.from(values)) });
}

let defaultTable: PermutationTable | null = null;

export function defaultPermutationTable(): PermutationTable {
  //1.- Lazily build the seed 0 table so noise queries stay defined before any planet is initialised.
  if (defaultTable === null) {
    defaultTable = buildPermutationTable(0);
  }
  return defaultTable;
}
