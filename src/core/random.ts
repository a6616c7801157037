export type RandomSource = () => number;

/**
 * Deterministic generator returning floats in [0, 1).
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = Math.imul(state ^ (state >>> 15), state | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomIndex(length: number, nextRandom: RandomSource): number {
  return Math.min(length - 1, Math.floor(nextRandom() * length));
}

export function randomChoice<T>(items: readonly T[], nextRandom: RandomSource): T {
  if (items.length === 0) {
    throw new Error('Cannot choose from an empty list');
  }
  const item = items[randomIndex(items.length, nextRandom)];
  if (item === undefined) {
    throw new Error('Random index out of range');
  }
  return item;
}

/**
 * Uniform sample of `count` items without replacement (partial
 * Fisher-Yates over a copy).
 */
export function sampleWithoutReplacement<T>(
  input: readonly T[],
  count: number,
  nextRandom: RandomSource,
): T[] {
  const array = input.slice();
  const size = Math.min(count, array.length);
  for (let i = 0; i < size; i += 1) {
    const j = i + randomIndex(array.length - i, nextRandom);
    const temp = array[i]!;
    array[i] = array[j]!;
    array[j] = temp;
  }
  return array.slice(0, size);
}
