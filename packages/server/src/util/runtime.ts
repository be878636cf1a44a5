/** Epoch milliseconds. Injected so decay and rate limits can be tested without sleeping. */
export type Clock = () => number;

/** Uniform in [0, 1), like Math.random. */
export type Random = () => number;

export const systemClock: Clock = () => Date.now();
export const systemRandom: Random = () => Math.random();

export function randomInt(random: Random, minInclusive: number, maxInclusive: number): number {
  return minInclusive + Math.floor(random() * (maxInclusive - minInclusive + 1));
}

export function pick<T>(random: Random, items: readonly T[]): T {
  if (items.length === 0) throw new RangeError('pick() needs at least one item');
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}
