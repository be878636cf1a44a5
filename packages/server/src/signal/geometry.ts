export const TWO_PI = Math.PI * 2;

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Wraps any finite angle into [0, 2π). */
export function normalizeAngle(angle: number): number {
  if (!Number.isFinite(angle)) return 0;
  const wrapped = angle % TWO_PI;
  const result = wrapped < 0 ? wrapped + TWO_PI : wrapped;
  // -1e-17 % 2π + 2π rounds to exactly 2π
  return result >= TWO_PI ? 0 : result;
}

/** Shorter-arc distance between two angles, in [0, π]. */
export function angularDistance(a: number, b: number): number {
  const delta = Math.abs(normalizeAngle(a) - normalizeAngle(b));
  return Math.min(delta, TWO_PI - delta);
}

/** -30 dBm and stronger is 100, -90 dBm and weaker is 0, linear between. */
export function rssiToStrength(rssi: number): number {
  if (rssi >= -30) return 100;
  if (rssi <= -90) return 0;
  return Math.trunc(100 * ((rssi + 90) / 60));
}

export function rssiToDistance(rssi: number, maxRange: number, minDistance = 0.5): number {
  const distance = Math.pow(10, (-rssi - 30) / 20) * 2;
  return clamp(distance, minDistance, maxRange);
}

/** Weak signals read as far away. */
export function strengthToDistance(strength: number, maxRange: number, minDistance = 0.5): number {
  return clamp(((100 - strength) / 100) * maxRange, minDistance, maxRange);
}
