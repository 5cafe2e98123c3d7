// Small general-purpose helpers

export function clamp(n: number, min: number, max: number) {
  return Math.max(min, Math.min(max, n));
}
