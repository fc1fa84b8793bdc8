export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

export function finiteOr(value: number | null | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

/** Last entry of a series, or undefined when it is missing or not finite */
export function latest(series: ReadonlyArray<number | null> | undefined): number | undefined {
  if (!series || series.length === 0) return undefined;
  const value = series[series.length - 1];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
