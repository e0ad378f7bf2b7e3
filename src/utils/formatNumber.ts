/**
 * Round to a fixed number of decimal places.
 * Values too small to survive that (e.g. a rotor inertia of 2e-5 kg·m² at 4 decimals)
 * keep `decimals` significant figures instead.
 * Normalizes -0 to 0 so printed tables never show "-0".
 */
export function roundTo(value: number, decimals: number): number {
  if (!isFinite(value) || value === 0) return value === 0 ? 0 : value;

  const places = Math.max(0, decimals);
  const factor = Math.pow(10, places);
  if (Math.abs(value) < 1 / factor) {
    return Number(value.toPrecision(Math.max(1, places)));
  }

  const scaled = value * factor;
  if (!isFinite(scaled)) return value;

  const rounded = Math.round(scaled) / factor;
  return rounded === 0 ? 0 : rounded;
}

/**
 * Format a value with its unit, e.g. "0.0387 N·m/A"
 */
export function formatQuantity(value: number, decimals: number, unit?: string): string {
  const text = String(roundTo(value, decimals));
  return unit ? `${text} ${unit}` : text;
}

/**
 * Recursively round every number in a plain data structure
 */
export function roundDeep<T>(value: T, decimals: number): T;
export function roundDeep(value: unknown, decimals: number): unknown {
  if (typeof value === 'number') {
    return roundTo(value, decimals);
  }
  if (Array.isArray(value)) {
    return value.map(item => roundDeep(item, decimals));
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, roundDeep(item, decimals)])
    );
  }
  return value;
}
