/**
 * Recursively freeze a value in place
 */
export function deepFreeze<T>(value: T, seen: WeakSet<object> = new WeakSet()): T {
  if (typeof value === 'object' && value !== null && !seen.has(value)) {
    seen.add(value);
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested, seen);
    }
  }
  return value;
}
