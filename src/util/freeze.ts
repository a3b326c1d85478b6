/**
 * Recursively freezes plain objects and arrays in place and returns the
 * same reference.
 */
export function deepFreeze<T>(value: T): T {
  freezeInPlace(value);
  return value;
}

function freezeInPlace(value: unknown): void {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
    return;
  }
  for (const child of Object.values(value)) {
    freezeInPlace(child);
  }
  Object.freeze(value);
}
