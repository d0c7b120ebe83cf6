export function deepFreeze<T>(value: T): T {
  freezeInPlace(value);
  return value;
}

function freezeInPlace(value: unknown): void {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
    return;
  }

  const children: unknown[] = Array.isArray(value) ? value : Object.values(value);
  for (const child of children) {
    freezeInPlace(child);
  }
  Object.freeze(value);
}
