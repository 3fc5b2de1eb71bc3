/**
 * Recursively freeze plain objects and arrays.
 *
 * Sets and Maps are left as they are; their immutability is carried by the
 * ReadonlySet / ReadonlyMap types at the call site.
 */
export function deepFreeze<T extends object>(value: T): Readonly<T> {
  const nested: unknown[] = Object.values(value);
  for (const child of nested) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)
      && !(child instanceof Set) && !(child instanceof Map)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
