/**
 * Structural equality used to deduplicate bound Props fields.
 */

export type EqualityFn<T> = (a: T, b: T) => boolean;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

// Deep equality check with circular reference protection
export function deepEqual(a: unknown, b: unknown, seen = new WeakMap<object, WeakSet<object>>()): boolean {
  if (Object.is(a, b)) return true;
  if (!isRecord(a) || !isRecord(b)) return false;

  // Already comparing this pair further up the stack
  let seenWithA = seen.get(a);
  if (seenWithA?.has(b)) return true;
  if (!seenWithA) {
    seenWithA = new WeakSet();
    seen.set(a, seenWithA);
  }
  seenWithA.add(b);

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i], seen));
  }

  if (Array.isArray(a) !== Array.isArray(b)) return false;
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();

  const keysA = Object.keys(a);
  const keysB = Object.keys(b);
  if (keysA.length !== keysB.length) return false;

  return keysA.every((key) =>
    Object.prototype.hasOwnProperty.call(b, key) && deepEqual(a[key], b[key], seen)
  );
}
