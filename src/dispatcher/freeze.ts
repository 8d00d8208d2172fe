/**
 * Freezes plain objects and arrays reachable from `value`, in place.
 *
 * Only plain data is walked: class instances, Maps, Sets, typed arrays and
 * other exotic objects are left alone (freezing a Map does not stop `set`).
 * Cycles are fine.
 */
export function deepFreeze<T>(value: T): T {
  freezeInto(value, new WeakSet());
  return value;
}

function isPlainData(value: object): boolean {
  if (Array.isArray(value)) return true;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function freezeInto(value: unknown, seen: WeakSet<object>): void {
  if (value === null || typeof value !== 'object') return;
  if (seen.has(value) || !isPlainData(value)) return;
  seen.add(value);

  for (const key of Reflect.ownKeys(value)) {
    const descriptor = Object.getOwnPropertyDescriptor(value, key);
    if (descriptor && 'value' in descriptor) freezeInto(descriptor.value, seen);
  }
  Object.freeze(value);
}
