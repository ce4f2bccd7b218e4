/**
 * @fileoverview Structural value equality
 *
 * @module layered-app-kit/domain/entity
 *
 * Equality is a property of the data, not of an inherited base class:
 * two values are equal when their shapes and leaves are equal.
 *
 * - Primitives compare with `Object.is` (so `NaN` equals `NaN`)
 * - `Date` compares by time value
 * - Arrays compare element-wise, in order
 * - `Map` and `Set` compare by membership, ignoring insertion order
 * - Plain objects compare own enumerable keys, ignoring key order
 */

/**
 * Deep structural equality between two values.
 *
 * @example
 * ```typescript
 * valueEquals({ id: '1', tags: ['a'] }, { tags: ['a'], id: '1' }); // true
 * valueEquals(new Date(0), new Date(0));                          // true
 * ```
 */
export function valueEquals(left: unknown, right: unknown): boolean {
  if (Object.is(left, right)) {
    return true;
  }

  if (
    typeof left !== 'object' ||
    typeof right !== 'object' ||
    left === null ||
    right === null
  ) {
    return false;
  }

  if (left instanceof Date || right instanceof Date) {
    return (
      left instanceof Date &&
      right instanceof Date &&
      left.getTime() === right.getTime()
    );
  }

  if (Array.isArray(left) || Array.isArray(right)) {
    if (!Array.isArray(left) || !Array.isArray(right)) return false;
    if (left.length !== right.length) return false;
    return left.every((item, index) => valueEquals(item, right[index]));
  }

  if (left instanceof Map || right instanceof Map) {
    if (!(left instanceof Map) || !(right instanceof Map)) return false;
    if (left.size !== right.size) return false;
    for (const [key, value] of left) {
      if (!right.has(key) || !valueEquals(value, right.get(key))) {
        return false;
      }
    }
    return true;
  }

  if (left instanceof Set || right instanceof Set) {
    if (!(left instanceof Set) || !(right instanceof Set)) return false;
    if (left.size !== right.size) return false;
    // Each right-hand item pairs with one left-hand item at most.
    const matched = new Set<unknown>();
    for (const item of left) {
      if (right.has(item) && !matched.has(item)) {
        matched.add(item);
        continue;
      }
      let found = false;
      for (const candidate of right) {
        if (!matched.has(candidate) && valueEquals(item, candidate)) {
          matched.add(candidate);
          found = true;
          break;
        }
      }
      if (!found) return false;
    }
    return true;
  }

  if (Object.getPrototypeOf(left) !== Object.getPrototypeOf(right)) {
    return false;
  }

  const leftEntries = Object.entries(left);
  if (leftEntries.length !== Object.keys(right).length) {
    return false;
  }

  return leftEntries.every(
    ([key, value]) =>
      Object.prototype.hasOwnProperty.call(right, key) &&
      valueEquals(value, Reflect.get(right, key)),
  );
}
