interface Comparable {
  equals(other: unknown, tolerance?: number): boolean;
}

function isComparable(value: object): value is Comparable {
  return typeof Reflect.get(value, 'equals') === 'function';
}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Structural equality used to elide no-op assignments.
 *
 * Arrays, typed arrays and plain objects compare by content; values exposing
 * `equals()` (transforms) compare through it with zero tolerance; every
 * other object compares by identity, so model objects held in fields are
 * never walked.
 */
export function isEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== 'object' || typeof b !== 'object') return false;
  if (a === null || b === null) return false;

  if (Array.isArray(a) || ArrayBuffer.isView(a)) {
    if (!(Array.isArray(b) || ArrayBuffer.isView(b))) return false;
    const left = toIndexable(a);
    const right = toIndexable(b);
    if (!left || !right || left.length !== right.length) return false;
    for (let i = 0; i < left.length; i++) {
      if (!isEqual(left[i], right[i])) return false;
    }
    return true;
  }

  if (isComparable(a)) return a.equals(b, 0);

  if (isPlainObject(a) && isPlainObject(b)) {
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every(
      (key) =>
        Object.prototype.hasOwnProperty.call(b, key) &&
        isEqual(Reflect.get(a, key), Reflect.get(b, key))
    );
  }

  return false;
}

function toIndexable(value: unknown): ArrayLike<unknown> | null {
  if (Array.isArray(value)) return value;
  if (
    value instanceof Float32Array ||
    value instanceof Float64Array ||
    value instanceof Int8Array ||
    value instanceof Int16Array ||
    value instanceof Int32Array ||
    value instanceof Uint8Array ||
    value instanceof Uint8ClampedArray ||
    value instanceof Uint16Array ||
    value instanceof Uint32Array
  ) {
    return value;
  }
  return null;
}
