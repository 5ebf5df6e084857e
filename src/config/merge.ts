import { isPlainObject } from "./key-paths.js";

/** Keys that would reach an object's prototype through assignment. */
const UNSAFE_KEYS = new Set(["__proto__", "constructor", "prototype"]);

/**
 * Recursively lay `overlay` over `base`. Plain objects merge key by key;
 * anything else (scalars, arrays, null) in the overlay replaces the base.
 * Prototype keys in the overlay are dropped. Neither input is mutated.
 */
export function deepMerge(base: unknown, overlay: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(overlay)) {
    return structuredClone(overlay);
  }
  const result: Record<string, unknown> = structuredClone(base);
  for (const [key, value] of Object.entries(overlay)) {
    if (UNSAFE_KEYS.has(key)) {
      continue;
    }
    result[key] = Object.hasOwn(result, key) ? deepMerge(result[key], value) : structuredClone(value);
  }
  return result;
}

/** Read a nested value; `undefined` when any segment is missing or not an object. */
export function getPath(root: unknown, segments: readonly string[]): unknown {
  let current = root;
  for (const segment of segments) {
    if (!isPlainObject(current) || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Write a nested value, creating (or replacing non-object) intermediate
 * levels. Returns the previous value at the path.
 */
export function setPath(root: Record<string, unknown>, segments: readonly string[], value: unknown): unknown {
  if (segments.length === 0) {
    throw new Error("setPath requires at least one segment");
  }
  let current = root;
  for (const segment of segments.slice(0, -1)) {
    const next = current[segment];
    if (isPlainObject(next)) {
      current = next;
      continue;
    }
    const created: Record<string, unknown> = {};
    current[segment] = created;
    current = created;
  }
  const last = segments[segments.length - 1];
  const previous = current[last];
  current[last] = value;
  return previous;
}
