import { isPlainObject } from "is-plain-object";
import { toJS } from "mobx";

export function fail(message?: string): never {
  throw new Error(message || "Failed");
}

/**
 * An equals that does deep-ish equality.
 *
 * We only do non-identity equals for:
 *
 * - "plain" objects that have no custom prototype/i.e. are object literals
 * - objects that implement `toJSON`, i.e. dates
 * - arrays
 */
export function areEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (isPlainObject(a) || Array.isArray(a)) {
    return deepEquals(toJS(a), toJS(b));
  }
  if (hasToJSON(a) && hasToJSON(b)) {
    return deepEquals(a.toJSON(), b.toJSON());
  }
  return isNaNPair(a, b);
}

function hasToJSON(o: unknown): o is { toJSON(): unknown } {
  return !!o && typeof o === "object" && "toJSON" in o && typeof o.toJSON === "function";
}

/** Cycle-safe structural equality over objects and arrays. */
function deepEquals(a: unknown, b: unknown, visited: Set<object> = new Set()): boolean {
  if (a === b) return true;
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) {
    return isNaNPair(a, b);
  }
  if (Array.isArray(a) !== Array.isArray(b)) return false;
  // Already comparing this node further up the stack
  if (visited.has(a)) return true;
  visited.add(a);

  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;
  return aKeys.every((key) => key in b && deepEquals(Reflect.get(a, key), Reflect.get(b, key), visited));
}

function isNaNPair(a: unknown, b: unknown): boolean {
  return typeof a === "number" && typeof b === "number" && isNaN(a) && isNaN(b);
}
