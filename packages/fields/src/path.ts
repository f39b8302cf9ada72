/**
 * Path expressions: the logical field-access chain handed to the resolver.
 *
 * Three spellings are accepted:
 *
 * ```ts
 * ["address", "zipCode"]                 // explicit hops
 * parsePath("address?.zipCode")          // dotted, `?` markers elided
 * pathOf<Person>((p) => p.address?.zipCode)  // recorded from a selector
 * ```
 */

import { PathError } from "@fieldmap/core";

/** Ordered field-access hops, by logical name. */
export type PathExpression = readonly string[];

/** Property accesses on `root` become hops. */
export type PathSelector<T> = (root: T) => unknown;

export type PathInput<T> = PathExpression | string | PathSelector<T>;

/**
 * Split a dotted path into hops. A trailing `?` on a hop is the optional
 * marker and is dropped; `[n]` is read as a positional hop.
 */
export function parsePath(text: string): PathExpression {
  if (text.trim() === "") return [];
  return text
    .replace(/\[(\d+)\]/g, ".$1")
    .split(".")
    .map((hop) => (hop.endsWith("?") ? hop.slice(0, -1) : hop));
}

// ============================================================================
// Selector recording
// ============================================================================

const recordedHops = new WeakMap<object, PathExpression>();

function recorder(hops: PathExpression): object {
  const node = new Proxy<object>(
    {},
    {
      get(_target, prop) {
        if (typeof prop === "symbol") return undefined;
        return recorder([...hops, prop]);
      },
    }
  );
  recordedHops.set(node, hops);
  return node;
}

/** A recorder stands in for a value of the selector's root type. */
function asRecorded<T>(node: object): T {
  return node as T;
}

function isObject(value: unknown): value is object {
  return (typeof value === "object" || typeof value === "function") && value !== null;
}

/**
 * Record the property chain a selector reads. The selector runs once
 * against a recording proxy, never against real data.
 *
 * ```ts
 * pathOf<Person>((p) => p.address?.zipCode)   // ["address", "zipCode"]
 * pathOf<Employee>((e) => e.skills[0]?.name)  // ["skills", "0", "name"]
 * pathOf<Employee>((e) => each(e.skills).name) // ["skills", "name"]
 * ```
 */
export function pathOf<T>(selector: PathSelector<T>): PathExpression {
  const selected = selector(asRecorded<T>(recorder([])));
  const hops = isObject(selected) ? recordedHops.get(selected) : undefined;
  if (!hops) {
    throw new PathError(
      "Path selector must return a field of its argument, e.g. (p) => p.address?.zipCode",
      "INVALID_PATH",
      ""
    );
  }
  return hops;
}

/**
 * Inside a selector, step into the elements of an array of records without
 * adding a hop, so the next field applies to every element.
 */
export function each<E>(items: readonly E[] | null | undefined): NonNullable<E> {
  if (isObject(items) && recordedHops.has(items)) {
    return asRecorded<NonNullable<E>>(items);
  }
  throw new PathError("each() can only be used inside a path selector", "INVALID_PATH", "");
}

/** Normalize any accepted spelling to hops. */
export function toPathExpression<T>(input: PathInput<T>): PathExpression {
  if (typeof input === "string") return parsePath(input);
  if (typeof input === "function") return pathOf(input);
  return input;
}
