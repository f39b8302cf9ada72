/**
 * Exhaustiveness helper for switches over tagged unions.
 *
 * ```ts
 * switch (tag.kind) {
 *   case "scalar": return "leaf";
 *   case "record": return "node";
 *   default: return unreachable(tag); // type error once a new kind is added
 * }
 * ```
 */

/** Throws if reached at run time; `value` must have been narrowed to `never`. */
export function unreachable(value: never): never {
  throw new Error(`Unreachable: unexpected value ${JSON.stringify(value)}`);
}
