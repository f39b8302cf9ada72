/**
 * Runtime classification of untyped values.
 *
 * Type names line up with `ScalarKind` so that `TypeCastError` can report
 * `Expected: int, Actual: string`. A number is `int` when it is an integer
 * inside the 32-bit range and `double` when otherwise finite; a bigint is
 * `long`. `NaN` and the infinities are named as such and match no kind.
 */

import type { RawValueMap, ScalarKind } from "@fieldmap/schema";
import { unreachable } from "@fieldmap/core";

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

export function isInt32(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Plain objects and `Map`s are documents; class instances are not. */
export function isRawValueMap(value: unknown): value is RawValueMap {
  if (typeof value !== "object" || value === null) return false;
  return value instanceof Map || (!Array.isArray(value) && isPlainObject(value));
}

function isMapDocument(data: RawValueMap): data is ReadonlyMap<string, unknown> {
  return data instanceof Map;
}

/** Own value stored under `key`, or `undefined`. */
export function readKey(data: RawValueMap, key: string): unknown {
  if (isMapDocument(data)) return data.get(key);
  return Object.prototype.hasOwnProperty.call(data, key) ? data[key] : undefined;
}

/** Entries of a document in insertion order. */
export function documentEntries(data: RawValueMap): Array<[string, unknown]> {
  return isMapDocument(data) ? [...data.entries()] : Object.entries(data);
}

export function runtimeTypeName(value: unknown): string {
  switch (typeof value) {
    case "string":
      return "string";
    case "boolean":
      return "boolean";
    case "bigint":
      return "long";
    case "number":
      if (isInt32(value)) return "int";
      return Number.isFinite(value) ? "double" : String(value);
    case "undefined":
      return "undefined";
    case "symbol":
      return "symbol";
    case "function":
      return "function";
    case "object":
      if (value === null) return "null";
      if (value instanceof Date) return "date";
      if (value instanceof Uint8Array) return "binary";
      if (Array.isArray(value)) return "array";
      if (isRawValueMap(value)) return "document";
      return constructorName(value) ?? "object";
    default:
      return "unknown";
  }
}

function constructorName(value: object): string | undefined {
  const ctor: unknown = Reflect.get(value, "constructor");
  return typeof ctor === "function" && ctor.name !== "" ? ctor.name : undefined;
}

/** Whether `value` has exactly the runtime type of a scalar kind. */
export function matchesScalar(kind: ScalarKind, value: unknown): boolean {
  switch (kind) {
    case "string":
      return typeof value === "string";
    case "int":
      return typeof value === "number" && isInt32(value);
    case "double":
      return typeof value === "number" && Number.isFinite(value);
    case "long":
      return typeof value === "bigint";
    case "boolean":
      return typeof value === "boolean";
    case "date":
      return value instanceof Date;
    case "binary":
      return value instanceof Uint8Array;
    default:
      return unreachable(kind);
  }
}
