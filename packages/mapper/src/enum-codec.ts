/**
 * Enum decoding and encoding.
 *
 * Decoding accepts, in order: an exact case name, a zero-based integer
 * ordinal, or a value equal to a case's declared value (numeric codes,
 * string enum values).
 */

import { EnumDecodeError, TypeCastError, type EnumEncoding } from "@fieldmap/core";
import { enumCaseNames, type EnumCase, type EnumType } from "@fieldmap/schema";
import { runtimeTypeName } from "./values.js";

export function findEnumCase<V>(enumType: EnumType<V>, raw: unknown): EnumCase<V> | undefined {
  if (typeof raw === "string") {
    const byName = enumType.cases.find((c) => c.name === raw);
    if (byName) return byName;
  }
  if (typeof raw === "number" && Number.isInteger(raw) && raw >= 0 && raw < enumType.cases.length) {
    return enumType.cases[raw];
  }
  return enumType.cases.find((c) => c.value === raw);
}

/** @throws EnumDecodeError when no case matches */
export function decodeEnum<V>(enumType: EnumType<V>, raw: unknown, fieldName: string, key: string): V {
  const match = findEnumCase(enumType, raw);
  if (!match) {
    throw new EnumDecodeError(fieldName, key, raw, enumType.name, enumCaseNames(enumType));
  }
  return match.value;
}

/** Write an enum value as its case name or ordinal. */
export function encodeEnum<V>(
  enumType: EnumType<V>,
  value: unknown,
  encoding: EnumEncoding,
  fieldName: string,
  key: string
): string | number {
  const match = enumType.cases.find((c) => c.value === value);
  if (!match) {
    throw new TypeCastError(fieldName, key, enumType.name, runtimeTypeName(value));
  }
  return encoding === "ordinal" ? match.ordinal : match.name;
}
