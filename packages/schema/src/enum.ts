import { SchemaDefinitionError } from "@fieldmap/core";
import type { EnumCase, EnumType } from "./types.js";

/**
 * Define an enum whose values are its case names.
 *
 * ```ts
 * const Status = enumOf("Status", ["Active", "Suspended", "Closed"]);
 * // EnumType<"Active" | "Suspended" | "Closed">
 * ```
 */
export function enumOf<const N extends string>(name: string, caseNames: readonly N[]): EnumType<N> {
  const cases = caseNames.map((caseName, ordinal) => ({ name: caseName, value: caseName, ordinal }));
  return buildEnum(name, cases);
}

/**
 * Define an enum from a TypeScript `enum` object. Numeric enums carry
 * reverse mappings (`Color[0] === "Red"`); those keys are not cases.
 *
 * ```ts
 * enum Priority { Low = 10, Normal = 20, High = 30 }
 * const PriorityType = nativeEnum("Priority", Priority);
 * ```
 */
export function nativeEnum<E extends Readonly<Record<string, string | number>>>(
  name: string,
  enumObject: E
): EnumType<NativeEnumValue<E>> {
  const cases: EnumCase<NativeEnumValue<E>>[] = [];
  for (const key of Object.keys(enumObject)) {
    if (!isOwnKey(enumObject, key) || isReverseMapping(key, enumObject)) continue;
    cases.push({ name: key, value: enumObject[key], ordinal: cases.length });
  }
  return buildEnum(name, cases);
}

/** Value type of a TypeScript `enum` object. */
export type NativeEnumValue<E> = E[Extract<keyof E, string>];

function isOwnKey<E extends object>(obj: E, key: string): key is Extract<keyof E, string> {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/** Build an enum from explicit cases. Ordinals are assigned in order. */
export function enumFromCases<V>(
  name: string,
  cases: ReadonlyArray<{ name: string; value: V }>
): EnumType<V> {
  return buildEnum(
    name,
    cases.map((c, ordinal) => ({ name: c.name, value: c.value, ordinal }))
  );
}

function isReverseMapping(key: string, enumObject: Readonly<Record<string, unknown>>): boolean {
  if (!/^-?\d+(\.\d+)?$/.test(key)) return false;
  const target = enumObject[key];
  return typeof target === "string" && enumObject[target] === Number(key);
}

function buildEnum<V>(name: string, cases: ReadonlyArray<EnumCase<V>>): EnumType<V> {
  const seen = new Set<string>();
  for (const c of cases) {
    if (seen.has(c.name)) {
      throw new SchemaDefinitionError(`Enum ${name} declares case '${c.name}' twice`, name);
    }
    seen.add(c.name);
  }
  return Object.freeze({ name, cases: Object.freeze([...cases]) });
}

/** Case names in declaration order. */
export function enumCaseNames(enumType: EnumType): string[] {
  return enumType.cases.map((c) => c.name);
}
