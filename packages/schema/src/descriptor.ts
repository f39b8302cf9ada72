/**
 * Field and record descriptors.
 *
 * A descriptor is the resolved, immutable view of a record type's metadata:
 * external names applied, optional wrappers and nested record types
 * unpacked, enum case names listed. Built once per type by
 * `DescriptorRegistry` and never mutated afterward.
 */

import { SchemaDefinitionError, unreachable } from "@fieldmap/core";
import type {
  EnumType,
  FieldMeta,
  NameOverrideSource,
  RecordMeta,
  RecordType,
  TypeTag,
} from "./types.js";

export interface FieldDescriptor {
  /** Logical name, as declared. */
  readonly name: string;
  /** Rename override, or the logical name. */
  readonly externalName: string;
  readonly type: TypeTag;
  /** Declared type with one optional layer removed. */
  readonly valueType: TypeTag;
  /** Display name of the declared type, used in error messages. */
  readonly typeName: string;
  readonly isOptional: boolean;
  /** Nested record type when the (unwrapped) field is record-valued. */
  readonly recordType: RecordType | undefined;
  /** Enum type when the (unwrapped) field is enum-valued. */
  readonly enumType: EnumType | undefined;
  /** Case names in ordinal order; empty for non-enum fields. */
  readonly enumCases: readonly string[];
  readonly defaultValue: (() => unknown) | undefined;
}

export class RecordTypeDescriptor {
  private readonly byName = new Map<string, FieldDescriptor>();
  private readonly byExternalName = new Map<string, FieldDescriptor>();

  constructor(
    readonly type: RecordType,
    readonly fields: readonly FieldDescriptor[]
  ) {
    for (const field of fields) {
      if (this.byName.has(field.name)) {
        throw new SchemaDefinitionError(
          `Record ${type.name} declares field '${field.name}' twice`,
          type.name
        );
      }
      const clash = this.byExternalName.get(field.externalName);
      if (clash) {
        throw new SchemaDefinitionError(
          `Record ${type.name}: fields '${clash.name}' and '${field.name}' share external name '${field.externalName}'`,
          type.name
        );
      }
      this.byName.set(field.name, field);
      this.byExternalName.set(field.externalName, field);
    }
    Object.freeze(this.fields);
  }

  get name(): string {
    return this.type.name;
  }

  field(name: string): FieldDescriptor | undefined {
    return this.byName.get(name);
  }

  fieldByExternalName(externalName: string): FieldDescriptor | undefined {
    return this.byExternalName.get(externalName);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }
}

/** Build the descriptor of one field. */
export function buildFieldDescriptor(
  type: RecordType,
  meta: FieldMeta,
  overrides: NameOverrideSource
): FieldDescriptor {
  const valueType = unwrapOptional(meta.type);
  const externalName = overrides.externalNameFor(type, meta) ?? meta.name;
  if (externalName.length === 0) {
    throw new SchemaDefinitionError(
      `Record ${type.name}: field '${meta.name}' has an empty external name`,
      type.name
    );
  }
  const enumType = valueType.kind === "enum" ? valueType.enumType : undefined;
  return Object.freeze({
    name: meta.name,
    externalName,
    type: meta.type,
    valueType,
    typeName: typeName(meta.type),
    isOptional: meta.type.kind === "optional",
    recordType: valueType.kind === "record" ? valueType.record() : undefined,
    enumType,
    enumCases: enumType ? enumType.cases.map((c) => c.name) : [],
    defaultValue: meta.defaultValue,
  });
}

/** Build the descriptor of a record type from its metadata. */
export function buildRecordDescriptor(
  type: RecordType,
  meta: RecordMeta,
  overrides: NameOverrideSource
): RecordTypeDescriptor {
  return new RecordTypeDescriptor(
    type,
    meta.fields.map((field) => buildFieldDescriptor(type, field, overrides))
  );
}

/** Remove one `optional` layer, if present. */
export function unwrapOptional(tag: TypeTag): TypeTag {
  return tag.kind === "optional" ? tag.inner : tag;
}

/** Whether a tag is, or contains, a record or union. */
export function containsRecord(tag: TypeTag): boolean {
  switch (tag.kind) {
    case "record":
    case "union":
      return true;
    case "optional":
      return containsRecord(tag.inner);
    case "array":
      return containsRecord(tag.element);
    case "map":
      return containsRecord(tag.value);
    case "scalar":
    case "enum":
      return false;
    default:
      return unreachable(tag);
  }
}

/** Whether a tag is a collection (array or map), ignoring one optional layer. */
export function isCollection(tag: TypeTag): boolean {
  const inner = unwrapOptional(tag);
  return inner.kind === "array" || inner.kind === "map";
}

/**
 * TypeScript-like display name of a tag.
 *
 * ```ts
 * typeName({ kind: "array", element: { kind: "scalar", scalar: "int" } }) // "int[]"
 * ```
 */
export function typeName(tag: TypeTag): string {
  switch (tag.kind) {
    case "scalar":
      return tag.scalar;
    case "enum":
      return tag.enumType.name;
    case "record":
      return tag.record().name;
    case "optional":
      return `${typeName(tag.inner)} | undefined`;
    case "array": {
      const element = typeName(tag.element);
      return element.includes(" ") ? `(${element})[]` : `${element}[]`;
    }
    case "map":
      return `Record<string, ${typeName(tag.value)}>`;
    case "union":
      return tag.variants.map((v) => v.record().name).join(" | ");
    default:
      return unreachable(tag);
  }
}
