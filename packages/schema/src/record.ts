import { SchemaDefinitionError } from "@fieldmap/core";
import type { FieldBuilder, InferShape, Shape } from "./builders.js";
import type { FieldMeta, RecordMeta, RecordType, TypeMetadataProvider } from "./types.js";

const inlineMetadata = new WeakMap<RecordType, RecordMeta>();

/**
 * Treat decoded field values as an instance of `T`. The mapper only calls
 * `create` after every field was checked against the record's descriptor.
 */
function trustDecoded<T>(fields: Readonly<Record<string, unknown>>): T {
  return fields as T;
}

export interface DefineRecordOptions<F, T> {
  /** Build the instance from decoded fields, e.g. to call a class constructor. */
  readonly construct: (fields: F) => T;
}

/**
 * Define a record type with inline field metadata.
 *
 * ```ts
 * const Person = defineRecord("Person", {
 *   name: t.string(),
 *   address: t.optional(t.record(Address)),
 * });
 * type Person = InferRecord<typeof Person>;
 *
 * // Class instances instead of plain objects
 * const Point = defineRecord("Point", { x: t.double(), y: t.double() }, {
 *   construct: ({ x, y }) => new PointClass(x, y),
 * });
 * ```
 */
export function defineRecord<S extends Shape>(name: string, shape: S): RecordType<InferShape<S>>;
export function defineRecord<S extends Shape, T>(
  name: string,
  shape: S,
  options: DefineRecordOptions<InferShape<S>, T>
): RecordType<T>;
export function defineRecord<S extends Shape, T>(
  name: string,
  shape: S,
  options?: DefineRecordOptions<InferShape<S>, T>
): RecordType<InferShape<S> | T> {
  const construct = options?.construct;
  const type: RecordType<InferShape<S> | T> = Object.freeze({
    name,
    create: (fields: Readonly<Record<string, unknown>>) => {
      const decoded = trustDecoded<InferShape<S>>(fields);
      return construct ? construct(decoded) : decoded;
    },
  });

  inlineMetadata.set(type, {
    name,
    fields: Object.entries(shape).map(([fieldName, builder]) => fieldMetaFrom(name, fieldName, builder)),
  });
  return type;
}

function fieldMetaFrom(recordName: string, name: string, builder: FieldBuilder<unknown>): FieldMeta {
  if (name.length === 0) {
    throw new SchemaDefinitionError(`Record ${recordName} declares a field with an empty name`, recordName);
  }
  return {
    name,
    type: builder.tag,
    rename: builder.options.rename,
    defaultValue: builder.options.defaultValue,
  };
}

/**
 * A record type whose metadata comes from another provider (for example
 * reflection over TypeScript declarations), matched by `name`.
 */
export function recordRef<T = Record<string, unknown>>(
  name: string,
  options?: { readonly construct?: (fields: Readonly<Record<string, unknown>>) => T }
): RecordType<T> {
  const construct = options?.construct;
  return Object.freeze({
    name,
    create: (fields: Readonly<Record<string, unknown>>): T =>
      construct ? construct(fields) : trustDecoded<T>(fields),
  });
}

/** Answers for record types created by {@link defineRecord}. */
export const inlineMetadataProvider: TypeMetadataProvider = {
  name: "inline",
  metadataFor(type: RecordType): RecordMeta | undefined {
    return inlineMetadata.get(type);
  },
};
