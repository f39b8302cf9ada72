/** Runtime scalar kinds. `int` is a 32-bit integer number, `long` a bigint. */
export type ScalarKind = "string" | "int" | "double" | "long" | "boolean" | "date" | "binary";

export const SCALAR_KINDS: readonly ScalarKind[] = [
  "string",
  "int",
  "double",
  "long",
  "boolean",
  "date",
  "binary",
];

/** One case of an enum, in declaration order. */
export interface EnumCase<V = unknown> {
  readonly name: string;
  readonly value: V;
  readonly ordinal: number;
}

/** An enum type: ordered cases, decoded by name, ordinal or value. */
export interface EnumType<V = unknown> {
  readonly name: string;
  readonly cases: ReadonlyArray<EnumCase<V>>;
}

/**
 * Type identity of a record. Descriptors are cached per `RecordType` object.
 *
 * `create` turns decoded field values (keyed by logical name) into an
 * instance; the default is the plain object itself.
 */
export interface RecordType<T = unknown> {
  readonly name: string;
  create(fields: Readonly<Record<string, unknown>>): T;
}

/** Either a record type or a thunk returning one (for self references). */
export type RecordTypeRef<T = unknown> = RecordType<T> | (() => RecordType<T>);

export interface UnionVariant {
  readonly tag: string;
  readonly record: () => RecordType;
}

/** Declared type of a field. */
export type TypeTag =
  | { readonly kind: "scalar"; readonly scalar: ScalarKind }
  | { readonly kind: "enum"; readonly enumType: EnumType }
  | { readonly kind: "record"; readonly record: () => RecordType }
  | { readonly kind: "optional"; readonly inner: TypeTag }
  | { readonly kind: "array"; readonly element: TypeTag }
  | { readonly kind: "map"; readonly value: TypeTag }
  | {
      readonly kind: "union";
      readonly discriminator: string;
      readonly variants: ReadonlyArray<UnionVariant>;
    };

export type TypeTagKind = TypeTag["kind"];

/** Metadata for a single field, as supplied by a metadata provider. */
export interface FieldMeta {
  readonly name: string;
  readonly type: TypeTag;
  /** External-name annotation (e.g. the persisted document key). */
  readonly rename?: string;
  /** Produces the value used when the field is absent from input data. */
  readonly defaultValue?: () => unknown;
}

/** Ordered field metadata for one record type. */
export interface RecordMeta {
  readonly name: string;
  readonly fields: ReadonlyArray<FieldMeta>;
}

/**
 * Supplies record metadata from some static source. Returns `undefined` for
 * types it does not know, letting the next provider answer.
 */
export interface TypeMetadataProvider {
  readonly name: string;
  metadataFor(type: RecordType): RecordMeta | undefined;
}

/** Supplies the external name of a field, or `undefined` to keep the logical name. */
export interface NameOverrideSource {
  externalNameFor(type: RecordType, field: FieldMeta): string | undefined;
}

/** Untyped document data decoded into records. */
export type RawValueMap = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>;

/**
 * Resolve a record reference.
 */
export function resolveRecordRef<T>(ref: RecordTypeRef<T>): RecordType<T> {
  return typeof ref === "function" ? ref() : ref;
}
