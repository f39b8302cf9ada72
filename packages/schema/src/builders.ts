/**
 * Field builders: a small DSL that declares record fields and infers the
 * TypeScript type of the record from them.
 *
 * ```ts
 * const Address = defineRecord("Address", {
 *   street: t.string(),
 *   zipCode: t.int().rename("zip"),
 *   city: t.string().default("Unknown"),
 * });
 * ```
 */

import type { EnumType, RecordType, RecordTypeRef, ScalarKind, TypeTag } from "./types.js";
import { resolveRecordRef } from "./types.js";

export interface FieldOptions {
  readonly rename?: string;
  readonly defaultValue?: () => unknown;
}

/** Declares one field of type `T`. Immutable: every modifier returns a new builder. */
export class FieldBuilder<T> {
  /** Type-level only; never assigned. */
  declare readonly _type: T;

  constructor(
    readonly tag: TypeTag,
    readonly options: FieldOptions = {}
  ) {}

  /** Read and write this field under a different document key. */
  rename(externalName: string): FieldBuilder<T> {
    return new FieldBuilder<T>(this.tag, { ...this.options, rename: externalName });
  }

  /**
   * Value used when the field is absent. The same value is handed to every
   * instance; use {@link defaultWith} for mutable values such as arrays.
   */
  default(value: T): FieldBuilder<T> {
    return new FieldBuilder<T>(this.tag, { ...this.options, defaultValue: () => value });
  }

  /** Factory called once per instance when the field is absent. */
  defaultWith(factory: () => T): FieldBuilder<T> {
    return new FieldBuilder<T>(this.tag, { ...this.options, defaultValue: factory });
  }
}

export type Shape = Readonly<Record<string, FieldBuilder<unknown>>>;

export type InferField<B> = B extends FieldBuilder<infer V> ? V : never;

type OptionalKeys<S extends Shape> = {
  [K in keyof S]: undefined extends InferField<S[K]> ? K : never;
}[keyof S];

type Flatten<O> = { [K in keyof O]: O[K] };

/** The record type described by a shape. Optional fields become optional properties. */
export type InferShape<S extends Shape> = Flatten<
  { [K in Exclude<keyof S, OptionalKeys<S>>]: InferField<S[K]> } & {
    [K in OptionalKeys<S>]?: InferField<S[K]>;
  }
>;

/** The instance type of a record type. */
export type InferRecord<R> = R extends RecordType<infer T> ? T : never;

type VariantMap = Readonly<Record<string, RecordType<object>>>;

/** Tagged union of the variants' instance types. */
export type InferUnion<D extends string, V extends VariantMap> = {
  [K in Extract<keyof V, string>]: Flatten<{ readonly [P in D]: K } & InferRecord<V[K]>>;
}[Extract<keyof V, string>];

function scalar<T>(kind: ScalarKind): FieldBuilder<T> {
  return new FieldBuilder<T>({ kind: "scalar", scalar: kind });
}

/**
 * Field type constructors.
 *
 * Record, enum and union fields infer `T | null`: a `null` in the input
 * data binds `null` directly instead of being decoded.
 */
export const t = {
  string: (): FieldBuilder<string> => scalar("string"),
  int: (): FieldBuilder<number> => scalar("int"),
  double: (): FieldBuilder<number> => scalar("double"),
  long: (): FieldBuilder<bigint> => scalar("long"),
  boolean: (): FieldBuilder<boolean> => scalar("boolean"),
  date: (): FieldBuilder<Date> => scalar("date"),
  binary: (): FieldBuilder<Uint8Array> => scalar("binary"),

  enum: <V>(enumType: EnumType<V>): FieldBuilder<V | null> =>
    new FieldBuilder<V | null>({ kind: "enum", enumType }),

  record: <R>(ref: RecordTypeRef<R>): FieldBuilder<R | null> =>
    new FieldBuilder<R | null>({ kind: "record", record: () => resolveRecordRef(ref) }),

  optional: <V>(inner: FieldBuilder<V>): FieldBuilder<Exclude<V, null> | undefined> =>
    new FieldBuilder<Exclude<V, null> | undefined>({ kind: "optional", inner: inner.tag }),

  array: <V>(element: FieldBuilder<V>): FieldBuilder<V[]> =>
    new FieldBuilder<V[]>({ kind: "array", element: element.tag }),

  map: <V>(value: FieldBuilder<V>): FieldBuilder<Record<string, V>> =>
    new FieldBuilder<Record<string, V>>({ kind: "map", value: value.tag }),

  /**
   * Discriminated union of record variants. The discriminator key holds the
   * variant's tag in documents and in decoded values.
   *
   * ```ts
   * t.union("kind", { circle: Circle, square: Square })
   * // { kind: "circle"; radius: number } | { kind: "square"; side: number } | null
   * ```
   */
  union: <const D extends string, V extends VariantMap>(
    discriminator: D,
    variants: V
  ): FieldBuilder<InferUnion<D, V> | null> =>
    new FieldBuilder<InferUnion<D, V> | null>({
      kind: "union",
      discriminator,
      variants: Object.entries(variants).map(([tag, record]) => ({ tag, record: () => record })),
    }),
} as const;
