/**
 * Construction mode: build a typed record from an untyped document.
 *
 * Fields are decoded in declaration order and the first problem aborts the
 * whole call; no partial instance is returned. Errors name the fully
 * dotted logical field path (`home.zipCode`, `tags[2]`) and the external
 * key that was read.
 */

import {
  MissingFieldError,
  NestedTypeError,
  TypeCastError,
  UnsupportedTypeError,
  VariantDecodeError,
  unreachable,
} from "@fieldmap/core";
import {
  containsRecord,
  defaultRegistry,
  isCollection,
  typeName,
  type DescriptorRegistry,
  type FieldDescriptor,
  type RawValueMap,
  type RecordType,
  type TypeTag,
} from "@fieldmap/schema";
import { decodeEnum } from "./enum-codec.js";
import { documentEntries, isRawValueMap, matchesScalar, readKey, runtimeTypeName } from "./values.js";

export interface MaterializeOptions {
  readonly registry?: DescriptorRegistry;
}

type UnionTag = Extract<TypeTag, { kind: "union" }>;

class Decoder {
  constructor(private readonly registry: DescriptorRegistry) {}

  record<T>(type: RecordType<T>, data: RawValueMap, prefix: string): T {
    return type.create(this.fields(type, data, prefix));
  }

  /** Decoded field values keyed by logical name. */
  fields(type: RecordType, data: RawValueMap, prefix: string): Record<string, unknown> {
    const decoded: Record<string, unknown> = {};
    for (const field of this.registry.describe(type).fields) {
      const path = prefix ? `${prefix}.${field.name}` : field.name;
      decoded[field.name] = this.field(field, readKey(data, field.externalName), path);
    }
    return decoded;
  }

  private field(field: FieldDescriptor, raw: unknown, path: string): unknown {
    if (isCollection(field.type) && containsRecord(field.type)) {
      throw new UnsupportedTypeError(path, field.externalName, field.typeName);
    }
    if (raw === undefined) {
      if (field.defaultValue) return field.defaultValue();
      if (field.isOptional) return undefined;
      throw new MissingFieldError(path, field.externalName);
    }
    return this.value(field.type, raw, path, field.externalName);
  }

  private value(tag: TypeTag, raw: unknown, path: string, key: string): unknown {
    if (raw === null || raw === undefined) {
      return this.absent(tag, raw, path, key);
    }

    switch (tag.kind) {
      case "optional":
        return this.value(tag.inner, raw, path, key);

      case "scalar":
        if (!matchesScalar(tag.scalar, raw)) {
          throw new TypeCastError(path, key, tag.scalar, runtimeTypeName(raw));
        }
        return raw;

      case "enum":
        return decodeEnum(tag.enumType, raw, path, key);

      case "record": {
        const record = tag.record();
        if (!isRawValueMap(raw)) {
          throw new NestedTypeError(path, key, record.name, runtimeTypeName(raw));
        }
        return this.record(record, raw, path);
      }

      case "array":
        if (containsRecord(tag.element)) {
          throw new UnsupportedTypeError(path, key, typeName(tag));
        }
        if (!Array.isArray(raw)) {
          throw new TypeCastError(path, key, typeName(tag), runtimeTypeName(raw));
        }
        return raw.map((element: unknown, i) => this.value(tag.element, element, `${path}[${i}]`, key));

      case "map": {
        if (containsRecord(tag.value)) {
          throw new UnsupportedTypeError(path, key, typeName(tag));
        }
        if (!isRawValueMap(raw)) {
          throw new TypeCastError(path, key, typeName(tag), runtimeTypeName(raw));
        }
        return Object.fromEntries(
          documentEntries(raw).map(([entryKey, entry]): [string, unknown] => [
            entryKey,
            this.value(tag.value, entry, `${path}.${entryKey}`, key),
          ])
        );
      }

      case "union":
        return this.union(tag, raw, path, key);

      default:
        return unreachable(tag);
    }
  }

  /** `null`, or `undefined` inside a collection. */
  private absent(tag: TypeTag, raw: null | undefined, path: string, key: string): unknown {
    switch (tag.kind) {
      case "optional":
        return undefined;
      case "record":
      case "enum":
      case "union":
        // bound directly, not decoded
        return null;
      default:
        throw new TypeCastError(path, key, typeName(tag), runtimeTypeName(raw));
    }
  }

  private union(tag: UnionTag, raw: unknown, path: string, key: string): Record<string, unknown> {
    if (!isRawValueMap(raw)) {
      throw new NestedTypeError(path, key, typeName(tag), runtimeTypeName(raw));
    }
    const discriminator = readKey(raw, tag.discriminator);
    const variant = tag.variants.find((v) => v.tag === discriminator);
    if (!variant) {
      throw new VariantDecodeError(
        path,
        key,
        tag.discriminator,
        discriminator,
        tag.variants.map((v) => v.tag)
      );
    }
    return { [tag.discriminator]: variant.tag, ...this.fields(variant.record(), raw, path) };
  }
}

/**
 * Build a `T` from an untyped document, reading each field under its
 * external name.
 *
 * ```ts
 * materialize(Address, { zip: 10001, c: "NY" })
 * // { zipCode: 10001, city: "NY" }
 * ```
 *
 * @throws FieldBuildError (a subclass naming the reason) for the first field that cannot be built
 */
export function materialize<T>(type: RecordType<T>, data: RawValueMap, options: MaterializeOptions = {}): T {
  return new Decoder(options.registry ?? defaultRegistry).record(type, data, "");
}
