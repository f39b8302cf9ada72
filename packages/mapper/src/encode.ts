/**
 * Write a typed record back into an untyped document, the inverse of
 * `materialize`: fields go under their external names, enums are written
 * by name or ordinal, unions carry their discriminator.
 */

import {
  config,
  MissingFieldError,
  NestedTypeError,
  TypeCastError,
  UnsupportedTypeError,
  VariantDecodeError,
  unreachable,
  type EnumEncoding,
  type NoneHandling,
} from "@fieldmap/core";
import {
  containsRecord,
  defaultRegistry,
  isCollection,
  typeName,
  type DescriptorRegistry,
  type RecordType,
  type TypeTag,
} from "@fieldmap/schema";
import { encodeEnum } from "./enum-codec.js";
import { documentEntries, isRawValueMap, matchesScalar, runtimeTypeName } from "./values.js";

export interface EncodeOptions {
  /**
   * `"encode"` writes `null` for an `undefined` optional field, `"ignore"`
   * leaves the key out. Defaults to config `codec.noneHandling`.
   */
  readonly noneHandling?: NoneHandling;
  /** Defaults to config `codec.enumEncoding`. */
  readonly enumEncoding?: EnumEncoding;
  readonly registry?: DescriptorRegistry;
}

type UnionTag = Extract<TypeTag, { kind: "union" }>;

function isObjectValue(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

class Encoder {
  constructor(
    private readonly registry: DescriptorRegistry,
    private readonly noneHandling: NoneHandling,
    private readonly enumEncoding: EnumEncoding
  ) {}

  record(type: RecordType, value: object, prefix: string): Record<string, unknown> {
    const document: Record<string, unknown> = {};
    for (const field of this.registry.describe(type).fields) {
      const path = prefix ? `${prefix}.${field.name}` : field.name;
      if (isCollection(field.type) && containsRecord(field.type)) {
        throw new UnsupportedTypeError(path, field.externalName, field.typeName);
      }
      const fieldValue: unknown = Reflect.get(value, field.name);
      if (fieldValue === undefined) {
        if (!field.isOptional) throw new MissingFieldError(path, field.externalName);
        if (this.noneHandling === "encode") document[field.externalName] = null;
        continue;
      }
      document[field.externalName] = this.value(field.type, fieldValue, path, field.externalName);
    }
    return document;
  }

  private value(tag: TypeTag, value: unknown, path: string, key: string): unknown {
    if (value === null || value === undefined) {
      if (tag.kind === "optional" || tag.kind === "record" || tag.kind === "enum" || tag.kind === "union") {
        return null;
      }
      throw new TypeCastError(path, key, typeName(tag), runtimeTypeName(value));
    }

    switch (tag.kind) {
      case "optional":
        return this.value(tag.inner, value, path, key);

      case "scalar":
        if (!matchesScalar(tag.scalar, value)) {
          throw new TypeCastError(path, key, tag.scalar, runtimeTypeName(value));
        }
        return value;

      case "enum":
        return encodeEnum(tag.enumType, value, this.enumEncoding, path, key);

      case "record": {
        const record = tag.record();
        if (!isObjectValue(value)) {
          throw new NestedTypeError(path, key, record.name, runtimeTypeName(value));
        }
        return this.record(record, value, path);
      }

      case "array":
        if (containsRecord(tag.element)) {
          throw new UnsupportedTypeError(path, key, typeName(tag));
        }
        if (!Array.isArray(value)) {
          throw new TypeCastError(path, key, typeName(tag), runtimeTypeName(value));
        }
        return value.map((element: unknown, i) => this.value(tag.element, element, `${path}[${i}]`, key));

      case "map": {
        if (containsRecord(tag.value)) {
          throw new UnsupportedTypeError(path, key, typeName(tag));
        }
        if (!isRawValueMap(value)) {
          throw new TypeCastError(path, key, typeName(tag), runtimeTypeName(value));
        }
        return Object.fromEntries(
          documentEntries(value).map(([entryKey, entry]): [string, unknown] => [
            entryKey,
            this.value(tag.value, entry, `${path}.${entryKey}`, key),
          ])
        );
      }

      case "union":
        return this.union(tag, value, path, key);

      default:
        return unreachable(tag);
    }
  }

  private union(tag: UnionTag, value: unknown, path: string, key: string): Record<string, unknown> {
    if (!isObjectValue(value)) {
      throw new NestedTypeError(path, key, typeName(tag), runtimeTypeName(value));
    }
    const discriminator: unknown = Reflect.get(value, tag.discriminator);
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
    return { [tag.discriminator]: variant.tag, ...this.record(variant.record(), value, path) };
  }
}

/**
 * Encode a record instance as a plain document keyed by external names.
 *
 * ```ts
 * encode(Address, { zipCode: 10001, city: "NY" })
 * // { zip: 10001, c: "NY" }
 * ```
 */
export function encode<T>(type: RecordType<T>, value: T, options: EncodeOptions = {}): Record<string, unknown> {
  if (!isObjectValue(value)) {
    throw new NestedTypeError("", "", type.name, runtimeTypeName(value));
  }
  const settings = config.settings().codec;
  const encoder = new Encoder(
    options.registry ?? defaultRegistry,
    options.noneHandling ?? settings.noneHandling,
    options.enumEncoding ?? settings.enumEncoding
  );
  return encoder.record(type, value, "");
}
