/**
 * @fieldmap/schema
 *
 * Runtime type metadata for record types: type tags, the `t` field
 * builders, `defineRecord`, enums, descriptors and the descriptor cache.
 */

export {
  SCALAR_KINDS,
  resolveRecordRef,
  type ScalarKind,
  type EnumCase,
  type EnumType,
  type RecordType,
  type RecordTypeRef,
  type UnionVariant,
  type TypeTag,
  type TypeTagKind,
  type FieldMeta,
  type RecordMeta,
  type TypeMetadataProvider,
  type NameOverrideSource,
  type RawValueMap,
} from "./types.js";

export { enumOf, nativeEnum, enumFromCases, enumCaseNames, type NativeEnumValue } from "./enum.js";

export {
  t,
  FieldBuilder,
  type FieldOptions,
  type Shape,
  type InferField,
  type InferShape,
  type InferRecord,
  type InferUnion,
} from "./builders.js";

export {
  defineRecord,
  recordRef,
  inlineMetadataProvider,
  type DefineRecordOptions,
} from "./record.js";

export {
  RecordTypeDescriptor,
  buildFieldDescriptor,
  buildRecordDescriptor,
  unwrapOptional,
  containsRecord,
  isCollection,
  typeName,
  type FieldDescriptor,
} from "./descriptor.js";

export {
  DescriptorRegistry,
  defaultRegistry,
  describe,
  annotationOverrides,
  type DescriptorRegistryOptions,
} from "./registry.js";
