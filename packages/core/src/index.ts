/**
 * Core module exports for @fieldmap/core
 *
 * This package provides:
 * - Configuration (config files, FIELDMAP_* environment variables)
 * - The error taxonomy shared by every package
 * - Scoped console logging
 * - A generic registry with compute-if-absent lookups
 * - An exhaustiveness helper for tagged unions
 */

export {
  config,
  defineConfig,
  type FieldmapConfig,
  type FieldmapSettings,
  type PathsConfig,
  type CodecConfig,
  type NoneHandling,
  type EnumEncoding,
} from "./config.js";

export {
  FieldmapError,
  PathError,
  UnknownFieldError,
  InvalidPathError,
  EmptyPathError,
  FieldBuildError,
  MissingFieldError,
  EnumDecodeError,
  NestedTypeError,
  TypeCastError,
  UnsupportedTypeError,
  VariantDecodeError,
  SchemaDefinitionError,
  type FieldmapErrorCode,
  type FieldBuildReason,
} from "./errors.js";

export { createLogger, type Logger } from "./logger.js";

export {
  createGenericRegistry,
  type GenericRegistry,
  type RegistryOptions,
} from "./registry.js";

export { unreachable } from "./safety.js";
