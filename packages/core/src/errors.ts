/**
 * Error Types
 *
 * Every failure in fieldmap is thrown as a subclass of `FieldmapError`.
 * Path resolution errors carry the path walked so far; construction errors
 * carry the fully dotted logical field path and the external key that was
 * read, plus expected and actual type names where they apply.
 */

export type FieldmapErrorCode =
  | "UNKNOWN_FIELD"
  | "INVALID_PATH"
  | "EMPTY_PATH"
  | "MISSING_FIELD"
  | "ENUM_DECODE"
  | "NESTED_TYPE"
  | "TYPE_CAST"
  | "UNSUPPORTED_TYPE"
  | "VARIANT_DECODE"
  | "SCHEMA_DEFINITION";

/**
 * Base class for all fieldmap errors.
 */
export class FieldmapError extends Error {
  constructor(
    message: string,
    readonly code: FieldmapErrorCode
  ) {
    super(message);
    this.name = "FieldmapError";
  }
}

// ============================================================================
// Path resolution
// ============================================================================

/**
 * Base class for failures while resolving a path expression.
 */
export class PathError extends FieldmapError {
  constructor(
    message: string,
    code: FieldmapErrorCode,
    /** Logical hops consumed before the failure, dot-joined. */
    readonly path: string
  ) {
    super(message, code);
    this.name = "PathError";
  }
}

/** A hop names a field the record type does not declare. */
export class UnknownFieldError extends PathError {
  constructor(
    readonly recordName: string,
    readonly fieldName: string,
    path: string
  ) {
    super(
      `Unknown field '${fieldName}' on record ${recordName}` +
        (path ? ` (after '${path}')` : ""),
      "UNKNOWN_FIELD",
      path
    );
    this.name = "UnknownFieldError";
  }
}

/** A hop continues past a field that has no nested fields. */
export class InvalidPathError extends PathError {
  constructor(
    readonly fieldName: string,
    readonly typeName: string,
    path: string,
    readonly nextHop: string
  ) {
    super(
      `Cannot select '${nextHop}' from '${path}': field ${fieldName} has type ${typeName}, which has no fields`,
      "INVALID_PATH",
      path
    );
    this.name = "InvalidPathError";
  }
}

/** The path expression has no hops. */
export class EmptyPathError extends PathError {
  constructor(readonly recordName: string) {
    super(`Empty path expression for record ${recordName}`, "EMPTY_PATH", "");
    this.name = "EmptyPathError";
  }
}

// ============================================================================
// Construction
// ============================================================================

export type FieldBuildReason =
  | "missing"
  | "enum_decode"
  | "nested_type"
  | "type_cast"
  | "unsupported_type"
  | "variant_decode";

/**
 * Base class for failures while building (or writing) a record instance.
 */
export class FieldBuildError extends FieldmapError {
  constructor(
    message: string,
    code: FieldmapErrorCode,
    /** Fully dotted logical path of the offending field. */
    readonly fieldName: string,
    readonly reason: FieldBuildReason,
    /** External key the value was read from or written to. */
    readonly key: string
  ) {
    super(message, code);
    this.name = "FieldBuildError";
  }
}

export class MissingFieldError extends FieldBuildError {
  constructor(fieldName: string, key: string) {
    super(`Missing field '${fieldName}' (key '${key}')`, "MISSING_FIELD", fieldName, "missing", key);
    this.name = "MissingFieldError";
  }
}

export class EnumDecodeError extends FieldBuildError {
  constructor(
    fieldName: string,
    key: string,
    readonly value: unknown,
    readonly enumName: string,
    readonly cases: readonly string[]
  ) {
    super(
      `Cannot decode enum ${enumName} for field '${fieldName}' from ${describeValue(value)}: ` +
        `expected one of ${cases.join(", ")} or an ordinal in 0..${cases.length - 1}`,
      "ENUM_DECODE",
      fieldName,
      "enum_decode",
      key
    );
    this.name = "EnumDecodeError";
  }
}

export class NestedTypeError extends FieldBuildError {
  constructor(
    fieldName: string,
    key: string,
    readonly recordName: string,
    readonly actualType: string
  ) {
    super(
      `Field '${fieldName}' must be a document for record ${recordName}, got ${actualType}`,
      "NESTED_TYPE",
      fieldName,
      "nested_type",
      key
    );
    this.name = "NestedTypeError";
  }
}

export class TypeCastError extends FieldBuildError {
  constructor(
    fieldName: string,
    key: string,
    readonly expectedType: string,
    readonly actualType: string
  ) {
    super(
      `Error casting field '${fieldName}'. Expected: ${expectedType}, Actual: ${actualType}`,
      "TYPE_CAST",
      fieldName,
      "type_cast",
      key
    );
    this.name = "TypeCastError";
  }
}

export class UnsupportedTypeError extends FieldBuildError {
  constructor(
    fieldName: string,
    key: string,
    readonly typeName: string
  ) {
    super(
      `Field '${fieldName}' has unsupported type ${typeName}: collections of records are not supported`,
      "UNSUPPORTED_TYPE",
      fieldName,
      "unsupported_type",
      key
    );
    this.name = "UnsupportedTypeError";
  }
}

export class VariantDecodeError extends FieldBuildError {
  constructor(
    fieldName: string,
    key: string,
    readonly discriminator: string,
    readonly value: unknown,
    readonly variants: readonly string[]
  ) {
    super(
      `Cannot pick a variant for field '${fieldName}': '${discriminator}' is ${describeValue(value)}, ` +
        `expected one of ${variants.join(", ")}`,
      "VARIANT_DECODE",
      fieldName,
      "variant_decode",
      key
    );
    this.name = "VariantDecodeError";
  }
}

// ============================================================================
// Schema
// ============================================================================

/** Record metadata is inconsistent or cannot be derived. */
export class SchemaDefinitionError extends FieldmapError {
  constructor(
    message: string,
    readonly recordName: string
  ) {
    super(message, "SCHEMA_DEFINITION");
    this.name = "SchemaDefinitionError";
  }
}

function describeValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  return String(value);
}
