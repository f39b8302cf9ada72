/**
 * Path resolution: logical field chains to dotted external paths.
 *
 * Each hop is looked up by logical name in the current record's descriptor
 * and contributes its external name. Optional wrappers are transparent: the
 * next hop descends into the wrapped record and no segment is emitted for
 * the wrapper itself. Arrays of records are transparent the same way, or
 * take a positional hop (`skills.0.name`).
 */

import { EmptyPathError, InvalidPathError, UnknownFieldError } from "@fieldmap/core";
import {
  defaultRegistry,
  typeName,
  unwrapOptional,
  type DescriptorRegistry,
  type FieldDescriptor,
  type RecordType,
  type RecordTypeDescriptor,
  type TypeTag,
} from "@fieldmap/schema";
import { toPathExpression, type PathInput } from "./path.js";

export type ResolveStep =
  | { readonly kind: "field"; readonly field: FieldDescriptor; readonly segment: string }
  | { readonly kind: "transparent"; readonly field: FieldDescriptor; readonly via: "optional" | "array" }
  | { readonly kind: "position"; readonly field: FieldDescriptor; readonly segment: string };

export interface ResolvedPath {
  /** Dotted external path. */
  readonly path: string;
  readonly segments: readonly string[];
  readonly steps: readonly ResolveStep[];
}

export interface ResolveOptions {
  readonly registry?: DescriptorRegistry;
}

const POSITION = /^\d+$/;

/**
 * Resolve a path and report every step taken.
 *
 * @throws EmptyPathError when the path has no hops
 * @throws UnknownFieldError when a hop names no field of the current record
 * @throws InvalidPathError when a hop follows a field without nested fields
 */
export function resolve<T>(
  type: RecordType<T>,
  input: PathInput<T>,
  options: ResolveOptions = {}
): ResolvedPath {
  const registry = options.registry ?? defaultRegistry;
  const hops = toPathExpression(input);
  if (hops.length === 0) {
    throw new EmptyPathError(type.name);
  }

  const segments: string[] = [];
  const steps: ResolveStep[] = [];
  const walked: string[] = [];

  let descriptor: RecordTypeDescriptor = registry.describe(type);
  let current: FieldDescriptor | undefined;
  // Element type of `current` once a position was taken, else `current`'s own type.
  let currentType: TypeTag | undefined;

  for (const hop of hops) {
    if (current && currentType) {
      const unwrapped = unwrapOptional(currentType);
      const next = nestedRecord(unwrapped);
      if (next && unwrapped.kind === "array" && currentType === current.type && POSITION.test(hop)) {
        if (current.isOptional) steps.push({ kind: "transparent", field: current, via: "optional" });
        steps.push({ kind: "position", field: current, segment: hop });
        segments.push(hop);
        walked.push(hop);
        currentType = unwrapped.element;
        continue;
      }

      if (!next) {
        throw new InvalidPathError(current.name, typeName(currentType), walked.join("."), hop);
      }
      if (currentType === current.type) {
        if (current.isOptional) steps.push({ kind: "transparent", field: current, via: "optional" });
        if (unwrapped.kind === "array") steps.push({ kind: "transparent", field: current, via: "array" });
      }
      descriptor = registry.describe(next);
    }

    const field = descriptor.field(hop);
    if (!field) {
      throw new UnknownFieldError(descriptor.name, hop, walked.join("."));
    }
    steps.push({ kind: "field", field, segment: field.externalName });
    segments.push(field.externalName);
    walked.push(hop);
    current = field;
    currentType = field.type;
  }

  return { path: segments.join("."), segments, steps };
}

/**
 * Dotted external path for a logical field chain.
 *
 * ```ts
 * resolvePath(User, "address?.zipCode")               // "address.zip"
 * resolvePath(User, (u) => u.address?.zipCode)        // "address.zip"
 * resolvePath(Employee, ["skills", "name"])           // "skills.name"
 * ```
 */
export function resolvePath<T>(
  type: RecordType<T>,
  input: PathInput<T>,
  options?: ResolveOptions
): string {
  return resolve(type, input, options).path;
}

/** Record type a hop may descend into from a value of this type. */
function nestedRecord(tag: TypeTag): RecordType | undefined {
  const inner = unwrapOptional(tag);
  if (inner.kind === "record") return inner.record();
  if (inner.kind === "array") {
    const element = unwrapOptional(inner.element);
    if (element.kind === "record") return element.record();
  }
  return undefined;
}
