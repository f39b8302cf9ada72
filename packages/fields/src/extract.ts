/**
 * Leaf path extraction.
 *
 * Walks a record type depth first in declaration order and lists every
 * leaf-reachable external path as a `(path, path)` pair:
 *
 * | Field                                         | Output                      |
 * |-----------------------------------------------|-----------------------------|
 * | scalar, enum, union                           | `p`                         |
 * | record                                        | fields of the record, `p.`  |
 * | optional scalar, enum or scalar collection    | `p.value`                   |
 * | optional record                               | fields of the record, `p.`  |
 * | array or map of scalars                       | `p`                         |
 * | array or map of records                       | nothing                     |
 *
 * The `.value` suffix for optional leaves is a legacy convention; turn it
 * off with `optionalValueSuffix: false` or the `paths.optionalValueSuffix`
 * config option.
 */

import { config, createLogger, unreachable } from "@fieldmap/core";
import {
  containsRecord,
  defaultRegistry,
  type DescriptorRegistry,
  type FieldDescriptor,
  type RecordType,
} from "@fieldmap/schema";

const log = createLogger("paths");

/** Source and destination path. Identical under the current policy. */
export type PathPair = readonly [source: string, destination: string];

export interface ExtractOptions {
  /** Append `.value` to optional leaves. Defaults to config `paths.optionalValueSuffix`. */
  readonly optionalValueSuffix?: boolean;
  /** Path of the record inside an enclosing document, without a trailing dot. */
  readonly prefix?: string;
  readonly registry?: DescriptorRegistry;
}

export function extractPaths<T>(type: RecordType<T>, options: ExtractOptions = {}): PathPair[] {
  const registry = options.registry ?? defaultRegistry;
  const valueSuffix = options.optionalValueSuffix ?? config.settings().paths.optionalValueSuffix;
  const pairs: PathPair[] = [];

  const emit = (path: string): void => {
    pairs.push([path, path]);
  };

  const leaf = (field: FieldDescriptor, path: string): void => {
    emit(field.isOptional && valueSuffix ? `${path}.value` : path);
  };

  const walk = (record: RecordType, prefix: string, expanding: ReadonlySet<RecordType>): void => {
    for (const field of registry.describe(record).fields) {
      const path = prefix ? `${prefix}.${field.externalName}` : field.externalName;
      const value = field.valueType;

      switch (value.kind) {
        case "scalar":
        case "enum":
          leaf(field, path);
          break;

        case "array":
        case "map":
          if (containsRecord(value)) {
            log.debug(`Skipping ${record.name}.${field.name} (${field.typeName}): collections of records have no leaf paths`);
          } else {
            leaf(field, path);
          }
          break;

        case "union":
          emit(path);
          break;

        case "record": {
          const nested = value.record();
          if (expanding.has(nested)) {
            emit(path);
          } else {
            walk(nested, path, new Set([...expanding, nested]));
          }
          break;
        }

        case "optional":
          // valueType is unwrapped; a doubly optional type is still a leaf
          leaf(field, path);
          break;

        default:
          unreachable(value);
      }
    }
  };

  walk(type, options.prefix ?? "", new Set<RecordType>([type]));
  return pairs;
}

/** Extracted paths as a lookup table from source to destination path. */
export function pathMap<T>(type: RecordType<T>, options?: ExtractOptions): ReadonlyMap<string, string> {
  return new Map(extractPaths(type, options));
}
