/**
 * Descriptor registry: builds record descriptors from metadata providers
 * and caches them per type identity.
 *
 * The cache is keyed by the `RecordType` object and populated through
 * compute-if-absent. It is never invalidated; record shapes are static for
 * the life of the process.
 */

import { createGenericRegistry, createLogger, SchemaDefinitionError } from "@fieldmap/core";
import type { GenericRegistry } from "@fieldmap/core";
import { buildRecordDescriptor, type RecordTypeDescriptor } from "./descriptor.js";
import { inlineMetadataProvider } from "./record.js";
import type { NameOverrideSource, RecordMeta, RecordType, TypeMetadataProvider } from "./types.js";

const log = createLogger("schema");

/** External names come from each field's rename annotation. */
export const annotationOverrides: NameOverrideSource = {
  externalNameFor: (_type, field) => field.rename,
};

export interface DescriptorRegistryOptions {
  /** Consulted after the inline provider, in order. */
  readonly providers?: readonly TypeMetadataProvider[];
  readonly overrides?: NameOverrideSource;
}

export class DescriptorRegistry {
  private readonly providers: TypeMetadataProvider[];
  private readonly overrides: NameOverrideSource;
  private readonly cache: GenericRegistry<RecordType, RecordTypeDescriptor> = createGenericRegistry({
    name: "DescriptorCache",
  });

  constructor(options: DescriptorRegistryOptions = {}) {
    this.providers = [inlineMetadataProvider, ...(options.providers ?? [])];
    this.overrides = options.overrides ?? annotationOverrides;
  }

  /** Descriptor for `type`, built on first request. */
  describe(type: RecordType): RecordTypeDescriptor {
    return this.cache.getOrCompute(type, (key) => {
      const meta = this.metadataFor(key);
      const descriptor = buildRecordDescriptor(key, meta, this.overrides);
      log.debug(`Built descriptor for ${key.name} (${descriptor.fields.length} fields)`);
      return descriptor;
    });
  }

  /** Raw metadata for `type` from the first provider that knows it. */
  metadataFor(type: RecordType): RecordMeta {
    for (const provider of this.providers) {
      const meta = provider.metadataFor(type);
      if (meta) return meta;
    }
    throw new SchemaDefinitionError(
      `No metadata for record ${type.name}; providers consulted: ${this.providers.map((p) => p.name).join(", ")}`,
      type.name
    );
  }

  /** Append a provider. Types already described keep their cached descriptor. */
  addProvider(provider: TypeMetadataProvider): void {
    this.providers.push(provider);
  }

  isCached(type: RecordType): boolean {
    return this.cache.has(type);
  }

  /** Number of cached descriptors. */
  get size(): number {
    return this.cache.size;
  }
}

/** Process-wide registry behind the top-level functions. */
export const defaultRegistry = new DescriptorRegistry();

/** Descriptor for `type` from the default registry. */
export function describe(type: RecordType): RecordTypeDescriptor {
  return defaultRegistry.describe(type);
}
