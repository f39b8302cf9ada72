/**
 * fieldmap - typed records over untyped documents
 *
 * Declare a record once and get its stored key paths, and a decoder and
 * encoder for documents that use those keys.
 *
 * ## Quick Start
 *
 * ```ts
 * import { defineRecord, t, resolvePath, extractPaths, materialize } from "fieldmap";
 *
 * const Address = defineRecord("Address", {
 *   zipCode: t.int().rename("zip"),
 *   city: t.string().rename("c"),
 * });
 *
 * const User = defineRecord("User", {
 *   name: t.string(),
 *   address: t.optional(t.record(Address)),
 * });
 *
 * resolvePath(User, (u) => u.address?.zipCode); // "address.zip"
 * extractPaths(Address);                        // [["zip", "zip"], ["c", "c"]]
 * materialize(Address, { zip: 10001, c: "NY" }); // { zipCode: 10001, city: "NY" }
 * ```
 *
 * ## Declarations as the source
 *
 * ```ts
 * import { SourceMetadataProvider, DescriptorRegistry } from "fieldmap";
 *
 * const source = SourceMetadataProvider.fromFiles(["src/models.ts"]);
 * const registry = new DescriptorRegistry({ providers: [source] });
 * materialize(source.typeOf<User>("User"), doc, { registry });
 * ```
 *
 * @module
 */

// ============================================================================
// Configuration, errors, logging
// ============================================================================

export * from "@fieldmap/core";

// ============================================================================
// Record types and descriptors
// ============================================================================

export * from "@fieldmap/schema";

// ============================================================================
// Paths
// ============================================================================

export * from "@fieldmap/fields";

// ============================================================================
// Documents
// ============================================================================

export * from "@fieldmap/mapper";

// ============================================================================
// Reflection over TypeScript sources
// ============================================================================

export * from "@fieldmap/reflect";
