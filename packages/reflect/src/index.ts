/**
 * @fieldmap/reflect
 *
 * Record metadata from TypeScript declarations, read with the compiler API.
 */

export { SourceMetadataProvider, type SourceProviderOptions } from "./source-provider.js";
export { createInMemoryProgram, createProgramFromFiles, DEFAULT_COMPILER_OPTIONS } from "./program.js";
export { jsDocTagText, literalValue } from "./annotations.js";
