/**
 * @fieldmap/fields
 *
 * Dotted external paths for record types: `resolvePath` for a single field
 * chain, `extractPaths` for every leaf.
 */

export {
  parsePath,
  pathOf,
  each,
  toPathExpression,
  type PathExpression,
  type PathSelector,
  type PathInput,
} from "./path.js";

export {
  resolve,
  resolvePath,
  type ResolvedPath,
  type ResolveStep,
  type ResolveOptions,
} from "./resolve.js";

export { extractPaths, pathMap, type PathPair, type ExtractOptions } from "./extract.js";
