/**
 * @fieldmap/mapper
 *
 * `materialize` builds typed records from untyped documents; `encode`
 * writes them back.
 */

export { materialize, type MaterializeOptions } from "./materialize.js";
export { encode, type EncodeOptions } from "./encode.js";
export { decodeEnum, encodeEnum, findEnumCase } from "./enum-codec.js";
export {
  runtimeTypeName,
  matchesScalar,
  isRawValueMap,
  isInt32,
  readKey,
  documentEntries,
} from "./values.js";
