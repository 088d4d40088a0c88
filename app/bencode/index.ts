export {
  decode,
  decodeAll,
  DEFAULT_MAX_DEPTH,
  MAX_DEPTH_LIMIT,
} from "./decode";
export type { DecodeOptions, DecodeResult } from "./decode";
export { encode } from "./encode";
export {
  BencodeError,
  BencodeDecodeError,
  BencodeValueError,
  DecodeErrorKinds,
} from "./errors";
export type { DecodeErrorKind } from "./errors";
export { toJSON, fromJSON } from "./json";
export type { JsonValue } from "./json";
export {
  INT64_MAX,
  INT64_MIN,
  integer,
  byteString,
  list,
  dictionary,
  dictionaryOf,
  compareBytes,
  asInteger,
  asBytes,
  asText,
  asList,
  asDictionary,
  lookup,
  equals,
} from "./value";
export type {
  BencodeValue,
  BencodeInteger,
  BencodeByteString,
  BencodeList,
  BencodeDictionary,
  BencodeEntry,
  DictionaryPair,
} from "./value";
