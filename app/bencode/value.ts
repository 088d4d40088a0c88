import { BencodeValueError } from "./errors";

export type BencodeValue =
  | BencodeInteger
  | BencodeByteString
  | BencodeList
  | BencodeDictionary;

export interface BencodeInteger {
  readonly type: "integer";
  readonly value: bigint;
}

export interface BencodeByteString {
  readonly type: "string";
  readonly bytes: Uint8Array;
}

export interface BencodeList {
  readonly type: "list";
  readonly items: readonly BencodeValue[];
}

export type BencodeEntry = readonly [key: Uint8Array, value: BencodeValue];

export interface BencodeDictionary {
  readonly type: "dictionary";
  /** Sorted by raw key bytes, keys unique. */
  readonly entries: readonly BencodeEntry[];
}

export type DictionaryPair = readonly [
  key: Uint8Array | string,
  value: BencodeValue,
];

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

/** Accepts the signed 64-bit range, the range `decode` reads by default. */
export function integer(value: number | bigint): BencodeInteger {
  if (typeof value == "number" && !Number.isSafeInteger(value)) {
    throw new BencodeValueError(`${value} is not a safe integer`);
  }

  const n = BigInt(value);
  if (n < INT64_MIN || n > INT64_MAX) {
    throw new BencodeValueError(`${n} is outside the signed 64-bit range`);
  }

  return { type: "integer", value: n };
}

// caller-supplied bytes are copied so later writes to them can't reach the value
function ownBytes(value: Uint8Array | string): Uint8Array {
  return typeof value == "string"
    ? textEncoder.encode(value)
    : Uint8Array.from(value);
}

export function byteString(value: Uint8Array | string): BencodeByteString {
  return { type: "string", bytes: ownBytes(value) };
}

export function list(items: Iterable<BencodeValue>): BencodeList {
  return { type: "list", items: Array.from(items) };
}

/**
 * Builds a dictionary from key/value pairs (a `Map` works too). String keys
 * are UTF-8 encoded, entries are sorted by raw key bytes and a repeated key
 * is rejected.
 */
export function dictionary(pairs: Iterable<DictionaryPair>): BencodeDictionary {
  const entries: BencodeEntry[] = Array.from(
    pairs,
    ([k, v]) => [ownBytes(k), v] as const
  );

  return { type: "dictionary", entries: sortEntries(entries) };
}

export function dictionaryOf(
  record: Readonly<Record<string, BencodeValue>>
): BencodeDictionary {
  return dictionary(Object.entries(record));
}

export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  return Buffer.compare(a, b);
}

/**
 * Returns a sorted copy of `entries`. Throws when two keys are equal, since
 * there is no canonical order for them.
 */
export function sortEntries(
  entries: readonly BencodeEntry[]
): BencodeEntry[] {
  const sorted = [...entries].sort(([a], [b]) => compareBytes(a, b));

  for (let i = 1; i < sorted.length; i++) {
    if (compareBytes(sorted[i - 1][0], sorted[i][0]) == 0) {
      throw new BencodeValueError(
        `duplicate dictionary key '${Buffer.from(sorted[i][0]).toString()}'`
      );
    }
  }

  return sorted;
}

export function asInteger(value: BencodeValue): bigint {
  if (value.type != "integer") {
    throw unexpectedType("integer", value);
  }
  return value.value;
}

export function asBytes(value: BencodeValue): Uint8Array {
  if (value.type != "string") {
    throw unexpectedType("string", value);
  }
  return value.bytes;
}

/** Reads a byte string as UTF-8. Invalid sequences throw instead of being replaced. */
export function asText(value: BencodeValue): string {
  const bytes = asBytes(value);

  try {
    return textDecoder.decode(bytes);
  } catch (error) {
    throw new BencodeValueError(
      `byte string is not valid UTF-8: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
  }
}

export function asList(value: BencodeValue): readonly BencodeValue[] {
  if (value.type != "list") {
    throw unexpectedType("list", value);
  }
  return value.items;
}

export function asDictionary(value: BencodeValue): BencodeDictionary {
  if (value.type != "dictionary") {
    throw unexpectedType("dictionary", value);
  }
  return value;
}

export function lookup(
  dict: BencodeDictionary,
  key: Uint8Array | string
): BencodeValue | undefined {
  const needle = typeof key == "string" ? textEncoder.encode(key) : key;
  let low = 0;
  let high = dict.entries.length - 1;

  while (low <= high) {
    const mid = (low + high) >>> 1;
    const [k, v] = dict.entries[mid];
    const cmp = compareBytes(k, needle);

    if (cmp == 0) {
      return v;
    }

    if (cmp < 0) {
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  return undefined;
}

export function equals(a: BencodeValue, b: BencodeValue): boolean {
  switch (a.type) {
    case "integer":
      return b.type == "integer" && a.value == b.value;
    case "string":
      return b.type == "string" && compareBytes(a.bytes, b.bytes) == 0;
    case "list":
      return (
        b.type == "list" &&
        a.items.length == b.items.length &&
        a.items.every((item, i) => equals(item, b.items[i]))
      );
    case "dictionary":
      return (
        b.type == "dictionary" &&
        a.entries.length == b.entries.length &&
        a.entries.every(
          ([k, v], i) =>
            compareBytes(k, b.entries[i][0]) == 0 && equals(v, b.entries[i][1])
        )
      );
  }
}

function unexpectedType(expected: BencodeValue["type"], actual: BencodeValue) {
  return new BencodeValueError(`expected ${expected}, got ${actual.type}`);
}
