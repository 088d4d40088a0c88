import { BencodeDecodeError, BencodeValueError } from "./errors";
import { Markers, isDigit } from "./markers";
import {
  INT64_MAX,
  INT64_MIN,
  compareBytes,
  type BencodeByteString,
  type BencodeDictionary,
  type BencodeEntry,
  type BencodeInteger,
  type BencodeList,
  type BencodeValue,
} from "./value";

export interface DecodeOptions {
  /**
   * Maximum container nesting before `NestingTooDeep`. Defaults to 512;
   * values above `MAX_DEPTH_LIMIT` are lowered to it.
   */
  maxDepth?: number;
  /**
   * `"int64"` (default) rejects integers outside the signed 64-bit range,
   * `"unbounded"` accepts any number of digits.
   */
  integers?: "int64" | "unbounded";
  /**
   * `"strict"` (default) rejects dictionaries whose keys are not ascending.
   * `"sort"` reorders them on ingest instead.
   */
  keyOrder?: "strict" | "sort";
}

export interface DecodeResult {
  value: BencodeValue;
  /** Bytes taken from the start of the input by `value`. */
  consumed: number;
}

export const DEFAULT_MAX_DEPTH = 512;
// deepest nesting the recursive decoder can walk on a default Node stack
export const MAX_DEPTH_LIMIT = 1024;

const INT64_MAX_DIGITS = 19;

interface DecodeState {
  readonly payload: Uint8Array;
  readonly maxDepth: number;
  readonly integers: "int64" | "unbounded";
  readonly keyOrder: "strict" | "sort";
  offset: number;
}

// what a container sees when it asks for its next element
type Item = { done: true } | { done: false; value: BencodeValue };

/**
 * Decodes the value at the start of `input`. Bytes after it are left alone;
 * `consumed` tells where they begin. Byte strings in the result are views
 * into `input`.
 */
export function decode(
  input: Uint8Array,
  options: DecodeOptions = {}
): DecodeResult {
  const state: DecodeState = {
    payload: new Uint8Array(input.buffer, input.byteOffset, input.byteLength),
    maxDepth: depthLimit(options.maxDepth),
    integers: options.integers ?? "int64",
    keyOrder: options.keyOrder ?? "strict",
    offset: 0,
  };

  if (state.payload.length == 0) {
    throw new BencodeDecodeError("EmptyInput", 0, "nothing to decode");
  }

  const value = decodeValue(state, 0);
  return { value, consumed: state.offset };
}

/** Like `decode`, but the value must span the whole input. */
export function decodeAll(
  input: Uint8Array,
  options: DecodeOptions = {}
): BencodeValue {
  const { value, consumed } = decode(input, options);

  if (consumed != input.length) {
    throw new BencodeDecodeError(
      "TrailingData",
      consumed,
      `${input.length - consumed} bytes after the value`
    );
  }

  return value;
}

function depthLimit(maxDepth = DEFAULT_MAX_DEPTH): number {
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new BencodeValueError(
      `maxDepth must be a non-negative integer, got ${maxDepth}`
    );
  }

  return Math.min(maxDepth, MAX_DEPTH_LIMIT);
}

function decodeValue(state: DecodeState, depth: number): BencodeValue {
  const c = state.payload[state.offset];

  switch (c) {
    case Markers.INTEGER:
      return decodeInteger(state);
    case Markers.LIST:
      return decodeList(state, depth + 1);
    case Markers.DICT:
      return decodeDictionary(state, depth + 1);
  }

  if (isDigit(c)) {
    return decodeString(state);
  }

  throw new BencodeDecodeError(
    "UnrecognizedType",
    state.offset,
    `expected 'i', 'l', 'd' or digit, got ${describeByte(c)}`
  );
}

function readItem(
  state: DecodeState,
  depth: number,
  truncated: "TruncatedList" | "TruncatedDictionary"
): Item {
  if (state.offset >= state.payload.length) {
    throw new BencodeDecodeError(
      truncated,
      state.payload.length,
      "input ended before 'e'"
    );
  }

  if (state.payload[state.offset] == Markers.END) {
    state.offset++;
    return { done: true };
  }

  return { done: false, value: decodeValue(state, depth) };
}

function enterContainer(state: DecodeState, depth: number) {
  if (depth > state.maxDepth) {
    throw new BencodeDecodeError(
      "NestingTooDeep",
      state.offset,
      `nesting exceeds ${state.maxDepth} levels`
    );
  }

  // skip the 'l' or 'd' marker
  state.offset++;
}

function decodeList(state: DecodeState, depth: number): BencodeList {
  enterContainer(state, depth);

  const items: BencodeValue[] = [];
  for (
    let item = readItem(state, depth, "TruncatedList");
    !item.done;
    item = readItem(state, depth, "TruncatedList")
  ) {
    items.push(item.value);
  }

  return { type: "list", items };
}

interface DecodedEntry {
  key: Uint8Array;
  value: BencodeValue;
  offset: number;
}

function decodeDictionary(
  state: DecodeState,
  depth: number
): BencodeDictionary {
  enterContainer(state, depth);

  const { payload } = state;
  const decoded: DecodedEntry[] = [];

  while (true) {
    const keyOffset = state.offset;
    const key = readItem(state, depth, "TruncatedDictionary");
    if (key.done) {
      break;
    }

    if (key.value.type != "string") {
      throw new BencodeDecodeError(
        "NonStringKey",
        keyOffset,
        `dictionary key is ${key.value.type}, expected string`
      );
    }

    const previous = decoded[decoded.length - 1];
    if (state.keyOrder == "strict" && previous) {
      const cmp = compareBytes(previous.key, key.value.bytes);
      if (cmp == 0) {
        throw duplicateKey(key.value.bytes, keyOffset);
      }
      if (cmp > 0) {
        throw new BencodeDecodeError(
          "UnorderedKeys",
          keyOffset,
          `key '${Buffer.from(key.value.bytes)}' sorts before '${Buffer.from(
            previous.key
          )}'`
        );
      }
    }

    if (state.offset >= payload.length) {
      throw new BencodeDecodeError(
        "TruncatedDictionary",
        payload.length,
        "input ended after a key"
      );
    }

    if (payload[state.offset] == Markers.END) {
      throw new BencodeDecodeError(
        "TruncatedDictionary",
        state.offset,
        `no value for key '${Buffer.from(key.value.bytes)}'`
      );
    }

    decoded.push({
      key: key.value.bytes,
      value: decodeValue(state, depth),
      offset: keyOffset,
    });
  }

  if (state.keyOrder == "sort") {
    decoded.sort((a, b) => compareBytes(a.key, b.key));

    for (let i = 1; i < decoded.length; i++) {
      const [a, b] = [decoded[i - 1], decoded[i]];
      if (compareBytes(a.key, b.key) == 0) {
        throw duplicateKey(b.key, Math.max(a.offset, b.offset));
      }
    }
  }

  const entries: BencodeEntry[] = decoded.map(
    ({ key, value }) => [key, value] as const
  );
  return { type: "dictionary", entries };
}

function decodeInteger(state: DecodeState): BencodeInteger {
  const { payload } = state;

  // this is only ever invoked when we're at an 'i' marker, so we can skip it
  const start = state.offset + 1;
  const end = payload.indexOf(Markers.END, start);

  if (end == -1) {
    throw new BencodeDecodeError(
      "TruncatedInteger",
      payload.length,
      "integer not terminated by 'e'"
    );
  }

  if (end == start) {
    throw new BencodeDecodeError("EmptyInteger", start, "no digits in integer");
  }

  let digits = start;
  if (payload[start] == Markers.MINUS) {
    digits++;

    if (digits == end) {
      throw new BencodeDecodeError("MalformedInteger", digits, "'-' without digits");
    }

    if (payload[digits] == Markers.ZERO) {
      throw new BencodeDecodeError(
        "MalformedInteger",
        digits,
        "negative integer starts with '0'"
      );
    }
  } else if (payload[start] == Markers.ZERO && end - start > 1) {
    throw new BencodeDecodeError("MalformedInteger", start, "leading zero");
  }

  for (let i = digits; i < end; i++) {
    if (!isDigit(payload[i])) {
      throw new BencodeDecodeError(
        "MalformedInteger",
        i,
        `expected digit, got ${describeByte(payload[i])}`
      );
    }
  }

  if (state.integers == "int64" && end - digits > INT64_MAX_DIGITS) {
    throw outOfRange(start);
  }

  const value = BigInt(Buffer.from(payload.subarray(start, end)).toString("ascii"));

  if (state.integers == "int64" && (value < INT64_MIN || value > INT64_MAX)) {
    throw outOfRange(start);
  }

  state.offset = end + 1;
  return { type: "integer", value };
}

function decodeString(state: DecodeState): BencodeByteString {
  const { payload } = state;
  let size = 0;
  let i = state.offset;

  for (; i < payload.length && payload[i] != Markers.COLON; i++) {
    const c = payload[i];
    if (!isDigit(c)) {
      throw new BencodeDecodeError(
        "InvalidLengthPrefix",
        i,
        `expected digit or ':', got ${describeByte(c)}`
      );
    }

    size = size * 10 + c - Markers.ZERO;
  }

  if (i >= payload.length) {
    throw new BencodeDecodeError(
      "TruncatedString",
      payload.length,
      "length prefix not terminated by ':'"
    );
  }

  const body = i + 1;
  const available = payload.length - body;

  if (size > available) {
    throw new BencodeDecodeError(
      "TruncatedString",
      payload.length,
      `expected ${size} bytes, ${available} left`
    );
  }

  state.offset = body + size;
  return { type: "string", bytes: payload.subarray(body, body + size) };
}

function duplicateKey(key: Uint8Array, offset: number) {
  return new BencodeDecodeError(
    "DuplicateKey",
    offset,
    `key '${Buffer.from(key)}' appears more than once`
  );
}

function outOfRange(offset: number) {
  return new BencodeDecodeError(
    "MalformedInteger",
    offset,
    "integer outside the signed 64-bit range"
  );
}

function describeByte(c: number) {
  return `'${String.fromCharCode(c)}' (${c})`;
}
