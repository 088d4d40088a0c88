import { BencodeValueError } from "./errors";
import {
  byteString,
  dictionary,
  integer,
  list,
  type BencodeValue,
} from "./value";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * A printable view of a decoded value. Byte strings that are not valid UTF-8
 * show up as `{ hex }` (as `hex:<digits>` when used as a key), integers
 * beyond 2^53 as decimal strings.
 */
export function toJSON(value: BencodeValue): JsonValue {
  switch (value.type) {
    case "integer": {
      const n = Number(value.value);
      return Number.isSafeInteger(n) ? n : value.value.toString();
    }
    case "string": {
      const text = utf8OrUndefined(value.bytes);
      return text ?? { hex: Buffer.from(value.bytes).toString("hex") };
    }
    case "list":
      return value.items.map(toJSON);
    case "dictionary":
      return Object.fromEntries(
        value.entries.map(([k, v]) => [
          utf8OrUndefined(k) ?? `hex:${Buffer.from(k).toString("hex")}`,
          toJSON(v),
        ])
      );
  }
}

function utf8OrUndefined(bytes: Uint8Array): string | undefined {
  try {
    return strictUtf8.decode(bytes);
  } catch {
    return undefined;
  }
}

export function fromJSON(json: JsonValue): BencodeValue {
  if (typeof json == "string") {
    return byteString(json);
  }

  if (typeof json == "number") {
    if (!Number.isInteger(json)) {
      throw new BencodeValueError(`${json} is not an integer`);
    }
    return integer(json);
  }

  if (Array.isArray(json)) {
    return list(json.map(fromJSON));
  }

  if (json === null || typeof json == "boolean") {
    throw new BencodeValueError(`${json} has no bencode representation`);
  }

  return dictionary(
    Object.entries(json).map(([k, v]) => [k, fromJSON(v)] as const)
  );
}
