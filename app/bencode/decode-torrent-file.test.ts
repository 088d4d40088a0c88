import { expect, test, describe } from "vitest";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { decode } from "./decode";
import { encode } from "./encode";
import {
  asBytes,
  asDictionary,
  asInteger,
  asText,
  lookup,
  type BencodeValue,
} from "./value";

const sample = readFileSync(
  fileURLToPath(new URL("../../sample.torrent", import.meta.url))
);

function field(dict: BencodeValue, key: string): BencodeValue {
  const value = lookup(asDictionary(dict), key);
  if (value === undefined) {
    throw new Error(`missing '${key}'`);
  }
  return value;
}

describe("decode torrent file", () => {
  test("should parse all content", () => {
    const { value: decoded, consumed } = decode(sample);

    expect(consumed).toEqual(sample.length);
    expect(asText(field(decoded, "announce"))).toEqual(
      "http://tracker.example.test/announce"
    );
    expect(asText(field(decoded, "created by"))).toEqual("mktorrent 1.1");

    const info = field(decoded, "info");

    expect(asText(field(info, "name"))).toEqual("sample.txt");
    expect(asInteger(field(info, "length"))).toEqual(92063n);
    expect(asInteger(field(info, "piece length"))).toEqual(32768n);
    expect(asBytes(field(info, "pieces")).length).toEqual(60);
  });

  test("re-encodes to the same bytes", () => {
    const { value } = decode(sample);

    expect(Buffer.from(encode(value))).toEqual(sample);
  });

  test("the info dictionary can be re-encoded on its own", () => {
    const info = field(decode(sample).value, "info");
    const start = sample.indexOf("4:infod") + "4:info".length;

    expect(Buffer.from(encode(info))).toEqual(
      sample.subarray(start, sample.length - 1)
    );
  });
});
