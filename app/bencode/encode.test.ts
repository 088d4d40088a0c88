import { expect, test, describe } from "vitest";
import {
  BencodeValueError,
  byteString,
  decode,
  dictionary,
  dictionaryOf,
  encode,
  integer,
  list,
  type BencodeDictionary,
} from ".";

const latin1 = (bytes: Uint8Array) => Buffer.from(bytes).toString("latin1");

describe("bencode", () => {
  describe("encode", () => {
    test.each([
      [byteString(""), "0:"],
      [byteString("foo"), "3:foo"],
      [byteString(new Uint8Array([0, 1, 2, 255])), "4:\x00\x01\x02\xff"],

      [integer(42), "i42e"],
      [integer(-123), "i-123e"],
      [integer(0), "i0e"],
      [integer(2n ** 63n - 1n), "i9223372036854775807e"],
      [integer(-(2n ** 63n)), "i-9223372036854775808e"],

      [list([]), "le"],
      [list([list([])]), "llee"],
      [list([byteString("a"), byteString("b")]), "l1:a1:be"],
      [list([byteString("a"), byteString("b"), integer(42)]), "l1:a1:bi42ee"],
      [
        list([
          byteString("a"),
          byteString("b"),
          integer(42),
          list([integer(123)]),
        ]),
        "l1:a1:bi42eli123eee",
      ],

      [dictionaryOf({}), "de"],
      [dictionaryOf({ a: integer(1) }), "d1:ai1ee"],
      [
        dictionaryOf({ z: integer(1), a: integer(2), m: integer(3) }),
        "d1:ai2e1:mi3e1:zi1ee",
      ],
    ])("'%s' -> '%s'", (input, result) => {
      expect(latin1(encode(input))).toEqual(result);
    });

    test("writes integers decoded without a range limit", () => {
      const input = new TextEncoder().encode("i1180591620717411303424e");
      const { value } = decode(input, { integers: "unbounded" });

      expect(latin1(encode(value))).toEqual("i1180591620717411303424e");
    });

    test("writes UTF-8 text with its byte length", () => {
      expect(Buffer.from(encode(byteString("héllo"))).toString()).toEqual(
        "6:héllo"
      );
    });

    test("orders keys by raw bytes", () => {
      const value = dictionary([
        [new Uint8Array([0xff]), integer(3)],
        ["a", integer(2)],
        ["B", integer(1)],
      ]);

      expect(latin1(encode(value))).toEqual("d1:Bi1e1:ai2e1:\xffi3ee");
    });

    test("grows past its initial buffer", () => {
      const encoded = encode(byteString("x".repeat(1000)));

      expect(encoded.length).toEqual(1005);
      expect(latin1(encoded.subarray(0, 6))).toEqual("1000:x");
    });

    test("sorts dictionaries that were built by hand", () => {
      const value: BencodeDictionary = {
        type: "dictionary",
        entries: [
          [new TextEncoder().encode("b"), integer(1)],
          [new TextEncoder().encode("a"), integer(2)],
        ],
      };

      expect(latin1(encode(value))).toEqual("d1:ai2e1:bi1ee");
    });

    test("rejects hand-built dictionaries with a repeated key", () => {
      const value: BencodeDictionary = {
        type: "dictionary",
        entries: [
          [new TextEncoder().encode("a"), integer(1)],
          [new TextEncoder().encode("a"), integer(2)],
        ],
      };

      expect(() => encode(value)).toThrow(BencodeValueError);
    });
  });
});
