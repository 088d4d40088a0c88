export const DecodeErrorKinds = [
  "EmptyInput",
  "UnrecognizedType",
  "EmptyInteger",
  "MalformedInteger",
  "TruncatedInteger",
  "InvalidLengthPrefix",
  "TruncatedString",
  "TruncatedList",
  "TruncatedDictionary",
  "NonStringKey",
  "DuplicateKey",
  "UnorderedKeys",
  "NestingTooDeep",
  "TrailingData",
] as const;

export type DecodeErrorKind = (typeof DecodeErrorKinds)[number];

export abstract class BencodeError extends Error {
  protected constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** Thrown by the decoder for any malformed or truncated input. */
export class BencodeDecodeError extends BencodeError {
  public constructor(
    public readonly kind: DecodeErrorKind,
    public readonly offset: number,
    detail: string
  ) {
    super(`${kind} at ${offset}: ${detail}`);
  }
}

/** Thrown when a value is built, read or encoded in a way the model does not allow. */
export class BencodeValueError extends BencodeError {
  public constructor(message: string) {
    super(message);
  }
}
