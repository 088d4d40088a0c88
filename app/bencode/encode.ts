import { Markers } from "./markers";
import { sortEntries, type BencodeValue } from "./value";

/**
 * Serializes `value` in canonical form. Dictionary entries are re-sorted by raw
 * key bytes, so hand-built dictionaries come out canonical too; equal keys
 * throw `BencodeValueError`.
 */
export function encode(value: BencodeValue): Uint8Array {
  const w = new Writer();
  w.write(value);

  return w.toUint8Array();
}

class Writer {
  private buffer: Buffer = Buffer.alloc(64);
  private size = 0;

  write(value: BencodeValue): void {
    switch (value.type) {
      case "integer": {
        this.writeByte(Markers.INTEGER);
        this.writeString(value.value.toString());
        this.writeByte(Markers.END);
        return;
      }
      case "string": {
        this.writeBytes(value.bytes);
        return;
      }
      case "list": {
        this.writeByte(Markers.LIST);
        for (const item of value.items) {
          this.write(item);
        }
        this.writeByte(Markers.END);
        return;
      }
      case "dictionary": {
        this.writeByte(Markers.DICT);
        for (const [k, v] of sortEntries(value.entries)) {
          this.writeBytes(k);
          this.write(v);
        }
        this.writeByte(Markers.END);
        return;
      }
    }
  }

  toUint8Array(): Uint8Array {
    return new Uint8Array(
      this.buffer.buffer,
      this.buffer.byteOffset,
      this.size
    );
  }

  // <length>:<bytes>
  private writeBytes(value: Uint8Array) {
    this.writeString(value.length.toString());
    this.writeByte(Markers.COLON);

    this.ensureFree(value.length);
    this.buffer.set(value, this.size);
    this.size += value.length;
  }

  private writeByte(value: number) {
    this.ensureFree(1);
    this.buffer[this.size++] = value;
  }

  private writeString(value: string) {
    this.ensureFree(value.length);
    this.buffer.write(value, this.size, "ascii");
    this.size += value.length;
  }

  private ensureFree(extraSize: number) {
    if (this.buffer.length < this.size + extraSize) {
      this.buffer = Buffer.concat([
        this.buffer.subarray(0, this.size),
        Buffer.alloc(Math.max(extraSize, this.buffer.length)),
      ]);
    }
  }
}
