import { POSITION_2D, POSITION_3D, TYPE_DOUBLE, TYPE_INTEGER, TYPE_STRING, TYPE_STRINGLIST } from "./constants";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export class TraciError extends Error {
  readonly commandId: number | null;
  readonly status: number | null;

  constructor(message: string, commandId: number | null = null, status: number | null = null) {
    super(message);
    this.name = "TraciError";
    this.commandId = commandId;
    this.status = status;
  }
}

/** Big-endian byte buffer in TraCI's storage layout. */
export class TraciWriter {
  private bytes: number[] = [];
  private readonly scratch = new DataView(new ArrayBuffer(8));

  get length(): number {
    return this.bytes.length;
  }

  writeUnsignedByte(value: number): this {
    this.bytes.push(value & 0xff);
    return this;
  }

  writeInt(value: number): this {
    this.scratch.setInt32(0, value);
    for (let i = 0; i < 4; i += 1) {
      this.bytes.push(this.scratch.getUint8(i));
    }
    return this;
  }

  writeDouble(value: number): this {
    this.scratch.setFloat64(0, value);
    for (let i = 0; i < 8; i += 1) {
      this.bytes.push(this.scratch.getUint8(i));
    }
    return this;
  }

  writeString(value: string): this {
    const encoded = encoder.encode(value);
    this.writeInt(encoded.length);
    return this.writeBytes(encoded);
  }

  writeStringList(values: readonly string[]): this {
    this.writeInt(values.length);
    for (const value of values) {
      this.writeString(value);
    }
    return this;
  }

  writeBytes(bytes: Uint8Array): this {
    for (const byte of bytes) {
      this.bytes.push(byte);
    }
    return this;
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }
}

export class TraciReader {
  private readonly view: DataView;
  private readonly bytes: Uint8Array;
  private offset = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  readUnsignedByte(): number {
    this.ensure(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  readInt(): number {
    this.ensure(4);
    const value = this.view.getInt32(this.offset);
    this.offset += 4;
    return value;
  }

  readDouble(): number {
    this.ensure(8);
    const value = this.view.getFloat64(this.offset);
    this.offset += 8;
    return value;
  }

  readString(): string {
    const length = this.readInt();
    return decoder.decode(this.readBytes(length));
  }

  readStringList(): string[] {
    const count = this.readInt();
    const values: string[] = [];
    for (let i = 0; i < count; i += 1) {
      values.push(this.readString());
    }
    return values;
  }

  readBytes(length: number): Uint8Array {
    if (length < 0) {
      throw new TraciError(`Negative length ${length} in TraCI storage.`);
    }
    this.ensure(length);
    const slice = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  readTypedInt(): number {
    this.expectType(TYPE_INTEGER, "integer");
    return this.readInt();
  }

  readTypedDouble(): number {
    this.expectType(TYPE_DOUBLE, "double");
    return this.readDouble();
  }

  readTypedString(): string {
    this.expectType(TYPE_STRING, "string");
    return this.readString();
  }

  readTypedStringList(): string[] {
    this.expectType(TYPE_STRINGLIST, "string list");
    return this.readStringList();
  }

  readTypedPosition(): { x: number; y: number } {
    const type = this.readUnsignedByte();
    if (type === POSITION_2D) {
      return { x: this.readDouble(), y: this.readDouble() };
    }
    if (type === POSITION_3D) {
      const point = { x: this.readDouble(), y: this.readDouble() };
      this.readDouble();
      return point;
    }
    throw new TraciError(`Expected a position, got type 0x${type.toString(16)}.`);
  }

  private expectType(expected: number, label: string) {
    const type = this.readUnsignedByte();
    if (type !== expected) {
      throw new TraciError(`Expected ${label}, got type 0x${type.toString(16)}.`);
    }
  }

  private ensure(length: number) {
    if (this.offset + length > this.bytes.length) {
      throw new TraciError(
        `TraCI storage underflow: need ${length} byte(s) at ${this.offset}, have ${this.remaining}.`
      );
    }
  }
}
