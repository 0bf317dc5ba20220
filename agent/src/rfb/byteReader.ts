/** Thrown when a span ends before the structure being read; the caller waits for more bytes. */
export class NeedMoreData extends Error {
  constructor(readonly needed: number) {
    super(`Need ${needed} more byte(s)`);
    this.name = 'NeedMoreData';
  }
}

/** Big-endian cursor over a byte span. */
export class ByteReader {
  private readonly view: DataView;
  private position: number;

  constructor(private readonly bytes: Uint8Array, start = 0) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.position = start;
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.bytes.byteLength - this.position;
  }

  ensure(size: number): void {
    if (this.remaining < size) {
      throw new NeedMoreData(size - this.remaining);
    }
  }

  u8(): number {
    this.ensure(1);
    const value = this.view.getUint8(this.position);
    this.position += 1;
    return value;
  }

  u16(): number {
    this.ensure(2);
    const value = this.view.getUint16(this.position);
    this.position += 2;
    return value;
  }

  u32(): number {
    this.ensure(4);
    const value = this.view.getUint32(this.position);
    this.position += 4;
    return value;
  }

  s32(): number {
    this.ensure(4);
    const value = this.view.getInt32(this.position);
    this.position += 4;
    return value;
  }

  skip(size: number): void {
    this.ensure(size);
    this.position += size;
  }

  take(size: number): Uint8Array {
    this.ensure(size);
    const slice = this.bytes.subarray(this.position, this.position + size);
    this.position += size;
    return slice;
  }
}
