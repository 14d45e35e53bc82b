import { CorruptFormatError, EndOfInputError, TruncatedReadError } from '../parser/errors';

/**
 * A read cursor over an in-memory byte array. Reads past the end never throw
 * here; the decoding functions below decide what running out of data means.
 */
export class ByteReader {
  readonly bytes: Uint8Array;
  position: number;

  constructor(bytes: Uint8Array, position = 0) {
    this.bytes = bytes;
    this.position = position;
  }

  get length(): number {
    return this.bytes.length;
  }

  get remaining(): number {
    return Math.max(0, this.bytes.length - this.position);
  }

  /** Next byte, or -1 when there is no more data. */
  read(): number {
    if (this.position >= this.bytes.length) return -1;
    return this.bytes[this.position++];
  }

  /** Copies up to `count` bytes; the result is shorter at the end of the data. */
  readBytes(count: number): Uint8Array {
    const end = Math.min(this.bytes.length, this.position + Math.max(0, count));
    const out = this.bytes.slice(this.position, end);
    this.position = end;
    return out;
  }

  skip(count: number): number {
    const skipped = Math.min(this.remaining, Math.max(0, count));
    this.position += skipped;
    return skipped;
  }

  seek(position: number): void {
    this.position = position;
  }
}

export function readLSBInt32(source: ByteReader): number {
  const b1 = source.read();
  const b2 = source.read();
  const b3 = source.read();
  const b4 = source.read();
  if ((b1 | b2 | b3 | b4) < 0) throw new EndOfInputError();
  return ((b4 << 24) | (b3 << 16) | (b2 << 8) | b1) >>> 0;
}

export function readMSBInt32(source: ByteReader): number {
  const b1 = source.read();
  const b2 = source.read();
  const b3 = source.read();
  const b4 = source.read();
  if ((b1 | b2 | b3 | b4) < 0) throw new EndOfInputError();
  return ((b1 << 24) | (b2 << 16) | (b3 << 8) | b4) >>> 0;
}

/**
 * Unsigned little-endian value of any width up to 6 bytes (the range a JS
 * number holds exactly).
 */
export function fromLSBBytes(bytes: Uint8Array): number {
  let value = 0;
  for (let i = 0; i < bytes.length; i++) {
    value += bytes[i] * 2 ** (8 * i);
  }
  return value;
}

export function readLittleEndianFloat32(bytes: Uint8Array): number {
  if (bytes.length !== 4) throw new TruncatedReadError(4, bytes.length);
  return new DataView(bytes.buffer, bytes.byteOffset, 4).getFloat32(0, true);
}

export interface VariableLengthInt {
  value: number;
  byteCount: number;
}

/**
 * MIDI style variable-length quantity: 7 bits per byte, least significant
 * group first, bit 7 set on every byte but the last.
 */
export function read7BitVariableLengthInt(source: ByteReader, maxBytes = 5): VariableLengthInt {
  let value = 0;
  let count = 0;
  for (;;) {
    const byte = source.read();
    if (byte < 0) throw new EndOfInputError();
    value += (byte & 0x7f) * 2 ** (7 * count);
    count++;
    if ((byte & 0x80) === 0) return { value, byteCount: count };
    if (count >= maxBytes) {
      throw new CorruptFormatError(`variable-length number longer than ${maxBytes} bytes at ${source.position - count}`);
    }
  }
}

export function readFixedLengthText(source: ByteReader, length: number, charset = 'utf-8'): string {
  const bytes = source.readBytes(length);
  if (bytes.length !== length) throw new TruncatedReadError(length, bytes.length);
  return new TextDecoder(charset).decode(bytes);
}

export function readUnixTimestampLSB(source: ByteReader): Date {
  return new Date(readLSBInt32(source) * 1000);
}

export function skipExactly(source: ByteReader, count: number): void {
  const skipped = source.skip(count);
  if (skipped !== count) {
    throw new CorruptFormatError(`could only skip ${skipped} of ${count} bytes, the file is truncated`);
  }
}

export function readFourCC(source: ByteReader): string {
  const bytes = source.readBytes(4);
  if (bytes.length !== 4) throw new TruncatedReadError(4, bytes.length);
  return String.fromCharCode(bytes[0], bytes[1], bytes[2], bytes[3]);
}
