import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { CorruptFormatError, EndOfInputError, TruncatedReadError } from '../src/parser/errors';
import {
  ByteReader,
  fromLSBBytes,
  read7BitVariableLengthInt,
  readFixedLengthText,
  readLittleEndianFloat32,
  readLSBInt32,
  readMSBInt32,
  readUnixTimestampLSB,
  skipExactly,
} from '../src/utils/bytes';

const reader = (...bytes: number[]) => new ByteReader(Uint8Array.from(bytes));

describe('integers', () => {
  it('reads 32 bit values least significant byte first', () => {
    const source = reader(0x78, 0x56, 0x34, 0x12, 0xff, 0xff, 0xff, 0xff);
    expect(readLSBInt32(source)).toBe(0x12345678);
    expect(readLSBInt32(source)).toBe(4294967295);
    expect(source.position).toBe(8);
  });

  it('reads 32 bit values most significant byte first', () => {
    expect(readMSBInt32(reader(0xde, 0xad, 0xbe, 0xef))).toBe(0xdeadbeef);
  });

  it('fails when any of the four bytes is missing', () => {
    expect(() => readLSBInt32(reader(1, 2, 3))).toThrow(EndOfInputError);
    expect(() => readMSBInt32(reader())).toThrow(EndOfInputError);
  });

  it('decodes little-endian values of any width', () => {
    expect(fromLSBBytes(new Uint8Array(0))).toBe(0);
    expect(fromLSBBytes(Uint8Array.of(0x34, 0x12))).toBe(0x1234);
    expect(fromLSBBytes(Uint8Array.of(0x01, 0x00, 0x00, 0x00, 0x01))).toBe(0x100000001);
  });

  it('agrees with readLSBInt32 for four bytes', () => {
    fc.assert(
      fc.property(fc.uint8Array({ minLength: 4, maxLength: 4 }), (bytes) => {
        expect(fromLSBBytes(bytes)).toBe(readLSBInt32(new ByteReader(bytes)));
      }),
    );
  });
});

describe('floats', () => {
  it('reads single precision little endian', () => {
    expect(readLittleEndianFloat32(Uint8Array.of(0x00, 0x00, 0x80, 0x3f))).toBe(1);
    expect(readLittleEndianFloat32(Uint8Array.of(0x00, 0x00, 0x20, 0xc0))).toBe(-2.5);
  });

  it('needs exactly four bytes', () => {
    expect(() => readLittleEndianFloat32(Uint8Array.of(0, 0, 0x80))).toThrow(TruncatedReadError);
  });

  it('reads from a view into a larger buffer', () => {
    const bytes = Uint8Array.of(0xaa, 0x00, 0x00, 0x80, 0x3f);
    expect(readLittleEndianFloat32(bytes.subarray(1))).toBe(1);
  });
});

describe('read7BitVariableLengthInt', () => {
  it('decodes a single byte', () => {
    expect(read7BitVariableLengthInt(reader(0x05))).toEqual({ value: 5, byteCount: 1 });
  });

  it('adds continuation bytes as higher groups', () => {
    expect(read7BitVariableLengthInt(reader(0x85, 0x01))).toEqual({ value: 133, byteCount: 2 });
    expect(read7BitVariableLengthInt(reader(0xff, 0xff, 0x03))).toEqual({ value: 65535, byteCount: 3 });
  });

  it('stops after the last byte', () => {
    const source = reader(0x85, 0x01, 0x7f);
    read7BitVariableLengthInt(source);
    expect(source.position).toBe(2);
  });

  it('rejects quantities longer than the cap', () => {
    expect(() => read7BitVariableLengthInt(reader(0x80, 0x80, 0x80, 0x80, 0x80, 0x01))).toThrow(CorruptFormatError);
    expect(read7BitVariableLengthInt(reader(0x80, 0x80, 0x01), 3)).toEqual({ value: 16384, byteCount: 3 });
  });

  it('fails on a missing continuation byte', () => {
    expect(() => read7BitVariableLengthInt(reader(0x85))).toThrow(EndOfInputError);
  });
});

describe('text and timestamps', () => {
  it('reads text of a fixed length', () => {
    const source = reader(0x4b, 0x69, 0x74, 0x21);
    expect(readFixedLengthText(source, 3)).toBe('Kit');
    expect(source.position).toBe(3);
  });

  it('fails when the text is cut off', () => {
    expect(() => readFixedLengthText(reader(0x41, 0x42), 3)).toThrow(TruncatedReadError);
  });

  it('decodes the given charset', () => {
    expect(readFixedLengthText(reader(0xe9), 1, 'latin1')).toBe('é');
  });

  it('converts POSIX seconds', () => {
    expect(readUnixTimestampLSB(reader(0x0b, 0x0b, 0x64, 0x4d)).toISOString()).toBe('2011-02-22T19:14:19.000Z');
  });
});

describe('skipExactly', () => {
  it('advances by the requested count', () => {
    const source = reader(1, 2, 3, 4);
    skipExactly(source, 3);
    expect(source.read()).toBe(4);
  });

  it('reports truncation as corruption', () => {
    const source = reader(1, 2);
    expect(() => skipExactly(source, 3)).toThrow(CorruptFormatError);
    expect(source.position).toBe(2);
  });
});
