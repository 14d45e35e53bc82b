import { Parser } from 'binary-parser';
import { CorruptFormatError } from './errors';
import type { ByteOrder, EnvelopeRecord, LoopRecord, ZoneHeaderExtension, ZoneHeaderRecord } from './types';

export const ZONE_HEADER_SIZE = 28;
export const EXTENDED_ZONE_HEADER_SIZE = 36;
export const LOOP_RECORD_SIZE = 16;
export const ENVELOPE_RECORD_SIZE = 28;

const floatOf = (order: ByteOrder): 'floatle' | 'floatbe' => (order === 'little' ? 'floatle' : 'floatbe');

const zoneHeader = (order: ByteOrder): Parser =>
  new Parser()
    .endianness(order)
    .uint8('rootKey')
    .uint8('lowKey')
    .uint8('highKey')
    .uint8('lowVelocity')
    .uint8('highVelocity')
    .uint8('flags')
    .uint16('reserved')
    [floatOf(order)]('tune')
    [floatOf(order)]('gain')
    .uint32('sampleRate')
    .int32('start')
    .int32('stop');

const zoneHeaderExtension = (order: ByteOrder): Parser =>
  new Parser()
    .endianness(order)
    .seek(ZONE_HEADER_SIZE)
    [floatOf(order)]('keyTracking')
    .uint8('keyCrossfadeLow')
    .uint8('keyCrossfadeHigh')
    .uint8('velocityCrossfadeLow')
    .uint8('velocityCrossfadeHigh');

const loop = (order: ByteOrder): Parser =>
  new Parser()
    .endianness(order)
    .uint8('type')
    .buffer('reserved', { length: 3 })
    .uint32('start')
    .uint32('end')
    [floatOf(order)]('crossfade');

const envelope = (order: ByteOrder): Parser =>
  new Parser()
    .endianness(order)
    [floatOf(order)]('delay')
    [floatOf(order)]('attack')
    [floatOf(order)]('hold')
    [floatOf(order)]('decay')
    [floatOf(order)]('release')
    [floatOf(order)]('start')
    [floatOf(order)]('sustain');

const byOrder = (create: (order: ByteOrder) => Parser): Readonly<Record<ByteOrder, Parser>> => ({
  little: create('little'),
  big: create('big'),
});

const ZONE_HEADER = byOrder(zoneHeader);
const ZONE_HEADER_EXTENSION = byOrder(zoneHeaderExtension);
const LOOP = byOrder(loop);
const ENVELOPE = byOrder(envelope);

function requireSize(payload: Uint8Array, size: number, what: string): void {
  if (payload.length < size) {
    throw new CorruptFormatError(`${what} needs ${size} bytes but has ${payload.length}`);
  }
}

export function readZoneHeader(payload: Uint8Array, order: ByteOrder): ZoneHeaderRecord {
  requireSize(payload, ZONE_HEADER_SIZE, 'zone header');
  return ZONE_HEADER[order].parse(payload);
}

export function readZoneHeaderExtension(payload: Uint8Array, order: ByteOrder): ZoneHeaderExtension {
  requireSize(payload, EXTENDED_ZONE_HEADER_SIZE, 'extended zone header');
  return ZONE_HEADER_EXTENSION[order].parse(payload);
}

export function readLoop(payload: Uint8Array, order: ByteOrder): LoopRecord {
  requireSize(payload, LOOP_RECORD_SIZE, 'loop');
  return LOOP[order].parse(payload);
}

export function readEnvelope(payload: Uint8Array, order: ByteOrder): EnvelopeRecord {
  requireSize(payload, ENVELOPE_RECORD_SIZE, 'envelope');
  return ENVELOPE[order].parse(payload);
}
