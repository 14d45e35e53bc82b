import { basename, dirname, resolve } from 'path';
import { createEnvelope, createSampleMetadata } from '../model/defaults';
import type { Envelope, LoopType, SampleLoop, SampleMetadata } from '../model/types';
import { CorruptFormatError } from './errors';
import type { EnvelopeRecord, LoopRecord, ZoneHeaderExtension, ZoneHeaderRecord } from './types';
import { ZONE_FLAG_REVERSED, ZONE_FLAG_ROUND_ROBIN } from './types';

const LOOP_TYPES: readonly LoopType[] = ['forward', 'backward', 'alternating'];

/** Sample paths are stored relative to the program file, with either separator. */
export function resolveSamplePath(sourceFile: string, storedPath: string): string {
  return resolve(dirname(sourceFile), storedPath.replace(/\\/g, '/'));
}

const MIDI_MAX = 127;

function requireFinite(name: string, value: number): number {
  if (!Number.isFinite(value)) throw new CorruptFormatError(`${name} is ${value}`);
  return value;
}

/** Low, root and high must lie in 0..127 in that order. */
function requireMidiRange(name: string, low: number, high: number, root = low): void {
  if (high > MIDI_MAX) throw new CorruptFormatError(`${name} range ${low}..${high} exceeds ${MIDI_MAX}`);
  if (low > root || root > high) {
    const values = root === low ? `${low}..${high}` : `${low}..${high} around ${root}`;
    throw new CorruptFormatError(`${name} range ${values} is out of order`);
  }
}

export function toSampleLoop(record: LoopRecord): SampleLoop {
  const type = LOOP_TYPES[record.type];
  if (type === undefined) throw new CorruptFormatError(`unknown loop type ${record.type}`);
  requireFinite('loop crossfade', record.crossfade);
  return {
    type,
    start: record.start,
    end: record.end,
    crossfade: Math.min(1, Math.max(0, record.crossfade)),
  };
}

export function toEnvelope(record: EnvelopeRecord): Envelope {
  return createEnvelope({ ...record });
}

export interface ZoneRecords {
  header: ZoneHeaderRecord;
  extension?: ZoneHeaderExtension;
  samplePath: string;
  loops: LoopRecord[];
  envelope?: EnvelopeRecord;
}

export function toSampleMetadata(sourceFile: string, zone: ZoneRecords): SampleMetadata {
  const { header, extension } = zone;
  requireMidiRange('key', header.lowKey, header.highKey, header.rootKey);
  requireMidiRange('velocity', header.lowVelocity, header.highVelocity);
  const filename = resolveSamplePath(sourceFile, zone.samplePath);
  return createSampleMetadata({
    filename,
    updatedFilename: basename(filename),
    keyRoot: header.rootKey,
    keyLow: header.lowKey,
    keyHigh: header.highKey,
    velocityLow: header.lowVelocity,
    velocityHigh: header.highVelocity,
    playLogic: header.flags & ZONE_FLAG_ROUND_ROBIN ? 'round-robin' : 'one-shot',
    reversed: (header.flags & ZONE_FLAG_REVERSED) !== 0,
    tune: requireFinite('tune', header.tune),
    gain: requireFinite('gain', header.gain),
    sampleRate: header.sampleRate,
    start: header.start,
    stop: header.stop,
    loops: zone.loops.map(toSampleLoop),
    ...(zone.envelope && { amplitudeEnvelope: toEnvelope(zone.envelope) }),
    ...(extension && {
      keyTracking: requireFinite('key tracking', extension.keyTracking),
      noteCrossfadeLow: extension.keyCrossfadeLow,
      noteCrossfadeHigh: extension.keyCrossfadeHigh,
      velocityCrossfadeLow: extension.velocityCrossfadeLow,
      velocityCrossfadeHigh: extension.velocityCrossfadeHigh,
    }),
  });
}
