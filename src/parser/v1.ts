import type { MetadataConfig } from '../config';
import { createMultisampleSource } from '../model/assemble';
import type { MultisampleSource, SampleMetadata } from '../model/types';
import {
  ByteReader,
  fromLSBBytes,
  readFixedLengthText,
  readLittleEndianFloat32,
  readUnixTimestampLSB,
  skipExactly,
} from '../utils/bytes';
import { parseChunks } from './chunk';
import type { Chunk } from './chunk';
import { CorruptFormatError, EndOfInputError } from './errors';
import { readLoop, readZoneHeader } from './records';
import type { DecodeContext, EnvelopeRecord, NkiDecoder } from './types';
import { toSampleMetadata } from './zone';

export const V1_FORM_TYPE = 'NKI1';

/** Zone envelopes were added with this format version. */
export const V1_ENVELOPE_VERSION = 0x0110;

export interface V1Header {
  version: number;
  /** Unset when the file stores a zero timestamp. */
  creationDate?: Date;
}

/**
 * Header layout after the magic: u16 version, 2 reserved bytes, u32 creation
 * time, 4 reserved bytes. Everything is little endian.
 */
export function readV1Header(source: ByteReader): V1Header {
  source.seek(4);
  const versionBytes = source.readBytes(2);
  if (versionBytes.length !== 2) throw new EndOfInputError();
  const version = fromLSBBytes(versionBytes);
  skipExactly(source, 2);
  const creationDate = readUnixTimestampLSB(source);
  skipExactly(source, 4);
  return creationDate.getTime() === 0 ? { version } : { version, creationDate };
}

function readText(chunk: Chunk): string {
  return readFixedLengthText(new ByteReader(chunk.payload), chunk.payload.length).replace(/\0+$/, '');
}

function readEnvelope(chunk: Chunk): EnvelopeRecord {
  const reader = new ByteReader(chunk.payload);
  const next = () => readLittleEndianFloat32(reader.readBytes(4));
  return {
    delay: next(),
    attack: next(),
    hold: next(),
    decay: next(),
    release: next(),
    start: next(),
    sustain: next(),
  };
}

function readZone(zone: Chunk, version: number, sourceFile: string): SampleMetadata {
  const header = zone.getPropertyChunk('zhdr');
  if (!header) throw new CorruptFormatError(`zone at ${zone.position} has no header`);
  const file = zone.getPropertyChunk('file');
  if (!file) throw new CorruptFormatError(`zone at ${zone.position} has no sample file`);

  const envelope = version >= V1_ENVELOPE_VERSION ? zone.getPropertyChunk('env ') : undefined;
  return toSampleMetadata(sourceFile, {
    header: readZoneHeader(header.payload, 'little'),
    samplePath: readText(file),
    loops: zone.getCollectionChunks('loop').map((loop) => readLoop(loop.payload, 'little')),
    envelope: envelope && readEnvelope(envelope),
  });
}

/** First generation program files: a single layer of zones, little endian. */
export class V1Decoder implements NkiDecoder {
  private readonly config: MetadataConfig;

  constructor(config: MetadataConfig) {
    this.config = config;
  }

  decode(context: DecodeContext): MultisampleSource[] {
    const reader = new ByteReader(context.bytes);
    const { version, creationDate } = readV1Header(reader);

    const root = parseChunks(reader, { collectionIds: ['loop'] });
    if (root.type !== V1_FORM_TYPE) {
      throw new CorruptFormatError(`expected form type ${V1_FORM_TYPE} but found '${root.type}'`);
    }

    const nameChunk = root.getPropertyChunk('name');
    const name = nameChunk ? readText(nameChunk) : '';
    const samples = root.getGroups('zone').map((zone) => readZone(zone, version, context.sourceFile));
    if (samples.length === 0) return [];

    const source = createMultisampleSource(
      {
        sourceFile: context.sourceFile,
        sourceFolder: context.sourceFolder,
        name,
        layers: [{ name, samples }],
        creationDate,
      },
      this.config,
    );
    return [source];
  }
}
