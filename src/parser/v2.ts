import type { MetadataConfig } from '../config';
import { createMultisampleSource } from '../model/assemble';
import type { MultisampleSource, SampleMetadata, VelocityLayer } from '../model/types';
import { ByteReader, read7BitVariableLengthInt, readFixedLengthText } from '../utils/bytes';
import { parseChunks } from './chunk';
import type { Chunk } from './chunk';
import { CorruptFormatError, EndOfInputError } from './errors';
import { readEnvelope, readLoop, readZoneHeader, readZoneHeaderExtension } from './records';
import type { ByteOrder, DecodeContext, NkiDecoder } from './types';
import { toSampleMetadata } from './zone';

export const V2_FORM_TYPE = 'NKI2';

/** First sub-version with key tracking and crossfades in the zone header. */
export const V2_EXTENDED_ZONE_VERSION = 2;

const HEADER_SIZE = 16;

export function readV2SubVersion(bytes: Uint8Array, order: ByteOrder): number {
  if (bytes.length < HEADER_SIZE) throw new EndOfInputError();
  return new DataView(bytes.buffer, bytes.byteOffset, HEADER_SIZE).getUint16(4, order === 'little');
}

/** Text prefixed by its byte length as a 7-bit variable-length number. */
function readText(chunk: Chunk): string {
  const reader = new ByteReader(chunk.payload);
  const { value: length } = read7BitVariableLengthInt(reader);
  return readFixedLengthText(reader, length);
}

/**
 * Second generation program files: velocity layers of zones. The byte order
 * given by the magic applies to every number inside the chunks and to the
 * header; the chunk framing itself is always little endian.
 */
export class V2Decoder implements NkiDecoder {
  private readonly config: MetadataConfig;
  readonly byteOrder: ByteOrder;

  constructor(config: MetadataConfig, byteOrder: ByteOrder) {
    this.config = config;
    this.byteOrder = byteOrder;
  }

  decode(context: DecodeContext): MultisampleSource[] {
    const subVersion = readV2SubVersion(context.bytes, this.byteOrder);
    const root = parseChunks(new ByteReader(context.bytes, HEADER_SIZE), { collectionIds: ['loop'] });
    if (root.type !== V2_FORM_TYPE) {
      throw new CorruptFormatError(`expected form type ${V2_FORM_TYPE} but found '${root.type}'`);
    }

    const nameChunk = root.getPropertyChunk('name');
    const name = nameChunk ? readText(nameChunk) : '';

    const layers: VelocityLayer[] = root.getGroups('grup').map((group) => {
      const layerName = group.getPropertyChunk('name');
      return {
        name: layerName ? readText(layerName) : undefined,
        samples: group.getGroups('zone').map((zone) => this.readZone(zone, subVersion, context.sourceFile)),
      };
    });
    if (layers.every((layer) => layer.samples.length === 0)) return [];

    const source = createMultisampleSource(
      {
        sourceFile: context.sourceFile,
        sourceFolder: context.sourceFolder,
        name,
        layers,
      },
      this.config,
    );
    return [source];
  }

  private readZone(zone: Chunk, subVersion: number, sourceFile: string): SampleMetadata {
    const header = zone.getPropertyChunk('zhdr');
    if (!header) throw new CorruptFormatError(`zone at ${zone.position} has no header`);
    const file = zone.getPropertyChunk('file');
    if (!file) throw new CorruptFormatError(`zone at ${zone.position} has no sample file`);
    const envelope = zone.getPropertyChunk('env ');

    return toSampleMetadata(sourceFile, {
      header: readZoneHeader(header.payload, this.byteOrder),
      extension:
        subVersion >= V2_EXTENDED_ZONE_VERSION ? readZoneHeaderExtension(header.payload, this.byteOrder) : undefined,
      samplePath: readText(file),
      loops: zone.getCollectionChunks('loop').map((loop) => readLoop(loop.payload, this.byteOrder)),
      envelope: envelope && readEnvelope(envelope.payload, this.byteOrder),
    });
  }
}
