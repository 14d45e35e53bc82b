import { ByteReader, readFourCC, readLSBInt32 } from '../utils/bytes';
import { CorruptFormatError } from './errors';

export const GROUP_IDS: ReadonlySet<string> = new Set(['RIFF', 'LIST']);

const HEADER_SIZE = 8;

function chunkKey(type: string, id: string): string {
  return `${type}/${id}`;
}

/**
 * A node of a chunk container. Group chunks (RIFF, LIST) carry their form type
 * as `type` and hold children; every other chunk owns a copy of its payload and
 * has the form type of the group it was found in.
 */
export class Chunk {
  readonly type: string;
  readonly id: string;
  readonly size: number;
  readonly position: number;
  readonly payload: Uint8Array;
  parserMessage?: string;

  private readonly propertyChunks = new Map<string, Chunk>();
  private readonly collectionChunks: Chunk[] = [];

  constructor(type: string, id: string, size = -1, position = -1, payload: Uint8Array = new Uint8Array(0)) {
    this.type = type;
    this.id = id;
    this.size = size;
    this.position = position;
    this.payload = payload;
  }

  putPropertyChunk(chunk: Chunk): void {
    this.propertyChunks.set(chunkKey(chunk.type, chunk.id), chunk);
  }

  getPropertyChunk(id: string): Chunk | undefined {
    return this.propertyChunks.get(chunkKey(this.type, id));
  }

  addCollectionChunk(chunk: Chunk): void {
    this.collectionChunks.push(chunk);
  }

  getCollectionChunks(id: string): Chunk[] {
    return this.collectionChunks.filter((chunk) => chunk.id === id);
  }

  /** Nested LIST groups of the given form type, in file order. */
  getGroups(formType: string): Chunk[] {
    return this.collectionChunks.filter((chunk) => chunk.id === 'LIST' && chunk.type === formType);
  }
}

export interface ChunkParserOptions {
  /** Leaf chunk ids that may occur several times in one group. */
  collectionIds?: Iterable<string>;
}

function isPrintableId(id: string): boolean {
  return /^[\x20-\x7E]{4}$/.test(id);
}

function readHeader(source: ByteReader): { id: string; size: number; position: number } {
  const position = source.position;
  const id = readFourCC(source);
  if (!isPrintableId(id)) {
    throw new CorruptFormatError(`chunk id at ${position} is not a 4 character tag`);
  }
  const size = readLSBInt32(source);
  if (size > source.remaining) {
    throw new CorruptFormatError(`chunk '${id}' at ${position} declares ${size} bytes but only ${source.remaining} remain`);
  }
  return { id, size, position };
}

/**
 * Walks a chunk container once and returns the root group. Every call builds
 * its own tree.
 */
export function parseChunks(source: ByteReader, options: ChunkParserOptions = {}): Chunk {
  const collectionIds = new Set(options.collectionIds ?? []);

  if (source.remaining < HEADER_SIZE) {
    throw new CorruptFormatError(`no chunk header at ${source.position}`);
  }
  const header = readHeader(source);
  if (!GROUP_IDS.has(header.id)) {
    throw new CorruptFormatError(`container starts with '${header.id}' instead of a group chunk`);
  }
  return parseGroup(source, header, collectionIds);
}

function parseGroup(
  source: ByteReader,
  header: { id: string; size: number; position: number },
  collectionIds: ReadonlySet<string>,
): Chunk {
  if (header.size < 4) {
    throw new CorruptFormatError(`group '${header.id}' at ${header.position} has no form type`);
  }
  const end = source.position + header.size;
  const formType = readFourCC(source);
  const group = new Chunk(formType, header.id, header.size, header.position);

  while (source.position < end) {
    const left = end - source.position;
    if (left < HEADER_SIZE) {
      group.parserMessage = `${left} trailing byte(s) after the last chunk`;
      break;
    }

    const child = readHeader(source);
    if (child.size > end - source.position) {
      group.parserMessage = `chunk '${child.id}' at ${child.position} overruns its group by ${child.size - (end - source.position)} byte(s)`;
      break;
    }

    if (GROUP_IDS.has(child.id)) {
      group.addCollectionChunk(parseGroup(source, child, collectionIds));
      continue;
    }

    const payload = source.readBytes(child.size);
    const chunk = new Chunk(formType, child.id, child.size, child.position, payload);
    if (collectionIds.has(child.id)) group.addCollectionChunk(chunk);
    else group.putPropertyChunk(chunk);
  }

  source.seek(end);
  return group;
}
