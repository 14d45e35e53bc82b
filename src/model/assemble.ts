import { basename, extname, relative, sep } from 'path';
import type { MetadataConfig } from '../config';
import { detectCategory, detectCreator, detectKeywords } from './tags';
import type { MultisampleSource, VelocityLayer } from './types';

export function nameWithoutType(file: string): string {
  const name = basename(file);
  return name.slice(0, name.length - extname(name).length);
}

/**
 * Folder names between the source folder and the file, followed by the file
 * name without its extension. Files outside of the source folder only
 * contribute their name.
 */
export function createPathParts(sourceFolder: string, sourceFile: string): string[] {
  const folders = relative(sourceFolder, sourceFile).split(sep).slice(0, -1);
  return [...(folders.includes('..') ? [] : folders), nameWithoutType(sourceFile)];
}

export interface MultisampleInput {
  sourceFile: string;
  sourceFolder: string;
  /** Falls back to the file name when blank. */
  name: string;
  layers: VelocityLayer[];
  description?: string;
  creationDate?: Date;
}

export function createMultisampleSource(input: MultisampleInput, config: MetadataConfig): MultisampleSource {
  const parts = createPathParts(input.sourceFolder, input.sourceFile);
  const name = input.name.trim() || nameWithoutType(input.sourceFile);
  return {
    sourceFile: input.sourceFile,
    parts,
    name,
    description: input.description,
    creationDate: input.creationDate,
    creator: detectCreator(parts, config.creatorTags, config.creatorName),
    category: detectCategory(parts),
    keywords: detectKeywords(parts),
    layers: input.layers,
  };
}
