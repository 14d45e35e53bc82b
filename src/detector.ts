import { readFile } from 'fs/promises';
import { extname, resolve } from 'path';
import type { MetadataConfig } from './config';
import type { MultisampleSource } from './model/types';
import type { Notifier } from './notifier';
import { parseNki } from './parser/nki';
import { keyName, keyRangeOf } from './utils/midi';
import { SfzCreator } from './writer/sfz';
import type { SampleStore } from './writer/sfz';

export const NKI_EXTENSION = '.nki';

export const isNkiFile = (file: string): boolean => extname(file).toLowerCase() === NKI_EXTENSION;

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export interface DetectorOptions {
  config: MetadataConfig;
  notifier: Notifier;
  /** Top folder of the scan; path parts used for tagging are relative to it. */
  sourceFolder: string;
}

export class NkiDetector {
  private readonly options: DetectorOptions;

  constructor(options: DetectorOptions) {
    this.options = options;
  }

  /** Never throws: failures are logged against the file and give no sources. */
  async readFile(file: string): Promise<MultisampleSource[]> {
    const { config, notifier, sourceFolder } = this.options;
    const sourceFile = resolve(file);

    let bytes: Uint8Array;
    try {
      bytes = await readFile(sourceFile);
    } catch (error) {
      notifier.logError('load-failed', [messageOf(error)], sourceFile);
      return [];
    }

    const sources = parseNki({ sourceFile, sourceFolder: resolve(sourceFolder), bytes }, { config, notifier });
    for (const source of sources) {
      const range = keyRangeOf(source);
      notifier.log(
        'detected',
        [
          source.name,
          String(source.layers.length),
          range ? keyName(range.low) : '-',
          range ? keyName(range.high) : '-',
        ],
        sourceFile,
      );
    }
    return sources;
  }

  /**
   * Yields the sources of the given files one by one. The next file is only
   * decoded after the consumer asked for the next value, so at most one
   * result waits for delivery. An abort takes effect between files.
   */
  async *detect(files: Iterable<string>, signal?: AbortSignal): AsyncGenerator<MultisampleSource, void, undefined> {
    for (const file of files) {
      if (signal?.aborted) return;
      if (!isNkiFile(file)) continue;
      yield* await this.readFile(file);
    }
  }
}

export interface ConvertOptions extends DetectorOptions {
  sampleStore?: SampleStore;
  signal?: AbortSignal;
}

/**
 * Converts the files one after the other into SFZ files in the destination
 * folder. Returns how many description files were written.
 */
export async function convertFiles(files: Iterable<string>, destinationFolder: string, options: ConvertOptions): Promise<number> {
  const detector = new NkiDetector(options);
  const creator = new SfzCreator(options.notifier, options.sampleStore);

  let written = 0;
  for await (const source of detector.detect(files, options.signal)) {
    try {
      if (await creator.create(destinationFolder, source)) written++;
    } catch (error) {
      options.notifier.logError('store-failed', [messageOf(error)], source.sourceFile);
    }
  }
  return written;
}
