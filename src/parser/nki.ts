import type { MetadataConfig } from '../config';
import type { MultisampleSource } from '../model/types';
import type { Notifier } from '../notifier';
import { ByteReader, readFixedLengthText, readMSBInt32 } from '../utils/bytes';
import { ConversionError, UnknownFormatError, UnsupportedVariantError } from './errors';
import type { ByteOrder, DecodeContext, NkiDecoder } from './types';
import { V1Decoder } from './v1';
import { V2Decoder } from './v2';

export const MAGIC_V1 = 0x5ee56eb3;
export const MAGIC_V2_LITTLE_ENDIAN = 0x1290a87f;
export const MAGIC_V2_BIG_ENDIAN = 0x7fa89012;
export const MAGIC_MONOLITH = 0x2f5c204e;

/** Files of the next container generation carry this tag at SIGNATURE_OFFSET. */
export const NEXT_GENERATION_SIGNATURE = 'hsin';
export const SIGNATURE_OFFSET = 12;

export type FormatVariant =
  | { kind: 'v1' }
  | { kind: 'v2'; byteOrder: ByteOrder }
  | { kind: 'monolith' };

export function identifyVariant(magic: number): FormatVariant {
  switch (magic) {
    case MAGIC_V1:
      return { kind: 'v1' };
    case MAGIC_V2_LITTLE_ENDIAN:
      return { kind: 'v2', byteOrder: 'little' };
    case MAGIC_V2_BIG_ENDIAN:
      return { kind: 'v2', byteOrder: 'big' };
    case MAGIC_MONOLITH:
      return { kind: 'monolith' };
    default:
      throw new UnknownFormatError(magic);
  }
}

export function createDecoder(variant: FormatVariant, config: MetadataConfig): NkiDecoder {
  switch (variant.kind) {
    case 'v1':
      return new V1Decoder(config);
    case 'v2':
      return new V2Decoder(config, variant.byteOrder);
    case 'monolith':
      throw new UnsupportedVariantError('monolith-not-supported');
    default: {
      const unhandled: never = variant;
      throw new Error(`Unhandled format variant ${JSON.stringify(unhandled)}`);
    }
  }
}

/**
 * Picks the decoder for a file from its leading bytes. Nothing beyond the
 * header is looked at until a variant is known.
 */
export function selectDecoder(bytes: Uint8Array, config: MetadataConfig): NkiDecoder {
  const reader = new ByteReader(bytes, SIGNATURE_OFFSET);
  if (readFixedLengthText(reader, NEXT_GENERATION_SIGNATURE.length, 'latin1') === NEXT_GENERATION_SIGNATURE) {
    throw new UnsupportedVariantError('newer-format-not-supported');
  }

  reader.seek(0);
  return createDecoder(identifyVariant(readMSBInt32(reader)), config);
}

export interface NkiReadOptions {
  config: MetadataConfig;
  notifier: Notifier;
}

/**
 * Decodes one file. Every failure is logged once with the file path and turns
 * into an empty result, so a batch can go on with the next file.
 */
export function parseNki(context: DecodeContext, { config, notifier }: NkiReadOptions): MultisampleSource[] {
  try {
    const result = selectDecoder(context.bytes, config).decode(context);
    if (result.length === 0) notifier.logError('no-layers-detected', [], context.sourceFile);
    return result;
  } catch (error) {
    if (error instanceof ConversionError) {
      notifier.logError(error.key, error.args, context.sourceFile);
    } else {
      notifier.logError('load-failed', [error instanceof Error ? error.message : String(error)], context.sourceFile);
    }
    return [];
  }
}
