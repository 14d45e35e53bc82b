import type { MultisampleSource } from '../model/types';

export type ByteOrder = 'little' | 'big';

export interface DecodeContext {
  /** Absolute path of the file being decoded. */
  sourceFile: string;
  /** Top folder of the scan, used for the path parts of the result. */
  sourceFolder: string;
  bytes: Uint8Array;
}

export interface NkiDecoder {
  decode(context: DecodeContext): MultisampleSource[];
}

export interface ZoneHeaderRecord {
  rootKey: number;
  lowKey: number;
  highKey: number;
  lowVelocity: number;
  highVelocity: number;
  flags: number;
  reserved: number;
  /** Semitones */
  tune: number;
  /** dB */
  gain: number;
  sampleRate: number;
  start: number;
  stop: number;
}

/** Fields appended to the zone header by v2 sub-version 2. */
export interface ZoneHeaderExtension {
  keyTracking: number;
  keyCrossfadeLow: number;
  keyCrossfadeHigh: number;
  velocityCrossfadeLow: number;
  velocityCrossfadeHigh: number;
}

export interface LoopRecord {
  type: number;
  start: number;
  end: number;
  crossfade: number;
}

export interface EnvelopeRecord {
  delay: number;
  attack: number;
  hold: number;
  decay: number;
  release: number;
  start: number;
  sustain: number;
}

export const ZONE_FLAG_REVERSED = 0x01;
export const ZONE_FLAG_ROUND_ROBIN = 0x02;
