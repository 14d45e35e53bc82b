export type PlayLogic = 'one-shot' | 'round-robin';

export type LoopType = 'forward' | 'backward' | 'alternating';

/** Times are in seconds, levels are fractions of the full level; -1 means not set. */
export interface Envelope {
  readonly delay: number;
  readonly attack: number;
  readonly hold: number;
  readonly decay: number;
  readonly release: number;
  readonly start: number;
  readonly sustain: number;
}

export interface SampleLoop {
  readonly type: LoopType;
  /** Frame positions */
  readonly start: number;
  readonly end: number;
  /** Fraction of the loop length, 0..1 */
  readonly crossfade: number;
}

export interface SampleMetadata {
  /** Absolute path of the source audio file. */
  readonly filename?: string;
  /** Name of the file inside the output sample folder. */
  readonly updatedFilename?: string;

  readonly keyRoot: number;
  readonly keyLow: number;
  readonly keyHigh: number;
  readonly noteCrossfadeLow: number;
  readonly noteCrossfadeHigh: number;

  readonly velocityLow: number;
  readonly velocityHigh: number;
  readonly velocityCrossfadeLow: number;
  readonly velocityCrossfadeHigh: number;

  readonly playLogic: PlayLogic;
  readonly reversed: boolean;
  /** Frame offsets, -1 plays from the start / to the end of the sample. */
  readonly start: number;
  readonly stop: number;

  /** Semitones */
  readonly tune: number;
  /** 1 is full tracking */
  readonly keyTracking: number;
  /** dB */
  readonly gain: number;
  readonly sampleRate: number;

  readonly loops: readonly SampleLoop[];
  readonly amplitudeEnvelope: Envelope;
}

export interface VelocityLayer {
  readonly name?: string;
  readonly samples: readonly SampleMetadata[];
}

export interface MultisampleSource {
  readonly sourceFile: string;
  /** Folder names from the source folder down to the file, then the file name. */
  readonly parts: readonly string[];
  readonly name: string;
  readonly description?: string;
  readonly creationDate?: Date;
  readonly creator: string;
  readonly category: string;
  readonly keywords: readonly string[];
  readonly layers: readonly VelocityLayer[];
}
