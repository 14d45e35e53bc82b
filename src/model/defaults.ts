import type { Envelope, SampleMetadata } from './types';

export const UNSET = -1;

export const DEFAULT_ENVELOPE: Envelope = Object.freeze({
  delay: UNSET,
  attack: UNSET,
  hold: UNSET,
  decay: UNSET,
  release: UNSET,
  start: UNSET,
  sustain: UNSET,
});

export function createEnvelope(values: Partial<Envelope> = {}): Envelope {
  return { ...DEFAULT_ENVELOPE, ...values };
}

export function createSampleMetadata(values: Partial<SampleMetadata> = {}): SampleMetadata {
  return {
    keyRoot: 0,
    keyLow: 0,
    keyHigh: 127,
    noteCrossfadeLow: 0,
    noteCrossfadeHigh: 0,
    velocityLow: 0,
    velocityHigh: 127,
    velocityCrossfadeLow: 0,
    velocityCrossfadeHigh: 0,
    playLogic: 'one-shot',
    reversed: false,
    start: UNSET,
    stop: UNSET,
    tune: 0,
    keyTracking: 1,
    gain: 0,
    sampleRate: 44100,
    loops: [],
    amplitudeEnvelope: DEFAULT_ENVELOPE,
    ...values,
  };
}
