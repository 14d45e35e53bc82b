import type { MultisampleSource } from '../model/types';

const PITCH_CLASSES = 'C C# D D# E F F# G G# A A# B'.split(' ');

/** Key name in scientific pitch notation with middle C (60) as C4, '?' marks keys outside 0..127. */
export function keyName(key: number): string {
  const pitchClass = PITCH_CLASSES.at(key % 12);
  if (!Number.isInteger(key) || key < 0 || key > 127 || pitchClass === undefined) return `?${key}`;
  return pitchClass + String((key - (key % 12)) / 12 - 1);
}

/** Lowest and highest key of all regions, or undefined without regions. */
export function keyRangeOf(source: MultisampleSource): { low: number; high: number } | undefined {
  const samples = source.layers.flatMap((layer) => layer.samples);
  if (samples.length === 0) return undefined;
  return {
    low: Math.min(...samples.map((info) => info.keyLow)),
    high: Math.max(...samples.map((info) => info.keyHigh)),
  };
}
