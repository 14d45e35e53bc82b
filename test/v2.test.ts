import { describe, expect, it } from 'vitest';
import { DEFAULT_METADATA_CONFIG } from '../src/config';
import { selectDecoder } from '../src/parser/nki';
import { V2Decoder, readV2SubVersion } from '../src/parser/v2';
import { CorruptFormatError, EndOfInputError } from '../src/parser/errors';
import type { ByteOrder } from '../src/parser/types';
import type { V2FileLayout, ZoneFields } from './builders';
import { u16, v2File } from './builders';

const decode = (bytes: Uint8Array) =>
  selectDecoder(bytes, DEFAULT_METADATA_CONFIG).decode({
    sourceFile: '/library/Strings/Violin Ensemble.nki',
    sourceFolder: '/library',
    bytes,
  });

const ensemble = (order: ByteOrder): V2FileLayout => ({
  order,
  subVersion: 2,
  name: 'Violins',
  layers: [
    {
      name: 'Soft',
      zones: [
        {
          header: { lowVelocity: 0, highVelocity: 63, tune: -0.25, gain: 1.5, start: 0, stop: 88200 },
          extension: {
            keyTracking: 0.5,
            keyCrossfadeLow: 2,
            keyCrossfadeHigh: 3,
            velocityCrossfadeLow: 4,
            velocityCrossfadeHigh: 5,
          },
          file: '../Samples/soft_c4.wav',
          loops: [{ type: 1, start: 1000, end: 2000, crossfade: 0.5 }],
          envelope: [0, 0.25, 0, 1, 0.5, 0, 0.75],
        },
      ],
    },
    {
      zones: [
        {
          header: { lowVelocity: 64, highVelocity: 127, flags: 2 },
          extension: {
            keyTracking: 1,
            keyCrossfadeLow: 0,
            keyCrossfadeHigh: 0,
            velocityCrossfadeLow: 0,
            velocityCrossfadeHigh: 0,
          },
          file: 'hard_c4.wav',
        },
      ],
    },
  ],
});

describe('readV2SubVersion', () => {
  it('follows the byte order of the file', () => {
    const header = (order: ByteOrder) => v2File({ order, subVersion: 0x0102, layers: [] });
    expect(readV2SubVersion(header('little'), 'little')).toBe(0x0102);
    expect(readV2SubVersion(header('big'), 'big')).toBe(0x0102);
  });

  it('needs the complete header', () => {
    expect(() => readV2SubVersion(u16(2), 'little')).toThrow(EndOfInputError);
  });
});

describe('V2Decoder', () => {
  it('decodes velocity layers with their names', () => {
    const [source] = decode(v2File(ensemble('little')));

    expect(source.name).toBe('Violins');
    expect(source.parts).toEqual(['Strings', 'Violin Ensemble']);
    expect(source.category).toBe('Strings');
    expect(source.keywords).toEqual(['ensemble', 'strings', 'violin']);
    expect(source.creationDate).toBeUndefined();
    expect(source.layers.map((layer) => layer.name)).toEqual(['Soft', undefined]);

    const soft = source.layers[0].samples[0];
    expect(soft).toMatchObject({
      filename: '/library/Samples/soft_c4.wav',
      updatedFilename: 'soft_c4.wav',
      keyRoot: 60,
      keyLow: 48,
      keyHigh: 72,
      velocityLow: 0,
      velocityHigh: 63,
      tune: -0.25,
      gain: 1.5,
      start: 0,
      stop: 88200,
      keyTracking: 0.5,
      noteCrossfadeLow: 2,
      noteCrossfadeHigh: 3,
      velocityCrossfadeLow: 4,
      velocityCrossfadeHigh: 5,
      playLogic: 'one-shot',
      loops: [{ type: 'backward', start: 1000, end: 2000, crossfade: 0.5 }],
      amplitudeEnvelope: { delay: 0, attack: 0.25, hold: 0, decay: 1, release: 0.5, start: 0, sustain: 0.75 },
    });

    const hard = source.layers[1].samples[0];
    expect(hard.filename).toBe('/library/Strings/hard_c4.wav');
    expect(hard.playLogic).toBe('round-robin');
  });

  it('decodes both byte orders to the same model', () => {
    expect(decode(v2File(ensemble('big')))).toEqual(decode(v2File(ensemble('little'))));
  });

  it('uses defaults for fields older sub-versions lack', () => {
    const [source] = decode(v2File({ order: 'big', subVersion: 1, layers: [{ zones: [{ file: 'a.wav' }] }] }));
    const sample = source.layers[0].samples[0];
    expect(sample.keyTracking).toBe(1);
    expect([sample.noteCrossfadeLow, sample.noteCrossfadeHigh]).toEqual([0, 0]);
    expect([sample.velocityCrossfadeLow, sample.velocityCrossfadeHigh]).toEqual([0, 0]);
  });

  it('needs the extended zone header from sub-version 2 on', () => {
    const bytes = v2File({ order: 'little', subVersion: 2, layers: [{ zones: [{ file: 'a.wav' }] }] });
    expect(() => decode(bytes)).toThrow('extended zone header needs 36 bytes but has 28');
  });

  it('rejects key and velocity ranges beyond 127', () => {
    const withHeader = (header: Partial<ZoneFields>) => {
      const layout = ensemble('little');
      const [zone] = layout.layers[0].zones;
      return v2File({ ...layout, layers: [{ zones: [{ ...zone, header: { ...zone.header, ...header } }] }] });
    };
    expect(() => decode(withHeader({ rootKey: 100, lowKey: 10, highKey: 200 }))).toThrow(
      'The file is corrupted: key range 10..200 exceeds 127',
    );
    expect(() => decode(withHeader({ highVelocity: 250 }))).toThrow('The file is corrupted: velocity range 0..250 exceeds 127');
  });

  it('rejects a key tracking factor that is not a number', () => {
    const layout = ensemble('big');
    const [zone] = layout.layers[0].zones;
    const extension = { keyTracking: NaN, keyCrossfadeLow: 0, keyCrossfadeHigh: 0, velocityCrossfadeLow: 0, velocityCrossfadeHigh: 0 };
    const bytes = v2File({ ...layout, layers: [{ zones: [{ ...zone, extension }] }] });
    expect(() => decode(bytes)).toThrow(CorruptFormatError);
    expect(() => decode(bytes)).toThrow('key tracking is NaN');
  });

  it('returns nothing when every layer is empty', () => {
    expect(decode(v2File({ order: 'little', subVersion: 1, name: 'Empty', layers: [{ zones: [] }, { zones: [] }] }))).toEqual([]);
  });

  it('keeps empty layers next to filled ones', () => {
    const [source] = decode(
      v2File({ order: 'little', subVersion: 1, layers: [{ name: 'Unused', zones: [] }, { zones: [{ file: 'a.wav' }] }] }),
    );
    expect(source.layers.map((layer) => layer.samples.length)).toEqual([0, 1]);
    expect(source.name).toBe('Violin Ensemble');
  });

  it('exposes the byte order it was created for', () => {
    expect(new V2Decoder(DEFAULT_METADATA_CONFIG, 'big').byteOrder).toBe('big');
  });
});
