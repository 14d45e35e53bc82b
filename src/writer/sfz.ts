import { copyFile, mkdir, open, rm } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { join } from 'path';
import { UNKNOWN_CATEGORY } from '../model/tags';
import type { LoopType, MultisampleSource, SampleMetadata } from '../model/types';
import type { Notifier } from '../notifier';

const FOLDER_POSTFIX = ' Samples';
const HEADER_LINES = ['/////////////////////////////////////////////////////////////////////////////', '////'];
const COMMENT_PREFIX = '//// ';

export const SfzHeader = {
  GLOBAL: 'global',
  GROUP: 'group',
  REGION: 'region',
} as const;

export const SfzOpcode = {
  GLOBAL_LABEL: 'global_label',
  GROUP_LABEL: 'group_label',
  SAMPLE: 'sample',
  DIRECTION: 'direction',
  SEQ_LENGTH: 'seq_length',
  SEQ_POSITION: 'seq_position',
  KEY: 'key',
  PITCH_KEY_CENTER: 'pitch_keycenter',
  LO_KEY: 'lokey',
  HI_KEY: 'hikey',
  XF_IN_LO_KEY: 'xfin_lokey',
  XF_IN_HI_KEY: 'xfin_hikey',
  XF_OUT_LO_KEY: 'xfout_lokey',
  XF_OUT_HI_KEY: 'xfout_hikey',
  LO_VEL: 'lovel',
  HI_VEL: 'hivel',
  XF_IN_LO_VEL: 'xfin_lovel',
  XF_IN_HI_VEL: 'xfin_hivel',
  XF_OUT_LO_VEL: 'xfout_lovel',
  XF_OUT_HI_VEL: 'xfout_hivel',
  OFFSET: 'offset',
  END: 'end',
  TUNE: 'tune',
  PITCH_KEYTRACK: 'pitch_keytrack',
  VOLUME: 'volume',
  AMPEG_DELAY: 'ampeg_delay',
  AMPEG_ATTACK: 'ampeg_attack',
  AMPEG_HOLD: 'ampeg_hold',
  AMPEG_DECAY: 'ampeg_decay',
  AMPEG_RELEASE: 'ampeg_release',
  AMPEG_START: 'ampeg_start',
  AMPEG_SUSTAIN: 'ampeg_sustain',
  LOOP_MODE: 'loop_mode',
  LOOP_TYPE: 'loop_type',
  LOOP_START: 'loop_start',
  LOOP_END: 'loop_end',
  LOOP_CROSSFADE: 'loop_crossfade',
} as const;

const LOOP_TYPE_NAMES: Readonly<Record<LoopType, string>> = {
  forward: 'forward',
  backward: 'backward',
  alternating: 'alternate',
};

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

/** Negative values stand for "not set" and fall back to the default. */
const check = (value: number, defaultValue: number): number => (value < 0 ? defaultValue : value);

/** Drops float noise such as 10.000000149 from single precision sources. */
const formatValue = (value: number): string => String(Math.round(value * 1e6) / 1e6);

const opcode = (name: string, value: string | number): string => `${name}=${value}`;

const isBlank = (text: string | undefined): boolean => text === undefined || text.trim() === '';

/** Opcodes that share a line; nothing is written when there are none. */
function pushLine(lines: string[], opcodes: string[]): void {
  if (opcodes.length > 0) lines.push(opcodes.join(' '));
}

export function createSafeFilename(name: string): string {
  return name.replace(/[\\/:*?"<>|\x00-\x1F]/g, '_').trim();
}

function createKeyLines(lines: string[], info: SampleMetadata): void {
  const { keyRoot, keyLow, keyHigh } = info;
  if (keyRoot === keyLow && keyLow === keyHigh) {
    lines.push(opcode(SfzOpcode.KEY, keyRoot));
  } else {
    lines.push(opcode(SfzOpcode.PITCH_KEY_CENTER, keyRoot));
    pushLine(lines, [opcode(SfzOpcode.LO_KEY, check(keyLow, 0)), opcode(SfzOpcode.HI_KEY, check(keyHigh, 127))]);
  }

  if (info.noteCrossfadeLow > 0) {
    pushLine(lines, [
      opcode(SfzOpcode.XF_IN_LO_KEY, Math.max(0, keyLow - info.noteCrossfadeLow)),
      opcode(SfzOpcode.XF_IN_HI_KEY, keyLow),
    ]);
  }
  if (info.noteCrossfadeHigh > 0) {
    pushLine(lines, [
      opcode(SfzOpcode.XF_OUT_LO_KEY, keyHigh),
      opcode(SfzOpcode.XF_OUT_HI_KEY, Math.min(127, keyHigh + info.noteCrossfadeHigh)),
    ]);
  }
}

function createVelocityLines(lines: string[], info: SampleMetadata): void {
  const { velocityLow, velocityHigh } = info;
  const range: string[] = [];
  // 0 and 1 both mean there is no lower limit
  if (velocityLow > 1) range.push(opcode(SfzOpcode.LO_VEL, velocityLow));
  if (velocityHigh > 0 && velocityHigh < 127) range.push(opcode(SfzOpcode.HI_VEL, velocityHigh));
  pushLine(lines, range);

  if (info.velocityCrossfadeLow > 0) {
    pushLine(lines, [
      opcode(SfzOpcode.XF_IN_LO_VEL, Math.max(0, velocityLow - info.velocityCrossfadeLow)),
      opcode(SfzOpcode.XF_IN_HI_VEL, velocityLow),
    ]);
  }
  if (info.velocityCrossfadeHigh > 0) {
    pushLine(lines, [
      opcode(SfzOpcode.XF_OUT_LO_VEL, velocityHigh),
      opcode(SfzOpcode.XF_OUT_HI_VEL, Math.min(127, velocityHigh + info.velocityCrossfadeHigh)),
    ]);
  }
}

function createVolumeLines(lines: string[], info: SampleMetadata): void {
  const volume = formatValue(info.gain);
  if (volume !== '0') lines.push(opcode(SfzOpcode.VOLUME, volume));

  const envelope = info.amplitudeEnvelope;
  const attributes: Array<[string, number]> = [
    [SfzOpcode.AMPEG_DELAY, envelope.delay],
    [SfzOpcode.AMPEG_ATTACK, envelope.attack],
    [SfzOpcode.AMPEG_HOLD, envelope.hold],
    [SfzOpcode.AMPEG_DECAY, envelope.decay],
    [SfzOpcode.AMPEG_RELEASE, envelope.release],
    [SfzOpcode.AMPEG_START, envelope.start * 100],
    [SfzOpcode.AMPEG_SUSTAIN, envelope.sustain * 100],
  ];
  pushLine(
    lines,
    attributes.filter(([, value]) => value >= 0).map(([name, value]) => opcode(name, formatValue(clamp(value, 0, 100)))),
  );
}

function createLoopLine(lines: string[], info: SampleMetadata): void {
  const sampleLoop = info.loops[0];
  if (sampleLoop === undefined) {
    lines.push(opcode(SfzOpcode.LOOP_MODE, 'no_loop'));
    return;
  }

  // Only forward continuous looping can be exported
  const loop = [opcode(SfzOpcode.LOOP_MODE, 'loop_continuous')];
  if (sampleLoop.type !== 'forward') loop.push(opcode(SfzOpcode.LOOP_TYPE, LOOP_TYPE_NAMES[sampleLoop.type]));
  loop.push(opcode(SfzOpcode.LOOP_START, sampleLoop.start), opcode(SfzOpcode.LOOP_END, sampleLoop.end));

  // TODO: confirm the sign of the loop length; start - end is only positive for inverted loops
  const loopLength = sampleLoop.start - sampleLoop.end;
  if (sampleLoop.crossfade > 0 && loopLength > 0 && info.sampleRate > 0) {
    const crossfadeInSeconds = sampleLoop.crossfade * (loopLength / info.sampleRate);
    loop.push(opcode(SfzOpcode.LOOP_CROSSFADE, Math.round(crossfadeInSeconds)));
  }
  pushLine(lines, loop);
}

/**
 * Lines of one region.
 *
 * @param sequenceNumber position in the round-robin sequence of the group
 */
export function createRegion(sampleFolderName: string, info: SampleMetadata, sequenceNumber: number): string[] {
  const lines = ['', `<${SfzHeader.REGION}>`];
  if (info.updatedFilename) lines.push(opcode(SfzOpcode.SAMPLE, `${sampleFolderName}\\${info.updatedFilename}`));
  if (info.reversed) lines.push(opcode(SfzOpcode.DIRECTION, 'reverse'));
  if (info.playLogic === 'round-robin') lines.push(opcode(SfzOpcode.SEQ_POSITION, sequenceNumber));

  createKeyLines(lines, info);
  createVelocityLines(lines, info);

  const trim: string[] = [];
  if (info.start >= 0) trim.push(opcode(SfzOpcode.OFFSET, info.start));
  if (info.stop >= 0) trim.push(opcode(SfzOpcode.END, info.stop));
  pushLine(lines, trim);

  if (info.tune !== 0) lines.push(opcode(SfzOpcode.TUNE, Math.round(info.tune * 100)));
  const keyTracking = Math.round(info.keyTracking * 100);
  if (keyTracking !== 100) lines.push(opcode(SfzOpcode.PITCH_KEYTRACK, keyTracking));

  createVolumeLines(lines, info);
  createLoopLine(lines, info);
  return lines;
}

function createComments(source: MultisampleSource): string[] {
  const comments: string[] = [];
  if (!isBlank(source.creator)) comments.push(`Creator : ${source.creator}`);
  if (!isBlank(source.category) && source.category !== UNKNOWN_CATEGORY) comments.push(`Category: ${source.category}`);
  if (source.keywords.length > 0) comments.push(`Keywords: ${source.keywords.join(', ')}`);
  if (source.creationDate) comments.push(`Created : ${source.creationDate.toISOString()}`);
  if (source.description !== undefined && !isBlank(source.description)) comments.push(...source.description.split('\n'));
  return comments.map((comment) => COMMENT_PREFIX + comment);
}

/** The complete description file. */
export function createSfzText(source: MultisampleSource, sampleFolderName: string): string {
  const lines = [...HEADER_LINES, ...createComments(source), '', `<${SfzHeader.GLOBAL}>`];
  if (!isBlank(source.name)) lines.push(opcode(SfzOpcode.GLOBAL_LABEL, source.name));

  for (const layer of source.layers) {
    if (layer.samples.length === 0) continue;

    const sequenceLength = layer.samples.filter((info) => info.playLogic === 'round-robin').length;
    lines.push('', `<${SfzHeader.GROUP}>`);
    if (layer.name !== undefined && !isBlank(layer.name)) lines.push(opcode(SfzOpcode.GROUP_LABEL, layer.name));
    if (sequenceLength > 0) lines.push(opcode(SfzOpcode.SEQ_LENGTH, sequenceLength));

    let sequence = 1;
    for (const info of layer.samples) {
      lines.push(...createRegion(sampleFolderName, info, sequence));
      if (info.playLogic === 'round-robin') sequence++;
    }
  }

  return lines.join('\n') + '\n';
}

export interface SamplePlacement {
  /** Absolute path of the source audio file. */
  from: string;
  /** File name inside the sample folder. */
  to: string;
}

export interface SfzPlan {
  fileName: string;
  sampleFolderName: string;
  text: string;
  placements: SamplePlacement[];
}

export function planSfz(source: MultisampleSource): SfzPlan {
  const safeName = createSafeFilename(source.name);
  const sampleFolderName = safeName + FOLDER_POSTFIX;

  const placements = new Map<string, SamplePlacement>();
  for (const layer of source.layers) {
    for (const info of layer.samples) {
      if (info.filename && info.updatedFilename && !placements.has(info.updatedFilename)) {
        placements.set(info.updatedFilename, { from: info.filename, to: info.updatedFilename });
      }
    }
  }

  return {
    fileName: `${safeName}.sfz`,
    sampleFolderName,
    text: createSfzText(source, sampleFolderName),
    placements: [...placements.values()],
  };
}

/** Puts one referenced sample into the sample folder. */
export interface SampleStore {
  store(placement: SamplePlacement, sampleFolder: string): Promise<void>;
}

export const copySampleStore: SampleStore = {
  async store(placement, sampleFolder) {
    await copyFile(placement.from, join(sampleFolder, placement.to));
  },
};

const isErrorCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

/** Creates the file, or returns undefined if it is already there. */
async function openExclusive(file: string): Promise<FileHandle | undefined> {
  try {
    return await open(file, 'wx');
  } catch (error) {
    if (isErrorCode(error, 'EEXIST')) return undefined;
    throw error;
  }
}

/**
 * Writes SFZ description files with a sibling "<name> Samples" folder.
 */
export class SfzCreator {
  private readonly notifier: Notifier;
  private readonly sampleStore: SampleStore;

  constructor(notifier: Notifier, sampleStore: SampleStore = copySampleStore) {
    this.notifier = notifier;
    this.sampleStore = sampleStore;
  }

  /**
   * Returns false without touching anything if the description file already
   * exists.
   */
  async create(destinationFolder: string, source: MultisampleSource): Promise<boolean> {
    const plan = planSfz(source);
    const multiFile = join(destinationFolder, plan.fileName);

    const handle = await openExclusive(multiFile);
    if (!handle) {
      this.notifier.logError('already-exists', [], multiFile);
      return false;
    }

    this.notifier.log('storing', [], multiFile);
    let createdFolder: string | undefined;
    try {
      try {
        await handle.writeFile(plan.text, 'utf8');
      } finally {
        await handle.close();
      }

      const sampleFolder = join(destinationFolder, plan.sampleFolderName);
      createdFolder = await mkdir(sampleFolder, { recursive: true });
      for (const placement of plan.placements) {
        await this.sampleStore.store(placement, sampleFolder);
      }
    } catch (error) {
      // A failed run removes its partial output.
      await rm(multiFile, { force: true });
      if (createdFolder !== undefined) await rm(createdFolder, { recursive: true, force: true });
      throw error;
    }

    this.notifier.log('done', [], multiFile);
    return true;
  }
}
