import { formatMessage } from '../messages';
import type { MessageKey } from '../messages';

/** Base class of everything the decoding layer throws on purpose. */
export class ConversionError extends Error {
  readonly key: MessageKey;
  readonly args: readonly string[];

  constructor(key: MessageKey, args: readonly string[] = []) {
    super(formatMessage(key, args));
    this.name = new.target.name;
    this.key = key;
    this.args = args;
  }
}

export class EndOfInputError extends ConversionError {
  constructor() {
    super('end-of-input');
  }
}

export class TruncatedReadError extends ConversionError {
  constructor(expected: number, available: number) {
    super('truncated-read', [String(expected), String(available)]);
  }
}

export class CorruptFormatError extends ConversionError {
  constructor(detail: string) {
    super('corrupt-format', [detail]);
  }
}

export class UnsupportedVariantError extends ConversionError {
  constructor(key: 'newer-format-not-supported' | 'monolith-not-supported') {
    super(key);
  }
}

export class UnknownFormatError extends ConversionError {
  readonly formatId: string;

  constructor(magic: number) {
    const formatId = magic.toString(16).toUpperCase();
    super('unknown-format-id', [formatId]);
    this.formatId = formatId;
  }
}
