export const MESSAGES = {
  'end-of-input': 'Unexpected end of input.',
  'truncated-read': 'Expected %1 bytes but only %2 are available.',
  'corrupt-format': 'The file is corrupted: %1',
  'newer-format-not-supported': 'Files of the newer container generation are not supported.',
  'monolith-not-supported': 'Monolith files are not supported.',
  'unknown-format-id': 'Unknown format id: %1',
  'no-layers-detected': 'Could not detect any layers.',
  'load-failed': 'Could not load the file: %1',
  'already-exists': 'The file already exists, skipped.',
  'detected': 'Detected "%1" with %2 layer(s), keys %3 to %4.',
  'storing': 'Storing...',
  'store-failed': 'Could not store the converted files: %1',
  'done': 'Done.',
} as const;

export type MessageKey = keyof typeof MESSAGES;

/**
 * Render a catalog entry; `%1` is replaced by the first argument and so on.
 * Placeholders without an argument are left as they are.
 */
export function formatMessage(key: MessageKey, args: readonly string[] = []): string {
  return MESSAGES[key].replace(/%(\d+)/g, (placeholder, index: string) => args[Number(index) - 1] ?? placeholder);
}
