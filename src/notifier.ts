import { formatMessage } from './messages';
import type { MessageKey } from './messages';

/**
 * Receives progress and diagnostics. The subject is usually the path of the
 * file the message is about.
 */
export interface Notifier {
  log(key: MessageKey, args?: readonly string[], subject?: string): void;
  logError(key: MessageKey, args?: readonly string[], subject?: string): void;
}

function render(key: MessageKey, args: readonly string[], subject: string | undefined): string {
  const message = formatMessage(key, args);
  return subject ? `${subject}: ${message}` : message;
}

export class ConsoleNotifier implements Notifier {
  log(key: MessageKey, args: readonly string[] = [], subject?: string): void {
    console.log(render(key, args, subject));
  }

  logError(key: MessageKey, args: readonly string[] = [], subject?: string): void {
    console.error(render(key, args, subject));
  }
}
