import { serializeError } from '../domain/errors';
import type { ClipboardWriter } from '../ports/ClipboardWriter';
import type { RuntimeLogger } from '../ports/RuntimeLogger';
import { silentLogger } from '../ports/RuntimeLogger';

/**
 * Tries each writer in order and stops at the first that succeeds.
 * Resolves `false` when none is given or all of them fail.
 */
export async function copyToClipboard(
  text: string,
  writers: readonly ClipboardWriter[],
  logger: RuntimeLogger = silentLogger
): Promise<boolean> {
  for (const [attempt, writer] of writers.entries()) {
    try {
      await writer.writeText(text);
      return true;
    } catch (error) {
      logger.warn('Clipboard write failed', { attempt, error: serializeError(error) });
    }
  }
  return false;
}
