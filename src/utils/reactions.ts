import { logger, describeError } from '../logger';
import { REACTION_DELAY_MS } from '../constants';
import { sleep } from './time';

/** The part of a discord.js Message the decorator touches. */
export interface Reactable {
  id: string;
  react(emoji: string): Promise<unknown>;
}

export interface DecorateOptions {
  delayMs?: number;
}

export interface DecorateResult {
  added: number;
  failed: string[];
}

/**
 * Adds each emoji in order, pausing between attempts but not after the last.
 * A failed reaction is logged and skipped; this never rejects.
 */
export async function decorateMessage(
  message: Reactable,
  emojis: readonly string[],
  options: DecorateOptions = {}
): Promise<DecorateResult> {
  const delayMs = options.delayMs ?? REACTION_DELAY_MS;
  const result: DecorateResult = { added: 0, failed: [] };

  for (const [i, emoji] of emojis.entries()) {
    try {
      await message.react(emoji);
      result.added++;
    } catch (e) {
      result.failed.push(emoji);
      logger.warn('Failed to add reaction', { messageId: message.id, emoji, error: describeError(e) });
    }
    if (i < emojis.length - 1) await sleep(delayMs);
  }

  logger.info('Reactions added', { messageId: message.id, added: result.added, failed: result.failed.length });
  return result;
}
