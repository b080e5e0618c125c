import { TelegramError } from 'telegraf';

/** HTTP status Telegram answers with when the bot may not write to a chat */
const FORBIDDEN = 403;

/**
 * True when Telegram refused the call with 403, e.g. the user blocked the
 * bot or the bot was removed from the group.
 */
export function isForbiddenError(error: unknown): error is TelegramError {
  return error instanceof TelegramError && error.code === FORBIDDEN;
}

/**
 * True when the target user has blocked the bot.
 */
export function isBotBlockedError(error: unknown): error is TelegramError {
  return (
    isForbiddenError(error) &&
    error.description.toLowerCase().includes('blocked')
  );
}
