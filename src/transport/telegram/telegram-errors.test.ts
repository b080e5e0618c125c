import { TelegramError } from 'telegraf';
import { createBlockedError, createKickedError } from '../../test/mocks/telegraf.mock';
import { isBotBlockedError, isForbiddenError } from './telegram-errors';

describe('telegram errors', () => {
  test('recognizes a user blocking the bot', () => {
    const error = createBlockedError();

    expect(isForbiddenError(error)).toBe(true);
    expect(isBotBlockedError(error)).toBe(true);
  });

  test('a kick is forbidden but not a block', () => {
    const error = createKickedError();

    expect(isForbiddenError(error)).toBe(true);
    expect(isBotBlockedError(error)).toBe(false);
  });

  test('other errors are neither', () => {
    const badRequest = new TelegramError({
      error_code: 400,
      description: 'Bad Request: message text is empty',
    });

    expect(isForbiddenError(badRequest)).toBe(false);
    expect(isForbiddenError(new Error('blocked'))).toBe(false);
    expect(isBotBlockedError(undefined)).toBe(false);
  });
});
