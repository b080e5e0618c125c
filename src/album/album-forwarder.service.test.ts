import { createMockLogger, type MockLogger } from '../test/mocks/pino-logger.mock';
import {
  OPERATOR_CHAT_ID,
  photoItem,
  photoSize,
  unsupportedItem,
  USER_CHAT,
  videoItem,
} from '../test/fixtures/messages';
import { AlbumForwarderService } from './album-forwarder.service';

const USER_LINK = '<a href="tg://user?id=100">Alice Smith</a>';

describe('AlbumForwarderService', () => {
  let forwarder: AlbumForwarderService;
  let logger: MockLogger;
  let sent: string[];
  let mockBroadcast: {
    sendText: jest.Mock;
    sendComposite: jest.Mock;
  };

  const createForwarder = (waitTimeoutMs?: number) =>
    new AlbumForwarderService(
      logger as never,
      mockBroadcast as never,
      { get: jest.fn(() => waitTimeoutMs) } as never,
    );

  beforeEach(() => {
    jest.useFakeTimers();
    logger = createMockLogger();
    sent = [];
    mockBroadcast = {
      sendText: jest.fn(async (chatId: number | string, text: string) => {
        sent.push(`text:${chatId}:${text}`);
      }),
      sendComposite: jest.fn(
        async (chatId: number | string, entries: unknown[]) => {
          sent.push(`composite:${chatId}:${entries.length}`);
        },
      ),
    };
    forwarder = createForwarder(1000);
    forwarder.start();
  });

  afterEach(async () => {
    if (forwarder.activeSessionCount > 0) {
      await forwarder.stop().catch(() => undefined);
    }
    jest.useRealTimers();
  });

  describe('lifecycle', () => {
    test('rejects submit before start', () => {
      const idle = createForwarder(1000);

      expect(() =>
        idle.submit(photoItem('g1', [photoSize('p1')]), OPERATOR_CHAT_ID),
      ).toThrow('Album forwarder not started');
    });

    test('rejects stop before start', async () => {
      const idle = createForwarder(1000);

      await expect(idle.stop()).rejects.toThrow('Album forwarder not started');
    });

    test('rejects a second start', () => {
      expect(() => forwarder.start()).toThrow('Album forwarder already started');
    });

    test('rejects submit after stop', async () => {
      await forwarder.stop();

      expect(() =>
        forwarder.submit(photoItem('g1', [photoSize('p1')]), OPERATOR_CHAT_ID),
      ).toThrow('Album forwarder not started');
    });
  });

  describe('submit', () => {
    test('rejects an item without media_group_id', () => {
      expect(() =>
        forwarder.submit(photoItem(undefined, [photoSize('p1')]), 1),
      ).toThrow('Album item must have a media_group_id');
    });

    test('skips a latecomer that has no session and no destination', async () => {
      forwarder.submit(photoItem('g9', [photoSize('p1')]));

      expect(forwarder.hasSession('g9')).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith(
        { groupId: 'g9', messageId: expect.any(Number) },
        'Skip album item as latecomer',
      );

      await jest.advanceTimersByTimeAsync(5000);
      expect(sent).toEqual([]);
    });

    test('returns without waiting for delivery', () => {
      forwarder.submit(photoItem('g1', [photoSize('p1')]), OPERATOR_CHAT_ID);

      expect(forwarder.hasSession('g1')).toBe(true);
      expect(sent).toEqual([]);
    });
  });

  describe('assembly', () => {
    test('forwards a quiet album as one media group with notices', async () => {
      forwarder.submit(
        photoItem('g1', [photoSize('p1-small', 10), photoSize('p1', 900)], 'Trip'),
        OPERATOR_CHAT_ID,
        true,
      );
      await jest.advanceTimersByTimeAsync(300);
      forwarder.submit(photoItem('g1', [photoSize('p2', 800)]));

      await jest.advanceTimersByTimeAsync(999);
      expect(mockBroadcast.sendComposite).not.toHaveBeenCalled();

      await jest.advanceTimersByTimeAsync(1);
      await forwarder.stop();

      expect(sent).toEqual([
        `text:${OPERATOR_CHAT_ID}:From ${USER_LINK}`,
        `composite:${OPERATOR_CHAT_ID}:2`,
        `text:${USER_CHAT.id}:Forwarded album items: 2`,
      ]);
      expect(mockBroadcast.sendText).toHaveBeenNthCalledWith(
        1,
        OPERATOR_CHAT_ID,
        `From ${USER_LINK}`,
        { html: true },
      );
      expect(mockBroadcast.sendComposite).toHaveBeenCalledWith(
        OPERATOR_CHAT_ID,
        [
          {
            type: 'photo',
            media: 'p1',
            caption: 'Trip',
            caption_entities: undefined,
          },
          {
            type: 'photo',
            media: 'p2',
            caption: undefined,
            caption_entities: undefined,
          },
        ],
      );
      expect(forwarder.activeSessionCount).toBe(0);
    });

    test('omits the sender notice unless requested', async () => {
      forwarder.submit(photoItem('g1', [photoSize('p1')]), '@relay_channel');
      await jest.advanceTimersByTimeAsync(1000);
      await forwarder.stop();

      expect(sent).toEqual([
        'composite:@relay_channel:1',
        `text:${USER_CHAT.id}:Forwarded album items: 1`,
      ]);
    });

    test('keeps routing from the first item of a group', async () => {
      forwarder.submit(photoItem('g1', [photoSize('p1')]), OPERATOR_CHAT_ID);
      forwarder.submit(videoItem('g1', 'v1'), 555, true);
      await jest.advanceTimersByTimeAsync(1000);
      await forwarder.stop();

      expect(sent).toEqual([
        `composite:${OPERATOR_CHAT_ID}:2`,
        `text:${USER_CHAT.id}:Forwarded album items: 2`,
      ]);
    });

    test('reports unsupported items back to the origin only', async () => {
      forwarder.submit(unsupportedItem('g2'), OPERATOR_CHAT_ID, true);
      forwarder.submit(unsupportedItem('g2'));
      await jest.advanceTimersByTimeAsync(1000);
      await forwarder.stop();

      expect(sent).toEqual([
        `text:${USER_CHAT.id}:Could not forward 2 album items of unsupported type.`,
      ]);
      expect(mockBroadcast.sendComposite).not.toHaveBeenCalled();
    });

    test('counts only supported items in the delivery notice', async () => {
      forwarder.submit(photoItem('g1', [photoSize('p1')]), OPERATOR_CHAT_ID);
      forwarder.submit(unsupportedItem('g1'));
      forwarder.submit(videoItem('g1', 'v1'));
      await jest.advanceTimersByTimeAsync(1000);
      await forwarder.stop();

      expect(sent).toEqual([
        `composite:${OPERATOR_CHAT_ID}:2`,
        `text:${USER_CHAT.id}:Forwarded album items: 2`,
      ]);
    });

    test('assembles concurrent groups independently', async () => {
      forwarder.submit(photoItem('g1', [photoSize('a1')]), 111);
      await jest.advanceTimersByTimeAsync(500);
      forwarder.submit(photoItem('g2', [photoSize('b1')]), 222);
      forwarder.submit(photoItem('g2', [photoSize('b2')]));

      expect(forwarder.activeSessionCount).toBe(2);

      await jest.advanceTimersByTimeAsync(500);
      expect(sent).toEqual([
        'composite:111:1',
        `text:${USER_CHAT.id}:Forwarded album items: 1`,
      ]);
      expect(forwarder.hasSession('g1')).toBe(false);

      await jest.advanceTimersByTimeAsync(500);
      await forwarder.stop();
      expect(sent.slice(2)).toEqual([
        'composite:222:2',
        `text:${USER_CHAT.id}:Forwarded album items: 2`,
      ]);
    });

    test('honors the configured wait timeout', async () => {
      await forwarder.stop();
      forwarder = createForwarder(250);
      forwarder.start();

      forwarder.submit(photoItem('g1', [photoSize('p1')]), OPERATOR_CHAT_ID);
      await jest.advanceTimersByTimeAsync(250);
      await forwarder.stop();

      expect(mockBroadcast.sendComposite).toHaveBeenCalledTimes(1);
    });

    test('falls back to a one second wait when unconfigured', async () => {
      await forwarder.stop();
      forwarder = createForwarder(undefined);
      forwarder.start();

      forwarder.submit(photoItem('g1', [photoSize('p1')]), OPERATOR_CHAT_ID);
      await jest.advanceTimersByTimeAsync(999);
      expect(mockBroadcast.sendComposite).not.toHaveBeenCalled();

      await jest.advanceTimersByTimeAsync(1);
      await forwarder.stop();
      expect(mockBroadcast.sendComposite).toHaveBeenCalledTimes(1);
    });

    test('drops items arriving while the group is being sent', async () => {
      let releaseComposite = () => {};
      mockBroadcast.sendComposite.mockImplementationOnce(
        () =>
          new Promise<void>(resolve => {
            releaseComposite = resolve;
          }),
      );

      forwarder.submit(photoItem('g1', [photoSize('p1')]), OPERATOR_CHAT_ID);
      await jest.advanceTimersByTimeAsync(1000);
      expect(mockBroadcast.sendComposite).toHaveBeenCalledTimes(1);

      const late = photoItem('g1', [photoSize('p2')]);
      forwarder.submit(late);

      expect(logger.warn).toHaveBeenCalledWith(
        { groupId: 'g1', messageId: late.message_id },
        'Skip album item arriving after its group was assembled',
      );

      releaseComposite();
      await forwarder.stop();
      expect(mockBroadcast.sendComposite).toHaveBeenCalledTimes(1);
      expect(sent).toEqual([`text:${USER_CHAT.id}:Forwarded album items: 1`]);
    });

    test('starts a new session for a group id seen after its cleanup', async () => {
      forwarder.submit(photoItem('g1', [photoSize('p1')]), OPERATOR_CHAT_ID);
      await jest.advanceTimersByTimeAsync(1000);
      expect(forwarder.hasSession('g1')).toBe(false);

      forwarder.submit(photoItem('g1', [photoSize('p2')]), OPERATOR_CHAT_ID);
      expect(forwarder.hasSession('g1')).toBe(true);
      await jest.advanceTimersByTimeAsync(1000);
      await forwarder.stop();

      expect(mockBroadcast.sendComposite).toHaveBeenCalledTimes(2);
    });
  });

  describe('failures', () => {
    test('logs a delivery error and still removes the session', async () => {
      const failure = new Error('Bad Request: wrong file identifier');
      mockBroadcast.sendComposite.mockRejectedValueOnce(failure);

      forwarder.submit(photoItem('g1', [photoSize('p1')]), OPERATOR_CHAT_ID);
      await jest.advanceTimersByTimeAsync(1000);
      await forwarder.stop();

      expect(logger.error).toHaveBeenCalledWith(
        { err: failure, task: 'album:g1' },
        'Album forward error',
      );
      expect(forwarder.hasSession('g1')).toBe(false);
      expect(sent).toEqual([]);
    });

    test('keeps other groups running when one fails', async () => {
      mockBroadcast.sendComposite.mockRejectedValueOnce(new Error('boom'));

      forwarder.submit(photoItem('g1', [photoSize('a1')]), 111);
      forwarder.submit(photoItem('g2', [photoSize('b1')]), 222);
      await jest.advanceTimersByTimeAsync(1000);
      await forwarder.stop();

      expect(sent).toEqual([
        'composite:222:1',
        `text:${USER_CHAT.id}:Forwarded album items: 1`,
      ]);
    });
  });

  describe('shutdown', () => {
    test('abandons albums still waiting for items', async () => {
      forwarder.submit(photoItem('g1', [photoSize('p1')]), OPERATOR_CHAT_ID);
      forwarder.submit(photoItem('g1', [photoSize('p2')]));
      await jest.advanceTimersByTimeAsync(400);

      await forwarder.stop();

      expect(sent).toEqual([]);
      expect(forwarder.activeSessionCount).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith(
        { groupId: 'g1', dropped: 2 },
        'Album assembly interrupted by shutdown',
      );
    });

    test('lets an album already being sent finish', async () => {
      let releaseComposite = () => {};
      mockBroadcast.sendComposite.mockImplementationOnce(
        (chatId: number | string, entries: unknown[]) =>
          new Promise<void>(resolve => {
            releaseComposite = () => {
              sent.push(`composite:${chatId}:${entries.length}`);
              resolve();
            };
          }),
      );

      forwarder.submit(photoItem('g1', [photoSize('p1')]), OPERATOR_CHAT_ID);
      await jest.advanceTimersByTimeAsync(1000);

      const stopping = forwarder.stop();
      releaseComposite();
      await stopping;

      expect(sent).toEqual([
        `composite:${OPERATOR_CHAT_ID}:1`,
        `text:${USER_CHAT.id}:Forwarded album items: 1`,
      ]);
    });
  });
});
