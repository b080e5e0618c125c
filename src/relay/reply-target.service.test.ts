import {
  ADMIN,
  ADMIN_CHAT,
  OPERATOR_CHAT_ID,
  photoItem,
  photoSize,
  sentMessage,
  USER_CHAT,
} from '../test/fixtures/messages';
import { createMockBroadcast, type MockBroadcast } from '../test/mocks/broadcast.mock';
import { createMockLogger } from '../test/mocks/pino-logger.mock';
import { createRelayState, type RelayState } from '../test/mocks/relay-state.mock';
import { createBlockedError, createKickedError } from '../test/mocks/telegraf.mock';
import { ReplyTargetService } from './reply-target.service';

const USER_LINK = '<a href="tg://user?id=100">Alice Smith</a>';

describe('ReplyTargetService', () => {
  let service: ReplyTargetService;
  let state: RelayState;
  let broadcast: MockBroadcast;
  let forwarder: { submit: jest.Mock };

  beforeEach(() => {
    state = createRelayState();
    broadcast = createMockBroadcast();
    forwarder = { submit: jest.fn() };
    service = new ReplyTargetService(
      createMockLogger() as never,
      state.chatState,
      state.stopped,
      forwarder as never,
      broadcast as never,
    );
  });

  describe('without a current target', () => {
    test('tells the operator there is no current user', async () => {
      await service.send(sentMessage(ADMIN_CHAT, ADMIN));

      expect(broadcast.sendText).toHaveBeenCalledWith(
        OPERATOR_CHAT_ID,
        'No current user.',
      );
      expect(broadcast.copy).not.toHaveBeenCalled();
    });

    test('hands album items to the forwarder without a destination', async () => {
      const item = photoItem('g1', [photoSize('p1')], undefined, ADMIN_CHAT);

      await service.send(item);

      expect(forwarder.submit).toHaveBeenCalledWith(item);
      expect(broadcast.sendText).not.toHaveBeenCalled();
    });
  });

  describe('with a current target', () => {
    beforeEach(async () => {
      await state.chatState.setCurrentChat({
        id: USER_CHAT.id,
        type: 'private',
        first_name: 'Alice',
        last_name: 'Smith',
      });
    });

    test('copies the message and confirms delivery', async () => {
      const message = sentMessage(ADMIN_CHAT, ADMIN);

      await service.send(message);

      expect(broadcast.copy).toHaveBeenCalledWith(
        USER_CHAT.id,
        OPERATOR_CHAT_ID,
        message.message_id,
      );
      expect(broadcast.sendText).toHaveBeenCalledWith(
        OPERATOR_CHAT_ID,
        `Message sent to ${USER_LINK}.`,
        { html: true, disableLinkPreview: true },
      );
    });

    test('sends the first album item to the forwarder with the target', async () => {
      const item = photoItem('g1', [photoSize('p1')], undefined, ADMIN_CHAT);

      await service.send(item);

      expect(forwarder.submit).toHaveBeenCalledWith(item, USER_CHAT.id);
      expect(broadcast.copy).not.toHaveBeenCalled();
    });

    test('refuses to send to a stopped user', async () => {
      await state.stopped.set(USER_CHAT.id);

      await service.send(sentMessage(ADMIN_CHAT, ADMIN));

      expect(broadcast.copy).not.toHaveBeenCalled();
      expect(broadcast.sendText).toHaveBeenCalledWith(
        OPERATOR_CHAT_ID,
        expect.stringMatching(
          /^<a href="tg:\/\/user\?id=100">Alice Smith<\/a> blocked me at .+\.$/,
        ),
        { html: true },
      );
    });

    test('marks the user blocked when the copy is refused', async () => {
      await state.chatState.addToChatList(USER_CHAT);
      broadcast.copy.mockRejectedValueOnce(createBlockedError());

      await service.send(sentMessage(ADMIN_CHAT, ADMIN));

      await expect(state.chatState.getChatList()).resolves.toEqual([]);
      await expect(state.stopped.get(USER_CHAT.id)).resolves.toEqual({
        stoppedAt: expect.any(String),
        blocked: true,
      });
      expect(broadcast.sendText).toHaveBeenCalledWith(
        OPERATOR_CHAT_ID,
        `${USER_LINK} blocked me.`,
        { html: true, disableLinkPreview: true },
      );
    });

    test('propagates other send failures', async () => {
      const failure = createKickedError();
      broadcast.copy.mockRejectedValueOnce(failure);

      await expect(service.send(sentMessage(ADMIN_CHAT, ADMIN))).rejects.toBe(
        failure,
      );
      await expect(state.stopped.get(USER_CHAT.id)).resolves.toBeNull();
    });
  });
});
