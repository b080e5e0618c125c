import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { AlbumForwarderService } from '../album/album-forwarder.service';
import { ChatStateService } from '../chats/chat-state.service';
import { StoppedService } from '../chats/stopped.service';
import { BOT_MESSAGES } from '../common/constants';
import { userLink } from '../common/html';
import { BroadcastService } from '../transport/telegram/broadcast.service';
import { isBotBlockedError } from '../transport/telegram/telegram-errors';
import { blockedAtNotice } from './relay.format';
import type { RelayMessage } from './relay.types';

/**
 * Delivers an operator message to the user currently chosen in the reply
 * menu. Feedback ("Message sent to ...", "No current user.") goes back to
 * the chat the operator wrote from.
 */
@Injectable()
export class ReplyTargetService {
  constructor(
    private readonly logger: PinoLogger,
    private readonly chatState: ChatStateService,
    private readonly stoppedService: StoppedService,
    private readonly albumForwarder: AlbumForwarderService,
    private readonly broadcastService: BroadcastService,
  ) {
    this.logger.setContext(ReplyTargetService.name);
  }

  async send(message: RelayMessage): Promise<void> {
    const replyChatId = message.chat.id;
    const target = await this.chatState.getCurrentChat();

    if (!target) {
      if (message.media_group_id) {
        // Later items of an album whose first item already claimed the target
        this.albumForwarder.submit(message);
        this.logger.debug(
          { groupId: message.media_group_id },
          'Add next media group item to forwarder',
        );
        return;
      }
      await this.broadcastService.sendText(
        replyChatId,
        BOT_MESSAGES.NO_CURRENT_USER,
      );
      this.logger.debug({}, 'Skip message to user: no current user');
      return;
    }

    const stopped = await this.stoppedService.get(target.id);
    if (stopped) {
      await this.broadcastService.sendText(
        replyChatId,
        blockedAtNotice(target, stopped),
        { html: true },
      );
      return;
    }

    if (message.media_group_id) {
      this.albumForwarder.submit(message, target.id);
      this.logger.debug(
        { groupId: message.media_group_id, chatId: target.id },
        'Add first media group item to forwarder',
      );
      return;
    }

    try {
      await this.broadcastService.copy(
        target.id,
        message.chat.id,
        message.message_id,
      );
    } catch (error) {
      if (!isBotBlockedError(error)) {
        throw error;
      }
      await this.chatState.removeFromChatList(target.id);
      await this.stoppedService.set(target.id, true);
      await this.broadcastService.sendText(
        replyChatId,
        BOT_MESSAGES.blocked(userLink(target)),
        { html: true, disableLinkPreview: true },
      );
      this.logger.info({ chatId: target.id }, 'Blocked by user');
      return;
    }

    await this.broadcastService.sendText(
      replyChatId,
      BOT_MESSAGES.messageSent(userLink(target)),
      { html: true, disableLinkPreview: true },
    );
    this.logger.debug({ chatId: target.id }, 'Message sent to user');
  }
}
