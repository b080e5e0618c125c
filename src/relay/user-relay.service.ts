import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { AlbumForwarderService } from '../album/album-forwarder.service';
import { ChatStateService } from '../chats/chat-state.service';
import { StoppedService } from '../chats/stopped.service';
import { BOT_MESSAGES } from '../common/constants';
import { userLink } from '../common/html';
import { BroadcastService } from '../transport/telegram/broadcast.service';
import { blockedAtNotice } from './relay.format';
import type { SentMessage } from './relay.types';

/**
 * Handles private chats with users: commands and the messages relayed to
 * the operator.
 */
@Injectable()
export class UserRelayService {
  constructor(
    private readonly logger: PinoLogger,
    private readonly chatState: ChatStateService,
    private readonly stoppedService: StoppedService,
    private readonly albumForwarder: AlbumForwarderService,
    private readonly broadcastService: BroadcastService,
  ) {
    this.logger.setContext(UserRelayService.name);
  }

  async start(message: SentMessage): Promise<void> {
    this.logger.info({ userId: message.from.id }, 'Start command from user');
    await this.welcomeBack(message.chat.id);
    await this.chatState.rememberChat(message.chat);
    await this.broadcastService.sendText(
      message.chat.id,
      BOT_MESSAGES.USER_HELP,
    );
  }

  async help(message: SentMessage): Promise<void> {
    await this.broadcastService.sendText(
      message.chat.id,
      BOT_MESSAGES.USER_HELP,
    );
  }

  /**
   * Marks the user stopped and tells the operator. A user who was the
   * current reply target stops being one.
   */
  async stop(message: SentMessage): Promise<void> {
    const userChatId = message.from.id;
    this.logger.info({ userId: userChatId }, 'Stop command from user');

    const marker = await this.stoppedService.set(userChatId);
    await this.chatState.removeFromChatList(userChatId);

    const operatorChatId = await this.chatState.getOperatorChatId();
    if (operatorChatId === null) {
      this.logger.error({ userId: userChatId }, 'Admin chat id is not set');
      return;
    }
    await this.broadcastService.sendText(
      operatorChatId,
      blockedAtNotice(message.from, marker),
      { html: true },
    );

    const current = await this.chatState.getCurrentChat();
    if (current?.id === userChatId) {
      await this.chatState.clearReplyTarget();
    }
  }

  /**
   * Relays any other user message to the operator chat. Album items go
   * through the album forwarder; everything else is forwarded as is.
   */
  async relay(message: SentMessage): Promise<void> {
    const { chat } = message;
    this.logger.info(
      { userId: message.from.id, messageId: message.message_id },
      'Message from user',
    );
    await this.chatState.rememberChat(chat);
    await this.welcomeBack(chat.id);

    const operatorChatId = await this.chatState.getOperatorChatId();
    if (operatorChatId === null) {
      await this.broadcastService.sendText(
        message.from.id,
        BOT_MESSAGES.BOT_BROKEN,
      );
      this.logger.error({ userId: message.from.id }, 'Admin chat id is not set');
      return;
    }

    // Forwarded audio and stickers carry no visible sender
    if (message.audio || message.sticker) {
      await this.broadcastService.sendText(
        operatorChatId,
        BOT_MESSAGES.from(userLink(chat)),
        { html: true },
      );
    }

    if (message.media_group_id) {
      this.albumForwarder.submit(message, operatorChatId, true);
    } else {
      await this.broadcastService.forward(
        operatorChatId,
        chat.id,
        message.message_id,
      );
    }

    await this.chatState.addToChatList(chat);
  }

  private async welcomeBack(chatId: number): Promise<void> {
    if (await this.stoppedService.resume(chatId)) {
      await this.broadcastService.sendText(chatId, BOT_MESSAGES.WELCOME_BACK);
    }
  }
}
